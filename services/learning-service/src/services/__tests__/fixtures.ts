import type { CollectionName } from '../../schemas/entity.schemas';
import { MemoryDocumentStore } from '../../store/memory/memory.store';
import type { Document } from '../../store/types';
import { createServiceContext, type ServiceContext } from '../context';

export const NOW = new Date('2024-06-01T12:00:00Z');

export function createTestContext(store = new MemoryDocumentStore({ dbName: 'test_db' }), maxAttempts?: number): ServiceContext {
  return createServiceContext(store, { clock: () => NOW, maxAttempts });
}

/**
 * Simulates a concurrent writer: before each of the next `races` inserts
 * into the target collection, a rival document derived from it lands first.
 */
export class RacingStore extends MemoryDocumentStore {
  private raced = 0;

  constructor(
    private readonly target: CollectionName,
    private readonly rival: (doc: Document, race: number) => Document,
    private readonly races = 1
  ) {
    super({ dbName: 'test_db' });
  }

  async insertOne(collection: CollectionName, doc: Document): Promise<string> {
    if (collection === this.target && this.raced < this.races) {
      this.raced += 1;
      await super.insertOne(collection, this.rival(doc, this.raced));
    }
    return super.insertOne(collection, doc);
  }
}

import { Types } from 'mongoose';
import { performance } from 'perf_hooks';
import { logDatabaseOperation } from '@eduhub/shared/config/logger';
import { COLLECTION_NAMES, isCollectionName, validateEntity, type CollectionName } from '../../schemas/entity.schemas';
import { indexSpecsOf, type IndexSpec } from '../../models';
import { DuplicateKeyError, SchemaValidationError } from '../errors';
import type {
  CollectionStats,
  DatabaseInfo,
  Document,
  DocumentStore,
  ExplainSummary,
  Filter,
  FindOptions,
  Pipeline,
  UpdateResult,
  UpdateSpec,
} from '../types';
import { AggregationExecutor, projectDocument, sortDocuments } from './aggregation';
import { matchesFilter, type QueryContext } from './query';
import { applyUpdate } from './update';
import { canonicalKey, cloneDocument, getPath, isObjectId, valuesEqual } from './values';

export interface MemoryStoreOptions {
  dbName?: string;
  /** Generates `_id` values; defaults to fresh ObjectIds */
  idFactory?: () => Types.ObjectId;
}

/**
 * In-process document store with the same unique indexes and document
 * validation as the MongoDB collections. Used by tests and offline runs.
 */
export class MemoryDocumentStore implements DocumentStore {
  readonly name: string;
  private readonly collections = new Map<CollectionName, Document[]>();
  private readonly idFactory: () => Types.ObjectId;

  constructor(options: MemoryStoreOptions = {}) {
    this.name = options.dbName ?? 'eduhub_db';
    this.idFactory = options.idFactory ?? (() => new Types.ObjectId());
  }

  async ensureCollections(): Promise<void> {
    for (const name of COLLECTION_NAMES) {
      this.documents(name);
    }
  }

  async listCollections(): Promise<string[]> {
    return [...this.collections.keys()].sort();
  }

  async find(collection: CollectionName, filter: Filter = {}, options: FindOptions = {}): Promise<Document[]> {
    let result = this.documents(collection).filter((doc) => matchesFilter(doc, filter, this.queryContext(collection)));
    if (options.sort) {
      result = sortDocuments(result, options.sort);
    }
    if (options.skip) {
      result = result.slice(options.skip);
    }
    if (options.limit) {
      result = result.slice(0, options.limit);
    }
    const { projection } = options;
    return result.map((doc) => (projection ? projectDocument(doc, projection) : cloneDocument(doc)));
  }

  async findOne(collection: CollectionName, filter: Filter, options: FindOptions = {}): Promise<Document | null> {
    const [first] = await this.find(collection, filter, { ...options, limit: 1 });
    return first ?? null;
  }

  async insertOne(collection: CollectionName, doc: Document): Promise<string> {
    const stored = cloneDocument(doc);
    if (stored._id === undefined) {
      stored._id = this.idFactory();
    }
    this.assertValid(collection, stored);
    this.assertUnique(collection, stored);
    this.documents(collection).push(stored);
    logDatabaseOperation('insertOne', collection);
    return idToString(stored._id);
  }

  /**
   * Ordered insert: documents before the first failure stay inserted.
   */
  async insertMany(collection: CollectionName, docs: Document[]): Promise<string[]> {
    const ids: string[] = [];
    for (const doc of docs) {
      ids.push(await this.insertOne(collection, doc));
    }
    return ids;
  }

  async updateOne(collection: CollectionName, filter: Filter, update: UpdateSpec): Promise<UpdateResult> {
    const docs = this.documents(collection);
    const index = docs.findIndex((doc) => matchesFilter(doc, filter, this.queryContext(collection)));
    if (index === -1) {
      return { matchedCount: 0, modifiedCount: 0 };
    }

    const current = docs[index];
    const updated = applyUpdate(current, update);
    if (valuesEqual(current, updated)) {
      return { matchedCount: 1, modifiedCount: 0 };
    }

    this.assertValid(collection, updated);
    this.assertUnique(collection, updated, current);
    docs[index] = updated;
    logDatabaseOperation('updateOne', collection);
    return { matchedCount: 1, modifiedCount: 1 };
  }

  async deleteOne(collection: CollectionName, filter: Filter): Promise<number> {
    const docs = this.documents(collection);
    const index = docs.findIndex((doc) => matchesFilter(doc, filter, this.queryContext(collection)));
    if (index === -1) {
      return 0;
    }
    docs.splice(index, 1);
    logDatabaseOperation('deleteOne', collection);
    return 1;
  }

  async deleteMany(collection: CollectionName, filter: Filter = {}): Promise<number> {
    const docs = this.documents(collection);
    const kept = docs.filter((doc) => !matchesFilter(doc, filter, this.queryContext(collection)));
    const deleted = docs.length - kept.length;
    this.collections.set(collection, kept);
    logDatabaseOperation('deleteMany', collection, { deleted });
    return deleted;
  }

  async countDocuments(collection: CollectionName, filter: Filter = {}): Promise<number> {
    return this.documents(collection).filter((doc) => matchesFilter(doc, filter, this.queryContext(collection))).length;
  }

  async aggregate(collection: CollectionName, pipeline: Pipeline): Promise<Document[]> {
    const executor = new AggregationExecutor(
      (name) => (isCollectionName(name) ? this.collections.get(name) : undefined),
      this.queryContext(collection)
    );
    return executor.execute(pipeline, this.documents(collection).map(cloneDocument));
  }

  /**
   * Plan summary modelled on executionStats: an index scan when the filter
   * constrains the leading field of an index, a collection scan otherwise.
   */
  async explain(collection: CollectionName, filter: Filter): Promise<ExplainSummary> {
    const started = performance.now();
    const docs = this.documents(collection);
    const matched = docs.filter((doc) => matchesFilter(doc, filter, this.queryContext(collection)));
    const index = this.chooseIndex(collection, filter);
    return {
      collection,
      stage: index ? 'IXSCAN' : 'COLLSCAN',
      indexName: index ? index.name : null,
      totalDocsExamined: index ? matched.length : docs.length,
      totalKeysExamined: index ? matched.length : 0,
      nReturned: matched.length,
      executionTimeMillis: Math.round(performance.now() - started),
    };
  }

  async stats(collection: CollectionName): Promise<CollectionStats> {
    const docs = this.documents(collection);
    const size = docs.reduce((total, doc) => total + Buffer.byteLength(JSON.stringify(doc)), 0);
    return {
      collection,
      count: docs.length,
      size,
      avgObjSize: docs.length === 0 ? 0 : Math.round(size / docs.length),
      // +1 for the implicit _id index
      nindexes: indexSpecsOf(collection).length + 1,
    };
  }

  async databaseInfo(): Promise<DatabaseInfo> {
    const names = await this.listCollections();
    return {
      name: this.name,
      collections: names.filter(isCollectionName).map((name) => ({ name, count: this.documents(name).length })),
    };
  }

  async close(): Promise<void> {
    this.collections.clear();
  }

  private documents(collection: CollectionName): Document[] {
    const existing = this.collections.get(collection);
    if (existing) {
      return existing;
    }
    const created: Document[] = [];
    this.collections.set(collection, created);
    return created;
  }

  private queryContext(collection: CollectionName): QueryContext {
    const textFields = indexSpecsOf(collection).flatMap((spec) =>
      Object.entries(spec.fields)
        .filter(([, direction]) => direction === 'text')
        .map(([field]) => field)
    );
    return { textFields };
  }

  private chooseIndex(collection: CollectionName, filter: Filter): IndexSpec | undefined {
    const filterKeys = Object.keys(filter);
    return indexSpecsOf(collection).find((spec) => {
      const [leading, direction] = Object.entries(spec.fields)[0] ?? [];
      if (direction === 'text') {
        return filterKeys.includes('$text');
      }
      return leading !== undefined && filterKeys.includes(leading);
    });
  }

  private assertValid(collection: CollectionName, doc: Document): void {
    const messages = validateEntity(collection, doc);
    if (messages.length > 0) {
      throw new SchemaValidationError(collection, messages);
    }
  }

  /**
   * Missing fields index as null, so two documents lacking a unique field collide.
   */
  private assertUnique(collection: CollectionName, candidate: Document, replacing?: Document): void {
    const others = this.documents(collection).filter((doc) => doc !== replacing);
    const uniqueIndexes = [
      { fields: { _id: 1 }, unique: true, name: '_id_' },
      ...indexSpecsOf(collection).filter((spec) => spec.unique),
    ];

    for (const spec of uniqueIndexes) {
      const fields = Object.keys(spec.fields);
      const keyOf = (doc: Document) => canonicalKey(fields.map((field) => getPath(doc, field) ?? null));
      const candidateKey = keyOf(candidate);
      if (others.some((doc) => keyOf(doc) === candidateKey)) {
        throw new DuplicateKeyError(
          collection,
          fields,
          Object.fromEntries(fields.map((field): [string, unknown] => [field, getPath(candidate, field) ?? null]))
        );
      }
    }
  }
}

function idToString(id: unknown): string {
  return isObjectId(id) ? id.toHexString() : String(id);
}

import logger from '@eduhub/shared/config/logger';
import type { CollectionName, UserRole } from '../schemas/entity.schemas';
import { DisplayIdCollisionError, DuplicateKeyError } from '../store/errors';
import type { Document, DocumentStore, Filter } from '../store/types';

export const DISPLAY_ID_PREFIXES = {
  student: 'STU_',
  instructor: 'INST_',
  course: 'COURSE_',
  lesson: 'LESSON_',
  assignment: 'ASSIGN_',
  enrollment: 'ENROLL_',
  submission: 'SUB_',
} as const;

export type DisplayIdPrefix = (typeof DISPLAY_ID_PREFIXES)[keyof typeof DISPLAY_ID_PREFIXES];

const escapeRegex = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/** `STU_` + 7 -> `STU_007`; wider numbers keep all their digits */
export function formatDisplayId(prefix: string, sequence: number): string {
  return `${prefix}${String(sequence).padStart(3, '0')}`;
}

export function parseDisplaySequence(prefix: string, displayId: string): number | null {
  const match = new RegExp(`^${escapeRegex(prefix)}(\\d+)$`).exec(displayId);
  return match ? Number(match[1]) : null;
}

/** Avatar URLs follow the role and its display number, e.g. student_12 */
export const avatarUrl = (role: UserRole, sequence: number): string =>
  `https://avatars.example.com/${role}_${sequence}.png`;

export interface AllocationRequest {
  collection: CollectionName;
  field: string;
  prefix: DisplayIdPrefix;
  /** Builds the document for a candidate ID; called again on every retry */
  build: (displayId: string) => Document | Promise<Document>;
  /** Other unique indexes whose collisions are retried, e.g. a per-course lesson order */
  retryOn?: string[][];
}

export interface Allocation {
  id: string;
  displayId: string;
  doc: Document;
}

/**
 * Allocates `PREFIX_NNN` display IDs by reading the current maximum and
 * inserting the next one. Concurrent writers can pick the same number; the
 * unique index rejects the loser, which retries with a fresh read, up to
 * `maxAttempts` times.
 */
export class DisplayIdAllocator {
  constructor(
    private readonly store: DocumentStore,
    private readonly maxAttempts = 5
  ) {}

  async nextId(collection: CollectionName, field: string, prefix: string, scope: Filter = {}): Promise<string> {
    const existing = await this.store.find(
      collection,
      { ...scope, [field]: { $regex: `^${escapeRegex(prefix)}\\d+$` } },
      { projection: { [field]: 1, _id: 0 } }
    );
    const highest = existing.reduce((max, doc) => {
      const value = doc[field];
      const sequence = typeof value === 'string' ? parseDisplaySequence(prefix, value) : null;
      return sequence !== null && sequence > max ? sequence : max;
    }, 0);
    return formatDisplayId(prefix, highest + 1);
  }

  async insert(request: AllocationRequest): Promise<Allocation> {
    const { collection, field, prefix, build, retryOn = [] } = request;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const displayId = await this.nextId(collection, field, prefix);
      const doc = await build(displayId);
      try {
        const id = await this.store.insertOne(collection, doc);
        return { id, displayId, doc };
      } catch (error) {
        const retryable =
          error instanceof DuplicateKeyError && (error.isOn(field) || retryOn.some((fields) => error.isOn(...fields)));
        if (!retryable) {
          throw error;
        }
        logger.warn('Display ID collision, retrying', {
          service: 'learning-service',
          collection,
          displayId,
          attempt,
          keyFields: error.keyFields,
        });
      }
    }

    throw new DisplayIdCollisionError(collection, prefix, this.maxAttempts);
  }
}

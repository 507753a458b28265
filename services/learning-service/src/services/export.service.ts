import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { Types } from 'mongoose';
import { z } from 'zod';
import logger from '@eduhub/shared/config/logger';
import { isPlainObject } from '@eduhub/shared/utils/typeGuards';
import { COLLECTION_NAMES, type CollectionName } from '../schemas/entity.schemas';
import type { Document } from '../store';
import type { ServiceContext } from './context';
import type { SeedSummary } from './seed.service';

/** Fields stored as dates; their ISO strings are turned back into Dates on import */
export const DATE_FIELDS = new Set([
  'dateJoined',
  'createdAt',
  'updatedAt',
  'dueDate',
  'enrollmentDate',
  'completionDate',
  'submissionDate',
  'gradedDate',
]);

const ISO_TIMESTAMP = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?Z$/;

export type ExportPayload = Record<CollectionName, Document[]>;

export interface ExportSink {
  write(destination: string, contents: string): Promise<void>;
}

export const fileSink: ExportSink = {
  async write(destination, contents) {
    await mkdir(dirname(destination), { recursive: true });
    await writeFile(destination, contents, 'utf8');
  },
};

const importPayloadSchema = z.record(z.array(z.record(z.unknown())));

/**
 * JSON-safe copy: ObjectIds become hex strings, Dates ISO strings.
 */
export function toSerializable(value: unknown): unknown {
  if (value instanceof Types.ObjectId) {
    return value.toHexString();
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    return value.map(toSerializable);
  }
  if (isPlainObject(value)) {
    return Object.fromEntries(Object.entries(value).map(([key, item]): [string, unknown] => [key, toSerializable(item)]));
  }
  return value;
}

function reviveDocument(doc: Record<string, unknown>): Document {
  return Object.fromEntries(
    Object.entries(doc).map(([key, value]): [string, unknown] => {
      if (key === '_id' && typeof value === 'string' && Types.ObjectId.isValid(value) && value.length === 24) {
        return [key, new Types.ObjectId(value)];
      }
      if (DATE_FIELDS.has(key) && typeof value === 'string' && ISO_TIMESTAMP.test(value)) {
        return [key, new Date(value)];
      }
      return [key, value];
    })
  );
}

export class ExportService {
  constructor(
    private readonly ctx: ServiceContext,
    private readonly sink: ExportSink = fileSink
  ) {}

  async collectSampleData(): Promise<ExportPayload> {
    const payload: ExportPayload = {
      users: [],
      courses: [],
      lessons: [],
      assignments: [],
      enrollments: [],
      submissions: [],
    };
    for (const name of COLLECTION_NAMES) {
      payload[name] = await this.ctx.store.find(name);
    }
    return payload;
  }

  /** Writes every collection as `{ <collection>: documents }`, indented by 2 */
  async exportSampleData(destination: string): Promise<SeedSummary> {
    const payload = await this.collectSampleData();
    await this.sink.write(destination, JSON.stringify(toSerializable(payload), null, 2));

    const summary = countsOf(payload);
    logger.info('Sample data exported', { destination, ...summary, service: 'learning-service' });
    return summary;
  }

  /**
   * Inserts exported documents back into their collections. Collections not
   * present in the payload are left alone; unknown keys are ignored.
   */
  async importSampleData(payload: unknown, options: { clear?: boolean } = {}): Promise<SeedSummary> {
    const parsed = importPayloadSchema.parse(payload);
    const summary = countsOf({});

    for (const name of COLLECTION_NAMES) {
      const docs = parsed[name];
      if (!docs) {
        continue;
      }
      if (options.clear !== false) {
        await this.ctx.store.deleteMany(name, {});
      }
      summary[name] = (await this.ctx.store.insertMany(name, docs.map(reviveDocument))).length;
    }

    logger.info('Sample data imported', { ...summary, service: 'learning-service' });
    return summary;
  }
}

function countsOf(payload: Partial<ExportPayload>): SeedSummary {
  return {
    users: payload.users?.length ?? 0,
    courses: payload.courses?.length ?? 0,
    lessons: payload.lessons?.length ?? 0,
    assignments: payload.assignments?.length ?? 0,
    enrollments: payload.enrollments?.length ?? 0,
    submissions: payload.submissions?.length ?? 0,
  };
}

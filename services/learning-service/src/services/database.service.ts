import { logPerformance } from '@eduhub/shared/config/logger';
import { performance } from 'perf_hooks';
import { COLLECTION_NAMES, type CollectionName } from '../schemas/entity.schemas';
import type { CollectionStats, DatabaseInfo, ExplainSummary, Filter } from '../store';
import { DAY_MS, type ServiceContext } from './context';

export type QueryTiming = {
  name: string;
  collection: CollectionName;
  durationMs: number;
  resultCount: number;
};

/**
 * Diagnostics over the store: query plans, timings, sizes.
 */
export class DatabaseService {
  constructor(private readonly ctx: ServiceContext) {}

  async analyzeQueryPerformance(collection: CollectionName, filter: Filter): Promise<ExplainSummary> {
    return this.ctx.store.explain(collection, filter);
  }

  /**
   * Times a fixed set of representative queries: a title pattern search,
   * recent enrollments and assignments due within a week.
   */
  async optimizeSlowQueries(): Promise<QueryTiming[]> {
    const now = this.ctx.clock();
    const samples: { name: string; collection: CollectionName; filter: Filter }[] = [
      { name: 'courses by title pattern', collection: 'courses', filter: { title: { $regex: 'Course', $options: 'i' } } },
      {
        name: 'enrollments in the last 30 days',
        collection: 'enrollments',
        filter: { enrollmentDate: { $gte: new Date(now.getTime() - 30 * DAY_MS) } },
      },
      {
        name: 'assignments due within 7 days',
        collection: 'assignments',
        filter: { dueDate: { $gte: now, $lte: new Date(now.getTime() + 7 * DAY_MS) } },
      },
    ];

    const timings: QueryTiming[] = [];
    for (const sample of samples) {
      const started = performance.now();
      const docs = await this.ctx.store.find(sample.collection, sample.filter);
      const durationMs = performance.now() - started;
      logPerformance(sample.name, durationMs, 'ms', { collection: sample.collection, results: docs.length });
      timings.push({ name: sample.name, collection: sample.collection, durationMs, resultCount: docs.length });
    }
    return timings;
  }

  async getCollectionStatistics(): Promise<CollectionStats[]> {
    const stats: CollectionStats[] = [];
    for (const name of COLLECTION_NAMES) {
      stats.push(await this.ctx.store.stats(name));
    }
    return stats;
  }

  async retrieveDatabaseInfo(): Promise<DatabaseInfo> {
    return this.ctx.store.databaseInfo();
  }
}

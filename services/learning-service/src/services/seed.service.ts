import logger from '@eduhub/shared/config/logger';
import { generateSampleData, type GeneratorOptions, type SampleCounts } from '../generator/sampleData';
import { COLLECTION_NAMES, type CollectionName } from '../schemas/entity.schemas';
import type { ServiceContext } from './context';

export type SeedSummary = Record<CollectionName, number>;

export class SeedService {
  constructor(private readonly ctx: ServiceContext) {}

  /**
   * Replaces the contents of every collection with a generated fixture set.
   * Returns the number of documents inserted per collection.
   */
  async seedDatabase(counts: SampleCounts, options: GeneratorOptions = {}): Promise<SeedSummary> {
    await this.clearAll();
    const dataset = generateSampleData(counts, { now: this.ctx.clock(), ...options });

    const summary: SeedSummary = {
      users: (await this.ctx.store.insertMany('users', dataset.users)).length,
      courses: (await this.ctx.store.insertMany('courses', dataset.courses)).length,
      lessons: (await this.ctx.store.insertMany('lessons', dataset.lessons)).length,
      assignments: (await this.ctx.store.insertMany('assignments', dataset.assignments)).length,
      enrollments: (await this.ctx.store.insertMany('enrollments', dataset.enrollments)).length,
      submissions: (await this.ctx.store.insertMany('submissions', dataset.submissions)).length,
    };

    logger.info('Sample data inserted', { ...summary, service: 'learning-service' });
    return summary;
  }

  async clearAll(): Promise<void> {
    for (const name of COLLECTION_NAMES) {
      await this.ctx.store.deleteMany(name, {});
    }
  }
}

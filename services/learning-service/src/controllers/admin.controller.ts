import type { Request, Response } from 'express';
import { z } from 'zod';
import { asyncHandler } from '@eduhub/shared/utils/asyncHandler';
import { successResponse } from '@eduhub/shared/utils/responseBuilder';
import { seededRandom } from '../generator/random';
import type { SampleCounts } from '../generator/sampleData';
import { COLLECTION_NAMES } from '../schemas/entity.schemas';
import type { DatabaseService } from '../services/database.service';
import type { ExportService } from '../services/export.service';
import type { SeedService } from '../services/seed.service';
import { unsupportedOperators } from '../store/memory/query';

const [firstCollection, ...otherCollections] = COLLECTION_NAMES;

export const explainSchema = z.object({
  collection: z.enum([firstCollection, ...otherCollections]),
  filter: z
    .record(z.unknown())
    .default({})
    .superRefine((filter, ctx) => {
      for (const operator of unsupportedOperators(filter)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unsupported query operator: ${operator}` });
      }
    }),
});

const count = (max: number) => z.number().int().min(0).max(max).optional();

export const seedSchema = z.object({
  users: z.number().int().min(1).max(1000).optional(),
  courses: count(200),
  lessons: count(5000),
  assignments: count(2000),
  enrollments: count(10000),
  submissions: count(10000),
  seed: z.number().int().optional(),
});

export const exportSchema = z.object({}).strict();

export type AdminDefaults = {
  counts: SampleCounts;
  exportPath: string;
};

export class AdminController {
  constructor(
    private readonly databaseService: DatabaseService,
    private readonly seedService: SeedService,
    private readonly exportService: ExportService,
    private readonly defaults: AdminDefaults
  ) {}

  info = asyncHandler(async (_req: Request, res: Response) => {
    const data = await this.databaseService.retrieveDatabaseInfo();
    return successResponse(res, { message: 'Database info retrieved successfully', data });
  });

  stats = asyncHandler(async (_req: Request, res: Response) => {
    const data = await this.databaseService.getCollectionStatistics();
    return successResponse(res, { message: 'Collection statistics retrieved successfully', data });
  });

  explain = asyncHandler(async (req: Request, res: Response) => {
    const { collection, filter } = explainSchema.parse(req.body);
    const data = await this.databaseService.analyzeQueryPerformance(collection, filter);
    return successResponse(res, { message: 'Query plan retrieved successfully', data });
  });

  slowQueries = asyncHandler(async (_req: Request, res: Response) => {
    const data = await this.databaseService.optimizeSlowQueries();
    return successResponse(res, { message: 'Query timings collected', data });
  });

  seed = asyncHandler(async (req: Request, res: Response) => {
    const { seed, ...counts } = seedSchema.parse(req.body ?? {});
    const merged: SampleCounts = {
      users: counts.users ?? this.defaults.counts.users,
      courses: counts.courses ?? this.defaults.counts.courses,
      lessons: counts.lessons ?? this.defaults.counts.lessons,
      assignments: counts.assignments ?? this.defaults.counts.assignments,
      enrollments: counts.enrollments ?? this.defaults.counts.enrollments,
      submissions: counts.submissions ?? this.defaults.counts.submissions,
    };
    const data = await this.seedService.seedDatabase(merged, seed === undefined ? {} : { random: seededRandom(seed) });
    return successResponse(res, { statusCode: 201, message: 'Sample data inserted', data });
  });

  exportData = asyncHandler(async (req: Request, res: Response) => {
    exportSchema.parse(req.body ?? {});
    const destination = this.defaults.exportPath;
    const data = await this.exportService.exportSampleData(destination);
    return successResponse(res, { message: 'Sample data exported', data: { destination, counts: data } });
  });
}

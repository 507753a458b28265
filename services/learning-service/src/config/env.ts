import { z } from 'zod';
import { loadServiceConfig } from '@eduhub/shared/config/configLoader';

export const SERVICE_NAME = 'learning-service';

const LearningServiceSchema = z.object({
  STORE_DRIVER: z.enum(['mongo', 'memory']).default('mongo'),
  DISPLAY_ID_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(50).default(5),
  EXPORT_PATH: z.string().min(1).default('sample_data.json'),
  REQUEST_TIMEOUT: z.string().min(1).default('30s'),
  SEED_USERS: z.coerce.number().int().min(1).default(20),
  SEED_COURSES: z.coerce.number().int().min(1).default(8),
  SEED_LESSONS: z.coerce.number().int().min(0).default(25),
  SEED_ASSIGNMENTS: z.coerce.number().int().min(0).default(10),
  SEED_ENROLLMENTS: z.coerce.number().int().min(0).default(15),
  SEED_SUBMISSIONS: z.coerce.number().int().min(0).default(12),
});

export type LearningServiceConfig = ReturnType<typeof loadLearningServiceConfig>;

/**
 * Mongo settings are required only for the mongo driver.
 */
export function loadLearningServiceConfig(env: NodeJS.ProcessEnv = process.env) {
  return loadServiceConfig(
    SERVICE_NAME,
    { requireMongo: env.STORE_DRIVER !== 'memory', env },
    LearningServiceSchema
  );
}

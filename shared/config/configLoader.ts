/**
 * Centralized Configuration Loader with Zod Validation
 * Provides type-safe configuration loading with runtime validation
 */

import { z } from 'zod';

// Base configuration schema
export const BaseConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info'),
  SERVICE_NAME: z.string().min(1),
  PORT: z.coerce.number().int().positive().default(3000),
});

export const MongoConfigSchema = z.object({
  MONGO_URI: z.string().url(),
  MONGO_DB_NAME: z.string().min(1),
});

export type BaseConfig = z.infer<typeof BaseConfigSchema>;
export type MongoConfig = z.infer<typeof MongoConfigSchema>;

export interface ServiceConfigOptions {
  requireMongo?: boolean;
  env?: NodeJS.ProcessEnv;
}

const formatIssues = (serviceName: string, error: z.ZodError): Error => {
  const missingFields = error.errors.map((err) => `${err.path.join('.')}: ${err.message}`);
  return new Error(`Configuration validation failed for ${serviceName}:\n${missingFields.join('\n')}`);
};

/**
 * Load and validate configuration for a service.
 * Mongo settings are optional unless `requireMongo` is set.
 */
export function loadServiceConfig<S extends z.AnyZodObject>(
  serviceName: string,
  options: ServiceConfigOptions,
  customSchema: S
): BaseConfig & Partial<MongoConfig> & z.infer<S> {
  const env = options.env ?? process.env;
  const input = {
    ...env,
    SERVICE_NAME: serviceName,
    PORT: env.PORT || env[`${serviceName.toUpperCase().replace(/-/g, '_')}_PORT`],
  };

  try {
    const base = BaseConfigSchema.parse(input);
    const mongo = options.requireMongo
      ? MongoConfigSchema.parse(input)
      : MongoConfigSchema.partial().parse(input);
    const custom: z.infer<S> = customSchema.parse(input);
    return { ...base, ...mongo, ...custom };
  } catch (error) {
    if (error instanceof z.ZodError) {
      throw formatIssues(serviceName, error);
    }
    throw error;
  }
}

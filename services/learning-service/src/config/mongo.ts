import mongoose, { ConnectOptions } from 'mongoose';
import logger from '@eduhub/shared/config/logger';
import { connectMongo, type MongoConnectionSettings } from '@eduhub/shared/databases/mongo/connection';

/**
 * Connects the default mongoose connection the models are bound to.
 * Reconnects after the store has been closed.
 */
export async function initMongo(
  settings: MongoConnectionSettings = {},
  overrides: Partial<ConnectOptions> = {}
): Promise<typeof mongoose> {
  const connection = await connectMongo(
    {
      appName: 'learning-service',
      maxPoolSize: 20,
      ...overrides,
    },
    settings
  );

  logger.info('MongoDB connected for Learning Service', { service: 'learning-service' });
  return connection;
}

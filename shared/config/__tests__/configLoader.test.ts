/**
 * Configuration loader
 */

import { z } from 'zod';
import { loadServiceConfig } from '../configLoader';

const schema = z.object({
  FEATURE_LIMIT: z.coerce.number().int().default(5),
});

describe('loadServiceConfig', () => {
  it('applies defaults and the service-specific port', () => {
    const config = loadServiceConfig('learning-service', { env: { LEARNING_SERVICE_PORT: '3010' } }, schema);

    expect(config).toMatchObject({
      SERVICE_NAME: 'learning-service',
      NODE_ENV: 'development',
      LOG_LEVEL: 'info',
      PORT: 3010,
      FEATURE_LIMIT: 5,
    });
  });

  it('prefers PORT over the service-specific port', () => {
    const config = loadServiceConfig('learning-service', { env: { PORT: '4000', LEARNING_SERVICE_PORT: '3010' } }, schema);

    expect(config.PORT).toBe(4000);
  });

  it('requires mongo settings only when asked', () => {
    expect(loadServiceConfig('learning-service', { env: {} }, schema).MONGO_URI).toBeUndefined();
    expect(() => loadServiceConfig('learning-service', { requireMongo: true, env: {} }, schema)).toThrow(
      'Configuration validation failed for learning-service'
    );
  });

  it('reports invalid custom values', () => {
    expect(() => loadServiceConfig('learning-service', { env: { FEATURE_LIMIT: 'many' } }, schema)).toThrow(
      'FEATURE_LIMIT: Expected number, received nan'
    );
  });
});

import logger from '@eduhub/shared/config/logger';
import type { DocumentStore } from '../store';
import { DisplayIdAllocator } from './displayId';

export type Clock = () => Date;

export type ServiceContext = {
  store: DocumentStore;
  ids: DisplayIdAllocator;
  clock: Clock;
};

export type ServiceContextOptions = {
  maxAttempts?: number;
  clock?: Clock;
};

export function createServiceContext(store: DocumentStore, options: ServiceContextOptions = {}): ServiceContext {
  return {
    store,
    ids: new DisplayIdAllocator(store, options.maxAttempts),
    clock: options.clock ?? (() => new Date()),
  };
}

export const DAY_MS = 24 * 60 * 60 * 1000;

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Logs a failed write; callers then return their sentinel (null / 0 / failed).
 */
export function logOperationFailure(operation: string, error: unknown, meta: Record<string, unknown> = {}): void {
  logger.error(`${operation} failed`, {
    ...meta,
    error: errorMessage(error),
    errorName: error instanceof Error ? error.name : undefined,
    service: 'learning-service',
  });
}

/**
 * Shared Package - Main Export
 * Central export point for shared utilities, types, and configurations
 */

// Config (includes the .env side-effect)
export * from './config';
export * from './config/logger';

// Database connections
export * from './databases/mongo/connection';

// Middlewares
export * from './middlewares/validateRequest';
export { globalErrorHandler } from './middlewares/globalErrorHandler';
export * from './middlewares/requestId';

// Utils
export * from './utils/responseBuilder';
export * from './utils/asyncHandler';
export * from './utils/typeGuards';


// Side-effect: load .env before anything reads process.env
import './global-env';

export * from './errorHandler';
export * from './configLoader';
export { findEnvPath } from './global-env';
export { default as logger } from './logger';
export { default } from './logger';

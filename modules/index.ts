//NOTE: Public exports
export * from '@modules/config.js';
export { logger, initLogger, type Logger, type LoggerOptions, type LogLevel } from '@modules/logger.js';
export * from '@modules/errors.js';
export * from '@modules/repository.js';
export * from '@modules/git.js';
export * from '@modules/github-api.js';
export * from '@modules/workspace.js';
export * from '@modules/pull-request.js';
export * from '@modules/status-waiter.js';
export * from '@modules/observer.js';
export * from '@modules/lifecycle.js';

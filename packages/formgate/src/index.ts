export * from './engine/index.js';
export * from './adapters/index.js';
export * from './config/index.js';
export * from './errors.js';
export { Logger, getLogger, redactObject, type LogEntry, type LogLevel, type LoggerOptions } from './monitoring/logger.js';

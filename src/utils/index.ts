export { delay } from './delay.js';
export { createLogger, createSyncLogger, type LoggerOptions } from './logger.js';
export {
  NotionRagError,
  InvalidInputError,
  ConfigurationError,
  NotFoundError,
  UploadTimeoutError,
  errorMessage,
  type ErrorCode,
} from './errors.js';

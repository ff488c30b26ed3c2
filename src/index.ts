export * from './modules/extractor/index.js';

export { ExtractionError, ExtractionErrorCodes, ErrorCodes, formatError, isExtractionError } from './utils/errors.js';
export type { ErrorResponse, ExtractionErrorCode } from './utils/errors.js';
export { getExtractorConfig, validateConfig, DEFAULT_MAX_BUNDLE_SIZE } from './utils/config.js';
export type { ExtractorConfig } from './utils/config.js';
export { logger, Logger } from './utils/logger.js';
export type { LogLevel } from './utils/logger.js';

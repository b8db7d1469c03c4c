/**
 * エントリーポイント
 */

export * from './services/index.js';
export * from './types/index.js';
export { RerouteError, type RerouteErrorCode, type RerouteFailureType } from './errors/RerouteError.js';
export { REROUTE_DEFAULTS } from './config/constants.js';
export { logger, type Logger } from './utils/logger.js';

/**
 * @tiermind/core
 *
 * Tiered conversation memory: importance scoring, calendar compaction and
 * token-budgeted context loading.
 */

// Main entry point
export { Tiermind, createTiermind, type TiermindOptions } from './tiermind.js';

// Configuration
export { loadConfig, getSecret, requireSecret, expandPath, type LoadConfigOptions } from './config/loader.js';

// Logging
export {
  createLogger,
  createNoopLogger,
  initializeLogger,
  getLogger,
  isLoggerInitialized,
  type SecureLogger,
  type LogContext,
  type LogLevel,
} from './logging/logger.js';

// AI
export * from './ai/index.js';

// Memory
export * from './memory/index.js';

// Gateway
export { GatewayServer, createGatewayServer, type GatewayServerOptions } from './gateway/server.js';

// Utilities
export { uuidv7, sha256, sanitizeForLogging } from './utils/crypto.js';
export { toErrorMessage, sendError } from './utils/errors.js';

export { VERSION } from './version.js';

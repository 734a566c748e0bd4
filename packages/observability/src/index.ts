/**
 * @repo/observability
 *
 * Structured logging shared by the versioning tools.
 */

export { createLogger, logger } from './logger.js';
export type { Logger } from './logger.js';

/**
 * Versioning Domain
 *
 * Exports for platform version and version history bookkeeping
 */

export { PlatformVersionService, createPlatformVersionService } from './version-service.js';
export type { CreatePlatformVersionServiceOptions } from './version-service.js';

export { VersionHistoryRepository } from './version-history-repository.js';
export { PlatformVersionRepository } from './platform-version-repository.js';

export {
  readJsonDocument,
  writeJsonDocument,
  serializeJsonDocument,
  orderKeysLike,
} from './json-document.js';
export type { LoadedDocument } from './json-document.js';
export { formatAbiRevision, randomAbiRevision } from './abi-revision.js';

export {
  loadVersioningConfig,
  DEFAULT_VERSION_HISTORY_FILE,
  DEFAULT_PLATFORM_VERSION_FILE,
} from './version-config.js';
export type { VersioningEnvironment } from './version-config.js';

export {
  VersionEntrySchema,
  VersionHistorySchema,
  PlatformVersionSchema,
  API_LEVEL_PATTERN,
  ABI_REVISION_PATTERN,
} from './version-types.js';
export type {
  VersionEntry,
  VersionHistory,
  PlatformVersion,
  AbiRevisionGenerator,
  ApiLevelBumpResult,
} from './version-types.js';

export {
  VersioningError,
  VersionFileNotFoundError,
  MalformedVersionDataError,
  VersionFileWriteError,
  InvalidApiLevelError,
} from './version-errors.js';

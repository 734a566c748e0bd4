/**
 * @repo/core - Domain logic for platform version bookkeeping
 *
 * Maintains the API level version history and the current platform
 * version pointer consumed by the build.
 */

export * from './versioning/index.js';

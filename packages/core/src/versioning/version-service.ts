/**
 * Platform Version Service
 *
 * Business logic for moving the platform to a new API level.
 * Both updates are idempotent and report whether they wrote a file.
 */

import { logger as rootLogger, type Logger } from '@repo/observability';
import { randomAbiRevision } from './abi-revision.js';
import { formatIssues } from './json-document.js';
import { PlatformVersionRepository } from './platform-version-repository.js';
import { InvalidApiLevelError, MalformedVersionDataError } from './version-errors.js';
import type { VersioningEnvironment } from './version-config.js';
import { VersionHistoryRepository } from './version-history-repository.js';
import { VersionEntrySchema } from './version-types.js';
import type { AbiRevisionGenerator, ApiLevelBumpResult, VersionEntry } from './version-types.js';

export class PlatformVersionService {
  constructor(
    private historyRepo: VersionHistoryRepository,
    private platformRepo: PlatformVersionRepository,
    private generateAbiRevision: AbiRevisionGenerator,
    private logger: Logger = rootLogger.child({ module: 'versioning' })
  ) {}

  /**
   * Append a ledger entry for the API level unless one already exists
   *
   * Existing entries keep their position and values; the new entry goes last.
   *
   * @returns true if the version history file was rewritten
   * @throws InvalidApiLevelError if newApiLevel is not a positive integer
   * @throws VersionFileNotFoundError, MalformedVersionDataError, VersionFileWriteError
   */
  updateVersionHistory(newApiLevel: number): boolean {
    this.assertApiLevel(newApiLevel);

    const apiLevel = String(newApiLevel);
    const loaded = this.historyRepo.load();
    const history = loaded.document;

    if (history.data.versions.some((entry) => entry.api_level === apiLevel)) {
      this.logger.debug(
        { apiLevel: newApiLevel, filePath: this.historyRepo.filePath },
        'Version history already contains API level'
      );
      return false;
    }

    const entry = this.createVersionEntry(newApiLevel);
    history.data.versions.push(entry);
    this.historyRepo.save(loaded);

    this.logger.info(
      {
        apiLevel: newApiLevel,
        abiRevision: entry.abi_revision,
        filePath: this.historyRepo.filePath,
      },
      'Added API level to version history'
    );
    return true;
  }

  /**
   * Point the platform version file at the API level
   *
   * The supported API levels are copied through untouched; only freezing a
   * level changes that list.
   *
   * @returns true if the platform version file was rewritten
   * @throws InvalidApiLevelError if newApiLevel is not a positive integer
   * @throws VersionFileNotFoundError, MalformedVersionDataError, VersionFileWriteError
   */
  updatePlatformVersion(newApiLevel: number): boolean {
    this.assertApiLevel(newApiLevel);

    const loaded = this.platformRepo.load();
    const platformVersion = loaded.document;
    const previousApiLevel = platformVersion.current_fuchsia_api_level;

    if (previousApiLevel === newApiLevel) {
      this.logger.debug(
        { apiLevel: newApiLevel, filePath: this.platformRepo.filePath },
        'Platform version already at API level'
      );
      return false;
    }

    this.platformRepo.save({
      ...loaded,
      document: { ...platformVersion, current_fuchsia_api_level: newApiLevel },
    });

    this.logger.info(
      { apiLevel: newApiLevel, previousApiLevel, filePath: this.platformRepo.filePath },
      'Updated platform version'
    );
    return true;
  }

  /**
   * Move the platform version pointer, then record the level in the history.
   * A failure in the second step does not undo the first.
   */
  bumpApiLevel(newApiLevel: number): ApiLevelBumpResult {
    const platformVersionUpdated = this.updatePlatformVersion(newApiLevel);
    const versionHistoryUpdated = this.updateVersionHistory(newApiLevel);
    return { platformVersionUpdated, versionHistoryUpdated };
  }

  private assertApiLevel(value: number): void {
    if (!Number.isSafeInteger(value) || value <= 0) {
      throw new InvalidApiLevelError(value);
    }
  }

  private createVersionEntry(apiLevel: number): VersionEntry {
    const result = VersionEntrySchema.safeParse({
      api_level: String(apiLevel),
      abi_revision: this.generateAbiRevision(apiLevel),
    });

    if (!result.success) {
      throw new MalformedVersionDataError(this.historyRepo.filePath, formatIssues(result.error));
    }

    return result.data;
  }
}

export interface CreatePlatformVersionServiceOptions {
  generateAbiRevision?: AbiRevisionGenerator;
  logger?: Logger;
}

/**
 * Wire a service against the files named by a resolved config
 */
export function createPlatformVersionService(
  config: VersioningEnvironment,
  options: CreatePlatformVersionServiceOptions = {}
): PlatformVersionService {
  return new PlatformVersionService(
    new VersionHistoryRepository(config.versionHistoryPath),
    new PlatformVersionRepository(config.platformVersionPath),
    options.generateAbiRevision ?? randomAbiRevision,
    options.logger
  );
}

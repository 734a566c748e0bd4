/**
 * Platform Version Repository
 *
 * Data access for the current platform version pointer file.
 */

import { readJsonDocument, writeJsonDocument, type LoadedDocument } from './json-document.js';
import { PlatformVersionSchema, type PlatformVersion } from './version-types.js';

export class PlatformVersionRepository {
  constructor(readonly filePath: string) {}

  load(): LoadedDocument<PlatformVersion> {
    return readJsonDocument(this.filePath, PlatformVersionSchema);
  }

  save(platformVersion: LoadedDocument<PlatformVersion>): void {
    writeJsonDocument(this.filePath, platformVersion.document, platformVersion.source);
  }
}

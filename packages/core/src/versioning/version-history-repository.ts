/**
 * Version History Repository
 *
 * Data access for the API level ledger file.
 * Pure file operations with no business logic.
 */

import { readJsonDocument, writeJsonDocument, type LoadedDocument } from './json-document.js';
import { VersionHistorySchema, type VersionHistory } from './version-types.js';

export class VersionHistoryRepository {
  constructor(readonly filePath: string) {}

  load(): LoadedDocument<VersionHistory> {
    return readJsonDocument(this.filePath, VersionHistorySchema);
  }

  save(history: LoadedDocument<VersionHistory>): void {
    writeJsonDocument(this.filePath, history.document, history.source);
  }
}

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  orderKeysLike,
  readJsonDocument,
  serializeJsonDocument,
  writeJsonDocument,
} from '../json-document.js';
import { PlatformVersionSchema, VersionHistorySchema } from '../version-types.js';
import {
  MalformedVersionDataError,
  VersionFileNotFoundError,
  VersionFileWriteError,
} from '../version-errors.js';

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

describe('JSON document store', () => {
  let testDir: string;
  let filePath: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'json-document-'));
    filePath = join(testDir, 'platform_version.json');
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  describe('readJsonDocument', () => {
    it('should return the validated document', () => {
      writeFileSync(
        filePath,
        '{"current_fuchsia_api_level": 3, "supported_fuchsia_api_levels": [2, 3]}'
      );

      const loaded = readJsonDocument(filePath, PlatformVersionSchema);

      expect(loaded.document).toEqual({
        current_fuchsia_api_level: 3,
        supported_fuchsia_api_levels: [2, 3],
      });
      expect(loaded.source).toEqual(loaded.document);
    });

    it('should throw VersionFileNotFoundError with the path for a missing file', () => {
      const error = catchError(() => readJsonDocument(filePath, PlatformVersionSchema));

      expect(error).toBeInstanceOf(VersionFileNotFoundError);
      expect(error).toMatchObject({
        name: 'VersionFileNotFoundError',
        filePath,
        message: `Version file not found: ${filePath}`,
      });
    });

    it('should throw MalformedVersionDataError for invalid JSON', () => {
      writeFileSync(filePath, '{"current_fuchsia_api_level": ');

      const error = catchError(() => readJsonDocument(filePath, PlatformVersionSchema));

      expect(error).toBeInstanceOf(MalformedVersionDataError);
      expect(error).toMatchObject({ details: 'not valid JSON' });
    });

    it('should list each schema violation by path', () => {
      writeFileSync(filePath, '{"current_fuchsia_api_level": "one"}');

      const error = catchError(() => readJsonDocument(filePath, PlatformVersionSchema));

      expect(error).toMatchObject({
        name: 'MalformedVersionDataError',
        details:
          'current_fuchsia_api_level: Expected number, received string, ' +
          'supported_fuchsia_api_levels: Required',
      });
    });

    it('should flag duplicate API levels in the version history', () => {
      writeFileSync(
        filePath,
        JSON.stringify({
          data: {
            name: 'map',
            type: 'version_history',
            versions: [
              { api_level: '4', abi_revision: '0x4' },
              { api_level: '4', abi_revision: '0x5' },
            ],
          },
          schema_id: 'schema',
        })
      );

      const error = catchError(() => readJsonDocument(filePath, VersionHistorySchema));

      expect(error).toMatchObject({
        details: 'data.versions: Duplicate api_level entries are not allowed',
      });
    });

    it('should flag an ABI revision without the 0x prefix', () => {
      writeFileSync(
        filePath,
        JSON.stringify({
          data: {
            name: 'map',
            type: 'version_history',
            versions: [{ api_level: '4', abi_revision: 'ABCD' }],
          },
          schema_id: 'schema',
        })
      );

      const error = catchError(() => readJsonDocument(filePath, VersionHistorySchema));

      expect(error).toMatchObject({
        details: 'data.versions.0.abi_revision: abi_revision must be a 0x-prefixed hexadecimal integer',
      });
    });

    it('should rethrow read errors other than a missing file', () => {
      const error = catchError(() => readJsonDocument(testDir, PlatformVersionSchema));

      expect(error).not.toBeInstanceOf(VersionFileNotFoundError);
      expect(error).toMatchObject({ code: 'EISDIR' });
    });
  });

  describe('writeJsonDocument', () => {
    it('should write four-space indented JSON with a trailing newline', () => {
      writeJsonDocument(filePath, { current_fuchsia_api_level: 5, supported_fuchsia_api_levels: [4] });

      expect(readFileSync(filePath, 'utf8')).toBe(
        '{\n' +
          '    "current_fuchsia_api_level": 5,\n' +
          '    "supported_fuchsia_api_levels": [\n' +
          '        4\n' +
          '    ]\n' +
          '}\n'
      );
    });

    it('should replace the previous contents entirely', () => {
      writeFileSync(filePath, 'x'.repeat(500));

      writeJsonDocument(filePath, { a: 1 });

      expect(readFileSync(filePath, 'utf8')).toBe(serializeJsonDocument({ a: 1 }));
    });

    it('should write keys in the order of the source document', () => {
      writeJsonDocument(
        filePath,
        { current_fuchsia_api_level: 6, supported_fuchsia_api_levels: [5] },
        { supported_fuchsia_api_levels: [5], current_fuchsia_api_level: 5 }
      );

      expect(readFileSync(filePath, 'utf8')).toBe(
        '{\n' +
          '    "supported_fuchsia_api_levels": [\n' +
          '        5\n' +
          '    ],\n' +
          '    "current_fuchsia_api_level": 6\n' +
          '}\n'
      );
    });

    it('should wrap write failures in VersionFileWriteError', () => {
      const unwritable = join(testDir, 'missing-dir', 'platform_version.json');

      const error = catchError(() => writeJsonDocument(unwritable, { a: 1 }));

      expect(error).toBeInstanceOf(VersionFileWriteError);
      expect(error).toMatchObject({
        filePath: unwritable,
        message: `Failed to write version file: ${unwritable}`,
        cause: { code: 'ENOENT' },
      });
    });
  });
});

describe('orderKeysLike', () => {
  it('should follow the reference order at every depth', () => {
    const ordered = orderKeysLike(
      { data: { name: 'n', versions: [{ api_level: '1', abi_revision: '0x1' }] }, schema_id: 's' },
      { schema_id: 's', data: { versions: [{ abi_revision: '0x1', api_level: '1' }], name: 'n' } }
    );

    expect(JSON.stringify(ordered)).toBe(
      '{"schema_id":"s","data":{"versions":[{"abi_revision":"0x1","api_level":"1"}],"name":"n"}}'
    );
  });

  it('should order new array items like the last reference item', () => {
    const ordered = orderKeysLike(
      [
        { api_level: '1', abi_revision: '0x1' },
        { api_level: '2', abi_revision: '0x2' },
      ],
      [{ abi_revision: '0x1', api_level: '1' }]
    );

    expect(JSON.stringify(ordered)).toBe(
      '[{"abi_revision":"0x1","api_level":"1"},{"abi_revision":"0x2","api_level":"2"}]'
    );
  });

  it('should append keys the reference lacks and drop ones the value lacks', () => {
    const ordered = orderKeysLike({ b: 2, c: 3, a: 1 }, { a: 0, x: 9, b: 0 });

    expect(JSON.stringify(ordered)).toBe('{"a":1,"b":2,"c":3}');
  });

  it('should return scalars unchanged', () => {
    expect(orderKeysLike(7, { a: 1 })).toBe(7);
    expect(orderKeysLike(null, undefined)).toBeNull();
  });
});

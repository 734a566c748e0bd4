/**
 * JSON Document Store
 *
 * Synchronous read/validate and serialize/write of the small JSON documents
 * kept under version control. Every descriptor opened here is closed before
 * returning, on success and on error.
 */

import { closeSync, fsyncSync, openSync, readFileSync, writeFileSync } from 'node:fs';
import type { z } from 'zod';
import {
  MalformedVersionDataError,
  VersionFileNotFoundError,
  VersionFileWriteError,
} from './version-errors.js';

const JSON_INDENT = 4;

/**
 * A validated document together with the JSON it was parsed from.
 * The source carries the key order the file was written in.
 */
export interface LoadedDocument<T> {
  document: T;
  source: unknown;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Flatten zod issues into a single "path: message" line
 */
export function formatIssues(error: z.ZodError): string {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Rebuild `value` with object keys in the order they appear in `reference`.
 * Keys the reference lacks follow in their own order. Array items past the
 * end of the reference take their order from its last item.
 */
export function orderKeysLike(value: unknown, reference: unknown): unknown {
  if (Array.isArray(value)) {
    const items: unknown[] = Array.isArray(reference) ? reference : [];
    return value.map((item, index) =>
      orderKeysLike(item, items[Math.min(index, items.length - 1)])
    );
  }

  if (!isPlainObject(value)) {
    return value;
  }

  const object = value;
  const referenceObject: Record<string, unknown> = isPlainObject(reference) ? reference : {};
  const referenceKeys = Object.keys(referenceObject).filter((key) => Object.hasOwn(object, key));
  const extraKeys = Object.keys(object).filter((key) => !Object.hasOwn(referenceObject, key));

  return Object.fromEntries(
    [...referenceKeys, ...extraKeys].map((key) => [
      key,
      orderKeysLike(object[key], referenceObject[key]),
    ])
  );
}

export function serializeJsonDocument(document: unknown): string {
  return `${JSON.stringify(document, null, JSON_INDENT)}\n`;
}

function openForReading(filePath: string): number {
  try {
    return openSync(filePath, 'r');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new VersionFileNotFoundError(filePath, { cause: error });
    }
    throw error;
  }
}

/**
 * Read a JSON document and validate it against a schema
 *
 * @throws VersionFileNotFoundError if the file does not exist
 * @throws MalformedVersionDataError if the contents are not JSON or fail validation
 */
export function readJsonDocument<T>(
  filePath: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): LoadedDocument<T> {
  const fd = openForReading(filePath);
  let raw: string;
  try {
    raw = readFileSync(fd, 'utf8');
  } finally {
    closeSync(fd);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new MalformedVersionDataError(filePath, 'not valid JSON', { cause: error });
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new MalformedVersionDataError(filePath, formatIssues(result.error));
  }

  return { document: result.data, source: parsed };
}

/**
 * Overwrite a file with the serialized document, flushing before close.
 * With a source, object keys are written in the source's order.
 *
 * @throws VersionFileWriteError wrapping the underlying fs error
 */
export function writeJsonDocument(filePath: string, document: unknown, source?: unknown): void {
  const contents = serializeJsonDocument(
    source === undefined ? document : orderKeysLike(document, source)
  );

  try {
    const fd = openSync(filePath, 'w');
    try {
      writeFileSync(fd, contents, 'utf8');
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
  } catch (error) {
    throw new VersionFileWriteError(filePath, { cause: error });
  }
}

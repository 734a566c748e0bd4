/**
 * Versioning Domain Types
 *
 * Zod schemas for the version history ledger and the platform version
 * pointer. Unknown keys are passed through so a rewrite keeps them.
 */

import { z } from 'zod';

export const API_LEVEL_PATTERN = /^[1-9]\d*$/;
export const ABI_REVISION_PATTERN = /^0x[0-9A-Fa-f]+$/;

/**
 * One ledger row
 * - api_level: decimal integer encoded as a string
 * - abi_revision: hexadecimal integer with a 0x prefix
 */
export const VersionEntrySchema = z
  .object({
    api_level: z.string().regex(API_LEVEL_PATTERN, 'api_level must be a positive decimal integer'),
    abi_revision: z
      .string()
      .regex(ABI_REVISION_PATTERN, 'abi_revision must be a 0x-prefixed hexadecimal integer'),
  })
  .passthrough();

export const VersionHistorySchema = z
  .object({
    data: z
      .object({
        name: z.string(),
        type: z.string(),
        versions: z
          .array(VersionEntrySchema)
          .refine(
            (versions) => new Set(versions.map((v) => v.api_level)).size === versions.length,
            'Duplicate api_level entries are not allowed'
          ),
      })
      .passthrough(),
    schema_id: z.string(),
  })
  .passthrough();

export const PlatformVersionSchema = z
  .object({
    current_fuchsia_api_level: z.number().int().positive(),
    supported_fuchsia_api_levels: z.array(z.number().int().positive()),
  })
  .passthrough();

export type VersionEntry = z.infer<typeof VersionEntrySchema>;
export type VersionHistory = z.infer<typeof VersionHistorySchema>;
export type PlatformVersion = z.infer<typeof PlatformVersionSchema>;

/**
 * Derives the ABI revision recorded for a newly added API level
 */
export type AbiRevisionGenerator = (apiLevel: number) => string;

export interface ApiLevelBumpResult {
  platformVersionUpdated: boolean;
  versionHistoryUpdated: boolean;
}

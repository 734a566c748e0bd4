import { randomBytes } from 'node:crypto';

const ABI_REVISION_HEX_DIGITS = 16;

/**
 * Format a 64-bit value as an ABI revision, e.g. 0x201665C5B012BA43
 */
export function formatAbiRevision(value: bigint): string {
  if (value < 0n || value >= 1n << 64n) {
    throw new RangeError(`ABI revision must fit in 64 bits, got ${value}`);
  }
  return `0x${value.toString(16).toUpperCase().padStart(ABI_REVISION_HEX_DIGITS, '0')}`;
}

export function randomAbiRevision(): string {
  return formatAbiRevision(randomBytes(8).readBigUInt64BE());
}

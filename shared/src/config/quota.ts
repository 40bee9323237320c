/**
 * Quota size parsing and formatting.
 *
 * Sizes are binary: `1K` = 1024 bytes, `1M` = 1024K, `1G` = 1024M. A unit may
 * carry a trailing `B` (`512MB`). Input is trimmed and case-insensitive.
 */

import { SIZE_UNITS, STORAGE } from './constants.js';
import { ValidationError } from '../utils/errorTypes.js';

const QUOTA_PATTERN = /^(\d+)\s*(?:([KMG])B?)?$/;

type SizeUnit = keyof typeof SIZE_UNITS;

function isSizeUnit(value: string): value is SizeUnit {
  return value in SIZE_UNITS;
}

/**
 * Parse a quota size into bytes. Empty input means "no quota" and yields 0n.
 *
 * @throws ValidationError when the input is not a size or exceeds 2^64-1
 *
 * @example
 * parseQuotaBytes('2G');    // 2147483648n
 * parseQuotaBytes('512mb'); // 536870912n
 * parseQuotaBytes('');      // 0n
 */
export function parseQuotaBytes(input: string): bigint {
  const value = input.trim().toUpperCase();
  if (value === '') {
    return 0n;
  }

  const match = QUOTA_PATTERN.exec(value);
  if (!match) {
    throw ValidationError.invalidFormat('quota', 'a byte count or a size such as 512M or 2G');
  }

  const [, digits, unit] = match;
  const multiplier = unit && isSizeUnit(unit) ? SIZE_UNITS[unit] : 1n;
  const bytes = BigInt(digits) * multiplier;

  if (bytes > STORAGE.MAX_QUOTA_BYTES) {
    throw new ValidationError('quota exceeds the 64-bit byte range', 'quota', { value: input });
  }

  return bytes;
}

export function isValidQuotaSize(input: string): boolean {
  try {
    parseQuotaBytes(input);
    return true;
  } catch {
    return false;
  }
}

/**
 * Human-readable size with two decimals, e.g. `2.00 GiB`.
 */
export function formatBytes(bytes: bigint): string {
  const units: Array<[string, bigint]> = [
    ['GiB', SIZE_UNITS.G],
    ['MiB', SIZE_UNITS.M],
    ['KiB', SIZE_UNITS.K],
  ];

  for (const [label, size] of units) {
    if (bytes >= size) {
      const hundredths = (bytes * 100n) / size;
      const whole = hundredths / 100n;
      const fraction = (hundredths % 100n).toString().padStart(2, '0');
      return `${whole}.${fraction} ${label}`;
    }
  }

  return `${bytes} B`;
}

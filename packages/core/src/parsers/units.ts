/**
 * Unit parsing for `docker stats` I/O columns such as "12.3MB / 4.5GB".
 */

import type { IOStats } from '../models/Stats';
import { ParseError } from '../types/errors';

/**
 * Byte multipliers by unit suffix. `kB` is how the docker CLI actually
 * prints decimal kilobytes; `KB` is accepted as well.
 */
export const UNIT_MULTIPLIERS: Readonly<Record<string, number>> = Object.freeze({
  B: 1,
  kB: 1e3,
  KB: 1e3,
  MB: 1e6,
  GB: 1e9,
  TB: 1e12,
  KiB: 1024,
  MiB: 1024 ** 2,
  GiB: 1024 ** 3,
  TiB: 1024 ** 4,
});

// Longest first, so "KiB" is tried before "B"
const SUFFIXES = Object.keys(UNIT_MULTIPLIERS).sort((a, b) => b.length - a.length);

const FLOAT_LITERAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

const IO_SEPARATOR = ' / ';

/**
 * Parse a decimal floating-point literal. Unlike `Number()`, rejects the
 * empty string, hex, and "Infinity".
 */
export function parseFloatLiteral(text: string): number | undefined {
  const trimmed = text.trim();
  return FLOAT_LITERAL.test(trimmed) ? Number(trimmed) : undefined;
}

/**
 * The unit suffix `text` ends with, preferring the longest match.
 */
export function matchUnit(text: string): string | undefined {
  return SUFFIXES.find((suffix) => text.endsWith(suffix));
}

/**
 * Convert one "<value><unit>" quantity to bytes. A missing unit means bytes.
 */
export function parseSize(text: string): number {
  const trimmed = text.trim();
  const unit = matchUnit(trimmed);
  const numeric = unit ? trimmed.slice(0, -unit.length) : trimmed;
  const value = parseFloatLiteral(numeric);

  if (value === undefined) {
    throw new ParseError(`Invalid size "${text}"`, text);
  }
  return unit ? value * UNIT_MULTIPLIERS[unit] : value;
}

/**
 * Parse "<in> / <out>" into byte counts.
 *
 * @example parseIOStats('12.3MB / 1.2GiB') // { in: 12300000, out: 1288490188.8 }
 */
export function parseIOStats(text: string): IOStats {
  const parts = text.split(IO_SEPARATOR);
  if (parts.length !== 2) {
    throw new ParseError(`Expected "<in> / <out>", got "${text}"`, text);
  }

  try {
    return { in: parseSize(parts[0]), out: parseSize(parts[1]) };
  } catch (error) {
    if (error instanceof ParseError) {
      throw new ParseError(`Invalid I/O stats "${text}": ${error.message}`, text);
    }
    throw error;
  }
}

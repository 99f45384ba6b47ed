import { ParseError } from '../errors';

// Decimal multipliers as printed by the archive diff
const UNIT_MULTIPLIERS = new Map<string, number>([
  ['B', 1],
  ['kB', 1e3],
  ['KB', 1e3],
  ['MB', 1e6],
  ['GB', 1e9],
  ['TB', 1e12],
]);

/**
 * Convert a size such as `77.8 kB` into a number of bytes. Errors echo
 * `source`, the size itself unless the caller passes the line it came from.
 */
export function sizeToBytes(significand: string, unit: string, source = `${significand} ${unit}`): number {
  const multiplier = UNIT_MULTIPLIERS.get(unit);
  if (multiplier === undefined) {
    throw new ParseError(`Unknown unit "${unit}"`, source);
  }

  const value = Number(significand);
  if (significand.trim() === '' || !Number.isFinite(value) || value < 0) {
    throw new ParseError('Invalid size', source);
  }

  return Math.round(value * multiplier);
}

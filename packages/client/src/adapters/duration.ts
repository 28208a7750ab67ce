/**
 * Parsing of configured time values.
 */

import { ConfigurationError } from '../errors.js';

const UNIT_MILLIS: Record<string, number> = {
  ms: 1,
  s: 1000,
  sec: 1000,
  m: 60_000,
  min: 60_000,
  h: 3_600_000,
  d: 86_400_000,
};

const TIME_VALUE = /^(\d+(?:\.\d+)?)\s*([a-z]*)$/;

/**
 * Parses `"500ms"`, `"1s"`, `"2m"` and the like into milliseconds. A bare
 * number is read in `defaultUnit`.
 *
 * @throws {ConfigurationError} When the value is malformed or the unit unknown
 */
export function parseTimeValue(key: string, text: string, defaultUnit = 's'): number {
  const match = TIME_VALUE.exec(text.trim().toLowerCase());
  const unit = match?.[2] || defaultUnit;
  const factor = UNIT_MILLIS[unit];
  if (!match?.[1] || factor === undefined) {
    throw new ConfigurationError(`Invalid time value for ${key}: ${text}`, undefined, { key, value: text });
  }
  return Math.round(Number(match[1]) * factor);
}

/**
 * Parses a whole number of seconds into milliseconds.
 *
 * @throws {ConfigurationError} When the value is not a non-negative integer
 */
export function parseSeconds(key: string, text: string): number {
  const trimmed = text.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new ConfigurationError(`Invalid number of seconds for ${key}: ${text}`, undefined, { key, value: text });
  }
  return Number(trimmed) * 1000;
}

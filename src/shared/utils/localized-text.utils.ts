/**
 * =============================================================================
 * LOCALIZED TEXT UTILITIES - Provider distance/duration strings
 * =============================================================================
 *
 * Pure parsers for the text the Routes API returns next to its raw values.
 *
 * ACCEPTED FORMATS:
 *   "1532s"              -> 1532   raw duration, plain digits only
 *   "25 min" / "25 mins" -> 25     localized minutes, thousands groups allowed
 *   "1,532 min"          -> 1532
 *   "12.3 mi"            -> 12.3   localized miles, thousands groups allowed
 *
 * Anything else throws ParseError. "1,532s" is rejected: the raw field is
 * machine-formatted and never grouped, so a comma there means the provider
 * changed its format.
 * =============================================================================
 */

import { ErrorCode, ParseError } from '../../core';

// "1532" or "1,532" (groups of exactly three after the first)
const INTEGER_TOKEN = '(?:\\d{1,3}(?:,\\d{3})+|\\d+)';

const SECONDS_PATTERN = /^(\d+)s$/;
const MINUTES_PATTERN = new RegExp(`^(${INTEGER_TOKEN})\\s+mins?$`);
const MILES_PATTERN = new RegExp(`^(${INTEGER_TOKEN}(?:\\.\\d+)?)\\s+mi$`);

function stripGrouping(token: string): string {
  return token.replace(/,/g, '');
}

function requireText(value: unknown, field: string): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ParseError(field, `Missing text for ${field}`, ErrorCode.PARSE_MISSING_FIELD, value);
  }
  return value.trim();
}

/**
 * Raw protobuf-style duration, e.g. "1532s"
 */
export function parseDurationSeconds(value: unknown, field: string = 'duration'): number {
  const text = requireText(value, field);
  const match = SECONDS_PATTERN.exec(text);
  if (!match) {
    throw new ParseError(field, `Expected "<integer>s" for ${field}, got "${text}"`, ErrorCode.PARSE_BAD_FORMAT, text);
  }
  return Number.parseInt(match[1], 10);
}

/**
 * Localized minutes, e.g. "25 min" or "25 mins"
 */
export function parseMinutes(value: unknown, field: string = 'minutes'): number {
  const text = requireText(value, field);
  const match = MINUTES_PATTERN.exec(text);
  if (!match) {
    throw new ParseError(field, `Expected "<integer> min(s)" for ${field}, got "${text}"`, ErrorCode.PARSE_BAD_FORMAT, text);
  }
  return Number.parseInt(stripGrouping(match[1]), 10);
}

/**
 * Localized miles, e.g. "12.3 mi" or "1,204.5 mi"
 */
export function parseMiles(value: unknown, field: string = 'miles'): number {
  const text = requireText(value, field);
  const match = MILES_PATTERN.exec(text);
  if (!match) {
    throw new ParseError(field, `Expected "<number> mi" for ${field}, got "${text}"`, ErrorCode.PARSE_BAD_FORMAT, text);
  }
  return Number.parseFloat(stripGrouping(match[1]));
}

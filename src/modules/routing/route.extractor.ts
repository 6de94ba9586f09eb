/**
 * =============================================================================
 * ROUTE EXTRACTOR - Raw provider route -> typed sample metrics
 * =============================================================================
 *
 * Pure, no I/O. A route with a missing or malformed field throws ParseError,
 * and extractRoutes() stops at the first one, so a run never persists a
 * partial set of alternatives.
 * =============================================================================
 */

import { z } from 'zod';
import { ErrorCode, ParseError } from '../../core';
import type { SampleMetrics } from '../../shared/database/repository.interface';
import {
  parseDurationSeconds,
  parseMiles,
  parseMinutes,
} from '../../shared/utils/localized-text.utils';
import { RawRoute, rawRouteSchema } from './routing.schema';

export function extractRoute(raw: RawRoute): SampleMetrics {
  const parsed = rawRouteSchema.safeParse(raw);
  if (!parsed.success) {
    throw toParseError(parsed.error.issues[0], raw);
  }

  const route = parsed.data;
  const localized = route.localizedValues;

  return {
    description: route.description,
    meters: route.distanceMeters,
    miles: parseMiles(localized.distance.text, 'localizedValues.distance.text'),
    durationSeconds: parseDurationSeconds(route.duration, 'duration'),
    durationStaticMinutes: parseMinutes(localized.staticDuration.text, 'localizedValues.staticDuration.text'),
    durationMinutes: parseMinutes(localized.duration.text, 'localizedValues.duration.text'),
  };
}

/**
 * All-or-nothing extraction of every alternative
 */
export function extractRoutes(raws: RawRoute[]): SampleMetrics[] {
  return raws.map((raw, index) => {
    try {
      return extractRoute(raw);
    } catch (error) {
      if (error instanceof ParseError) {
        throw new ParseError(
          error.field,
          `Route ${index}: ${error.message}`,
          toErrorCode(error.code),
          error.details?.value
        );
      }
      throw error;
    }
  });
}

function toParseError(issue: z.ZodIssue, raw: RawRoute): ParseError {
  const field = issue.path.join('.');
  const missing = issue.code === z.ZodIssueCode.invalid_type && issue.received === 'undefined';

  return new ParseError(
    field,
    missing ? `Route is missing ${field}` : `Route field ${field}: ${issue.message}`,
    missing ? ErrorCode.PARSE_MISSING_FIELD : ErrorCode.PARSE_BAD_FORMAT,
    missing ? undefined : valueAt(raw, issue.path)
  );
}

function valueAt(source: unknown, path: (string | number)[]): unknown {
  let current: unknown = source;
  for (const segment of path) {
    if (typeof current !== 'object' || current === null) {
      return undefined;
    }
    current = Reflect.get(current, segment);
  }
  return current;
}

function toErrorCode(code: string): ErrorCode {
  return code === ErrorCode.PARSE_MISSING_FIELD ? ErrorCode.PARSE_MISSING_FIELD : ErrorCode.PARSE_BAD_FORMAT;
}

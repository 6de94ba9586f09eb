/**
 * =============================================================================
 * ROUTE EXTRACTOR - Unit Tests
 * =============================================================================
 */

import { ErrorCode, ParseError } from '../core';
import { extractRoute, extractRoutes } from '../modules/routing/route.extractor';
import { rawRoute } from './helpers/fixtures';

describe('extractRoute', () => {
  it('normalizes raw and localized fields into metrics', () => {
    expect(extractRoute(rawRoute())).toEqual({
      description: 'I-95 N',
      meters: 16093,
      miles: 10,
      durationSeconds: 1532,
      durationStaticMinutes: 21,
      durationMinutes: 26,
    });
  });

  it('parses "min" and "mins" the same way', () => {
    const metrics = extractRoute(rawRoute({ staticDuration: '25 min', durationText: '25 mins' }));

    expect(metrics.durationStaticMinutes).toBe(25);
    expect(metrics.durationMinutes).toBe(25);
  });

  it('reports a missing top-level field', () => {
    const raw = rawRoute();
    delete raw.description;

    expect(() => extractRoute(raw)).toThrow(ParseError);
    expect(() => extractRoute(raw)).toThrow('Route is missing description');
  });

  it('reports a missing nested localized value', () => {
    const raw = rawRoute();
    raw.localizedValues = {
      distance: { text: '10.0 mi' },
      duration: { text: '26 mins' },
    };

    expect.assertions(1);
    try {
      extractRoute(raw);
    } catch (error) {
      expect(error).toMatchObject({
        field: 'localizedValues.staticDuration',
        code: ErrorCode.PARSE_MISSING_FIELD,
      });
    }
  });

  it('rejects a distance that is not an integer number of meters', () => {
    const raw = rawRoute();
    raw.distanceMeters = '16093';

    expect.assertions(1);
    try {
      extractRoute(raw);
    } catch (error) {
      expect(error).toMatchObject({
        field: 'distanceMeters',
        code: ErrorCode.PARSE_BAD_FORMAT,
        details: { field: 'distanceMeters', value: '16093' },
      });
    }
  });

  it('rejects a grouped raw duration', () => {
    expect(() => extractRoute(rawRoute({ duration: '1,532s' }))).toThrow(
      'Expected "<integer>s" for duration, got "1,532s"'
    );
  });
});

describe('extractRoutes', () => {
  it('extracts every alternative in order', () => {
    const metrics = extractRoutes([
      rawRoute({ description: 'I-95 N' }),
      rawRoute({ description: 'US-1 N', meters: 17500, durationText: '31 mins' }),
    ]);

    expect(metrics.map(m => m.description)).toEqual(['I-95 N', 'US-1 N']);
    expect(metrics[1].meters).toBe(17500);
    expect(metrics[1].durationMinutes).toBe(31);
  });

  it('fails the whole set when one alternative is malformed', () => {
    const routes = [rawRoute(), rawRoute({ miles: '3 km' })];

    expect(() => extractRoutes(routes)).toThrow(
      'Route 1: Expected "<number> mi" for localizedValues.distance.text, got "3 km"'
    );
  });
});

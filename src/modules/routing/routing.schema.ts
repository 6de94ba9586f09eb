/**
 * =============================================================================
 * ROUTING MODULE - SCHEMAS & TYPES
 * =============================================================================
 *
 * Route payload shape the extractor reads, and the provider contracts the
 * pipeline depends on.
 *
 * EXAMPLE ROUTE (computeRoutes, units IMPERIAL):
 * {
 *   "description": "I-95 N",
 *   "distanceMeters": 16093,
 *   "duration": "1532s",
 *   "localizedValues": {
 *     "distance":       { "text": "10.0 mi" },
 *     "duration":       { "text": "26 mins" },
 *     "staticDuration": { "text": "21 mins" }
 *   }
 * }
 * =============================================================================
 */

import { z } from 'zod';
import type { Coordinates } from '../../shared/database/repository.interface';

// =============================================================================
// ROUTES
// =============================================================================

/**
 * One candidate route exactly as the provider sent it.
 * Field checks happen in the extractor, not here.
 */
export type RawRoute = Record<string, unknown>;

const localizedTextSchema = z.object({ text: z.string() });

/**
 * Fields the extractor needs from each route
 */
export const rawRouteSchema = z.object({
  description: z.string(),
  distanceMeters: z.number().int().nonnegative(),
  duration: z.string(),
  localizedValues: z.object({
    distance: localizedTextSchema,
    duration: localizedTextSchema,
    staticDuration: localizedTextSchema,
  }),
});

// =============================================================================
// PROVIDER CONTRACTS
// =============================================================================

/**
 * Address -> coordinates lookup used on location cache misses
 */
export interface GeocodingProvider {
  geocode(address: string, label?: string): Promise<Coordinates>;
}

/**
 * One routing request per invocation, alternatives included
 */
export interface RouteClient {
  getRoutes(origin: Coordinates, destination: Coordinates): Promise<RawRoute[]>;
}

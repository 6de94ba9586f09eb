/**
 * =============================================================================
 * GOOGLE MAPS SERVICE - Geocoding, Routes
 * =============================================================================
 *
 * Thin client for the two Google Maps Platform calls the sampler makes:
 * - Geocoding API: address -> coordinates (location cache misses only)
 * - Routes API computeRoutes: traffic-aware driving routes with alternatives
 *
 * Every call has a fixed timeout and no retry. A failure surfaces as
 * ResolutionError (geocoding) or UpstreamError (routes) and ends the run.
 *
 * =============================================================================
 */

import { logger } from './logger.service';
import { ErrorCode, GOOGLE_MAPS, ResolutionError, UpstreamError } from '../../core';
import type { Coordinates } from '../database/repository.interface';
import { z } from 'zod';
import type { GeocodingProvider, RawRoute, RouteClient } from '../../modules/routing/routing.schema';

// =============================================================================
// CONFIGURATION
// =============================================================================

/**
 * The part of the fetch Response the client reads
 */
export interface HttpResponse {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<HttpResponse>;

export interface GoogleMapsOptions {
  apiKey: string;
  /** Swappable transport; tests inject a stand-in */
  fetch?: FetchLike;
  geocodeTimeoutMs?: number;
  routesTimeoutMs?: number;
}

// =============================================================================
// PROVIDER PAYLOADS
// =============================================================================

const geocodeResponseSchema = z.object({
  status: z.string(),
  error_message: z.string().optional(),
  results: z.array(
    z.object({
      formatted_address: z.string().optional(),
      geometry: z.object({
        location: z.object({
          lat: z.number(),
          lng: z.number(),
        }),
      }),
    })
  ).default([]),
});

// Individual routes stay raw; the extractor validates their fields
const computeRoutesResponseSchema = z.object({
  routes: z.array(z.record(z.unknown())).optional(),
});

interface GoogleMapsMetrics {
  apiCalls: { total: number; routes: number; geocoding: number };
  errors: { total: number; routes: number; geocoding: number };
  lastResponseTimeMs: { routes: number; geocoding: number };
}

// =============================================================================
// GOOGLE MAPS SERVICE CLASS
// =============================================================================

export class GoogleMapsService implements GeocodingProvider, RouteClient {
  private readonly apiKey: string;
  private readonly fetchImpl: FetchLike;
  private readonly geocodeTimeoutMs: number;
  private readonly routesTimeoutMs: number;

  private readonly metrics: GoogleMapsMetrics = {
    apiCalls: { total: 0, routes: 0, geocoding: 0 },
    errors: { total: 0, routes: 0, geocoding: 0 },
    lastResponseTimeMs: { routes: 0, geocoding: 0 },
  };

  constructor(options: GoogleMapsOptions) {
    this.apiKey = options.apiKey;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.geocodeTimeoutMs = options.geocodeTimeoutMs ?? GOOGLE_MAPS.GEOCODE_TIMEOUT_MS;
    this.routesTimeoutMs = options.routesTimeoutMs ?? GOOGLE_MAPS.ROUTES_TIMEOUT_MS;
  }

  getMetrics(): Readonly<GoogleMapsMetrics> {
    return this.metrics;
  }

  // =========================================================================
  // GEOCODING API
  // =========================================================================

  async geocode(address: string, label: string = address): Promise<Coordinates> {
    const startTime = Date.now();
    this.metrics.apiCalls.total++;
    this.metrics.apiCalls.geocoding++;

    try {
      const params = new URLSearchParams({ address, key: this.apiKey });

      let response: HttpResponse;
      let payload: unknown;
      try {
        response = await this.fetchImpl(`${GOOGLE_MAPS.GEOCODE_URL}?${params.toString()}`, {
          signal: AbortSignal.timeout(this.geocodeTimeoutMs),
        });
        payload = await readBody(response);
      } catch (error) {
        throw new ResolutionError(
          `Geocoding request failed for '${label}': ${describeFailure(error)}`,
          ErrorCode.GEOCODE_REQUEST_FAILED,
          { label }
        );
      }

      if (!response.ok) {
        throw new ResolutionError(
          `Geocoding returned HTTP ${response.status} for '${label}'`,
          ErrorCode.GEOCODE_REQUEST_FAILED,
          { label, status: response.status, body: payload }
        );
      }

      const parsed = geocodeResponseSchema.safeParse(payload);
      if (!parsed.success) {
        throw new ResolutionError(
          `Geocoding returned an unexpected body for '${label}'`,
          ErrorCode.GEOCODE_REQUEST_FAILED,
          { label, issues: parsed.error.issues.map(issue => issue.message) }
        );
      }

      const { status, results, error_message: providerMessage } = parsed.data;
      if (status === 'ZERO_RESULTS' || (status === 'OK' && results.length === 0)) {
        throw new ResolutionError(
          `Geocode failed for '${label}': no results`,
          ErrorCode.GEOCODE_NO_RESULTS,
          { label, status }
        );
      }
      if (status !== 'OK') {
        throw new ResolutionError(
          `Geocode failed for '${label}': ${status}`,
          ErrorCode.GEOCODE_REJECTED,
          { label, status, ...(providerMessage !== undefined && { providerMessage }) }
        );
      }

      const { lat, lng } = results[0].geometry.location;
      this.metrics.lastResponseTimeMs.geocoding = Date.now() - startTime;
      logger.debug(`📍 Google Geocoding: '${label}' -> ${lat},${lng} - ${this.metrics.lastResponseTimeMs.geocoding}ms`);

      return { lat, lon: lng };
    } catch (error) {
      this.metrics.errors.total++;
      this.metrics.errors.geocoding++;
      throw error;
    }
  }

  // =========================================================================
  // ROUTES API - computeRoutes with alternatives
  // =========================================================================

  async getRoutes(origin: Coordinates, destination: Coordinates): Promise<RawRoute[]> {
    const startTime = Date.now();
    this.metrics.apiCalls.total++;
    this.metrics.apiCalls.routes++;

    const body = {
      origin: toWaypoint(origin),
      destination: toWaypoint(destination),
      travelMode: 'DRIVE',
      units: 'IMPERIAL',
      computeAlternativeRoutes: true,
      routingPreference: 'TRAFFIC_AWARE_OPTIMAL',
    };

    try {
      let response: HttpResponse;
      let payload: unknown;
      try {
        response = await this.fetchImpl(GOOGLE_MAPS.ROUTES_URL, {
          method: 'POST',
          headers: {
            'X-Goog-Api-Key': this.apiKey,
            'Content-Type': 'application/json',
            'X-Goog-FieldMask': GOOGLE_MAPS.ROUTES_FIELD_MASK,
          },
          body: JSON.stringify(body),
          signal: AbortSignal.timeout(this.routesTimeoutMs),
        });
        payload = await readBody(response);
      } catch (error) {
        throw new UpstreamError(
          `Routes API request failed: ${describeFailure(error)}`,
          ErrorCode.ROUTES_REQUEST_FAILED,
          { cause: error }
        );
      }

      if (!response.ok) {
        throw new UpstreamError(
          `Routes API returned ${response.status}. Check: API enabled, billing active, and key permissions.`,
          ErrorCode.ROUTES_HTTP_ERROR,
          { status: response.status, body: payload }
        );
      }

      const parsed = computeRoutesResponseSchema.safeParse(payload);
      if (!parsed.success) {
        throw new UpstreamError(
          'Routes API returned an unexpected body',
          ErrorCode.ROUTES_MALFORMED,
          { status: response.status, body: payload }
        );
      }

      const routes = parsed.data.routes ?? [];
      if (routes.length === 0) {
        throw new UpstreamError(
          'Routes API failed: no routes returned',
          ErrorCode.ROUTES_EMPTY,
          { status: response.status, body: payload }
        );
      }

      this.metrics.lastResponseTimeMs.routes = Date.now() - startTime;
      logger.debug(`📍 Google Routes: ${routes.length} alternatives - ${this.metrics.lastResponseTimeMs.routes}ms`);

      return routes;
    } catch (error) {
      this.metrics.errors.total++;
      this.metrics.errors.routes++;
      throw error;
    }
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function toWaypoint({ lat, lon }: Coordinates) {
  return { location: { latLng: { latitude: lat, longitude: lon } } };
}

/**
 * JSON when the body parses, raw text otherwise (kept for diagnosis)
 */
async function readBody(response: HttpResponse): Promise<unknown> {
  const text = await response.text();
  if (text === '') {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function describeFailure(error: unknown): string {
  if (error instanceof Error) {
    return error.name === 'TimeoutError' ? 'request timed out' : error.message;
  }
  return String(error);
}

/**
 * =============================================================================
 * LOCATION RESOLVER - Cache-through label -> coordinates
 * =============================================================================
 *
 * 1. Cached row with both coordinates -> return it, no provider call
 * 2. Otherwise geocode the address (first result wins)
 * 3. Upsert (label, address, lat, lon); re-resolving never duplicates a label
 * =============================================================================
 */

import { logger } from '../../shared/services/logger.service';
import type { Coordinates, LocationRepository } from '../../shared/database/repository.interface';
import type { GeocodingProvider } from '../routing/routing.schema';

export class LocationResolver {
  constructor(
    private readonly locations: LocationRepository,
    private readonly geocoder: GeocodingProvider
  ) {}

  async resolve(label: string, address: string): Promise<Coordinates> {
    const cached = this.locations.findByLabel(label);
    if (cached && cached.lat !== null && cached.lon !== null) {
      logger.debug(`📍 Location cache HIT: ${label}`);
      return { lat: cached.lat, lon: cached.lon };
    }

    logger.info(`📍 Location cache MISS: ${label}, geocoding`);
    const coordinates = await this.geocoder.geocode(address, label);

    this.locations.upsert(label, address, coordinates);
    logger.info(`📍 Cached coordinates for ${label}`, { lat: coordinates.lat, lon: coordinates.lon });

    return coordinates;
  }
}

/**
 * =============================================================================
 * LOCATION RESOLVER - Cache-through Tests
 * =============================================================================
 */

import { ErrorCode, ResolutionError } from '../core';
import { LocationResolver } from '../modules/locations/location.resolver';
import { SqliteLocationRepository } from '../modules/locations/location.repository';
import type { GeocodingProvider } from '../modules/routing/routing.schema';
import type { Coordinates } from '../shared/database/repository.interface';
import { createTempDatabase, InMemoryLocationRepository, TempDatabase } from './helpers/fixtures';

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

const HOME: Coordinates = { lat: 40.7128, lon: -74.006 };

function fakeGeocoder(result: Coordinates = HOME) {
  const geocode = jest.fn<Promise<Coordinates>, [string, string?]>().mockResolvedValue(result);
  const provider: GeocodingProvider = { geocode };
  return { provider, geocode };
}

describe('LocationResolver', () => {
  it('geocodes on a cache miss and stores the result', async () => {
    const locations = new InMemoryLocationRepository();
    const { provider, geocode } = fakeGeocoder();

    const coords = await new LocationResolver(locations, provider).resolve('Home', '1 Elm Street');

    expect(coords).toEqual(HOME);
    expect(geocode).toHaveBeenCalledWith('1 Elm Street', 'Home');
    expect(locations.findByLabel('Home')).toMatchObject({ address: '1 Elm Street', lat: 40.7128, lon: -74.006 });
  });

  it('serves the second resolve from the cache without calling the provider', async () => {
    const locations = new InMemoryLocationRepository();
    const { provider, geocode } = fakeGeocoder();
    const resolver = new LocationResolver(locations, provider);

    const first = await resolver.resolve('Home', '1 Elm Street');
    const second = await resolver.resolve('Home', '1 Elm Street');

    expect(geocode).toHaveBeenCalledTimes(1);
    expect(second).toEqual(first);
  });

  it('re-geocodes a cached label whose coordinates are missing', async () => {
    const locations = new InMemoryLocationRepository();
    locations.rows.set('Home', {
      id: 1,
      label: 'Home',
      address: 'old address',
      lat: null,
      lon: null,
      createdAt: '2026-01-01 00:00:00',
    });
    const { provider, geocode } = fakeGeocoder();

    await new LocationResolver(locations, provider).resolve('Home', '1 Elm Street');

    expect(geocode).toHaveBeenCalledTimes(1);
    expect(locations.rows.size).toBe(1);
    expect(locations.findByLabel('Home')).toMatchObject({ id: 1, address: '1 Elm Street', lat: 40.7128 });
  });

  it('propagates resolution failures and caches nothing', async () => {
    const locations = new InMemoryLocationRepository();
    const geocode = jest
      .fn<Promise<Coordinates>, [string, string?]>()
      .mockRejectedValue(new ResolutionError("Geocode failed for 'Home': no results", ErrorCode.GEOCODE_NO_RESULTS));

    await expect(
      new LocationResolver(locations, { geocode }).resolve('Home', 'nowhere')
    ).rejects.toBeInstanceOf(ResolutionError);
    expect(locations.rows.size).toBe(0);
  });
});

describe('SqliteLocationRepository', () => {
  let db: TempDatabase;

  beforeEach(() => {
    db = createTempDatabase();
  });

  afterEach(() => {
    db.cleanup();
  });

  it('returns null for an unknown label', () => {
    expect(new SqliteLocationRepository(db.sqlite).findByLabel('Home')).toBeNull();
  });

  it('upserts without duplicating the label', () => {
    const repository = new SqliteLocationRepository(db.sqlite);

    repository.upsert('Home', '1 Elm Street', HOME);
    repository.upsert('Home', '2 Oak Avenue', { lat: 41.5, lon: -73.25 });

    const count = db.sqlite.withConnection('count', conn =>
      conn.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM locations').get()
    );
    expect(count).toEqual({ n: 1 });
    expect(repository.findByLabel('Home')).toMatchObject({
      label: 'Home',
      address: '2 Oak Avenue',
      lat: 41.5,
      lon: -73.25,
    });
  });

  it('backs the resolver cache across separate connections', async () => {
    const repository = new SqliteLocationRepository(db.sqlite);
    const { provider, geocode } = fakeGeocoder();

    await new LocationResolver(repository, provider).resolve('Home', '1 Elm Street');
    const cached = await new LocationResolver(new SqliteLocationRepository(db.sqlite), provider)
      .resolve('Home', '1 Elm Street');

    expect(geocode).toHaveBeenCalledTimes(1);
    expect(cached).toEqual(HOME);
  });
});

// node/src/services/mapbox.ts: Mapbox forward geocoding and category search

import { z } from 'zod';
import { WorkerError, toRetryable } from '@/bus/envelope';
import type { PointOfInterest } from '@/types/estate';
import { retryWithBackoff } from '@/utils/retryWithBackoff';
import { componentLogger } from '@/services/logger';
import type { JsonFetcher } from './http';

const log = componentLogger('mapbox');

const GEOCODE_URL = 'https://api.mapbox.com/search/geocode/v6/forward';
const CATEGORY_URL = 'https://api.mapbox.com/search/searchbox/v1/category';

// GeoJSON order is [lon, lat]
const featureSchema = z.object({
  geometry: z.object({ coordinates: z.array(z.number()).min(2) }),
  properties: z
    .object({
      name: z.string().optional(),
      full_address: z.string().optional(),
      place_formatted: z.string().optional(),
      distance: z.number().optional(),
    })
    .passthrough()
    .default({}),
});

const featureCollectionSchema = z.object({
  features: z.array(featureSchema).default([]),
});

export interface GeocodeHit {
  latitude: number;
  longitude: number;
  resolvedAddress: string;
}

function parseFeatures(data: unknown, context: string): Array<z.infer<typeof featureSchema>> {
  const result = featureCollectionSchema.safeParse(data);
  if (!result.success) {
    throw new WorkerError(`${context}: unexpected Mapbox response`, 'BAD_RESPONSE', false);
  }
  return result.data.features;
}

/** Top US match for the address, or null when Mapbox has none. */
export async function geocodeAddress(
  fetcher: JsonFetcher,
  token: string,
  address: string,
): Promise<GeocodeHit | null> {
  const data = await retryWithBackoff(
    () => fetcher(GEOCODE_URL, { params: { q: address, access_token: token, limit: 1, country: 'US' } }),
    { maxRetries: 2, shouldRetry: toRetryable, label: 'mapbox geocode' },
  );
  const [feature] = parseFeatures(data, 'geocode');
  if (!feature) return null;

  const [longitude, latitude] = feature.geometry.coordinates;
  return {
    latitude,
    longitude,
    resolvedAddress: feature.properties.full_address ?? address,
  };
}

/** POIs of one category around a point; the category label is kept as given. */
export async function searchCategory(
  fetcher: JsonFetcher,
  token: string,
  category: string,
  latitude: number,
  longitude: number,
  limit: number,
): Promise<PointOfInterest[]> {
  const data = await fetcher(`${CATEGORY_URL}/${encodeURIComponent(category)}`, {
    params: {
      access_token: token,
      proximity: `${longitude},${latitude}`,
      limit,
      language: 'en',
    },
  });

  const points = parseFeatures(data, `category ${category}`).map((feature) => {
    const [lon, lat] = feature.geometry.coordinates;
    const { name, full_address, place_formatted, distance } = feature.properties;
    const point: PointOfInterest = {
      name: name ?? 'Unknown',
      category,
      latitude: lat,
      longitude: lon,
      address: full_address ?? place_formatted ?? '',
    };
    if (distance !== undefined) point.distanceMeters = distance;
    return point;
  });
  log.debug(`${category}: ${points.length} near ${latitude},${longitude}`);
  return points;
}

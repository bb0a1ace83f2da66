// POI worker: nearby amenities for one geocoded listing, one Mapbox category search per category.
import type { PoiResponse } from '@/bus/types';
import type { PointOfInterest } from '@/types/estate';
import type { JsonFetcher } from '@/services/http';
import { componentLogger } from '@/services/logger';
import { searchCategory } from '@/services/mapbox';
import { defineWorker } from './worker';

const log = componentLogger('poi');

export const POI_CATEGORIES = [
  'school',
  'hospital',
  'grocery',
  'restaurant',
  'park',
  'transit_station',
  'cafe',
  'gym',
] as const;

export interface PoiWorkerDeps {
  fetcher: JsonFetcher;
  token?: string;
  limitPerCategory?: number;
  categories?: readonly string[];
}

export function createPoiWorker({ fetcher, token, limitPerCategory = 2, categories = POI_CATEGORIES }: PoiWorkerDeps) {
  return defineWorker('poi', 'poi.request', async (request): Promise<PoiResponse> => {
    const { latitude, longitude, listingIndex } = request;
    if (!token) return { kind: 'poi.response', listingIndex, points: [], error: 'Mapbox token not configured' };

    const settled = await Promise.allSettled(
      categories.map((category) => searchCategory(fetcher, token, category, latitude, longitude, limitPerCategory)),
    );

    const points: PointOfInterest[] = [];
    let failed = 0;
    settled.forEach((outcome, i) => {
      if (outcome.status === 'fulfilled') {
        points.push(...outcome.value);
      } else {
        failed++;
        const reason = outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason);
        log.warn(`listing ${listingIndex}: ${categories[i]} search skipped (${reason})`);
      }
    });

    if (categories.length > 0 && failed === categories.length) {
      return { kind: 'poi.response', listingIndex, points: [], error: 'All category searches failed' };
    }
    return { kind: 'poi.response', listingIndex, points };
  });
}

// Geocode worker: one listing address to coordinates. Failures are answered in-band.
import type { GeocodeResponse } from '@/bus/types';
import type { JsonFetcher } from '@/services/http';
import { componentLogger } from '@/services/logger';
import { geocodeAddress } from '@/services/mapbox';
import { defineWorker } from './worker';

const log = componentLogger('geocode');

function geocodeError(error: string): GeocodeResponse {
  return { kind: 'geocode.response', latitude: null, longitude: null, resolvedAddress: null, error };
}

export interface GeocodeWorkerDeps {
  fetcher: JsonFetcher;
  token?: string;
}

export function createGeocodeWorker({ fetcher, token }: GeocodeWorkerDeps) {
  return defineWorker('geocode', 'geocode.request', async (request) => {
    if (!token) return geocodeError('Mapbox token not configured');

    try {
      const hit = await geocodeAddress(fetcher, token, request.address);
      if (!hit) return geocodeError('No coordinates found for address');
      return { kind: 'geocode.response', ...hit };
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      log.warn(`geocoding "${request.address}" failed: ${message}`);
      return geocodeError(`Geocoding failed: ${message}`);
    }
  });
}

/**
 * Fan-out: one geocode sub-request per addressable listing, then one POI
 * sub-request per successful geocode as those arrive.
 */
import { createTag } from '@/bus/tags';
import type { Session } from '@/memory/sessionState';
import { componentLogger } from '@/services/logger';
import type { GeocodedListing, Listing } from '@/types/estate';
import { deadlineEffect, type CoordinatorPolicy, type Effect } from './effects';

const log = componentLogger('fan-out');

export function listingAddress(listing: Listing): string | null {
  const address = listing.address?.trim();
  return address ? address : null;
}

/**
 * Dispatch the geocode batch for the turn's search result and fix the expected
 * count. Listings without an address are skipped and not counted.
 */
export function dispatchGeocodeBatch(session: Session, policy: CoordinatorPolicy): Effect[] {
  const turn = session.turn;
  if (!turn.searchResult || turn.counters.expectedGeocode !== null) return [];

  const batch = turn.searchResult.listings.slice(0, policy.fanOutCap);
  const effects: Effect[] = [];

  batch.forEach((listing, index) => {
    const address = listingAddress(listing);
    if (!address) {
      log.debug(`${session.key}#${turn.id}: listing ${index + 1} has no address, skipping`);
      return;
    }
    turn.dispatchedGeocode.add(index);
    effects.push({
      type: 'send',
      to: 'geocode',
      tag: createTag(session.key, turn.id, 'geocode', index),
      message: { kind: 'geocode.request', address },
    });
  });

  turn.counters.expectedGeocode = turn.dispatchedGeocode.size;
  log.info(`${session.key}#${turn.id}: geocoding ${turn.counters.expectedGeocode} of ${batch.length} listings`);

  if (turn.counters.expectedGeocode > 0) {
    turn.phase = 'awaiting_geocode';
    effects.push(...deadlineEffect(session, policy, 'geocode'));
  }
  return effects;
}

/** Cascade one POI search for a freshly geocoded listing. */
export function dispatchPoi(session: Session, geocoded: GeocodedListing, policy: CoordinatorPolicy): Effect[] {
  const turn = session.turn;
  if (turn.dispatchedPoi.has(geocoded.index)) return [];

  const first = turn.dispatchedPoi.size === 0;
  turn.dispatchedPoi.add(geocoded.index);
  const effect: Effect = {
    type: 'send',
    to: 'poi',
    tag: createTag(session.key, turn.id, 'poi', geocoded.index),
    message: {
      kind: 'poi.request',
      latitude: geocoded.latitude,
      longitude: geocoded.longitude,
      listingIndex: geocoded.index,
    },
  };
  turn.counters.expectedPoi += 1;
  turn.phase = 'awaiting_poi';

  return first ? [effect, ...deadlineEffect(session, policy, 'poi')] : [effect];
}

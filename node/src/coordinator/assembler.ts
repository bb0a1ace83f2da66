/**
 * Merges everything a turn collected into one record per listing and renders the reply.
 */
import type { TurnState } from '@/memory/sessionState';
import type { EnrichedListing } from '@/types/estate';
import { renderPropertyReport } from '@/format/propertyReport';
import { buildStaticMapUrl } from '@/format/staticMap';
import type { CoordinatorPolicy } from './effects';

export function mergeListings(turn: TurnState, fanOutCap: number): EnrichedListing[] {
  const search = turn.searchResult;
  if (!search) return [];

  return search.listings.slice(0, fanOutCap).map((listing, index) => {
    const geocoded = turn.geocoded.find((g) => g.index === index);
    const image = search.images.find((img) => img.index === index);
    const points = turn.pois
      .filter((p) => p.listingIndex === index)
      .flatMap((p) => p.points);

    const merged: EnrichedListing = { ...listing, index, pointsOfInterest: points };
    if (geocoded) {
      merged.latitude = geocoded.latitude;
      merged.longitude = geocoded.longitude;
      merged.resolvedAddress = geocoded.resolvedAddress;
    }
    if (image) merged.imageUrl = image.imageUrl;
    return merged;
  });
}

export function assembleReply(turn: TurnState, policy: CoordinatorPolicy): string {
  const search = turn.searchResult;
  const listings = mergeListings(turn, policy.fanOutCap);
  const mapUrl = policy.mapboxToken
    ? buildStaticMapUrl(
        turn.geocoded.filter((g) => g.index < listings.length),
        policy.mapboxToken,
      )
    : null;

  return renderPropertyReport({
    summary: search?.searchSummary ?? '',
    totalFound: search?.totalFound ?? 0,
    listings,
    community: turn.communityAnalysis,
    mapUrl,
  });
}

import type { GeocodedListing } from '@/types/estate';

const STATIC_BASE_URL = 'https://api.mapbox.com/styles/v1/mapbox/streets-v12/static';
const PIN_COLORS = ['e74c3c', '3498db', '2ecc71', 'f39c12', '9b59b6'];

/**
 * Mapbox Static Images URL with one numbered pin per geocoded listing, auto-fitted.
 * Returns null when there is nothing to pin.
 */
export function buildStaticMapUrl(geocoded: GeocodedListing[], token: string): string | null {
  if (!token || geocoded.length === 0) return null;

  const markers = [...geocoded]
    .sort((a, b) => a.index - b.index)
    .map((g) => {
      const color = PIN_COLORS[g.index % PIN_COLORS.length];
      return `pin-s-${g.index + 1}+${color}(${g.longitude},${g.latitude})`;
    });

  return `${STATIC_BASE_URL}/${markers.join(',')}/auto/1000x600@2x?access_token=${encodeURIComponent(token)}`;
}

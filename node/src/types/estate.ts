/**
 * Domain records shared by the coordinator and the worker adapters.
 * Schemas double as runtime validators for payloads coming back from workers and LLMs.
 */
import { z } from 'zod';

export const requirementsSchema = z.object({
  budgetMin: z.number().nonnegative().nullable().optional(),
  budgetMax: z.number().nonnegative().nullable().optional(),
  bedrooms: z.number().nonnegative().nullable().optional(),
  bathrooms: z.number().nonnegative().nullable().optional(),
  location: z.string().min(1),
  additionalInfo: z.string().nullable().optional(),
});

export type Requirements = z.infer<typeof requirementsSchema>;

export const listingSchema = z.object({
  title: z.string(),
  address: z.string().optional(),
  link: z.string().optional(),
  description: z.string().optional(),
  price: z.string().optional(),
  beds: z.number().optional(),
  baths: z.number().optional(),
  sqft: z.number().optional(),
});

export type Listing = z.infer<typeof listingSchema>;

export interface ListingImage {
  index: number;
  imageUrl: string;
}

export interface SearchResult {
  listings: Listing[];
  searchSummary: string;
  totalFound: number;
  images: ListingImage[];
}

export interface GeocodedListing {
  index: number;
  latitude: number;
  longitude: number;
  resolvedAddress: string;
}

export const pointOfInterestSchema = z.object({
  name: z.string(),
  category: z.string(),
  latitude: z.number(),
  longitude: z.number(),
  address: z.string(),
  distanceMeters: z.number().optional(),
});

export type PointOfInterest = z.infer<typeof pointOfInterestSchema>;

export interface ListingPois {
  listingIndex: number;
  points: PointOfInterest[];
}

export const communityStorySchema = z.object({
  title: z.string().default('News'),
  summary: z.string().default(''),
  url: z
    .string()
    .nullish()
    .transform((url) => url ?? undefined),
});

export type CommunityStory = z.infer<typeof communityStorySchema>;

export interface CommunityAnalysis {
  location: string;
  overallScore: number | null;
  overallExplanation: string | null;
  safetyScore: number | null;
  schoolScore: number | null;
  schoolExplanation: string | null;
  housingPricePerSqft: number | null;
  avgHouseSizeSqft: number | null;
  positiveStories: CommunityStory[];
  negativeStories: CommunityStory[];
}

/** One listing with everything the fan-in collected for it. */
export interface EnrichedListing extends Listing {
  index: number;
  latitude?: number;
  longitude?: number;
  resolvedAddress?: string;
  imageUrl?: string;
  pointsOfInterest: PointOfInterest[];
}

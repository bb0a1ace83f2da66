/**
 * Wire contract between the coordinator and the workers.
 * Every message travels inside an Envelope whose tag correlates it to a session turn and stage slot.
 */
import type {
  CommunityAnalysis,
  ListingImage,
  Listing,
  PointOfInterest,
  Requirements,
} from '@/types/estate';

export type WorkerAddress =
  | 'coordinator'
  | 'scoping'
  | 'search'
  | 'geocode'
  | 'poi'
  | 'community'
  | 'general';

export type Stage = 'scope' | 'search' | 'geocode' | 'poi' | 'community' | 'general';

export interface SubtaskTag {
  sessionKey: string;
  turnId: number;
  stage: Stage;
  /** Listing index for fan-out stages, 0 for single-shot stages. */
  index: number;
}

export interface ScopeRequest {
  kind: 'scope.request';
  userMessage: string;
  conversationId: string;
}

export interface ScopeResponse {
  kind: 'scope.response';
  /** Raw classification; the intent router validates it. */
  classification: unknown;
}

export interface SearchRequest {
  kind: 'search.request';
  requirements: Requirements;
}

export interface SearchResponse {
  kind: 'search.response';
  listings: Listing[];
  searchSummary: string;
  totalFound: number;
  images: ListingImage[];
}

export interface GeocodeRequest {
  kind: 'geocode.request';
  address: string;
}

export interface GeocodeResponse {
  kind: 'geocode.response';
  latitude: number | null;
  longitude: number | null;
  resolvedAddress: string | null;
  error?: string;
}

export interface PoiRequest {
  kind: 'poi.request';
  latitude: number;
  longitude: number;
  listingIndex: number;
}

export interface PoiResponse {
  kind: 'poi.response';
  listingIndex: number;
  points: PointOfInterest[];
  error?: string;
}

export interface CommunityRequest {
  kind: 'community.request';
  locationName: string;
}

export interface CommunityResponse extends CommunityAnalysis {
  kind: 'community.response';
}

export interface GeneralRequest {
  kind: 'general.request';
  question: string;
}

export interface GeneralResponse {
  kind: 'general.response';
  answer: string;
}

export interface WorkerErrorDetail {
  code: string;
  message: string;
  retryable: boolean;
}

export interface WorkerFailure {
  kind: 'worker.failure';
  stage: Stage;
  error: WorkerErrorDetail;
}

export type RequestMessage =
  | ScopeRequest
  | SearchRequest
  | GeocodeRequest
  | PoiRequest
  | CommunityRequest
  | GeneralRequest;

export type ResponseMessage =
  | ScopeResponse
  | SearchResponse
  | GeocodeResponse
  | PoiResponse
  | CommunityResponse
  | GeneralResponse
  | WorkerFailure;

export type BusMessage = RequestMessage | ResponseMessage;

export interface Envelope<M extends BusMessage = BusMessage> {
  /** Delivery id; a redelivered message keeps its id. */
  id: string;
  from: WorkerAddress;
  to: WorkerAddress;
  tag: SubtaskTag;
  message: M;
}

export type RequestKind = RequestMessage['kind'];

/** Response message type paired with each request kind. */
export interface ResponseFor {
  'scope.request': ScopeResponse;
  'search.request': SearchResponse;
  'geocode.request': GeocodeResponse;
  'poi.request': PoiResponse;
  'community.request': CommunityResponse;
  'general.request': GeneralResponse;
}

export type RequestOfKind<K extends RequestKind> = Extract<RequestMessage, { kind: K }>;

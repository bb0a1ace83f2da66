// node/src/memory/sessionState.ts

import type { Stage } from '@/bus/types';
import type {
  CommunityAnalysis,
  GeocodedListing,
  ListingPois,
  Requirements,
  SearchResult,
} from '@/types/estate';

export type TurnPhase =
  | 'idle'
  | 'awaiting_scope'
  | 'answering_general'
  | 'awaiting_search'
  | 'awaiting_geocode'
  | 'awaiting_poi'
  | 'assembled';

export interface TurnReply {
  sessionKey: string;
  turnId: number;
  text: string;
  /** Exactly one final reply is sent per turn. */
  final: boolean;
}

/** Where the answer for the current turn goes; replaced on every new user turn. */
export interface ReplyChannel {
  send(reply: TurnReply): void;
}

export interface StageCounters {
  /** null until the geocode batch is dispatched; fixed afterwards. */
  expectedGeocode: number | null;
  arrivedGeocode: number;
  /** Grows by one per successful geocode. */
  expectedPoi: number;
  arrivedPoi: number;
}

export interface TurnState {
  id: number;
  phase: TurnPhase;
  startedAt: number;
  searchResult: SearchResult | null;
  geocoded: GeocodedListing[];
  pois: ListingPois[];
  communityRequested: boolean;
  communityAnalysis: CommunityAnalysis | null;
  /** Community reply failed or the grace window elapsed. */
  communitySettled: boolean;
  communityGraceArmed: boolean;
  counters: StageCounters;
  dispatchedGeocode: Set<number>;
  dispatchedPoi: Set<number>;
  seenTags: Set<string>;
  /** Stages closed by their deadline rather than by arrivals. */
  timedOut: Set<Stage>;
  finalized: boolean;
}

export interface Session {
  key: string;
  sender: string | null;
  createdAt: number;
  updatedAt: number;
  replyChannel: ReplyChannel | null;
  requirements: Requirements | null;
  turn: TurnState;
}

export function createTurn(id: number, now = Date.now()): TurnState {
  return {
    id,
    phase: id === 0 ? 'idle' : 'awaiting_scope',
    startedAt: now,
    searchResult: null,
    geocoded: [],
    pois: [],
    communityRequested: false,
    communityAnalysis: null,
    communitySettled: false,
    communityGraceArmed: false,
    counters: { expectedGeocode: null, arrivedGeocode: 0, expectedPoi: 0, arrivedPoi: 0 },
    dispatchedGeocode: new Set(),
    dispatchedPoi: new Set(),
    seenTags: new Set(),
    timedOut: new Set(),
    finalized: id === 0,
  };
}

export function createSession(key: string, now = Date.now()): Session {
  return {
    key,
    sender: null,
    createdAt: now,
    updatedAt: now,
    replyChannel: null,
    requirements: null,
    turn: createTurn(0, now),
  };
}

/** Start a new turn: overwrite the reply channel and reset every per-turn field. */
export function beginTurn(session: Session, sender: string, channel: ReplyChannel, now = Date.now()): TurnState {
  session.sender = sender;
  session.replyChannel = channel;
  session.turn = createTurn(session.turn.id + 1, now);
  return session.turn;
}

export function isTurnInFlight(session: Session): boolean {
  return !session.turn.finalized;
}

/**
 * Fan-in: every response from a worker lands here, inside the session's atomic
 * update. Each handler records the arrival, then defers to settleTurn, so the
 * completion check is the same no matter which stage finished last.
 */
import { tagKey } from '@/bus/tags';
import type {
  CommunityResponse,
  GeneralResponse,
  GeocodeResponse,
  PoiResponse,
  ResponseMessage,
  ScopeResponse,
  SearchResponse,
  Stage,
  SubtaskTag,
  WorkerFailure,
} from '@/bus/types';
import type { Session } from '@/memory/sessionState';
import { componentLogger } from '@/services/logger';
import type { CommunityAnalysis } from '@/types/estate';
import { finishTurn, settleTurn } from './completion';
import { progressEffect, type CoordinatorPolicy, type Effect } from './effects';
import { dispatchGeocodeBatch, dispatchPoi } from './fanOut';
import { routeClassification } from './intentRouter';

const log = componentLogger('fan-in');

export const UNAVAILABLE_MESSAGES: Record<'scope' | 'search' | 'general', string> = {
  scope: "I'm having trouble processing your request right now. Could you try again in a moment?",
  search: "I couldn't reach the listing search right now, so I can't show properties yet. Please try again shortly.",
  general: "I couldn't look that up right now. Please try asking again in a moment.",
};

export const TIMEOUT_MESSAGES: Record<'scope' | 'search' | 'general', string> = {
  scope: 'This is taking longer than expected. Please send your message again.',
  search: 'The listing search is taking too long. Please try again in a moment.',
  general: 'Looking that up is taking too long. Please try again in a moment.',
};

export type ArrivalVerdict = 'accept' | 'late' | 'stale' | 'duplicate' | 'unknown-slot';

/**
 * Classify an arrival against the session's current turn and record its tag.
 * 'late' arrivals belong to the current turn but came after it was finalized.
 */
export function admitArrival(session: Session, tag: SubtaskTag): ArrivalVerdict {
  const turn = session.turn;
  if (tag.turnId !== turn.id) return 'stale';

  if (tag.stage === 'geocode' && !turn.dispatchedGeocode.has(tag.index)) return 'unknown-slot';
  if (tag.stage === 'poi' && !turn.dispatchedPoi.has(tag.index)) return 'unknown-slot';

  const key = tagKey(tag);
  if (turn.seenTags.has(key)) return 'duplicate';
  turn.seenTags.add(key);
  return turn.finalized ? 'late' : 'accept';
}

export function onScopeArrival(session: Session, msg: ScopeResponse, policy: CoordinatorPolicy): Effect[] {
  return routeClassification(session, msg.classification, policy);
}

export function onSearchArrival(session: Session, msg: SearchResponse, policy: CoordinatorPolicy): Effect[] {
  const turn = session.turn;
  turn.searchResult = {
    listings: msg.listings,
    searchSummary: msg.searchSummary,
    totalFound: msg.totalFound,
    images: msg.images,
  };
  log.info(`${session.key}#${turn.id}: search returned ${msg.listings.length} listings`);

  const effects: Effect[] = [];
  if (msg.listings.length > 0) {
    effects.push(
      ...progressEffect(session, policy, `📍 Found ${msg.totalFound} properties! Gathering location details...`),
    );
  }
  effects.push(...dispatchGeocodeBatch(session, policy));
  effects.push(...settleTurn(session, policy));
  return effects;
}

export function onGeocodeArrival(
  session: Session,
  tag: SubtaskTag,
  msg: GeocodeResponse,
  policy: CoordinatorPolicy,
  late = false,
): Effect[] {
  const turn = session.turn;
  turn.counters.arrivedGeocode += 1;
  const progress = `${turn.counters.arrivedGeocode}/${turn.counters.expectedGeocode ?? 0}`;

  if (msg.error || msg.latitude === null || msg.longitude === null) {
    log.warn(`${session.key}#${turn.id}: geocode failed for listing ${tag.index + 1} (${progress}): ${msg.error ?? 'no coordinates'}`);
    return late ? [] : settleTurn(session, policy);
  }

  const geocoded = {
    index: tag.index,
    latitude: msg.latitude,
    longitude: msg.longitude,
    resolvedAddress: msg.resolvedAddress ?? '',
  };
  turn.geocoded.push(geocoded);
  log.debug(`${session.key}#${turn.id}: geocoded listing ${tag.index + 1} (${progress})`);

  if (late || turn.timedOut.has('geocode')) return late ? [] : settleTurn(session, policy);
  return [...dispatchPoi(session, geocoded, policy), ...settleTurn(session, policy)];
}

export function onPoiArrival(
  session: Session,
  tag: SubtaskTag,
  msg: PoiResponse,
  policy: CoordinatorPolicy,
  late = false,
): Effect[] {
  const turn = session.turn;
  turn.pois.push({ listingIndex: tag.index, points: msg.points });
  turn.counters.arrivedPoi += 1;
  if (msg.error) log.warn(`${session.key}#${turn.id}: POI search for listing ${tag.index + 1} degraded: ${msg.error}`);
  log.debug(`${session.key}#${turn.id}: POI progress ${turn.counters.arrivedPoi}/${turn.counters.expectedPoi}`);
  return late ? [] : settleTurn(session, policy);
}

export function onCommunityArrival(session: Session, msg: CommunityResponse, policy: CoordinatorPolicy): Effect[] {
  const { kind: _kind, ...analysis } = msg;
  const community: CommunityAnalysis = analysis;
  session.turn.communityAnalysis = community;
  log.info(`${session.key}#${session.turn.id}: community analysis for ${community.location} arrived`);
  return settleTurn(session, policy);
}

export function onGeneralArrival(session: Session, msg: GeneralResponse): Effect[] {
  return finishTurn(session, msg.answer);
}

/** A worker gave up on its sub-task, or could not be reached. */
export function onFailure(session: Session, tag: SubtaskTag, msg: WorkerFailure, policy: CoordinatorPolicy): Effect[] {
  const turn = session.turn;
  log.warn(`${session.key}#${turn.id}: ${tag.stage} failed [${msg.error.code}] ${msg.error.message}`);

  switch (tag.stage) {
    case 'scope':
    case 'search':
    case 'general':
      return finishTurn(session, UNAVAILABLE_MESSAGES[tag.stage]);
    case 'geocode':
      return onGeocodeArrival(
        session,
        tag,
        { kind: 'geocode.response', latitude: null, longitude: null, resolvedAddress: null, error: msg.error.message },
        policy,
      );
    case 'poi':
      return onPoiArrival(session, tag, { kind: 'poi.response', listingIndex: tag.index, points: [], error: msg.error.message }, policy);
    case 'community':
      turn.communitySettled = true;
      return settleTurn(session, policy);
  }
}

/** Route one admitted response to its stage handler. */
export function applyArrival(
  session: Session,
  tag: SubtaskTag,
  msg: ResponseMessage,
  policy: CoordinatorPolicy,
  late: boolean,
): Effect[] {
  if (late) {
    // merged for the record; the turn has already been answered
    if (msg.kind === 'geocode.response') return onGeocodeArrival(session, tag, msg, policy, true);
    if (msg.kind === 'poi.response') return onPoiArrival(session, tag, msg, policy, true);
    if (msg.kind === 'community.response') {
      const { kind: _kind, ...analysis } = msg;
      session.turn.communityAnalysis = analysis;
    }
    return [];
  }

  switch (msg.kind) {
    case 'scope.response':
      return onScopeArrival(session, msg, policy);
    case 'search.response':
      return onSearchArrival(session, msg, policy);
    case 'geocode.response':
      return onGeocodeArrival(session, tag, msg, policy);
    case 'poi.response':
      return onPoiArrival(session, tag, msg, policy);
    case 'community.response':
      return onCommunityArrival(session, msg, policy);
    case 'general.response':
      return onGeneralArrival(session, msg);
    case 'worker.failure':
      return onFailure(session, tag, msg, policy);
  }
}

/**
 * A stage deadline fired. Open stages are closed with whatever arrived; single-shot
 * stages with nothing to assemble end the turn with an explanation.
 */
export function onStageDeadline(session: Session, turnId: number, stage: Stage, policy: CoordinatorPolicy): Effect[] {
  const turn = session.turn;
  if (turn.id !== turnId || turn.finalized) return [];

  switch (stage) {
    case 'scope':
      if (turn.phase !== 'awaiting_scope') return [];
      return finishTurn(session, TIMEOUT_MESSAGES.scope);
    case 'general':
      return finishTurn(session, TIMEOUT_MESSAGES.general);
    case 'search':
      if (turn.searchResult !== null) return [];
      return finishTurn(session, TIMEOUT_MESSAGES.search);
    case 'geocode':
    case 'poi':
      log.warn(`${session.key}#${turn.id}: ${stage} deadline reached, continuing with partial data`, {
        geocoded: `${turn.counters.arrivedGeocode}/${turn.counters.expectedGeocode ?? 0}`,
        pois: `${turn.counters.arrivedPoi}/${turn.counters.expectedPoi}`,
      });
      turn.timedOut.add(stage);
      return settleTurn(session, policy);
    case 'community':
      turn.communitySettled = true;
      return settleTurn(session, policy);
  }
}

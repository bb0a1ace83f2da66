/**
 * Turn completion. isTurnComplete is the one predicate every arrival handler
 * and every deadline goes through before anything is assembled.
 */
import { componentLogger } from '@/services/logger';
import type { Session, TurnState } from '@/memory/sessionState';
import { assembleReply } from './assembler';
import { replyEffect, type CoordinatorPolicy, type Effect } from './effects';

const log = componentLogger('completion');

export function isGeocodeStageClosed(turn: TurnState): boolean {
  const { expectedGeocode, arrivedGeocode } = turn.counters;
  if (expectedGeocode === null) return false;
  return arrivedGeocode >= expectedGeocode || turn.timedOut.has('geocode');
}

export function isPoiStageClosed(turn: TurnState): boolean {
  const { expectedPoi, arrivedPoi } = turn.counters;
  return arrivedPoi >= expectedPoi || turn.timedOut.has('poi');
}

/** Search, geocode and POI stages have all resolved. */
export function isCoreComplete(turn: TurnState): boolean {
  return turn.searchResult !== null && isGeocodeStageClosed(turn) && isPoiStageClosed(turn);
}

export function isCommunitySettled(turn: TurnState): boolean {
  return !turn.communityRequested || turn.communityAnalysis !== null || turn.communitySettled;
}

export function isTurnComplete(turn: TurnState): boolean {
  return !turn.finalized && isCoreComplete(turn) && isCommunitySettled(turn);
}

/** Send the final reply and close the turn. Second calls are no-ops. */
export function finishTurn(session: Session, text: string): Effect[] {
  const turn = session.turn;
  if (turn.finalized) return [];
  turn.finalized = true;
  turn.phase = 'assembled';
  return [
    ...replyEffect(session, text, true),
    { type: 'clear-deadlines', sessionKey: session.key, turnId: turn.id },
  ];
}

/**
 * Re-evaluate the turn after an arrival or a deadline. Assembles exactly once;
 * while only the advisory community analysis is outstanding, arms its grace window.
 */
export function settleTurn(session: Session, policy: CoordinatorPolicy): Effect[] {
  const turn = session.turn;
  if (turn.finalized || !isCoreComplete(turn)) return [];

  if (!isCommunitySettled(turn)) {
    if (policy.communityGraceMs <= 0) {
      turn.communitySettled = true;
    } else if (!turn.communityGraceArmed) {
      turn.communityGraceArmed = true;
      log.debug(`${session.key}#${turn.id}: core complete, waiting ${policy.communityGraceMs}ms for community`);
      return [
        {
          type: 'deadline',
          sessionKey: session.key,
          turnId: turn.id,
          stage: 'community',
          ms: policy.communityGraceMs,
        },
      ];
    } else {
      return [];
    }
  }

  if (!isTurnComplete(turn)) return [];
  log.info(`${session.key}#${turn.id}: all stages resolved, assembling`, {
    geocoded: `${turn.counters.arrivedGeocode}/${turn.counters.expectedGeocode ?? 0}`,
    pois: `${turn.counters.arrivedPoi}/${turn.counters.expectedPoi}`,
    community: turn.communityAnalysis !== null,
  });
  return finishTurn(session, assembleReply(turn, policy));
}

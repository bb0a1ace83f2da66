// pattern: state transitions return effects; the coordinator runs them after the session update commits

import type { RequestMessage, Stage, SubtaskTag, WorkerAddress } from '@/bus/types';
import type { ReplyChannel, Session, TurnReply } from '@/memory/sessionState';

export type Effect =
  | { type: 'send'; to: WorkerAddress; tag: SubtaskTag; message: RequestMessage }
  | { type: 'reply'; channel: ReplyChannel; reply: TurnReply }
  | { type: 'deadline'; sessionKey: string; turnId: number; stage: Stage; ms: number }
  | { type: 'clear-deadlines'; sessionKey: string; turnId: number };

export interface CoordinatorPolicy {
  /** Listings past this index are neither geocoded nor rendered. */
  fanOutCap: number;
  /** 0 disables stage deadlines. */
  stageTimeoutMs: number;
  /** How long a finished pipeline waits for an outstanding community analysis. */
  communityGraceMs: number;
  progressUpdates: boolean;
  mapboxToken?: string;
}

export const DEFAULT_POLICY: CoordinatorPolicy = {
  fanOutCap: 5,
  stageTimeoutMs: 45_000,
  communityGraceMs: 3_000,
  progressUpdates: true,
};

export function replyEffect(session: Session, text: string, final: boolean): Effect[] {
  if (!session.replyChannel) return [];
  return [
    {
      type: 'reply',
      channel: session.replyChannel,
      reply: { sessionKey: session.key, turnId: session.turn.id, text, final },
    },
  ];
}

export function progressEffect(session: Session, policy: CoordinatorPolicy, text: string): Effect[] {
  return policy.progressUpdates ? replyEffect(session, text, false) : [];
}

export function deadlineEffect(session: Session, policy: CoordinatorPolicy, stage: Stage): Effect[] {
  if (policy.stageTimeoutMs <= 0) return [];
  return [
    { type: 'deadline', sessionKey: session.key, turnId: session.turn.id, stage, ms: policy.stageTimeoutMs },
  ];
}

/**
 * Coordinator: accepts one user message per turn and fans the turn out over the
 * bus. All session mutation happens inside SessionStore.update; bus sends,
 * replies and deadline timers are effects run after the update commits.
 */
import type { MessageBus } from '@/bus/messageBus';
import { createEnvelope } from '@/bus/envelope';
import { createTag, formatLegacyTag } from '@/bus/tags';
import type { BusMessage, Envelope, ResponseMessage, Stage } from '@/bus/types';
import type { SessionKeyMode } from '@/config/app.config';
import type { SessionStore } from '@/memory/SessionStore';
import { beginTurn, type ReplyChannel, type Session } from '@/memory/sessionState';
import { componentLogger } from '@/services/logger';
import { finishTurn } from './completion';
import {
  DEFAULT_POLICY,
  deadlineEffect,
  progressEffect,
  type CoordinatorPolicy,
  type Effect,
} from './effects';
import { admitArrival, applyArrival, onStageDeadline } from './fanIn';
import { FALLBACK_PROMPT } from './intentRouter';

const log = componentLogger('coordinator');

export const SUPERSEDED_MESSAGE = 'Your previous request was replaced by a newer message.';

export interface UserTurnInput {
  sender: string;
  text: string;
  channel: ReplyChannel;
  /** Overrides the key derived from the sender. */
  sessionKey?: string;
}

export interface TurnHandle {
  sessionKey: string;
  turnId: number;
}

export function deriveSessionKey(sender: string, mode: SessionKeyMode, now: number = Date.now()): string {
  return mode === 'sender-timestamp' ? `${sender}@${now}` : sender;
}

function isResponse(message: BusMessage): message is ResponseMessage {
  return !message.kind.endsWith('.request');
}

function turnKey(sessionKey: string, turnId: number): string {
  return `${sessionKey}#${turnId}`;
}

export class Coordinator {
  readonly policy: CoordinatorPolicy;
  private readonly timers = new Map<string, Set<NodeJS.Timeout>>();
  private unregister: (() => void) | null = null;

  constructor(
    private readonly bus: MessageBus,
    private readonly store: SessionStore,
    policy: Partial<CoordinatorPolicy> = {},
    private readonly keyMode: SessionKeyMode = 'sender',
  ) {
    this.policy = { ...DEFAULT_POLICY, ...policy };
  }

  start(): void {
    if (this.unregister) return;
    this.unregister = this.bus.register('coordinator', (envelope) => this.receive(envelope));
    log.info('coordinator listening', {
      fanOutCap: this.policy.fanOutCap,
      stageTimeoutMs: this.policy.stageTimeoutMs,
      communityGraceMs: this.policy.communityGraceMs,
    });
  }

  async handleUserMessage(input: UserTurnInput): Promise<TurnHandle> {
    const sessionKey = input.sessionKey ?? deriveSessionKey(input.sender, this.keyMode);
    const text = input.text.trim();
    let turnId = 0;

    await this.apply(sessionKey, (session) => {
      const effects = this.supersede(session);
      const turn = beginTurn(session, input.sender, input.channel);
      turnId = turn.id;
      log.info(`${sessionKey}#${turn.id}: new turn from ${input.sender}`);

      if (!text) return [...effects, ...finishTurn(session, FALLBACK_PROMPT)];

      return [
        ...effects,
        ...progressEffect(session, this.policy, '🔍 Processing your request...'),
        {
          type: 'send',
          to: 'scoping',
          tag: createTag(sessionKey, turn.id, 'scope'),
          message: { kind: 'scope.request', userMessage: text, conversationId: input.sender },
        },
        ...deadlineEffect(session, this.policy, 'scope'),
      ];
    });

    return { sessionKey, turnId };
  }

  /** Bus entry point for every worker response. */
  async receive(envelope: Envelope): Promise<void> {
    const { message, tag } = envelope;
    if (!isResponse(message)) {
      log.warn(`coordinator does not take ${message.kind}`);
      return;
    }

    await this.apply(tag.sessionKey, (session) => {
      const verdict = admitArrival(session, tag);
      switch (verdict) {
        case 'stale':
          log.warn(`${formatLegacyTag(tag)}: ${message.kind} for turn ${tag.turnId} ignored, session is on turn ${session.turn.id}`);
          return [];
        case 'duplicate':
          log.debug(`${formatLegacyTag(tag)}: duplicate ${message.kind} ignored`);
          return [];
        case 'unknown-slot':
          log.warn(`${formatLegacyTag(tag)}: ${message.kind} for an index that was never dispatched`);
          return [];
        case 'late':
        case 'accept':
          return applyArrival(session, tag, message, this.policy, verdict === 'late');
      }
    });
  }

  /** Number of armed stage deadlines across all sessions. */
  pendingDeadlines(): number {
    let count = 0;
    for (const set of this.timers.values()) count += set.size;
    return count;
  }

  shutdown(): void {
    for (const set of this.timers.values()) set.forEach((timer) => clearTimeout(timer));
    this.timers.clear();
    this.unregister?.();
    this.unregister = null;
  }

  private supersede(session: Session): Effect[] {
    const previous = session.turn;
    if (previous.finalized) return [];
    log.info(`${session.key}#${previous.id}: superseded by a new message`);
    return finishTurn(session, SUPERSEDED_MESSAGE);
  }

  private async apply(sessionKey: string, mutate: (session: Session) => Effect[]): Promise<void> {
    const effects = await this.store.update(sessionKey, mutate);
    this.run(effects);
  }

  private run(effects: Effect[]): void {
    for (const effect of effects) {
      switch (effect.type) {
        case 'send':
          this.bus.send(createEnvelope('coordinator', effect.to, effect.tag, effect.message));
          break;
        case 'reply':
          try {
            effect.channel.send(effect.reply);
          } catch (err: unknown) {
            log.error(`reply to ${effect.reply.sessionKey} failed`, {
              error: err instanceof Error ? err.message : String(err),
            });
          }
          break;
        case 'deadline':
          this.armDeadline(effect.sessionKey, effect.turnId, effect.stage, effect.ms);
          break;
        case 'clear-deadlines':
          this.clearDeadlines(effect.sessionKey, effect.turnId);
          break;
      }
    }
  }

  private armDeadline(sessionKey: string, turnId: number, stage: Stage, ms: number): void {
    const key = turnKey(sessionKey, turnId);
    const timer = setTimeout(() => {
      this.timers.get(key)?.delete(timer);
      this.apply(sessionKey, (session) => onStageDeadline(session, turnId, stage, this.policy)).catch(
        (err: unknown) => {
          log.error(`${key}: ${stage} deadline handling failed`, {
            error: err instanceof Error ? err.message : String(err),
          });
        },
      );
    }, ms);
    const set = this.timers.get(key) ?? new Set<NodeJS.Timeout>();
    set.add(timer);
    this.timers.set(key, set);
  }

  private clearDeadlines(sessionKey: string, turnId: number): void {
    const key = turnKey(sessionKey, turnId);
    this.timers.get(key)?.forEach((timer) => clearTimeout(timer));
    this.timers.delete(key);
  }
}

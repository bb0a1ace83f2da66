/**
 * Intent router: turns the scoping worker's classification into the next stage of the turn.
 */
import { z } from 'zod';
import { createTag } from '@/bus/tags';
import type { Session } from '@/memory/sessionState';
import { componentLogger } from '@/services/logger';
import { requirementsSchema, type Requirements } from '@/types/estate';
import { finishTurn } from './completion';
import { deadlineEffect, progressEffect, type CoordinatorPolicy, type Effect } from './effects';

const log = componentLogger('router');

export const FALLBACK_PROMPT =
  "I'm here to help you find a home. Tell me your budget, how many bedrooms and bathrooms you need, and where you'd like to live.";

export const classificationSchema = z.object({
  isGeneralQuestion: z.boolean().default(false),
  generalQuestion: z.string().nullish(),
  isComplete: z.boolean().default(false),
  requirements: requirementsSchema.nullish(),
  communityName: z.string().nullish(),
  agentMessage: z.string().default(''),
});

export type Classification = z.infer<typeof classificationSchema>;

export type RouteDecision =
  | { route: 'general'; question: string }
  | { route: 'search'; requirements: Requirements; communityName: string | null }
  | { route: 'relay'; message: string }
  | { route: 'fallback'; reason: string };

const agentMessageOnly = z.object({ agentMessage: z.string() });

export function decideRoute(raw: unknown): RouteDecision {
  const parsed = classificationSchema.safeParse(raw);
  if (!parsed.success) {
    const reason = parsed.error.errors.map((e) => `${e.path.join('.') || 'root'}: ${e.message}`).join('; ');
    // unusable requirements still leave the model's own reply to relay
    const onlyRequirements = parsed.error.errors.every((e) => e.path[0] === 'requirements');
    const relayable = agentMessageOnly.safeParse(raw);
    const message = relayable.success ? relayable.data.agentMessage.trim() : '';
    if (onlyRequirements && message) {
      log.warn(`relaying agent message, requirements rejected (${reason})`);
      return { route: 'relay', message };
    }
    return { route: 'fallback', reason };
  }

  const c = parsed.data;
  const question = c.generalQuestion?.trim();
  if (c.isGeneralQuestion && question) {
    return { route: 'general', question };
  }
  if (c.isComplete && c.requirements) {
    const communityName = c.communityName?.trim();
    return { route: 'search', requirements: c.requirements, communityName: communityName || null };
  }
  const message = c.agentMessage.trim();
  return message ? { route: 'relay', message } : { route: 'fallback', reason: 'empty agent message' };
}

export function routeClassification(session: Session, raw: unknown, policy: CoordinatorPolicy): Effect[] {
  const turn = session.turn;
  const decision = decideRoute(raw);

  switch (decision.route) {
    case 'general': {
      log.info(`${session.key}#${turn.id}: general question`);
      turn.phase = 'answering_general';
      const tag = createTag(session.key, turn.id, 'general');
      return [
        ...progressEffect(session, policy, '💬 Answering your question...'),
        { type: 'send', to: 'general', tag, message: { kind: 'general.request', question: decision.question } },
        ...deadlineEffect(session, policy, 'general'),
      ];
    }

    case 'search': {
      log.info(`${session.key}#${turn.id}: search in ${decision.requirements.location}`, {
        community: decision.communityName,
      });
      session.requirements = decision.requirements;
      turn.phase = 'awaiting_search';
      const effects: Effect[] = [
        ...progressEffect(session, policy, '🏠 Searching for properties...'),
        {
          type: 'send',
          to: 'search',
          tag: createTag(session.key, turn.id, 'search'),
          message: { kind: 'search.request', requirements: decision.requirements },
        },
        ...deadlineEffect(session, policy, 'search'),
      ];
      if (decision.communityName) {
        turn.communityRequested = true;
        effects.push({
          type: 'send',
          to: 'community',
          tag: createTag(session.key, turn.id, 'community'),
          message: { kind: 'community.request', locationName: decision.communityName },
        });
      }
      return effects;
    }

    case 'relay':
      return finishTurn(session, decision.message);

    case 'fallback':
      log.warn(`${session.key}#${turn.id}: unusable classification (${decision.reason})`);
      return finishTurn(session, FALLBACK_PROMPT);
  }
}

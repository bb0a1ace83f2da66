/**
 * Scoping worker: classifies a user message as a general question, a complete
 * search request, or a follow-up that needs more detail.
 */
import { LRUCache } from 'lru-cache';
import { z } from 'zod';
import type { LlmClient, LlmMessage } from '@/services/llm-client';
import { SCOPING_SYSTEM_PROMPT } from '@/services/prompt-templates';
import { safeParseJson } from '@/services/safe-parse-json';
import { componentLogger } from '@/services/logger';
import { defineWorker } from './worker';

const log = componentLogger('scoping');

export const HISTORY_LIMIT = 20;

const locationProbe = z.object({ requirements: z.object({ location: z.string().min(1) }) });

/** Complete searches get a neighbourhood report for the search location unless the model named one. */
function withCommunityName(classification: Record<string, unknown>): Record<string, unknown> {
  const named = classification.communityName;
  if (typeof named === 'string' && named.trim()) return classification;
  const probe = locationProbe.safeParse(classification);
  return probe.success ? { ...classification, communityName: probe.data.requirements.location } : classification;
}

export interface ScopingWorkerDeps {
  llm: LlmClient;
  /** Conversations kept at once; the least recently used one is dropped first. */
  maxConversations?: number;
  /** Idle time after which a conversation's history is forgotten. */
  historyTtlMs?: number;
}

export function createScopingWorker({
  llm,
  maxConversations = 1000,
  historyTtlMs = 30 * 60 * 1000,
}: ScopingWorkerDeps) {
  const conversations = new LRUCache<string, LlmMessage[]>({
    max: maxConversations,
    ttl: historyTtlMs,
  });

  const worker = defineWorker('scoping', 'scope.request', async (request) => {
    const history = conversations.get(request.conversationId) ?? [];
    const raw = await llm.call(request.userMessage, {
      task: 'classification',
      system: SCOPING_SYSTEM_PROMPT,
      history,
      maxTokens: 600,
    });

    const updated: LlmMessage[] = [
      ...history,
      { role: 'user', content: request.userMessage },
      { role: 'assistant', content: raw },
    ];
    conversations.set(request.conversationId, updated.slice(-HISTORY_LIMIT));

    const parsed = safeParseJson(raw, 'scoping');
    if (!parsed) {
      // plain-text replies are relayed as the agent's question
      log.warn(`${request.conversationId}: model replied without JSON`);
      return {
        kind: 'scope.response',
        classification: { agentMessage: raw, isComplete: false, isGeneralQuestion: false },
      };
    }
    return { kind: 'scope.response', classification: withCommunityName(parsed) };
  });

  return {
    worker,
    historyFor: (conversationId: string): LlmMessage[] => conversations.get(conversationId) ?? [],
  };
}

// General Q&A worker: answers neighbourhood and amenity questions outside a listing search.
import { WorkerError } from '@/bus/envelope';
import type { LlmClient } from '@/services/llm-client';
import { GENERAL_SYSTEM_PROMPT } from '@/services/prompt-templates';
import { defineWorker } from './worker';

export function createGeneralWorker(llm: LlmClient) {
  return defineWorker('general', 'general.request', async (request) => {
    const answer = (
      await llm.call(request.question, { task: 'answer', system: GENERAL_SYSTEM_PROMPT, maxTokens: 700 })
    ).trim();
    if (!answer) throw new WorkerError('empty answer from model', 'EMPTY_ANSWER', true);
    return { kind: 'general.response', answer };
  });
}

import type { ReplyChannel, TurnReply } from '@/memory/sessionState';
import type { CoordinatorPolicy, Effect } from '@/coordinator/effects';
import type { LlmCallOptions, LlmClient } from '@/services/llm-client';

export interface RecordingChannel {
  channel: ReplyChannel;
  replies: TurnReply[];
  finals(): string[];
  updates(): string[];
}

export function recordingChannel(): RecordingChannel {
  const replies: TurnReply[] = [];
  return {
    replies,
    channel: { send: (reply) => void replies.push(reply) },
    finals: () => replies.filter((r) => r.final).map((r) => r.text),
    updates: () => replies.filter((r) => !r.final).map((r) => r.text),
  };
}

export const quietPolicy: CoordinatorPolicy = {
  fanOutCap: 5,
  stageTimeoutMs: 0,
  communityGraceMs: 0,
  progressUpdates: false,
};

/** Let queued setImmediate deliveries and their promise chains run. */
export async function flushBus(rounds = 25): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}

export interface Gate {
  promise: Promise<void>;
  open(): void;
}

export function gate(): Gate {
  let open: () => void = () => undefined;
  const promise = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { promise, open: () => open() };
}

export function finalTexts(effects: Effect[]): string[] {
  return effects.flatMap((e) => (e.type === 'reply' && e.reply.final ? [e.reply.text] : []));
}

export function sends(effects: Effect[]): Array<Extract<Effect, { type: 'send' }>> {
  return effects.flatMap((e) => (e.type === 'send' ? [e] : []));
}

export interface ScriptedLlm extends LlmClient {
  calls: Array<{ prompt: string; options: LlmCallOptions }>;
}

/** LLM stand-in answering from a script; a thrown Error is rethrown. */
export function scriptedLlm(answer: (prompt: string, options: LlmCallOptions) => string): ScriptedLlm {
  const calls: ScriptedLlm['calls'] = [];
  return {
    calls,
    async call(prompt, options) {
      calls.push({ prompt, options });
      return answer(prompt, options);
    },
  };
}

// node/src/services/llm-client.ts: chat-completion client shared by the LLM-backed workers

import OpenAI from 'openai';
import { CircuitBreaker, createLlmCircuitBreaker } from '@/stability/circuitBreaker';
import { WorkerError } from '@/bus/envelope';

export type LlmTask = 'classification' | 'answer' | 'summary' | 'analysis';

export interface LlmMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LlmCallOptions {
  task: LlmTask;
  /** Replaces the task's default system prompt. */
  system?: string;
  /** Prior turns placed between the system prompt and the new message. */
  history?: LlmMessage[];
  maxTokens?: number;
}

export interface LlmClient {
  call(prompt: string, options: LlmCallOptions): Promise<string>;
}

const DEFAULT_SYSTEM: Record<LlmTask, string> = {
  classification: 'You are a JSON-only classifier/extractor.',
  answer: 'You are a helpful local real estate assistant.',
  summary: 'You summarize property search results for home buyers.',
  analysis: 'You analyze neighbourhoods for home buyers. Respond in JSON.',
};

export interface OpenAiLlmClientOptions {
  apiKey?: string;
  model: string;
  breaker?: CircuitBreaker;
}

export class OpenAiLlmClient implements LlmClient {
  private client: OpenAI | null = null;
  private readonly breaker: CircuitBreaker;

  constructor(private readonly options: OpenAiLlmClientOptions) {
    this.breaker = options.breaker ?? createLlmCircuitBreaker();
  }

  private getClient(): OpenAI {
    if (!this.client) {
      if (!this.options.apiKey) {
        throw new WorkerError(
          'Missing OPENAI_API_KEY. Set it in .env or pass it when starting the server.',
          'LLM_NOT_CONFIGURED',
          false,
        );
      }
      this.client = new OpenAI({ apiKey: this.options.apiKey });
    }
    return this.client;
  }

  async call(prompt: string, options: LlmCallOptions): Promise<string> {
    const client = this.getClient();
    const messages: LlmMessage[] = [
      { role: 'system', content: options.system ?? DEFAULT_SYSTEM[options.task] },
      ...(options.history ?? []),
      { role: 'user', content: prompt },
    ];

    const res = await this.breaker.execute(() =>
      client.chat.completions.create({
        model: this.options.model,
        messages,
        temperature: options.task === 'classification' ? 0 : 0.5,
        max_tokens: options.maxTokens ?? 512,
      }),
    );
    return res.choices[0]?.message?.content ?? '';
  }
}

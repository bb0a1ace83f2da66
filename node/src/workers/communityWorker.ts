/**
 * Community worker: neighbourhood report built from web articles and an LLM read of them.
 * Scores are clamped to 0-10; missing figures stay null.
 */
import { z } from 'zod';
import { WorkerError } from '@/bus/envelope';
import type { CommunityResponse } from '@/bus/types';
import { communityStorySchema } from '@/types/estate';
import type { JsonFetcher } from '@/services/http';
import type { LlmClient } from '@/services/llm-client';
import { componentLogger } from '@/services/logger';
import { COMMUNITY_SYSTEM_PROMPT, buildCommunityPrompt } from '@/services/prompt-templates';
import { safeParseJson } from '@/services/safe-parse-json';
import { COMMUNITY_QUERIES, tavilySearch, type CommunityArticle } from '@/services/tavily';
import { defineWorker } from './worker';

const log = componentLogger('community');

export function clampScore(value: number): number {
  return Math.round(Math.min(10, Math.max(0, value)) * 10) / 10;
}

const score = z
  .number()
  .nullish()
  .transform((value) => (value == null ? null : clampScore(value)));

const figure = z
  .number()
  .nonnegative()
  .nullish()
  .transform((value) => (value == null ? null : Math.round(value)));

const text = z
  .string()
  .nullish()
  .transform((value) => value?.trim() || null);

export const communityAnalysisSchema = z.object({
  location: z.string().nullish(),
  overall: z.object({ score, explanation: text }).default({}),
  safety: z
    .object({
      score,
      positiveStories: z.array(communityStorySchema).default([]),
      negativeStories: z.array(communityStorySchema).default([]),
    })
    .default({}),
  schools: z.object({ score, explanation: text }).default({}),
  housing: z.object({ pricePerSqft: figure, avgHouseSizeSqft: figure }).default({}),
});

export function toCommunityResponse(locationName: string, raw: Record<string, unknown>): CommunityResponse {
  const parsed = communityAnalysisSchema.safeParse(raw);
  if (!parsed.success) {
    throw new WorkerError(
      `analysis did not match the expected shape: ${parsed.error.errors.map((e) => e.path.join('.')).join(', ')}`,
      'BAD_ANALYSIS',
      false,
    );
  }
  const a = parsed.data;
  return {
    kind: 'community.response',
    location: a.location?.trim() || locationName,
    overallScore: a.overall.score,
    overallExplanation: a.overall.explanation,
    safetyScore: a.safety.score,
    schoolScore: a.schools.score,
    schoolExplanation: a.schools.explanation,
    housingPricePerSqft: a.housing.pricePerSqft,
    avgHouseSizeSqft: a.housing.avgHouseSizeSqft,
    positiveStories: a.safety.positiveStories,
    negativeStories: a.safety.negativeStories,
  };
}

export interface CommunityWorkerDeps {
  fetcher: JsonFetcher;
  llm: LlmClient;
  tavilyApiKey?: string;
}

export function createCommunityWorker({ fetcher, llm, tavilyApiKey }: CommunityWorkerDeps) {
  return defineWorker('community', 'community.request', async (request) => {
    if (!tavilyApiKey) throw new WorkerError('TAVILY_API_KEY is not configured', 'NOT_CONFIGURED', false);
    const location = request.locationName;

    const search = async (query: string, maxResults: number): Promise<CommunityArticle[]> => {
      try {
        return await tavilySearch(fetcher, tavilyApiKey, query, maxResults);
      } catch (err: unknown) {
        log.warn(`article search failed for "${query}"`, { error: err instanceof Error ? err.message : String(err) });
        return [];
      }
    };

    const [news, schools, housing] = await Promise.all([
      search(COMMUNITY_QUERIES.news(location), 20),
      search(COMMUNITY_QUERIES.schools(location), 10),
      search(COMMUNITY_QUERIES.housing(location), 10),
    ]);
    log.info(`${location}: ${news.length} news, ${schools.length} school, ${housing.length} housing articles`);

    const raw = await llm.call(buildCommunityPrompt(location, { news, schools, housing }), {
      task: 'analysis',
      system: COMMUNITY_SYSTEM_PROMPT,
      maxTokens: 2048,
    });
    const parsed = safeParseJson(raw, 'community');
    if (!parsed) throw new WorkerError('analysis was not valid JSON', 'BAD_ANALYSIS', false);
    return toCommunityResponse(location, parsed);
  });
}

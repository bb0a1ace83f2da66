// node/src/services/tavily.ts: Tavily web search for neighbourhood research

import { z } from 'zod';
import { WorkerError, toRetryable } from '@/bus/envelope';
import { retryWithBackoff } from '@/utils/retryWithBackoff';
import type { JsonFetcher } from './http';

const TAVILY_URL = 'https://api.tavily.com/search';

const tavilyResponseSchema = z.object({
  results: z
    .array(
      z.object({
        title: z.string().default(''),
        url: z.string().default(''),
        content: z.string().default(''),
        score: z.number().default(0),
      }),
    )
    .default([]),
});

export type CommunityArticle = z.infer<typeof tavilyResponseSchema>['results'][number];

export const COMMUNITY_QUERIES = {
  news: (location: string) => `${location} local news community safety crime development`,
  schools: (location: string) => `${location} schools ratings rankings education quality greatschools niche`,
  housing: (location: string) => `${location} housing prices per square foot average home size zillow redfin realtor`,
} as const;

export async function tavilySearch(
  fetcher: JsonFetcher,
  apiKey: string,
  query: string,
  maxResults = 10,
): Promise<CommunityArticle[]> {
  const data = await retryWithBackoff(
    () =>
      fetcher(TAVILY_URL, {
        method: 'POST',
        body: { api_key: apiKey, query, max_results: maxResults, search_depth: 'advanced' },
        timeoutMs: 20000,
      }),
    { maxRetries: 1, shouldRetry: toRetryable, label: 'tavily' },
  );
  const parsed = tavilyResponseSchema.safeParse(data);
  if (!parsed.success) {
    throw new WorkerError('tavily: unexpected response', 'BAD_RESPONSE', false);
  }
  return parsed.data.results;
}

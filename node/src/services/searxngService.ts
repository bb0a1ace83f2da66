/**
 * SearXNG Search Service
 * Web search used by the listing search worker.
 */

import { z } from 'zod';
import { WorkerError, toRetryable } from '@/bus/envelope';
import { retryWithBackoff } from '@/utils/retryWithBackoff';
import type { JsonFetcher } from './http';

export interface SearxngSearchOptions {
  categories?: string[];
  engines?: string[];
  language?: string;
  pageno?: number;
}

const searxngResultSchema = z.object({
  title: z.string().default(''),
  url: z.string().default(''),
  img_src: z.string().optional(),
  thumbnail_src: z.string().optional(),
  thumbnail: z.string().optional(),
  content: z.string().optional(),
});

const searxngResponseSchema = z.object({
  results: z.array(searxngResultSchema).default([]),
  suggestions: z.array(z.string()).default([]),
});

export type SearxngSearchResult = z.infer<typeof searxngResultSchema>;

/**
 * Search using SearXNG
 * @param baseUrl - SearXNG instance, e.g. http://localhost:8080
 * @returns Search results and suggestions
 */
export const searchSearxng = async (
  fetcher: JsonFetcher,
  baseUrl: string,
  query: string,
  opts: SearxngSearchOptions = {},
): Promise<{ results: SearxngSearchResult[]; suggestions: string[] }> => {
  const params: Record<string, string | number | undefined> = {
    q: query,
    format: 'json',
    categories: opts.categories?.join(','),
    engines: opts.engines?.join(','),
    language: opts.language,
    pageno: opts.pageno,
  };

  const data = await retryWithBackoff(
    () => fetcher(`${baseUrl.replace(/\/+$/, '')}/search`, { params }),
    { maxRetries: 2, shouldRetry: toRetryable, label: 'searxng' },
  );

  const parsed = searxngResponseSchema.safeParse(data);
  if (!parsed.success) {
    throw new WorkerError('searxng: unexpected response', 'BAD_RESPONSE', false);
  }
  return parsed.data;
};

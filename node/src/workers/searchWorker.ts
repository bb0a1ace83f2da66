/**
 * Listing search worker: web search for homes matching the requirements,
 * turned into listings with the details the result text exposes.
 */
import { WorkerError } from '@/bus/envelope';
import type { Listing, ListingImage, Requirements } from '@/types/estate';
import type { JsonFetcher } from '@/services/http';
import type { LlmClient } from '@/services/llm-client';
import { componentLogger } from '@/services/logger';
import { SEARCH_SUMMARY_SYSTEM_PROMPT, buildSearchSummaryPrompt } from '@/services/prompt-templates';
import { searchSearxng, type SearxngSearchResult } from '@/services/searxngService';
import { defineWorker } from './worker';

const log = componentLogger('search');

export const NO_RESULTS_SUMMARY = 'No properties found matching your search. Try adjusting your search terms.';

const IMAGE_SKIP_WORDS = ['icon', 'logo', 'avatar', 'badge', 'button'];
const SUMMARY_WORDS = ['found', 'results', 'listings', 'properties'];
const TOP_RESULTS = 5;

function dollars(amount: number): string {
  return `$${amount.toLocaleString('en-US')}`;
}

export function buildSearchQuery(requirements: Requirements): string {
  const parts: string[] = [];
  if (requirements.bedrooms != null) parts.push(`${requirements.bedrooms} bed`);
  if (requirements.bathrooms != null) parts.push(`${requirements.bathrooms} bath`);
  parts.push(`homes for sale in ${requirements.location}`);

  const { budgetMin, budgetMax } = requirements;
  if (budgetMin != null && budgetMax != null) parts.push(`${dollars(budgetMin)}-${dollars(budgetMax)}`);
  else if (budgetMax != null) parts.push(`under ${dollars(budgetMax)}`);
  else if (budgetMin != null) parts.push(`over ${dollars(budgetMin)}`);

  const extra = requirements.additionalInfo?.trim();
  if (extra) parts.push(extra);
  return parts.join(' ');
}

/** Price, beds, baths and square footage as far as the text states them. */
export function parseListingDetails(text: string): Pick<Listing, 'price' | 'beds' | 'baths' | 'sqft'> {
  const details: Pick<Listing, 'price' | 'beds' | 'baths' | 'sqft'> = {};

  const price = /\$\s?(?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d+)?(?:\s?[kKmM]\b)?/.exec(text);
  if (price) details.price = price[0].replace(/\s/g, '');

  const beds = /(\d+(?:\.\d+)?)\s*(?:bd|bds|beds?|bedrooms?)\b/i.exec(text);
  if (beds) details.beds = Number(beds[1]);

  const baths = /(\d+(?:\.\d+)?)\s*(?:ba|baths?|bathrooms?)\b/i.exec(text);
  if (baths) details.baths = Number(baths[1]);

  const sqft = /(\d[\d,]*)\s*(?:sq\.?\s?ft|sqft|square feet)/i.exec(text);
  if (sqft) details.sqft = Number(sqft[1].replace(/,/g, ''));

  return details;
}

export function toListing(result: SearxngSearchResult): Listing {
  const title = result.title.trim() || result.url;
  const description = result.content?.trim();
  return {
    title,
    address: title,
    link: result.url,
    ...(description ? { description } : {}),
    ...parseListingDetails(`${title} ${description ?? ''}`),
  };
}

export function pickImage(result: SearxngSearchResult): string | null {
  const candidates = [result.thumbnail, result.thumbnail_src, result.img_src];
  for (const url of candidates) {
    if (!url || !/^https?:\/\//.test(url)) continue;
    const lower = url.toLowerCase();
    if (IMAGE_SKIP_WORDS.some((word) => lower.includes(word))) continue;
    return url;
  }
  return null;
}

export function fallbackSummary(count: number): string {
  return `Found ${count} property listings. Check the search results for details!`;
}

export function withTopResults(summary: string, listings: Listing[]): string {
  const top = listings
    .slice(0, TOP_RESULTS)
    .map((listing, i) => `\n${i + 1}. ${listing.title}\n   ${listing.link ?? ''}`)
    .join('');
  return `${summary}\n\nTop results:${top}`;
}

export interface SearchWorkerDeps {
  fetcher: JsonFetcher;
  llm: LlmClient;
  searxngUrl?: string;
  maxResults?: number;
}

export function createSearchWorker({ fetcher, llm, searxngUrl, maxResults = 10 }: SearchWorkerDeps) {
  async function summarize(query: string, listings: Listing[]): Promise<string> {
    try {
      const text = (
        await llm.call(buildSearchSummaryPrompt(query, listings), {
          task: 'summary',
          system: SEARCH_SUMMARY_SYSTEM_PROMPT,
        })
      ).trim();
      if (!text) return fallbackSummary(listings.length);
      const lower = text.toLowerCase();
      return SUMMARY_WORDS.some((word) => lower.includes(word)) ? text : `Found ${listings.length} property listings. ${text}`;
    } catch (err: unknown) {
      log.warn('summary failed, using fallback', { error: err instanceof Error ? err.message : String(err) });
      return fallbackSummary(listings.length);
    }
  }

  return defineWorker('search', 'search.request', async (request) => {
    if (!searxngUrl) throw new WorkerError('SEARXNG_URL is not configured', 'NOT_CONFIGURED', false);

    const query = buildSearchQuery(request.requirements);
    log.info(`query: ${query}`);
    const { results } = await searchSearxng(fetcher, searxngUrl, query);

    const usable = results.filter((r) => r.url).slice(0, maxResults);
    const listings = usable.map(toListing);
    const images: ListingImage[] = [];
    usable.forEach((result, index) => {
      const imageUrl = pickImage(result);
      if (imageUrl) images.push({ index, imageUrl });
    });

    const searchSummary =
      listings.length === 0 ? NO_RESULTS_SUMMARY : withTopResults(await summarize(query, listings), listings);

    return { kind: 'search.response', listings, searchSummary, totalFound: listings.length, images };
  });
}

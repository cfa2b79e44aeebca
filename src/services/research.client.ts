/**
 * Brave Web Search Research Client
 * Implements ResearchPort against the Brave Search API
 *
 * Never throws: HTTP and network errors become RESEARCH_FAILED,
 * unexpected payloads become INVALID_RESPONSE.
 */

import { z } from 'zod';

import type { ResearchHit, ResearchPort, Result } from '@/types/index.js';
import { PORT_ERROR_CODES, errorMessage, failure, success } from '@/types/index.js';

export const BRAVE_SEARCH_URL = 'https://api.search.brave.com/res/v1/web/search';

/**
 * Brave caps `count` at 20; results past 10 add little for a tangent
 */
const MAX_RESULTS = 10;

const braveResponseSchema = z.object({
  web: z
    .object({
      results: z
        .array(
          z.object({
            title: z.string().optional(),
            url: z.string().optional(),
            description: z.string().optional(),
          })
        )
        .default([]),
    })
    .optional(),
});

export interface ResearchClientConfig {
  apiKey: string;
  /** Request timeout in milliseconds (default 10s) */
  timeout?: number;
  baseUrl?: string;
  fetch?: typeof fetch;
}

/**
 * Create a ResearchPort backed by Brave web search
 */
export function createResearchClient(config: ResearchClientConfig): ResearchPort {
  if (!config.apiKey || config.apiKey.trim() === '') {
    throw new Error('Brave API key is required');
  }

  const fetchFn = config.fetch ?? fetch;
  const timeout = config.timeout ?? 10000;
  const baseUrl = config.baseUrl ?? BRAVE_SEARCH_URL;

  return {
    async search(query: string, limit: number): Promise<Result<ResearchHit[]>> {
      const count = Math.max(1, Math.min(Math.floor(limit), MAX_RESULTS));
      const url = new URL(baseUrl);
      url.searchParams.set('q', query);
      url.searchParams.set('count', String(count));

      let body: unknown;
      try {
        const response = await fetchFn(url, {
          headers: {
            Accept: 'application/json',
            'X-Subscription-Token': config.apiKey,
          },
          signal: AbortSignal.timeout(timeout),
        });

        if (!response.ok) {
          return failure(
            PORT_ERROR_CODES.RESEARCH_FAILED,
            `Brave search returned ${response.status}`,
            { status: response.status }
          );
        }

        body = await response.json();
      } catch (err) {
        return failure(PORT_ERROR_CODES.RESEARCH_FAILED, errorMessage(err));
      }

      const parsed = braveResponseSchema.safeParse(body);
      if (!parsed.success) {
        return failure(
          PORT_ERROR_CODES.INVALID_RESPONSE,
          'Unexpected Brave search payload'
        );
      }

      const results = parsed.data.web?.results ?? [];
      return success(
        results.slice(0, count).map((item) => ({
          title: item.title ?? '',
          snippet: item.description ?? '',
          url: item.url ?? '',
        }))
      );
    },
  };
}

import fetch from 'node-fetch';
import { z } from 'zod';
import { SearchResult } from '../../core/entities/Tool.js';
import { BackendHttpError } from '../../core/interfaces/IOllamaClient.js';
import { IWebSearchClient } from '../../core/interfaces/IWebSearchClient.js';
import { createLogger } from '../../utils/logger.js';
import { withTimeout } from '../../utils/retry.js';

const SearxngResponseSchema = z.object({
  results: z
    .array(
      z.object({
        title: z.string().optional(),
        url: z.string().optional(),
        content: z.string().optional(),
        snippet: z.string().optional(),
        engine: z.string().optional(),
      })
    )
    .default([]),
});

/**
 * SearXNG JSON API client (`GET /search?format=json`)
 */
export class SearxngClient implements IWebSearchClient {
  private logger = createLogger('searxng');
  private baseUrl: string;

  constructor(
    baseUrl: string,
    private timeoutMs: number = 15_000
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  async search(query: string): Promise<SearchResult[]> {
    const params = new URLSearchParams({ q: query, format: 'json', language: 'en' });

    try {
      const body = await withTimeout<unknown>(async (signal) => {
        const res = await fetch(`${this.baseUrl}/search?${params.toString()}`, {
          headers: { Accept: 'application/json' },
          signal,
        });
        if (!res.ok) {
          throw new BackendHttpError(res.status, await res.text());
        }
        return res.json();
      }, this.timeoutMs);

      const results = SearxngResponseSchema.parse(body).results.map((item) => ({
        title: item.title || 'No title',
        url: item.url ?? '',
        snippet: item.content ?? item.snippet ?? 'No description available',
        engine: item.engine,
      }));
      this.logger.debug('Search finished', { query, results: results.length });
      return results;
    } catch (error) {
      this.logger.warn('Search failed; continuing without results', { query, error });
      return [];
    }
  }
}

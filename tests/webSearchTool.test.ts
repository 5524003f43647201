/**
 * Tests for the web search tool and the hallucination guard
 */

import { WebSearchTool, hasSearchIntent } from '../src/application/tools/WebSearchTool.js';
import { detectHallucinationRisk } from '../src/application/tools/HallucinationGuard.js';
import { SearchResult, ToolName } from '../src/core/entities/Tool.js';
import { ToolInputError } from '../src/core/errors.js';
import { IWebSearchClient } from '../src/core/interfaces/IWebSearchClient.js';

class FakeSearchClient implements IWebSearchClient {
  queries: string[] = [];

  constructor(private results: SearchResult[]) {}

  async search(query: string): Promise<SearchResult[]> {
    this.queries.push(query);
    return this.results;
  }
}

const enabled = new Set<ToolName>(['web_search']);

describe('WebSearchTool', () => {
  describe('applies', () => {
    const tool = new WebSearchTool(new FakeSearchClient([]));

    it('should apply to search phrases and domain mentions', () => {
      expect(tool.applies('Search for typescript generics', enabled)).toBe(true);
      expect(tool.applies('What does example.com sell?', enabled)).toBe(true);
      expect(hasSearchIntent('Look up the weather')).toBe(true);
    });

    it('should not apply to other messages or when disabled', () => {
      expect(tool.applies('hello there', enabled)).toBe(false);
      expect(tool.applies('Search for typescript generics', new Set<ToolName>())).toBe(false);
    });
  });

  describe('run without a domain', () => {
    it('should format the top results', async () => {
      const client = new FakeSearchClient([
        { title: 'T1', url: 'https://a.dev/1', snippet: 'S1', engine: 'duckduckgo' },
        { title: 'T2', url: 'https://b.dev/2', snippet: 'S2' },
        { title: 'T3', url: 'https://c.dev/3', snippet: 'S3' },
      ]);
      const tool = new WebSearchTool(client, 2);

      const result = await tool.run('  search for typescript generics ');

      expect(client.queries).toEqual(['search for typescript generics']);
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.fragment.text).toBe(
          'Search results for "search for typescript generics":\n\n' +
            '1. T1\n   S1\n   URL: https://a.dev/1\n   Source: duckduckgo\n\n' +
            '2. T2\n   S2\n   URL: https://b.dev/2'
        );
        expect(result.fragment.sources?.map((s) => s.title)).toEqual(['T1', 'T2']);
        expect(result.fragment.systemInstruction).toBeUndefined();
      }
    });

    it('should shorten long snippets', async () => {
      const tool = new WebSearchTool(
        new FakeSearchClient([{ title: 'Long', url: 'https://a.dev', snippet: 'x'.repeat(250) }])
      );

      const result = await tool.run('search for x');

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.fragment.text.split('\n')[3]).toBe(`   ${'x'.repeat(200)}...`);
      }
    });

    it('should report an empty search as a tool input error', async () => {
      const result = await new WebSearchTool(new FakeSearchClient([])).run('search for nothing');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(ToolInputError);
        expect(result.error.message).toBe('No search results for "search for nothing"');
      }
    });
  });

  describe('run with a domain', () => {
    it('should search for the site and keep only its results', async () => {
      const client = new FakeSearchClient([
        { title: 'About', url: 'https://example.com/about', snippet: 'About us' },
        { title: 'Review', url: 'https://other.org/review', snippet: 'A review' },
      ]);
      const tool = new WebSearchTool(client);

      const result = await tool.run('Tell me about example.com');

      expect(client.queries).toEqual(['example.com']);
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.fragment.sources?.map((s) => s.url)).toEqual(['https://example.com/about']);
        expect(result.fragment.systemInstruction).toContain('(example.com)');
      }
    });

    it('should say so when no result is from the domain', async () => {
      const tool = new WebSearchTool(
        new FakeSearchClient([{ title: 'Review', url: 'https://other.org/review', snippet: 'A review' }])
      );

      const result = await tool.run('Tell me about example.com');

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.fragment.text).toBe(
          'No reliable information found for example.com. ' +
            'The search returned 1 results but none were from the target domain.'
        );
        expect(result.fragment.sources).toEqual([]);
      }
    });
  });
});

describe('detectHallucinationRisk', () => {
  it('should not flag answers backed by web search', () => {
    expect(detectHallucinationRisk('What is example.com?', 'It was founded in 1999', ['web_search'])).toBeNull();
  });

  it('should flag unresearched domain questions', () => {
    expect(detectHallucinationRisk('What is example.com?', 'A site.', [])).toBe(
      'This answer was generated without researching the mentioned website. Ask for a web search for accurate information.'
    );
  });

  it('should flag questions about recent events', () => {
    expect(detectHallucinationRisk('What is the latest release?', 'Version 2.', ['calculator'])).toBe(
      "This answer is based on the model's training data and may be out of date. Ask for a web search for current information."
    );
  });

  it('should flag specific factual claims', () => {
    expect(detectHallucinationRisk('Who is Acme?', 'Acme was founded in 1999.', [])).toBe(
      'The details above are not based on specific research. Ask for a web search to verify them.'
    );
  });

  it('should leave ordinary answers alone', () => {
    expect(detectHallucinationRisk('Explain recursion', 'A function calling itself.', [])).toBeNull();
  });
});

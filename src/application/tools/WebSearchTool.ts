import { SearchResult, ToolName } from '../../core/entities/Tool.js';
import { ToolInputError } from '../../core/errors.js';
import { IWebSearchClient } from '../../core/interfaces/IWebSearchClient.js';
import { createLogger } from '../../utils/logger.js';
import { filterByDomain, findDomainMention } from './domain.js';
import { ChatTool, ToolRunResult } from './types.js';

export const SEARCH_PHRASES = [
  'search for',
  'search the web',
  'look up',
  'find information about',
  'what is the latest',
  'recent news',
  'tell me about the website',
] as const;

const SNIPPET_LENGTH = 200;

export function hasSearchIntent(message: string): boolean {
  const lower = message.toLowerCase();
  return SEARCH_PHRASES.some((phrase) => lower.includes(phrase));
}

function formatResults(query: string, results: readonly SearchResult[]): string {
  const lines = [`Search results for "${query}":`, ''];
  results.forEach((result, index) => {
    const snippet =
      result.snippet.length > SNIPPET_LENGTH ? `${result.snippet.slice(0, SNIPPET_LENGTH)}...` : result.snippet;
    lines.push(`${index + 1}. ${result.title}`);
    lines.push(`   ${snippet}`);
    lines.push(`   URL: ${result.url}`);
    if (result.engine) {
      lines.push(`   Source: ${result.engine}`);
    }
    lines.push('');
  });
  return lines.join('\n').trim();
}

/**
 * Web search through SearXNG. A message naming a URL or domain searches for
 * that site and keeps only results from its registrable domain.
 */
export class WebSearchTool implements ChatTool {
  readonly name: ToolName = 'web_search';
  private logger = createLogger('tool:web_search');

  constructor(
    private readonly client: IWebSearchClient,
    private readonly maxResults: number = 5
  ) {}

  applies(message: string, enabled: ReadonlySet<ToolName>): boolean {
    if (!enabled.has(this.name)) {
      return false;
    }
    return findDomainMention(message) !== null || hasSearchIntent(message);
  }

  async run(message: string): Promise<ToolRunResult> {
    const mention = findDomainMention(message);
    const query = mention ? mention.target : message.trim();

    const results = await this.client.search(query);
    if (results.length === 0) {
      return { ok: false, error: new ToolInputError(`No search results for "${query}"`) };
    }

    if (!mention) {
      const top = results.slice(0, this.maxResults);
      return {
        ok: true,
        fragment: { tool: this.name, text: formatResults(query, top), sources: top },
      };
    }

    const systemInstruction =
      `The user asked about a website (${mention.target}). Web search results for it are provided as tool output. ` +
      'Base your answer only on these results and do not add details from your training data. ' +
      'If the results do not contain enough information, say so explicitly.';

    const matching = filterByDomain(results, mention.domain);
    this.logger.debug('Filtered search results by domain', {
      domain: mention.domain,
      total: results.length,
      kept: matching.length,
    });

    if (matching.length === 0) {
      return {
        ok: true,
        fragment: {
          tool: this.name,
          text:
            `No reliable information found for ${mention.domain}. ` +
            `The search returned ${results.length} results but none were from the target domain.`,
          systemInstruction,
          sources: [],
        },
      };
    }

    const top = matching.slice(0, this.maxResults);
    return {
      ok: true,
      fragment: { tool: this.name, text: formatResults(query, top), systemInstruction, sources: top },
    };
  }
}

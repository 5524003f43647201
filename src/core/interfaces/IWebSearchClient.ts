import { SearchResult } from '../entities/Tool.js';

/**
 * Interface for the external web search backend
 */
export interface IWebSearchClient {
  /**
   * Never rejects: a failed or timed-out search resolves to an empty list
   */
  search(query: string): Promise<SearchResult[]>;
}

import { RetrievedChunk } from '../../core/entities/Document.js';
import { RetrievalUnavailableError } from '../../core/errors.js';
import { IEmbeddingClient, IVectorStore } from '../../core/interfaces/IVectorStore.js';
import { createLogger } from '../../utils/logger.js';
import { withTimeout } from '../../utils/retry.js';

export interface DocumentRetrieverOptions {
  embeddingModel: string;
  timeoutMs: number;
}

/**
 * Semantic search over a project's indexed document chunks
 */
export class DocumentRetriever {
  private logger = createLogger('retriever');

  constructor(
    private readonly vectorStore: IVectorStore,
    private readonly embedder: IEmbeddingClient,
    private readonly options: DocumentRetrieverOptions
  ) {}

  /**
   * Top-k chunks of the project by descending similarity. A project without
   * chunks returns [] without embedding the query.
   *
   * @throws RetrievalUnavailableError when embedding or the vector store fails
   */
  async retrieve(
    projectId: number,
    query: string,
    k: number,
    documentIds?: readonly number[]
  ): Promise<RetrievedChunk[]> {
    if (k <= 0) {
      return [];
    }
    const filter = documentIds && documentIds.length > 0 ? [...documentIds] : undefined;

    try {
      const available = await this.vectorStore.countChunks(projectId, filter);
      if (available === 0) {
        this.logger.debug('No indexed chunks', { projectId, documentIds: filter });
        return [];
      }

      const vector = await withTimeout(
        (signal) => this.embedder.embed(this.options.embeddingModel, query, signal),
        this.options.timeoutMs
      );

      const chunks = await this.vectorStore.query({ projectId, vector, k, documentIds: filter });
      this.logger.debug('Retrieved chunks', {
        projectId,
        count: chunks.length,
        sources: chunks.map((chunk) => chunk.source),
      });
      return chunks;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new RetrievalUnavailableError(`Document retrieval failed: ${reason}`, { cause: error });
    }
  }
}

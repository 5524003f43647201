import { DocumentChunk, RetrievedChunk } from '../entities/Document.js';

export interface VectorQuery {
  projectId: number;
  vector: number[];
  k: number;
  documentIds?: number[];
}

/**
 * Interface for the document chunk index
 */
export interface IVectorStore {
  /**
   * Top-k chunks of one project by descending similarity, ties by insertion order
   */
  query(query: VectorQuery): Promise<RetrievedChunk[]>;

  countChunks(projectId: number, documentIds?: number[]): Promise<number>;

  upsert(chunks: DocumentChunk[]): Promise<void>;

  deleteDocument(documentId: number): Promise<number>;
}

export interface IEmbeddingClient {
  embed(model: string, text: string, abortSignal?: AbortSignal): Promise<number[]>;
}

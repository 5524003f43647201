/**
 * Document chunk entities owned by the vector store
 */
export interface DocumentChunk {
  documentId: number;
  projectId: number;
  chunkIndex: number;
  source: string;
  content: string;
  embedding: number[];
}

export interface RetrievedChunk {
  documentId: number;
  projectId: number;
  chunkIndex: number;
  source: string;
  content: string;
  score: number;
}

export interface DocumentChunkRecord {
  id: number;
  document_id: number;
  project_id: number;
  chunk_index: number;
  source: string;
  content: string;
  embedding: string;
}

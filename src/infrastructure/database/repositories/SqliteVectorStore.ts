import Database from 'better-sqlite3';
import { IVectorStore, VectorQuery } from '../../../core/interfaces/IVectorStore.js';
import { DocumentChunk, DocumentChunkRecord, RetrievedChunk } from '../../../core/entities/Document.js';

interface CountRow {
  count: number;
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length || a.length === 0) {
    return 0;
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

function parseEmbedding(raw: string): number[] {
  const value: unknown = JSON.parse(raw);
  if (!Array.isArray(value) || !value.every((item): item is number => typeof item === 'number')) {
    throw new Error('Stored embedding is not a number array');
  }
  return value;
}

/**
 * Chunk index in SQLite. Similarity is computed in process, which suits the
 * corpus size of a single project.
 */
export class SqliteVectorStore implements IVectorStore {
  constructor(private db: Database.Database) {}

  async query(query: VectorQuery): Promise<RetrievedChunk[]> {
    const { sql, params } = this.scope(query.projectId, query.documentIds);
    const rows = this.db
      .prepare<Array<number>, DocumentChunkRecord>(`SELECT * FROM document_chunks WHERE ${sql} ORDER BY id`)
      .all(...params);

    // Stable sort keeps insertion order for equal scores
    return rows
      .map((row) => ({
        documentId: row.document_id,
        projectId: row.project_id,
        chunkIndex: row.chunk_index,
        source: row.source,
        content: row.content,
        score: cosineSimilarity(query.vector, parseEmbedding(row.embedding)),
      }))
      .sort((a, b) => b.score - a.score)
      .slice(0, Math.max(0, query.k));
  }

  async countChunks(projectId: number, documentIds?: number[]): Promise<number> {
    const { sql, params } = this.scope(projectId, documentIds);
    const row = this.db
      .prepare<Array<number>, CountRow>(`SELECT COUNT(*) as count FROM document_chunks WHERE ${sql}`)
      .get(...params);
    return row?.count ?? 0;
  }

  async upsert(chunks: DocumentChunk[]): Promise<void> {
    const stmt = this.db.prepare(`
      INSERT INTO document_chunks (document_id, project_id, chunk_index, source, content, embedding)
      VALUES (?, ?, ?, ?, ?, ?)
      ON CONFLICT(document_id, chunk_index) DO UPDATE SET
        project_id = excluded.project_id,
        source = excluded.source,
        content = excluded.content,
        embedding = excluded.embedding
    `);
    const insertAll = this.db.transaction((items: DocumentChunk[]) => {
      for (const chunk of items) {
        stmt.run(
          chunk.documentId,
          chunk.projectId,
          chunk.chunkIndex,
          chunk.source,
          chunk.content,
          JSON.stringify(chunk.embedding)
        );
      }
    });
    insertAll(chunks);
  }

  async deleteDocument(documentId: number): Promise<number> {
    return this.db.prepare('DELETE FROM document_chunks WHERE document_id = ?').run(documentId).changes;
  }

  private scope(projectId: number, documentIds?: number[]): { sql: string; params: number[] } {
    if (documentIds && documentIds.length > 0) {
      const placeholders = documentIds.map(() => '?').join(', ');
      return {
        sql: `project_id = ? AND document_id IN (${placeholders})`,
        params: [projectId, ...documentIds],
      };
    }
    return { sql: 'project_id = ?', params: [projectId] };
  }
}

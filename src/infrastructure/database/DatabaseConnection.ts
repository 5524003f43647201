import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';

export const IN_MEMORY = ':memory:';

interface CountRow {
  count: number;
}

/**
 * Database connection manager
 */
export class DatabaseConnection {
  private db: Database.Database;

  constructor(private readonly dbPath: string = IN_MEMORY) {
    if (dbPath !== IN_MEMORY) {
      // Ensure data directory exists
      const dataDir = path.dirname(dbPath);
      if (!fs.existsSync(dataDir)) {
        fs.mkdirSync(dataDir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    if (dbPath !== IN_MEMORY) {
      // Enable WAL mode for better concurrency
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('foreign_keys = ON');

    this.initializeTables();
  }

  private initializeTables() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS conversations (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        project_id INTEGER NOT NULL,
        user_id INTEGER NOT NULL,
        title TEXT,
        system_prompt TEXT,
        total_tokens INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_conversations_owner ON conversations(project_id, user_id, updated_at);

      CREATE TABLE IF NOT EXISTS messages (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        conversation_id INTEGER NOT NULL,
        role TEXT NOT NULL CHECK (role IN ('user', 'assistant', 'tool')),
        content TEXT NOT NULL,
        token_count INTEGER,
        created_at TEXT NOT NULL,
        FOREIGN KEY (conversation_id) REFERENCES conversations(id) ON DELETE CASCADE
      );

      CREATE INDEX IF NOT EXISTS idx_messages_conversation ON messages(conversation_id, created_at, id);

      CREATE TABLE IF NOT EXISTS document_chunks (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        document_id INTEGER NOT NULL,
        project_id INTEGER NOT NULL,
        chunk_index INTEGER NOT NULL,
        source TEXT NOT NULL,
        content TEXT NOT NULL,
        embedding TEXT NOT NULL,
        UNIQUE(document_id, chunk_index)
      );

      CREATE INDEX IF NOT EXISTS idx_chunks_project ON document_chunks(project_id, document_id);
    `);
  }

  getDatabase(): Database.Database {
    return this.db;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  getStatistics(): {
    totalConversations: number;
    totalMessages: number;
    totalChunks: number;
    databaseSize: number;
  } {
    const count = (table: 'conversations' | 'messages' | 'document_chunks'): number => {
      const row = this.db.prepare<[], CountRow>(`SELECT COUNT(*) as count FROM ${table}`).get();
      return row?.count ?? 0;
    };

    // In-memory databases have no file
    const databaseSize =
      this.dbPath !== IN_MEMORY && fs.existsSync(this.dbPath) ? fs.statSync(this.dbPath).size : 0;

    return {
      totalConversations: count('conversations'),
      totalMessages: count('messages'),
      totalChunks: count('document_chunks'),
      databaseSize,
    };
  }
}

import Database from 'better-sqlite3';
import { IConversationRepository } from '../../../core/interfaces/IConversationRepository.js';
import {
  Conversation,
  ConversationMessage,
  ConversationMessageRecord,
  ConversationRecord,
  ConversationSummary,
  NewConversation,
  NewMessage,
} from '../../../core/entities/Conversation.js';
import { ConversationNotFoundError } from '../../../core/errors.js';

interface SummaryRecord {
  id: number;
  title: string | null;
  total_tokens: number;
  message_count: number;
  updated_at: string;
}

function toConversation(row: ConversationRecord): Conversation {
  return {
    id: row.id,
    projectId: row.project_id,
    userId: row.user_id,
    title: row.title,
    systemPrompt: row.system_prompt,
    totalTokens: row.total_tokens,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toMessage(row: ConversationMessageRecord): ConversationMessage {
  return {
    id: row.id,
    conversationId: row.conversation_id,
    role: row.role,
    content: row.content,
    tokenCount: row.token_count,
    createdAt: row.created_at,
  };
}

/**
 * SQLite implementation of conversation repository.
 * Timestamps are ISO-8601 with milliseconds; messages sort by (created_at, id).
 */
export class ConversationRepository implements IConversationRepository {
  constructor(
    private db: Database.Database,
    private now: () => Date = () => new Date()
  ) {}

  createConversation(input: NewConversation): Conversation {
    const timestamp = this.now().toISOString();
    const result = this.db
      .prepare(
        `
      INSERT INTO conversations (project_id, user_id, title, system_prompt, total_tokens, created_at, updated_at)
      VALUES (?, ?, ?, ?, 0, ?, ?)
    `
      )
      .run(input.projectId, input.userId, input.title, input.systemPrompt ?? null, timestamp, timestamp);

    return this.requireConversation(Number(result.lastInsertRowid));
  }

  findConversation(conversationId: number): Conversation | null {
    const row = this.db
      .prepare<[number], ConversationRecord>('SELECT * FROM conversations WHERE id = ?')
      .get(conversationId);
    return row ? toConversation(row) : null;
  }

  appendMessage(message: NewMessage): ConversationMessage {
    const result = this.db
      .prepare(
        `
      INSERT INTO messages (conversation_id, role, content, token_count, created_at)
      VALUES (?, ?, ?, ?, ?)
    `
      )
      .run(message.conversationId, message.role, message.content, message.tokenCount, this.now().toISOString());

    const row = this.db
      .prepare<[number], ConversationMessageRecord>('SELECT * FROM messages WHERE id = ?')
      .get(Number(result.lastInsertRowid));
    if (!row) {
      throw new Error(`Message ${result.lastInsertRowid} vanished after insert`);
    }
    return toMessage(row);
  }

  incrementTokenTotal(conversationId: number, tokens: number): Conversation {
    const result = this.db
      .prepare(
        `
      UPDATE conversations
      SET total_tokens = total_tokens + ?, updated_at = ?
      WHERE id = ?
    `
      )
      .run(tokens, this.now().toISOString(), conversationId);

    if (result.changes === 0) {
      throw new ConversationNotFoundError(conversationId);
    }
    return this.requireConversation(conversationId);
  }

  updateTitle(conversationId: number, title: string): void {
    this.db
      .prepare('UPDATE conversations SET title = ?, updated_at = ? WHERE id = ?')
      .run(title, this.now().toISOString(), conversationId);
  }

  updateSystemPrompt(conversationId: number, systemPrompt: string | null): void {
    this.db
      .prepare('UPDATE conversations SET system_prompt = ?, updated_at = ? WHERE id = ?')
      .run(systemPrompt, this.now().toISOString(), conversationId);
  }

  listMessages(conversationId: number): ConversationMessage[] {
    return this.db
      .prepare<[number], ConversationMessageRecord>(
        `
      SELECT * FROM messages
      WHERE conversation_id = ?
      ORDER BY created_at, id
    `
      )
      .all(conversationId)
      .map(toMessage);
  }

  listRecentMessages(conversationId: number, limit: number): ConversationMessage[] {
    const rows = this.db
      .prepare<[number, number], ConversationMessageRecord>(
        `
      SELECT * FROM messages
      WHERE conversation_id = ?
      ORDER BY created_at DESC, id DESC
      LIMIT ?
    `
      )
      .all(conversationId, limit);

    // Reverse to maintain chronological order
    return rows.reverse().map(toMessage);
  }

  listConversations(projectId: number, userId: number): ConversationSummary[] {
    return this.db
      .prepare<[number, number], SummaryRecord>(
        `
      SELECT
        c.id,
        c.title,
        c.total_tokens,
        c.updated_at,
        (SELECT COUNT(*) FROM messages m WHERE m.conversation_id = c.id) as message_count
      FROM conversations c
      WHERE c.project_id = ? AND c.user_id = ?
      ORDER BY c.updated_at DESC, c.id DESC
    `
      )
      .all(projectId, userId)
      .map((row) => ({
        id: row.id,
        title: row.title,
        totalTokens: row.total_tokens,
        messageCount: row.message_count,
        updatedAt: row.updated_at,
      }));
  }

  deleteConversation(conversationId: number): boolean {
    // Messages go with it (ON DELETE CASCADE)
    const result = this.db.prepare('DELETE FROM conversations WHERE id = ?').run(conversationId);
    return result.changes > 0;
  }

  private requireConversation(conversationId: number): Conversation {
    const conversation = this.findConversation(conversationId);
    if (!conversation) {
      throw new ConversationNotFoundError(conversationId);
    }
    return conversation;
  }
}

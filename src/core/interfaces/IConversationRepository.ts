import {
  Conversation,
  ConversationMessage,
  ConversationSummary,
  NewConversation,
  NewMessage,
} from '../entities/Conversation.js';

/**
 * Interface for conversation persistence
 */
export interface IConversationRepository {
  createConversation(input: NewConversation): Conversation;

  findConversation(conversationId: number): Conversation | null;

  appendMessage(message: NewMessage): ConversationMessage;

  /**
   * Add to the running token total and touch updated_at in a single statement
   */
  incrementTokenTotal(conversationId: number, tokens: number): Conversation;

  updateTitle(conversationId: number, title: string): void;

  /**
   * Set or clear (null) the conversation's system prompt override
   */
  updateSystemPrompt(conversationId: number, systemPrompt: string | null): void;

  listMessages(conversationId: number): ConversationMessage[];

  listRecentMessages(conversationId: number, limit: number): ConversationMessage[];

  listConversations(projectId: number, userId: number): ConversationSummary[];

  deleteConversation(conversationId: number): boolean;
}

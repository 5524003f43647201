/**
 * Conversation domain entities
 */
export type MessageRole = 'user' | 'assistant' | 'tool';

export interface Conversation {
  id: number;
  projectId: number;
  userId: number;
  title: string | null;
  systemPrompt: string | null;
  totalTokens: number;
  createdAt: string;
  updatedAt: string;
}

export interface ConversationMessage {
  id: number;
  conversationId: number;
  role: MessageRole;
  content: string;
  tokenCount: number | null;
  createdAt: string;
}

export interface NewConversation {
  projectId: number;
  userId: number;
  title: string | null;
  systemPrompt?: string | null;
}

export interface NewMessage {
  conversationId: number;
  role: MessageRole;
  content: string;
  tokenCount: number | null;
}

/**
 * Row shapes as stored in SQLite
 */
export interface ConversationRecord {
  id: number;
  project_id: number;
  user_id: number;
  title: string | null;
  system_prompt: string | null;
  total_tokens: number;
  created_at: string;
  updated_at: string;
}

export interface ConversationMessageRecord {
  id: number;
  conversation_id: number;
  role: MessageRole;
  content: string;
  token_count: number | null;
  created_at: string;
}

export interface ConversationSummary {
  id: number;
  title: string | null;
  totalTokens: number;
  messageCount: number;
  updatedAt: string;
}

import { MessageRole } from '../entities/Conversation.js';

/**
 * Chat message format for structured conversation
 */
export interface ChatMessage {
  role: 'system' | 'user' | 'assistant' | 'tool';
  content: string;
}

/**
 * Payload types for different Ollama API endpoints
 */
export type PromptPayload =
  | {
      type: 'generate';
      prompt: string;
      system?: string;
    }
  | {
      type: 'chat';
      messages: ChatMessage[];
    };

/**
 * Template type identifiers
 */
export type TemplateType = 'legacy' | 'chat';

export interface HistoryEntry {
  role: MessageRole;
  content: string;
}

/**
 * The pieces of a prompt after context assembly, in serialization order
 */
export interface PromptParts {
  systemPrompt: string;
  /** Tagged document excerpts and tool output */
  contextBlocks: string[];
  /** Chronological history that fitted the budget */
  history: HistoryEntry[];
  userMessage: string;
}

/**
 * Abstract interface for prompt templates
 * Different template implementations format messages differently
 */
export interface PromptTemplate {
  /**
   * Format assembled prompt parts into a payload
   * @returns Formatted payload ready for Ollama API
   */
  formatPrompt(parts: PromptParts): PromptPayload;

  /**
   * Get the template name
   */
  getName(): string;
}

import { z } from 'zod';
import { ToolName, ToolNameSchema } from './Tool.js';

/**
 * Request accepted by both the answer and the stream operations
 */
export const ChatRequestSchema = z.object({
  projectId: z.number().int().positive(),
  conversationId: z.number().int().positive().optional(),
  userId: z.number().int().positive(),
  message: z.string().trim().min(1, 'Message must not be empty'),
  modelId: z.string().min(1).optional(),
  enabledTools: z.array(ToolNameSchema).default([]),
  useDocumentContext: z.boolean().default(false),
  documentIds: z.array(z.number().int().positive()).optional(),
  systemPrompt: z.string().optional(),
  projectName: z.string().optional(),
});

export type ChatRequestInput = z.input<typeof ChatRequestSchema>;

export interface ChatRequest {
  projectId: number;
  conversationId?: number;
  userId: number;
  message: string;
  modelId?: string;
  enabledTools: ToolName[];
  useDocumentContext: boolean;
  documentIds?: number[];
  /** Project-level system prompt; a conversation override takes precedence */
  systemPrompt?: string;
  projectName?: string;
}

export interface ContextUsage {
  systemTokens: number;
  documentTokens: number;
  toolTokens: number;
  historyTokens: number;
  messageTokens: number;
  totalTokens: number;
  contextLimit: number;
  remainingTokens: number;
  usageRatio: number;
  nearLimit: boolean;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  /** Tokens added to the conversation total by this turn (user + assistant message) */
  turnTokens: number;
  conversationTotal: number;
  context: ContextUsage;
}

export type ChatWarningKind =
  | 'ContextOverflow'
  | 'MessageTruncated'
  | 'RetrievalUnavailable'
  | 'HistoryTrimmed'
  | 'ContextDropped'
  | 'HallucinationRisk';

export interface ChatWarning {
  kind: ChatWarningKind;
  message: string;
}

export interface ChatResult {
  conversationId: number;
  title: string | null;
  modelId: string;
  userMessageId: number;
  assistantMessageId: number;
  assistantText: string;
  toolUsed: ToolName | null;
  sources: Array<{ source: string; documentId: number; score: number }>;
  tokenUsage: TokenUsage;
  warnings: ChatWarning[];
}

export type ChatStreamEvent =
  | { type: 'start'; conversationId: number; title: string | null; modelId: string; userMessageId: number }
  | { type: 'tool'; tool: ToolName; status: 'success'; preview: string }
  | { type: 'warning'; warning: ChatWarning }
  | { type: 'chunk'; text: string }
  | { type: 'done'; result: ChatResult };

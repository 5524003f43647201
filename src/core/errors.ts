/**
 * Error taxonomy for chat turns.
 *
 * Every error carries a stable `kind` that callers map to user-facing
 * messages. Retrieval and tool errors are absorbed inside a turn; inference
 * errors end the turn and reach the caller with the stage that failed and the
 * conversation id, so the client can retry on the same conversation.
 */

export type ChatErrorKind =
  | 'ConversationNotFound'
  | 'RetrievalUnavailable'
  | 'ToolInputError'
  | 'InferenceTimeout'
  | 'InferenceUnavailable'
  | 'ModelNotFound'
  | 'InvalidRequest';

export type TurnStage =
  | 'validate-model'
  | 'resolve-conversation'
  | 'route-tools'
  | 'retrieve-context'
  | 'assemble-prompt'
  | 'infer'
  | 'persist'
  | 'respond';

export interface TurnContext {
  stage: TurnStage;
  conversationId?: number;
}

export abstract class ChatError extends Error {
  abstract readonly kind: ChatErrorKind;
  stage?: TurnStage;
  conversationId?: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  /**
   * Attach the failing stage and conversation. Returns the same instance so it
   * can be rethrown directly.
   */
  withContext(context: TurnContext): this {
    this.stage = context.stage;
    if (context.conversationId !== undefined) {
      this.conversationId = context.conversationId;
    }
    return this;
  }
}

export class ConversationNotFoundError extends ChatError {
  readonly kind = 'ConversationNotFound';

  constructor(conversationId: number) {
    super(`Conversation ${conversationId} not found`);
  }
}

export class RetrievalUnavailableError extends ChatError {
  readonly kind = 'RetrievalUnavailable';
}

export class ToolInputError extends ChatError {
  readonly kind = 'ToolInputError';
}

export class InferenceTimeoutError extends ChatError {
  readonly kind = 'InferenceTimeout';

  constructor(timeoutMs: number, options?: { cause?: unknown }) {
    super(`Model did not respond within ${timeoutMs}ms`, options);
  }
}

export class InferenceUnavailableError extends ChatError {
  readonly kind = 'InferenceUnavailable';
}

export class ModelNotFoundError extends ChatError {
  readonly kind = 'ModelNotFound';

  constructor(readonly modelId: string, options?: { cause?: unknown }) {
    super(`Model "${modelId}" is not available on the inference backend`, options);
  }
}

export class InvalidRequestError extends ChatError {
  readonly kind = 'InvalidRequest';
}

export function isChatError(error: unknown): error is ChatError {
  return error instanceof ChatError;
}

/**
 * Human-readable messages shown to end users, one per kind.
 */
export const USER_MESSAGES: Record<ChatErrorKind, string> = {
  ConversationNotFound: 'This conversation does not exist or you do not have access to it.',
  RetrievalUnavailable: 'Document search is currently unavailable.',
  ToolInputError: 'The tool could not process this input.',
  InferenceTimeout: 'The model took too long to respond. Please try again.',
  InferenceUnavailable: 'The model server is unreachable. Please try again shortly.',
  ModelNotFound: 'The selected model is not installed on the model server.',
  InvalidRequest: 'The request is invalid.',
};

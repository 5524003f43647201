import { randomUUID } from 'crypto';
import { ChatErrorKind, TurnStage, USER_MESSAGES, isChatError } from './errors.js';

export type ErrorResponseKind = ChatErrorKind | 'Internal';

export interface ErrorResponse {
  success: false;
  error: {
    kind: ErrorResponseKind;
    message: string;
    details?: string;
    conversationId?: number;
    stage?: TurnStage;
    requestId: string;
  };
}

export const HTTP_STATUS: Record<ErrorResponseKind, number> = {
  InvalidRequest: 400,
  ConversationNotFound: 404,
  ModelNotFound: 404,
  ToolInputError: 422,
  Internal: 500,
  InferenceUnavailable: 503,
  RetrievalUnavailable: 503,
  InferenceTimeout: 504,
};

/**
 * Client-facing error body. Unknown errors get a generic message and never
 * leak internals.
 */
export function toErrorResponse(error: unknown, requestId: string = randomUUID()): ErrorResponse {
  if (!isChatError(error)) {
    return {
      success: false,
      error: { kind: 'Internal', message: 'An unexpected error occurred.', requestId },
    };
  }

  return {
    success: false,
    error: {
      kind: error.kind,
      message: USER_MESSAGES[error.kind],
      details: error.message,
      ...(error.conversationId !== undefined ? { conversationId: error.conversationId } : {}),
      ...(error.stage !== undefined ? { stage: error.stage } : {}),
      requestId,
    },
  };
}

export function httpStatusFor(response: ErrorResponse): number {
  return HTTP_STATUS[response.error.kind];
}

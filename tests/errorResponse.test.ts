/**
 * Tests for the error taxonomy and client-facing error bodies
 */

import { httpStatusFor, toErrorResponse } from '../src/core/errorResponse.js';
import {
  ConversationNotFoundError,
  InferenceTimeoutError,
  RetrievalUnavailableError,
  USER_MESSAGES,
  isChatError,
} from '../src/core/errors.js';

describe('toErrorResponse', () => {
  it('should carry kind, stage and conversation of a chat error', () => {
    const error = new ConversationNotFoundError(5).withContext({ stage: 'resolve-conversation', conversationId: 5 });

    const response = toErrorResponse(error, 'req-1');

    expect(response).toEqual({
      success: false,
      error: {
        kind: 'ConversationNotFound',
        message: 'This conversation does not exist or you do not have access to it.',
        details: 'Conversation 5 not found',
        conversationId: 5,
        stage: 'resolve-conversation',
        requestId: 'req-1',
      },
    });
    expect(httpStatusFor(response)).toBe(404);
  });

  it('should map inference timeouts to 504', () => {
    const response = toErrorResponse(new InferenceTimeoutError(1000), 'req-2');

    expect(response.error.details).toBe('Model did not respond within 1000ms');
    expect(response.error.message).toBe(USER_MESSAGES.InferenceTimeout);
    expect(response.error).not.toHaveProperty('stage');
    expect(httpStatusFor(response)).toBe(504);
  });

  it('should hide the details of unexpected errors', () => {
    const response = toErrorResponse(new Error('SQLITE_CORRUPT at /var/data/chat.db'), 'req-3');

    expect(response).toEqual({
      success: false,
      error: { kind: 'Internal', message: 'An unexpected error occurred.', requestId: 'req-3' },
    });
    expect(httpStatusFor(response)).toBe(500);
  });

  it('should generate a request id', () => {
    expect(toErrorResponse(new Error('x')).error.requestId).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/
    );
  });
});

describe('ChatError', () => {
  it('should keep its cause and class name', () => {
    const cause = new Error('socket hang up');
    const error = new RetrievalUnavailableError('Document retrieval failed: socket hang up', { cause });

    expect(error.name).toBe('RetrievalUnavailableError');
    expect(error.kind).toBe('RetrievalUnavailable');
    expect(error.cause).toBe(cause);
    expect(isChatError(error)).toBe(true);
    expect(isChatError(cause)).toBe(false);
  });

  it('should leave the conversation alone when the context has none', () => {
    const error = new InferenceTimeoutError(10).withContext({ stage: 'infer', conversationId: 3 });

    error.withContext({ stage: 'persist' });

    expect(error.stage).toBe('persist');
    expect(error.conversationId).toBe(3);
  });
});

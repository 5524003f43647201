import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { toErrorResponse } from '../../core/errorResponse.js';

export function textResult(text: string): CallToolResult {
  return { content: [{ type: 'text', text }] };
}

export function errorResult(error: unknown): CallToolResult {
  const { error: body } = toErrorResponse(error);
  const lines = [`**${body.kind}**: ${body.message}`];
  if (body.details) lines.push(body.details);
  if (body.conversationId !== undefined) lines.push(`Conversation ID: ${body.conversationId}`);
  lines.push(`Request ID: ${body.requestId}`);
  return { isError: true, content: [{ type: 'text', text: lines.join('\n') }] };
}

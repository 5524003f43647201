import { PromptTemplate, PromptPayload, ChatMessage, PromptParts } from './types.js';

/**
 * Chat template using structured messages array
 * Works with Ollama's /api/chat endpoint
 *
 * Ollama applies the model's own chat format (Llama3 headers, ChatML, ...);
 * this template only provides the structured messages. Document excerpts and
 * tool output travel in the system message so the history stays a clean
 * alternation of turns.
 */
export class ChatTemplate implements PromptTemplate {
  formatPrompt(parts: PromptParts): PromptPayload {
    const chatMessages: ChatMessage[] = [];

    const system = [parts.systemPrompt, ...parts.contextBlocks]
      .filter((block) => block.length > 0)
      .join('\n\n');
    if (system) {
      chatMessages.push({ role: 'system', content: system });
    }

    parts.history.forEach((msg) => {
      chatMessages.push({ role: msg.role, content: msg.content });
    });

    chatMessages.push({ role: 'user', content: parts.userMessage });

    return {
      type: 'chat',
      messages: chatMessages,
    };
  }

  getName(): string {
    return 'Chat (Llama3/Command-R/ChatML)';
  }
}

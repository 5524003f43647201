import { PromptTemplate, PromptPayload, PromptParts } from './types.js';

const ROLE_LABELS = {
  user: 'User',
  assistant: 'Assistant',
  tool: 'Tool',
} as const;

/**
 * Text-based template for /api/generate
 *
 * Format:
 * <context blocks>
 *
 * Previous conversation:
 * User: question 1
 * Assistant: response 1
 *
 * Current question: question 2
 * Assistant:
 */
export class LegacyTemplate implements PromptTemplate {
  formatPrompt(parts: PromptParts): PromptPayload {
    const sections: string[] = [...parts.contextBlocks];

    if (parts.history.length > 0) {
      const lines = parts.history.map((msg) => `${ROLE_LABELS[msg.role]}: ${msg.content}`);
      sections.push(['Previous conversation:', ...lines].join('\n'));
    }

    sections.push(`Current question: ${parts.userMessage}\nAssistant:`);

    return {
      type: 'generate',
      prompt: sections.join('\n\n'),
      system: parts.systemPrompt || undefined,
    };
  }

  getName(): string {
    return 'Legacy (text-based)';
  }
}

import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { ConversationOrchestrator } from '../../application/services/ConversationOrchestrator.js';
import { ChatResult } from '../../core/entities/Chat.js';
import { ToolNameSchema } from '../../core/entities/Tool.js';
import { errorResult, textResult } from './results.js';

export function formatChatResult(result: ChatResult): string {
  const usage = result.tokenUsage;
  const sections = [
    `# ${result.title ?? 'Conversation'}`,
    result.assistantText,
    '---',
    `**Conversation ID**: \`${result.conversationId}\` (use it to continue the conversation)`,
    `**Model**: ${result.modelId}${result.toolUsed ? ` | **Tool**: ${result.toolUsed}` : ''}`,
    `**Tokens**: ${usage.turnTokens} this turn, ${usage.conversationTotal} total | context ${usage.context.totalTokens}/${usage.context.contextLimit}${usage.context.nearLimit ? ' (near limit)' : ''}`,
  ];

  if (result.sources.length > 0) {
    sections.push(
      `**Sources**:\n${result.sources.map((source) => `- ${source.source} (${source.score.toFixed(2)})`).join('\n')}`
    );
  }
  if (result.warnings.length > 0) {
    sections.push(`**Warnings**:\n${result.warnings.map((warning) => `- ${warning.message}`).join('\n')}`);
  }
  return sections.join('\n\n');
}

const ChatInput = z.object({
  project_id: z.number().int().positive().describe('Project the conversation belongs to'),
  user_id: z.number().int().positive().describe('User who owns the conversation'),
  message: z.string().min(1).describe('The user message'),
  conversation_id: z
    .number()
    .int()
    .positive()
    .optional()
    .describe('Continue an existing conversation; omit to start a new one'),
  model: z.string().optional().describe('Ollama model to use (defaults to the configured model)'),
  enabled_tools: z.array(ToolNameSchema).optional().describe('Tools the model may use for this turn'),
  use_document_context: z.boolean().optional().describe('Search the project documents for context'),
  document_ids: z.array(z.number().int().positive()).optional().describe('Restrict document search'),
  system_prompt: z.string().optional().describe('Project-level system prompt'),
});

type ChatArgs = z.infer<typeof ChatInput>;

/**
 * Register the chat tool
 */
export function registerChatTool(server: McpServer, orchestrator: ConversationOrchestrator) {
  server.registerTool(
    'chat',
    {
      description:
        'Ask the local model a question, optionally grounded in project documents and tools (web search, calculator)',
      inputSchema: ChatInput.shape,
    },
    async (args: ChatArgs) => {
      try {
        const result = await orchestrator.answer({
          projectId: args.project_id,
          userId: args.user_id,
          message: args.message,
          conversationId: args.conversation_id,
          modelId: args.model,
          enabledTools: args.enabled_tools ?? [],
          useDocumentContext: args.use_document_context ?? false,
          documentIds: args.document_ids,
          systemPrompt: args.system_prompt,
        });
        return textResult(formatChatResult(result));
      } catch (error) {
        return errorResult(error);
      }
    }
  );
}

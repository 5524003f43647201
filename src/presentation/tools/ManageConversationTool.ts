import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import {
  ConversationOwner,
  ConversationService,
  ConversationStatistics,
} from '../../application/services/ConversationService.js';
import { Conversation } from '../../core/entities/Conversation.js';
import { InvalidRequestError } from '../../core/errors.js';
import { errorResult, textResult } from './results.js';

const ROLE_LABELS = {
  user: '👤 User',
  assistant: '🤖 Assistant',
  tool: '🔧 Tool',
} as const;

const ManageConversationInput = z.object({
  action: z
    .enum(['list', 'view', 'rename', 'set-system-prompt', 'stats', 'delete'])
    .describe(
      "Action to perform: 'list' conversations, 'view' messages, 'rename', 'set-system-prompt', 'stats' for token usage, 'delete' a conversation"
    ),
  project_id: z.number().int().positive().describe('Project ID'),
  user_id: z.number().int().positive().describe('Owner user ID'),
  conversation_id: z.number().int().positive().optional().describe('Required for every action except list'),
  title: z.string().optional().describe('New title (rename)'),
  system_prompt: z
    .string()
    .optional()
    .describe('Prompt used instead of the project prompt; empty clears it (set-system-prompt)'),
  model: z.string().optional().describe('Model whose context window the stats are measured against'),
});

type ManageConversationArgs = z.infer<typeof ManageConversationInput>;

export interface ConversationNotifications {
  updated?: (conversation: Conversation) => void;
  deleted?: (conversationId: number, owner: ConversationOwner) => void;
}

export function formatStatistics(stats: ConversationStatistics): string {
  const lines = [
    `# Conversation ${stats.conversationId} statistics`,
    '',
    `- **Model**: ${stats.modelId}`,
    `- **Messages**: ${stats.messageCount}`,
    `- **Tokens recorded**: ${stats.totalTokens}`,
    `- **Context**: ${stats.usage.totalTokens}/${stats.usage.contextLimit} (${stats.usagePercentage}%)`,
  ];
  if (stats.warning) {
    lines.push('', `⚠️ ${stats.warning}`);
  }
  return lines.join('\n');
}

function requireArg<T>(value: T | undefined, name: string, action: string): T {
  if (value === undefined) {
    throw new InvalidRequestError(`${name} is required for '${action}'`);
  }
  return value;
}

/**
 * Register the manage-conversation tool
 */
export function registerManageConversationTool(
  server: McpServer,
  conversationService: ConversationService,
  notifications: ConversationNotifications = {}
) {
  server.registerTool(
    'manage-conversation',
    {
      description:
        "Manage conversations - list a project's conversations, view, rename or delete one, set its system prompt, or show its token usage",
      inputSchema: ManageConversationInput.shape,
    },
    async (args: ManageConversationArgs) => {
      const { action, project_id, user_id } = args;
      const owner = { projectId: project_id, userId: user_id };
      try {
        if (action === 'list') {
          const conversations = conversationService.listConversations(owner);
          if (conversations.length === 0) {
            return textResult('No conversations found.');
          }
          const list = conversations
            .map(
              (c) =>
                `- **${c.id}** ${c.title ?? '(untitled)'}: ${c.messageCount} messages, ${c.totalTokens} tokens, updated ${c.updatedAt}`
            )
            .join('\n');
          return textResult(`# Conversations\n\n${list}`);
        }

        const conversationId = requireArg(args.conversation_id, 'conversation_id', action);

        switch (action) {
          case 'view': {
            const { conversation, messages } = conversationService.getConversation(conversationId, owner);
            const history = messages
              .map((msg, idx) => `${idx + 1}. **${ROLE_LABELS[msg.role]}**\n${msg.content}\n`)
              .join('\n---\n\n');
            return textResult(
              `# ${conversation.title ?? 'Conversation'} (${conversation.totalTokens} tokens)\n\n${history || 'No messages yet.'}`
            );
          }
          case 'rename': {
            const title = requireArg(args.title, 'title', action);
            const conversation = conversationService.renameConversation(conversationId, owner, title);
            notifications.updated?.(conversation);
            return textResult(`✓ Conversation ${conversationId} renamed to "${conversation.title}"`);
          }
          case 'set-system-prompt': {
            const prompt = requireArg(args.system_prompt, 'system_prompt', action);
            const conversation = conversationService.setSystemPrompt(conversationId, owner, prompt);
            notifications.updated?.(conversation);
            return textResult(
              conversation.systemPrompt === null
                ? `✓ Conversation ${conversationId} now uses the project system prompt`
                : `✓ System prompt of conversation ${conversationId} updated`
            );
          }
          case 'stats':
            return textResult(formatStatistics(conversationService.getStatistics(conversationId, owner, args.model)));
          case 'delete':
            conversationService.deleteConversation(conversationId, owner);
            notifications.deleted?.(conversationId, owner);
            return textResult(`✓ Conversation ${conversationId} deleted`);
        }
      } catch (error) {
        return errorResult(error);
      }
    }
  );
}

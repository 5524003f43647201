import { IConversationRepository } from '../../core/interfaces/IConversationRepository.js';
import {
  Conversation,
  ConversationMessage,
  ConversationSummary,
} from '../../core/entities/Conversation.js';
import { ContextUsage } from '../../core/entities/Chat.js';
import { ConversationNotFoundError, InvalidRequestError } from '../../core/errors.js';
import { createLogger } from '../../utils/logger.js';
import { TokenEstimator } from './TokenEstimator.js';

const TITLE_MAX_LENGTH = 200;

export interface ConversationOwner {
  projectId: number;
  userId: number;
}

export interface ConversationPatch {
  title?: string;
  /** null clears the override */
  systemPrompt?: string | null;
}

export interface ConversationStatistics {
  conversationId: number;
  modelId: string;
  messageCount: number;
  /** Running total recorded by chat turns */
  totalTokens: number;
  /** Prompt size if the system prompt and the whole history were sent to `modelId` */
  usage: ContextUsage;
  usagePercentage: number;
  warning: string | null;
}

/**
 * Service for managing conversations outside of chat turns
 */
export class ConversationService {
  private logger = createLogger('conversations');

  constructor(
    private conversationRepo: IConversationRepository,
    private estimator: TokenEstimator,
    private defaultModel: string
  ) {}

  /**
   * Conversations of a project owned by the user, most recently updated first
   */
  listConversations(owner: ConversationOwner): ConversationSummary[] {
    return this.conversationRepo.listConversations(owner.projectId, owner.userId);
  }

  /**
   * Conversation with its messages in chronological order
   */
  getConversation(
    conversationId: number,
    owner: ConversationOwner
  ): { conversation: Conversation; messages: ConversationMessage[] } {
    const conversation = this.requireOwned(conversationId, owner);
    return { conversation, messages: this.conversationRepo.listMessages(conversationId) };
  }

  renameConversation(conversationId: number, owner: ConversationOwner, title: string): Conversation {
    this.requireOwned(conversationId, owner);
    const trimmed = title.trim();
    if (!trimmed) {
      throw new InvalidRequestError('Title must not be empty');
    }
    if (trimmed.length > TITLE_MAX_LENGTH) {
      throw new InvalidRequestError(`Title must be at most ${TITLE_MAX_LENGTH} characters`);
    }
    this.conversationRepo.updateTitle(conversationId, trimmed);
    this.logger.info('Conversation renamed', { conversationId });
    return this.requireOwned(conversationId, owner);
  }

  /**
   * Set the prompt that replaces the project prompt on later turns. A blank
   * prompt clears the override.
   */
  setSystemPrompt(conversationId: number, owner: ConversationOwner, systemPrompt: string | null): Conversation {
    this.requireOwned(conversationId, owner);
    const value = systemPrompt?.trim() || null;
    this.conversationRepo.updateSystemPrompt(conversationId, value);
    this.logger.info('Conversation system prompt updated', { conversationId, cleared: value === null });
    return this.requireOwned(conversationId, owner);
  }

  /**
   * Apply a rename and a system prompt change together; the title is checked first
   */
  updateConversation(conversationId: number, owner: ConversationOwner, patch: ConversationPatch): Conversation {
    let conversation = this.requireOwned(conversationId, owner);
    if (patch.title !== undefined) {
      conversation = this.renameConversation(conversationId, owner, patch.title);
    }
    if (patch.systemPrompt !== undefined) {
      conversation = this.setSystemPrompt(conversationId, owner, patch.systemPrompt);
    }
    return conversation;
  }

  /**
   * Token usage of a conversation against a model's context window
   */
  getStatistics(
    conversationId: number,
    owner: ConversationOwner,
    modelId: string = this.defaultModel
  ): ConversationStatistics {
    const conversation = this.requireOwned(conversationId, owner);
    const messages = this.conversationRepo.listMessages(conversationId);

    const historyTokens = messages.reduce(
      (sum, message) => sum + (message.tokenCount ?? this.estimator.estimate(message.content)),
      0
    );
    const usage = this.estimator.contextUsage(
      {
        systemTokens: this.estimator.estimate(conversation.systemPrompt ?? ''),
        documentTokens: 0,
        toolTokens: 0,
        historyTokens,
        messageTokens: 0,
      },
      modelId
    );
    const usagePercentage = Math.round(usage.usageRatio * 1000) / 10;

    return {
      conversationId,
      modelId,
      messageCount: messages.length,
      totalTokens: conversation.totalTokens,
      usage,
      usagePercentage,
      warning: usage.nearLimit
        ? `This conversation uses ${usagePercentage}% of the ${usage.contextLimit}-token context window; older messages will be left out of new turns.`
        : null,
    };
  }

  /**
   * Delete a conversation and its messages
   */
  deleteConversation(conversationId: number, owner: ConversationOwner): void {
    this.requireOwned(conversationId, owner);
    this.conversationRepo.deleteConversation(conversationId);
    this.logger.info('Conversation deleted', { conversationId, projectId: owner.projectId });
  }

  private requireOwned(conversationId: number, owner: ConversationOwner): Conversation {
    const conversation = this.conversationRepo.findConversation(conversationId);
    if (!conversation || conversation.projectId !== owner.projectId || conversation.userId !== owner.userId) {
      throw new ConversationNotFoundError(conversationId);
    }
    return conversation;
  }
}

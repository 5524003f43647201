import { ChatWarning } from '../../core/entities/Chat.js';
import { RetrievedChunk } from '../../core/entities/Document.js';
import { ToolFragment, ToolName } from '../../core/entities/Tool.js';
import { buildSystemPrompt } from '../../core/prompts/systemPrompt.js';
import { TemplateFactory } from '../../core/templates/TemplateFactory.js';
import { HistoryEntry, PromptParts, PromptPayload, TemplateType } from '../../core/templates/types.js';
import { createLogger } from '../../utils/logger.js';
import { PartTokens, TokenEstimator } from './TokenEstimator.js';

export interface AssembleInput {
  modelId: string;
  /** Conversation override or project prompt; the default persona when empty */
  basePrompt?: string | null;
  projectName?: string;
  enabledTools: readonly ToolName[];
  documents: readonly RetrievedChunk[];
  toolFragment: ToolFragment | null;
  /** Chronological, oldest first */
  history: readonly HistoryEntry[];
  userMessage: string;
}

export interface AssembledContext {
  payload: PromptPayload;
  parts: PromptParts;
  /** The user message as sent to the model */
  userMessage: string;
  truncated: boolean;
  documents: RetrievedChunk[];
  toolIncluded: boolean;
  historyDropped: number;
  tokens: PartTokens;
  estimatedTokens: number;
  budget: number;
  warnings: ChatWarning[];
}

export interface ContextAssemblerOptions {
  responseReserveTokens: number;
  templates?: Record<string, TemplateType>;
}

/** Message size kept when the system prompt alone exceeds the budget */
export const OVERFLOW_MESSAGE_TOKENS = 64;

export function formatDocumentBlock(chunk: RetrievedChunk): string {
  return `[Document: ${chunk.source} | relevance ${chunk.score.toFixed(2)}]\n${chunk.content}`;
}

export function formatToolBlock(fragment: ToolFragment): string {
  return `[Tool output: ${fragment.tool}]\n${fragment.text}`;
}

/**
 * Builds the prompt for a turn inside `contextLimit(model) - responseReserve`.
 *
 * System prompt and the new message are placed first (the message is
 * truncated when both do not fit). The remaining budget goes to tool output,
 * then documents in rank order, then history from newest to oldest.
 */
export class ContextAssembler {
  private logger = createLogger('context');

  constructor(
    private readonly estimator: TokenEstimator,
    private readonly options: ContextAssemblerOptions,
    private readonly now: () => Date = () => new Date()
  ) {}

  budgetFor(modelId: string): number {
    return Math.max(0, this.estimator.contextLimit(modelId) - this.options.responseReserveTokens);
  }

  assemble(input: AssembleInput): AssembledContext {
    const budget = this.budgetFor(input.modelId);
    const warnings: ChatWarning[] = [];
    const currentDate = this.now();

    const systemFor = (toolInstruction?: string) =>
      buildSystemPrompt({
        basePrompt: input.basePrompt,
        enabledTools: input.enabledTools,
        currentDate,
        projectName: input.projectName,
        toolInstruction,
      });

    let systemPrompt = systemFor(input.toolFragment?.systemInstruction);
    let systemTokens = this.estimator.estimate(systemPrompt);

    let userMessage = input.userMessage;
    let messageTokens = this.estimator.estimate(userMessage);
    let truncated = false;

    if (systemTokens > budget) {
      warnings.push({
        kind: 'ContextOverflow',
        message: `The system prompt alone (${systemTokens} tokens) exceeds the context budget of ${budget} tokens.`,
      });
      if (messageTokens > OVERFLOW_MESSAGE_TOKENS) {
        userMessage = this.truncateToFit(userMessage, OVERFLOW_MESSAGE_TOKENS);
        messageTokens = this.estimator.estimate(userMessage);
        truncated = true;
        warnings.push({
          kind: 'MessageTruncated',
          message: `The message was shortened to ${messageTokens} tokens because the context window is already full.`,
        });
      }
    } else if (systemTokens + messageTokens > budget) {
      userMessage = this.truncateToFit(userMessage, budget - systemTokens);
      messageTokens = this.estimator.estimate(userMessage);
      truncated = true;
      warnings.push({
        kind: 'MessageTruncated',
        message: `The message was shortened to fit the model's context window (${budget} tokens).`,
      });
    }

    let remaining = Math.max(0, budget - systemTokens - messageTokens);

    let toolBlock: string | null = null;
    let toolTokens = 0;
    if (input.toolFragment) {
      const block = formatToolBlock(input.toolFragment);
      const cost = this.estimator.estimate(block);
      if (cost <= remaining) {
        toolBlock = block;
        toolTokens = cost;
        remaining -= cost;
      } else {
        warnings.push({
          kind: 'ContextDropped',
          message: `Output of ${input.toolFragment.tool} did not fit the context window and was left out.`,
        });
        if (input.toolFragment.systemInstruction) {
          // The instruction refers to output that is no longer there
          const withoutInstruction = systemFor();
          const saved = systemTokens - this.estimator.estimate(withoutInstruction);
          systemPrompt = withoutInstruction;
          systemTokens -= saved;
          remaining += saved;
        }
      }
    }

    const documents: RetrievedChunk[] = [];
    const documentBlocks: string[] = [];
    let documentTokens = 0;
    for (const chunk of input.documents) {
      const block = formatDocumentBlock(chunk);
      const cost = this.estimator.estimate(block);
      if (cost > remaining) {
        break;
      }
      documents.push(chunk);
      documentBlocks.push(block);
      documentTokens += cost;
      remaining -= cost;
    }
    if (documents.length < input.documents.length) {
      warnings.push({
        kind: 'ContextDropped',
        message: `${input.documents.length - documents.length} of ${input.documents.length} document excerpts did not fit the context window.`,
      });
    }

    const kept: HistoryEntry[] = [];
    let historyTokens = 0;
    for (let i = input.history.length - 1; i >= 0; i--) {
      const cost = this.estimator.estimate(input.history[i].content);
      if (cost > remaining) {
        break;
      }
      kept.push(input.history[i]);
      historyTokens += cost;
      remaining -= cost;
    }
    kept.reverse();
    const historyDropped = input.history.length - kept.length;
    if (historyDropped > 0) {
      warnings.push({
        kind: 'HistoryTrimmed',
        message: `${historyDropped} older messages were left out of the context.`,
      });
    }

    const parts: PromptParts = {
      systemPrompt,
      contextBlocks: toolBlock ? [...documentBlocks, toolBlock] : documentBlocks,
      history: kept,
      userMessage,
    };
    const template = TemplateFactory.forModel(input.modelId, this.options.templates);
    const tokens: PartTokens = { systemTokens, documentTokens, toolTokens, historyTokens, messageTokens };
    const estimatedTokens = systemTokens + documentTokens + toolTokens + historyTokens + messageTokens;

    this.logger.debug('Assembled context', {
      model: input.modelId,
      template: template.getName(),
      budget,
      estimatedTokens,
      documents: documents.length,
      history: kept.length,
      historyDropped,
      truncated,
    });

    return {
      payload: template.formatPrompt(parts),
      parts,
      userMessage,
      truncated,
      documents,
      toolIncluded: toolBlock !== null,
      historyDropped,
      tokens,
      estimatedTokens,
      budget,
      warnings,
    };
  }

  /**
   * Largest prefix (in code points) whose estimate fits `maxTokens`
   */
  truncateToFit(text: string, maxTokens: number): string {
    const chars = Array.from(text);
    let low = 0;
    let high = chars.length;
    while (low < high) {
      const mid = Math.ceil((low + high) / 2);
      if (this.estimator.estimate(chars.slice(0, mid).join('')) <= maxTokens) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    return chars.slice(0, low).join('');
  }
}

import {
  ChatRequest,
  ChatRequestSchema,
  ChatResult,
  ChatStreamEvent,
  ChatWarning,
} from '../../core/entities/Chat.js';
import { Conversation, ConversationMessage } from '../../core/entities/Conversation.js';
import { RetrievedChunk } from '../../core/entities/Document.js';
import { ToolRouting } from '../../core/entities/Tool.js';
import {
  ConversationNotFoundError,
  InvalidRequestError,
  RetrievalUnavailableError,
  TurnStage,
  isChatError,
} from '../../core/errors.js';
import { IConversationRepository } from '../../core/interfaces/IConversationRepository.js';
import { AsyncChannel } from '../../utils/AsyncChannel.js';
import { KeyedMutex } from '../../utils/KeyedMutex.js';
import { createLogger } from '../../utils/logger.js';
import { detectHallucinationRisk } from '../tools/HallucinationGuard.js';
import { AssembledContext, ContextAssembler } from './ContextAssembler.js';
import { DocumentRetriever } from './DocumentRetriever.js';
import { InferenceGateway } from './InferenceGateway.js';
import { TokenEstimator } from './TokenEstimator.js';
import { ToolRouter } from './ToolRouter.js';

export interface OrchestratorOptions {
  defaultModel: string;
  historyLimit: number;
  retrievalTopK: number;
  streamBufferSize: number;
}

export interface ConversationUpdate {
  conversationId: number;
  projectId: number;
  userId: number;
  totalTokens: number;
}

export interface OrchestratorDependencies {
  repository: IConversationRepository;
  estimator: TokenEstimator;
  router: ToolRouter;
  retriever: DocumentRetriever;
  assembler: ContextAssembler;
  gateway: InferenceGateway;
  /** Called after every persisted turn */
  onConversationUpdated?: (update: ConversationUpdate) => void;
}

const TITLE_WORDS = 8;
const TITLE_MAX_LENGTH = 100;

/**
 * Title from the first words of the opening message
 */
export function deriveTitle(message: string): string {
  const words = message.trim().split(/\s+/).filter(Boolean);
  if (words.length === 0) {
    return 'New conversation';
  }
  let title = words.slice(0, TITLE_WORDS).join(' ');
  if (words.length > TITLE_WORDS) {
    title += '...';
  }
  return title.length > TITLE_MAX_LENGTH ? `${title.slice(0, TITLE_MAX_LENGTH - 3)}...` : title;
}

interface Turn {
  request: ChatRequest;
  modelId: string;
  conversation: Conversation;
  userMessage: ConversationMessage;
  history: ConversationMessage[];
  warnings: ChatWarning[];
  routing: ToolRouting;
  documents: RetrievedChunk[];
  context: AssembledContext | null;
}

type EmitEvent = (event: ChatStreamEvent) => Promise<boolean>;

/**
 * Runs chat turns: validate model, resolve conversation, route tools,
 * retrieve documents, assemble the prompt, infer, persist, respond.
 *
 * Turns on the same conversation run one at a time.
 */
export class ConversationOrchestrator {
  private logger = createLogger('orchestrator');
  private locks = new KeyedMutex<number>();

  constructor(
    private readonly deps: OrchestratorDependencies,
    private readonly options: OrchestratorOptions
  ) {}

  async answer(input: unknown): Promise<ChatResult> {
    const request = this.parseRequest(input);
    const modelId = request.modelId ?? this.options.defaultModel;

    await this.validateModel(modelId);
    const conversation = this.resolveConversation(request);

    return this.locks.runExclusive(conversation.id, async () => {
      const turn = this.beginTurn(request, modelId, conversation);
      await this.gatherContext(turn);
      const context = this.requireContext(turn);

      let text: string;
      try {
        text = await this.deps.gateway.complete(context.payload, modelId);
      } catch (error) {
        throw this.failTurn(error, 'infer', turn);
      }

      return this.completeTurn(turn, text);
    });
  }

  /**
   * Same pipeline as `answer`, delivered as events. The assistant message is
   * persisted once, after the last chunk; a cancelled stream persists none.
   */
  stream(input: unknown, signal?: AbortSignal): AsyncIterableIterator<ChatStreamEvent> {
    const controller = new AbortController();
    const channel = new AsyncChannel<ChatStreamEvent>(this.options.streamBufferSize, () => controller.abort());

    const onAbort = () => channel.cancel();
    if (signal?.aborted) {
      channel.cancel();
      return channel;
    }
    signal?.addEventListener('abort', onAbort, { once: true });

    this.runStream(input, channel, controller.signal)
      .then(() => channel.close())
      .catch((error: unknown) => channel.fail(error))
      .finally(() => signal?.removeEventListener('abort', onAbort));

    return channel;
  }

  private async runStream(
    input: unknown,
    channel: AsyncChannel<ChatStreamEvent>,
    abortSignal: AbortSignal
  ): Promise<void> {
    const request = this.parseRequest(input);
    const modelId = request.modelId ?? this.options.defaultModel;

    await this.validateModel(modelId);
    const conversation = this.resolveConversation(request);
    const emit: EmitEvent = (event) => channel.push(event);

    await this.locks.runExclusive(conversation.id, async () => {
      const turn = this.beginTurn(request, modelId, conversation);
      const started = await emit({
        type: 'start',
        conversationId: turn.conversation.id,
        title: turn.conversation.title,
        modelId,
        userMessageId: turn.userMessage.id,
      });
      if (!started) return;

      await this.gatherContext(turn, emit);
      const context = this.requireContext(turn);
      if (channel.isCancelled) return;

      let text = '';
      try {
        for await (const fragment of this.deps.gateway.stream(context.payload, modelId, abortSignal)) {
          text += fragment;
          if (!(await emit({ type: 'chunk', text: fragment }))) {
            break;
          }
        }
      } catch (error) {
        throw this.failTurn(error, 'infer', turn);
      }

      if (channel.isCancelled || abortSignal.aborted) {
        this.logger.info('Stream cancelled; assistant message not saved', {
          conversationId: turn.conversation.id,
          chars: text.length,
        });
        return;
      }

      const result = this.completeTurn(turn, text);
      await emit({ type: 'done', result });
    });
  }

  private parseRequest(input: unknown): ChatRequest {
    const parsed = ChatRequestSchema.safeParse(input);
    if (!parsed.success) {
      const details = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'request'}: ${issue.message}`);
      throw new InvalidRequestError(`Invalid chat request: ${details.join('; ')}`);
    }
    return parsed.data;
  }

  private async validateModel(modelId: string): Promise<void> {
    try {
      await this.deps.gateway.ensureModel(modelId);
    } catch (error) {
      throw this.failTurn(error, 'validate-model');
    }
  }

  private resolveConversation(request: ChatRequest): Conversation {
    const { repository } = this.deps;

    if (request.conversationId === undefined) {
      const conversation = repository.createConversation({
        projectId: request.projectId,
        userId: request.userId,
        title: deriveTitle(request.message),
      });
      this.logger.info('Conversation created', { conversationId: conversation.id, projectId: request.projectId });
      return conversation;
    }

    const existing = repository.findConversation(request.conversationId);
    if (!existing || existing.projectId !== request.projectId || existing.userId !== request.userId) {
      throw new ConversationNotFoundError(request.conversationId).withContext({
        stage: 'resolve-conversation',
        conversationId: request.conversationId,
      });
    }
    return existing;
  }

  /**
   * Load history and persist the user message (inside the conversation lock)
   */
  private beginTurn(request: ChatRequest, modelId: string, conversation: Conversation): Turn {
    const { repository, estimator } = this.deps;

    const history =
      this.options.historyLimit > 0 ? repository.listRecentMessages(conversation.id, this.options.historyLimit) : [];

    let current = conversation;
    if (!current.title) {
      const title = deriveTitle(request.message);
      repository.updateTitle(current.id, title);
      current = { ...current, title };
    }

    const userMessage = repository.appendMessage({
      conversationId: current.id,
      role: 'user',
      content: request.message,
      tokenCount: estimator.estimate(request.message),
    });

    return {
      request,
      modelId,
      conversation: current,
      userMessage,
      history,
      warnings: [],
      routing: { status: 'not_applicable', attempted: [] },
      documents: [],
      context: null,
    };
  }

  /**
   * Tool routing, retrieval and prompt assembly. Tool and retrieval failures
   * become warnings.
   */
  private async gatherContext(turn: Turn, emit?: EmitEvent): Promise<void> {
    const { request } = turn;

    try {
      turn.routing = await this.deps.router.route(request.message, request.enabledTools);
    } catch (error) {
      this.logger.warn('Tool routing failed', { conversationId: turn.conversation.id, error });
    }
    if (turn.routing.status === 'applied' && emit) {
      await emit({
        type: 'tool',
        tool: turn.routing.tool,
        status: 'success',
        preview: turn.routing.fragment.text.slice(0, 200),
      });
    }

    if (request.useDocumentContext) {
      try {
        turn.documents = await this.deps.retriever.retrieve(
          request.projectId,
          request.message,
          this.options.retrievalTopK,
          request.documentIds
        );
      } catch (error) {
        if (!(error instanceof RetrievalUnavailableError)) {
          throw this.failTurn(error, 'retrieve-context', turn);
        }
        this.logger.warn('Answering without document context', { conversationId: turn.conversation.id, error });
        turn.warnings.push({ kind: 'RetrievalUnavailable', message: error.message });
      }
    }

    try {
      turn.context = this.deps.assembler.assemble({
        modelId: turn.modelId,
        basePrompt: turn.conversation.systemPrompt ?? request.systemPrompt,
        projectName: request.projectName,
        enabledTools: request.enabledTools,
        documents: turn.documents,
        toolFragment: turn.routing.status === 'applied' ? turn.routing.fragment : null,
        history: turn.history.map((message) => ({ role: message.role, content: message.content })),
        userMessage: request.message,
      });
    } catch (error) {
      throw this.failTurn(error, 'assemble-prompt', turn);
    }
    turn.warnings.push(...turn.context.warnings);

    if (emit) {
      for (const warning of turn.warnings) {
        await emit({ type: 'warning', warning });
      }
    }
  }

  private requireContext(turn: Turn): AssembledContext {
    if (!turn.context) {
      throw this.failTurn(new Error('Prompt was not assembled'), 'assemble-prompt', turn);
    }
    return turn.context;
  }

  /**
   * Persist the answer and account its tokens
   */
  private completeTurn(turn: Turn, text: string): ChatResult {
    const { repository, estimator } = this.deps;
    const context = this.requireContext(turn);
    const conversationId = turn.conversation.id;

    let assistantMessage: ConversationMessage;
    let conversation: Conversation;
    const completionTokens = estimator.estimate(text);
    const turnTokens = (turn.userMessage.tokenCount ?? 0) + completionTokens;
    try {
      assistantMessage = repository.appendMessage({
        conversationId,
        role: 'assistant',
        content: text,
        tokenCount: completionTokens,
      });
      conversation = repository.incrementTokenTotal(conversationId, turnTokens);
    } catch (error) {
      throw this.failTurn(error, 'persist', turn);
    }

    const toolUsed = turn.routing.status === 'applied' && context.toolIncluded ? turn.routing.tool : null;
    const warnings = [...turn.warnings];
    const risk = detectHallucinationRisk(turn.request.message, text, toolUsed ? [toolUsed] : []);
    if (risk) {
      warnings.push({ kind: 'HallucinationRisk', message: risk });
    }

    const usage = estimator.contextUsage(context.tokens, turn.modelId);

    this.logger.info('Turn completed', {
      conversationId,
      model: turn.modelId,
      turnTokens,
      conversationTotal: conversation.totalTokens,
      toolUsed,
      documents: context.documents.length,
      warnings: warnings.map((warning) => warning.kind),
    });

    this.deps.onConversationUpdated?.({
      conversationId,
      projectId: conversation.projectId,
      userId: conversation.userId,
      totalTokens: conversation.totalTokens,
    });

    return {
      conversationId,
      title: conversation.title,
      modelId: turn.modelId,
      userMessageId: turn.userMessage.id,
      assistantMessageId: assistantMessage.id,
      assistantText: text,
      toolUsed,
      sources: context.documents.map((chunk) => ({
        source: chunk.source,
        documentId: chunk.documentId,
        score: chunk.score,
      })),
      tokenUsage: {
        promptTokens: context.estimatedTokens,
        completionTokens,
        turnTokens,
        conversationTotal: conversation.totalTokens,
        context: usage,
      },
      warnings,
    };
  }

  /**
   * Attach stage and conversation to a ChatError and log the failure
   */
  private failTurn(error: unknown, stage: TurnStage, turn?: Turn): unknown {
    const conversationId = turn?.conversation.id;
    if (isChatError(error)) {
      error.withContext({ stage, conversationId });
    }
    this.logger.error('Turn failed', { stage, conversationId, error });
    return error;
  }
}

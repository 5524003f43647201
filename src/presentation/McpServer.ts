import { McpServer as BaseMcpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { Config } from '../config.js';
import { DatabaseConnection } from '../infrastructure/database/DatabaseConnection.js';
import { ConversationRepository } from '../infrastructure/database/repositories/ConversationRepository.js';
import { SqliteVectorStore } from '../infrastructure/database/repositories/SqliteVectorStore.js';
import { OllamaApiClient } from '../infrastructure/http/OllamaApiClient.js';
import { SearxngClient } from '../infrastructure/http/SearxngClient.js';
import { WebServer } from '../infrastructure/web/WebServer.js';
import { initializeModelProfiles } from '../core/models/ModelContextProfiles.js';
import { TokenEstimator } from '../application/services/TokenEstimator.js';
import { ToolRouter } from '../application/services/ToolRouter.js';
import { DocumentRetriever } from '../application/services/DocumentRetriever.js';
import { ContextAssembler } from '../application/services/ContextAssembler.js';
import { InferenceGateway } from '../application/services/InferenceGateway.js';
import { ConversationOrchestrator, ConversationUpdate } from '../application/services/ConversationOrchestrator.js';
import { ConversationService } from '../application/services/ConversationService.js';
import { WebSearchTool } from '../application/tools/WebSearchTool.js';
import { CalculatorTool } from '../application/tools/Calculator.js';
import { registerChatTool } from './tools/ChatTool.js';
import { registerManageConversationTool } from './tools/ManageConversationTool.js';
import { registerHealthCheckTool } from './tools/HealthCheckTool.js';
import { createLogger } from '../utils/logger.js';

/**
 * Composition root: builds the services from config and exposes them over
 * the MCP stdio transport and the HTTP API
 */
export class McpServer {
  private server: BaseMcpServer | null = null;
  private webServer: WebServer | null = null;
  private dbConnection: DatabaseConnection;
  private gateway: InferenceGateway;
  private orchestrator: ConversationOrchestrator;
  private conversationService: ConversationService;
  private logger = createLogger('server');
  private stopped = false;

  constructor(private config: Config) {
    this.dbConnection = new DatabaseConnection(config.database.path);
    const db = this.dbConnection.getDatabase();

    // Repositories
    const conversationRepo = new ConversationRepository(db);
    const vectorStore = new SqliteVectorStore(db);

    // Backends
    const ollamaClient = new OllamaApiClient(config.ollama.apiUrl);
    const searxng = new SearxngClient(config.search.searxngUrl, config.search.timeoutMs);

    // Services
    const estimator = new TokenEstimator(
      initializeModelProfiles(config.chat.contextLimits, config.chat.defaultContextLimit)
    );
    const router = new ToolRouter([new WebSearchTool(searxng, config.search.maxResults), new CalculatorTool()]);
    const retriever = new DocumentRetriever(vectorStore, ollamaClient, {
      embeddingModel: config.ollama.embeddingModel,
      timeoutMs: config.chat.retrievalTimeoutMs,
    });
    const assembler = new ContextAssembler(estimator, {
      responseReserveTokens: config.chat.responseReserveTokens,
      templates: config.ollama.templates,
    });
    this.gateway = new InferenceGateway(ollamaClient, {
      requestTimeoutMs: config.ollama.requestTimeoutMs,
      streamTimeoutMs: config.ollama.streamTimeoutMs,
      modelListTtlMs: config.ollama.modelListTtlMs,
      retryAttempts: config.ollama.retryAttempts,
      streamBufferSize: config.chat.streamBufferSize,
    });

    this.orchestrator = new ConversationOrchestrator(
      {
        repository: conversationRepo,
        estimator,
        router,
        retriever,
        assembler,
        gateway: this.gateway,
        onConversationUpdated: (update) => this.handleConversationUpdated(update),
      },
      {
        defaultModel: config.ollama.defaultModel,
        historyLimit: config.chat.historyLimit,
        retrievalTopK: config.chat.retrievalTopK,
        streamBufferSize: config.chat.streamBufferSize,
      }
    );
    this.conversationService = new ConversationService(conversationRepo, estimator, config.ollama.defaultModel);

    if (config.web.enabled) {
      this.webServer = new WebServer(
        {
          orchestrator: this.orchestrator,
          conversations: this.conversationService,
          gateway: this.gateway,
          database: this.dbConnection,
        },
        config.web.port
      );
    }
  }

  private handleConversationUpdated(update: ConversationUpdate): void {
    this.webServer?.notifyConversationUpdate(update.conversationId, update, update.totalTokens);
  }

  private createMcpServer(): BaseMcpServer {
    const server = new BaseMcpServer({
      name: this.config.server.name,
      version: this.config.server.version,
    });

    registerChatTool(server, this.orchestrator);
    registerManageConversationTool(server, this.conversationService, {
      updated: (conversation) =>
        this.webServer?.notifyConversationUpdate(conversation.id, conversation, conversation.totalTokens),
      deleted: (conversationId, owner) => this.webServer?.notifyConversationDeleted(conversationId, owner),
    });
    registerHealthCheckTool(server, this.gateway, this.dbConnection);

    return server;
  }

  async start(): Promise<void> {
    if (this.webServer) {
      await this.webServer.start();
    }

    if (this.config.mcp.transport === 'stdio') {
      this.server = this.createMcpServer();
      const transport = new StdioServerTransport();

      process.stdin.on('error', (error) => {
        this.logger.error('stdin error', { error });
      });
      process.stdout.on('error', (error) => {
        this.logger.error('stdout error', { error });
      });

      await this.server.connect(transport);
      this.logger.info('MCP server running on stdio', { name: this.config.server.name });
    }

    const stats = this.dbConnection.getStatistics();
    this.logger.info('Database ready', { path: this.config.database.path, ...stats });
  }

  async shutdown(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;

    this.logger.info('Shutting down');

    if (this.webServer) {
      await this.webServer.stop();
      this.webServer = null;
    }
    if (this.server) {
      await this.server.close();
      this.server = null;
    }
    this.dbConnection.close();
  }
}

import express, { Express, NextFunction, Request, Response } from 'express';
import { Server as HttpServer } from 'http';
import { randomUUID } from 'crypto';
import { WebSocketServer, WebSocket } from 'ws';
import cors from 'cors';
import { z } from 'zod';
import type { ConversationOrchestrator } from '../../application/services/ConversationOrchestrator.js';
import type { ConversationOwner, ConversationService } from '../../application/services/ConversationService.js';
import type { InferenceGateway } from '../../application/services/InferenceGateway.js';
import type { DatabaseConnection } from '../database/DatabaseConnection.js';
import { InvalidRequestError } from '../../core/errors.js';
import { httpStatusFor, toErrorResponse } from '../../core/errorResponse.js';
import { createLogger } from '../../utils/logger.js';

const OwnerQuerySchema = z.object({
  projectId: z.coerce.number().int().positive(),
  userId: z.coerce.number().int().positive(),
});

const IdParamSchema = z.coerce.number().int().positive();

const StatsQuerySchema = OwnerQuerySchema.extend({
  modelId: z.string().min(1).optional(),
});

const ConversationPatchSchema = z
  .object({
    title: z.string().optional(),
    systemPrompt: z.string().nullable().optional(),
  })
  .refine((patch) => patch.title !== undefined || patch.systemPrompt !== undefined, {
    message: 'Provide a title or a systemPrompt',
  });

export type BroadcastMessage =
  | { type: 'connected'; timestamp: string }
  | {
      type: 'conversation_updated';
      conversationId: number;
      projectId: number;
      userId: number;
      totalTokens: number;
      timestamp: string;
    }
  | { type: 'conversation_deleted'; conversationId: number; projectId: number; userId: number; timestamp: string };

export interface WebServerDependencies {
  orchestrator: ConversationOrchestrator;
  conversations: ConversationService;
  gateway: InferenceGateway;
  database: DatabaseConnection;
}

function parseOrThrow<T>(schema: z.ZodType<T>, value: unknown, what: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.') || what}: ${issue.message}`);
    throw new InvalidRequestError(`Invalid ${what}: ${details.join('; ')}`);
  }
  return parsed.data;
}

export class WebServer {
  private app: Express;
  private httpServer: HttpServer | null = null;
  private wss: WebSocketServer | null = null;
  private clients: Set<WebSocket> = new Set();
  private logger = createLogger('web');

  constructor(
    private deps: WebServerDependencies,
    private port: number = 3001
  ) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  /**
   * Bound port; differs from the configured one when started on port 0
   */
  getPort(): number {
    const address = this.httpServer?.address();
    return address && typeof address === 'object' ? address.port : this.port;
  }

  private setupMiddleware(): void {
    this.app.use(cors());
    this.app.use(express.json({ limit: '1mb' }));
  }

  private setupRoutes(): void {
    const { orchestrator, conversations, gateway, database } = this.deps;

    // API: Health of the backend and its dependencies
    this.app.get('/api/health', async (req: Request, res: Response) => {
      const ollama = await gateway
        .listModels()
        .then((models) => ({ healthy: true, models }))
        .catch((error: unknown) => {
          this.logger.warn('Health check could not reach Ollama', { error });
          return { healthy: false, models: [] };
        });
      res.json({
        success: true,
        data: {
          ollama,
          circuitBreaker: gateway.getCircuitStats().state,
          database: database.getStatistics(),
        },
      });
    });

    // API: Answer a message
    this.app.post('/api/chat', async (req: Request, res: Response, next: NextFunction) => {
      try {
        const result = await orchestrator.answer(req.body);
        res.json({ success: true, data: result });
      } catch (error) {
        next(error);
      }
    });

    // API: Answer a message as server-sent events
    this.app.post('/api/chat/stream', async (req: Request, res: Response) => {
      const requestId = randomUUID();
      const controller = new AbortController();
      res.on('close', () => {
        if (!res.writableFinished) {
          controller.abort();
        }
      });

      res.writeHead(200, {
        'Content-Type': 'text/event-stream',
        'Cache-Control': 'no-cache',
        Connection: 'keep-alive',
      });

      try {
        for await (const event of orchestrator.stream(req.body, controller.signal)) {
          res.write(`event: ${event.type}\ndata: ${JSON.stringify(event)}\n\n`);
        }
      } catch (error) {
        this.logger.warn('Stream ended with error', { requestId, error });
        res.write(`event: error\ndata: ${JSON.stringify(toErrorResponse(error, requestId))}\n\n`);
      }
      res.end();
    });

    // API: Conversations of a project for a user
    this.app.get('/api/conversations', (req: Request, res: Response, next: NextFunction) => {
      try {
        const owner = parseOrThrow(OwnerQuerySchema, req.query, 'query');
        res.json({ success: true, data: conversations.listConversations(owner) });
      } catch (error) {
        next(error);
      }
    });

    // API: Conversation with its messages
    this.app.get('/api/conversations/:id', (req: Request, res: Response, next: NextFunction) => {
      try {
        const id = parseOrThrow(IdParamSchema, req.params.id, 'conversation id');
        const owner = parseOrThrow(OwnerQuerySchema, req.query, 'query');
        res.json({ success: true, data: conversations.getConversation(id, owner) });
      } catch (error) {
        next(error);
      }
    });

    // API: Rename a conversation or change its system prompt
    this.app.patch('/api/conversations/:id', (req: Request, res: Response, next: NextFunction) => {
      try {
        const id = parseOrThrow(IdParamSchema, req.params.id, 'conversation id');
        const owner = parseOrThrow(OwnerQuerySchema, req.query, 'query');
        const patch = parseOrThrow(ConversationPatchSchema, req.body, 'conversation update');
        const conversation = conversations.updateConversation(id, owner, patch);
        this.notifyConversationUpdate(id, owner, conversation.totalTokens);
        res.json({ success: true, data: conversation });
      } catch (error) {
        next(error);
      }
    });

    // API: Token usage of a conversation
    this.app.get('/api/conversations/:id/stats', (req: Request, res: Response, next: NextFunction) => {
      try {
        const id = parseOrThrow(IdParamSchema, req.params.id, 'conversation id');
        const { modelId, ...owner } = parseOrThrow(StatsQuerySchema, req.query, 'query');
        res.json({ success: true, data: conversations.getStatistics(id, owner, modelId) });
      } catch (error) {
        next(error);
      }
    });

    // API: Delete a conversation
    this.app.delete('/api/conversations/:id', (req: Request, res: Response, next: NextFunction) => {
      try {
        const id = parseOrThrow(IdParamSchema, req.params.id, 'conversation id');
        const owner = parseOrThrow(OwnerQuerySchema, req.query, 'query');
        conversations.deleteConversation(id, owner);
        this.notifyConversationDeleted(id, owner);
        res.json({ success: true, message: 'Conversation deleted' });
      } catch (error) {
        next(error);
      }
    });

    this.app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
      // express.json() reports malformed bodies as SyntaxError
      const body = toErrorResponse(
        error instanceof SyntaxError ? new InvalidRequestError(`Malformed JSON body: ${error.message}`) : error
      );
      const status = httpStatusFor(body);
      if (status >= 500) {
        this.logger.error('Request failed', { path: req.path, requestId: body.error.requestId, error });
      }
      res.status(status).json(body);
    });
  }

  private setupWebSocket(): void {
    if (!this.httpServer) return;

    this.wss = new WebSocketServer({ server: this.httpServer });

    this.wss.on('connection', (ws: WebSocket) => {
      this.logger.debug('WebSocket client connected');
      this.clients.add(ws);

      ws.on('close', () => {
        this.clients.delete(ws);
      });

      ws.on('error', (error) => {
        this.logger.warn('WebSocket error', { error });
        this.clients.delete(ws);
      });

      // Send initial connection confirmation
      ws.send(JSON.stringify({ type: 'connected', timestamp: new Date().toISOString() } satisfies BroadcastMessage));
    });
  }

  public broadcast(message: BroadcastMessage): void {
    const payload = JSON.stringify(message);
    this.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        client.send(payload);
      }
    });
  }

  public notifyConversationUpdate(conversationId: number, owner: ConversationOwner, totalTokens: number): void {
    this.broadcast({
      type: 'conversation_updated',
      conversationId,
      projectId: owner.projectId,
      userId: owner.userId,
      totalTokens,
      timestamp: new Date().toISOString(),
    });
  }

  public notifyConversationDeleted(conversationId: number, owner: ConversationOwner): void {
    this.broadcast({
      type: 'conversation_deleted',
      conversationId,
      projectId: owner.projectId,
      userId: owner.userId,
      timestamp: new Date().toISOString(),
    });
  }

  public start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.port, () => {
        this.logger.info('HTTP API listening', { port: this.getPort() });
        this.setupWebSocket();
        resolve();
      });
      server.on('error', (error) => {
        this.logger.error('Server error', { error });
        reject(error);
      });
      this.httpServer = server;
    });
  }

  public stop(): Promise<void> {
    return new Promise((resolve) => {
      // Close all WebSocket connections
      this.clients.forEach((client) => {
        client.close();
      });
      this.clients.clear();

      // Close WebSocket server
      this.wss?.close();
      this.wss = null;

      // Close HTTP server
      if (this.httpServer) {
        this.httpServer.close(() => {
          this.logger.info('HTTP server closed');
          resolve();
        });
        this.httpServer = null;
      } else {
        resolve();
      }
    });
  }
}

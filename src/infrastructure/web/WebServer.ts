import express, { Express, NextFunction, Request, Response } from 'express';
import { Server as HttpServer } from 'http';
import cors from 'cors';
import { z } from 'zod';
import type { OrchestratorService } from '../../application/services/OrchestratorService.js';
import type { AnomalyExplanation, ReportService } from '../../application/services/ReportService.js';
import type { IConversationStore } from '../../core/interfaces/IConversationStore.js';
import type { Message } from '../../core/entities/Conversation.js';
import {
  ErrorKind,
  OrchestratorError,
  statusForError,
  toOrchestratorError,
  UnknownSessionError,
} from '../../core/errors.js';
import { DebugLog, noopDebugLog } from '../../utils/debug.js';

export interface WebServerOptions {
  port: number;
  corsOrigins: string[];
  model: string;
  hasApiKey: boolean;
  bodyLimit?: string;
  debugLog?: DebugLog;
}

const QueryBodySchema = z.object({
  session_id: z.string().optional(),
  query: z.string({
    required_error: 'query is required',
    invalid_type_error: 'query must be a string',
  }),
});

const ExecutiveSummaryBodySchema = z.object({
  dataset_summary: z.string({ required_error: 'dataset_summary is required' }),
  top_anomalies: z.array(z.unknown(), {
    required_error: 'top_anomalies is required',
    invalid_type_error: 'top_anomalies must be an array',
  }),
});

const ExplainAnomalyBodySchema = z.object({
  dataset_summary: z.string({ required_error: 'dataset_summary is required' }),
  row: z.record(z.unknown(), {
    required_error: 'row is required',
    invalid_type_error: 'row must be an object',
  }),
});

function serializeExplanation(explanation: AnomalyExplanation): unknown {
  return explanation.structured ? explanation.data : { raw_model_output: explanation.rawModelOutput };
}

/**
 * Abort the returned signal when the caller goes away before a response is written
 */
function abortOnClose(res: Response): AbortController {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableEnded) {
      controller.abort();
    }
  });
  return controller;
}

function serializeMessage(message: Message) {
  return {
    role: message.role,
    content: message.content,
    timestamp: message.timestamp.toISOString(),
  };
}

function sendError(res: Response, error: OrchestratorError): void {
  res.status(statusForError(error)).json({
    error_kind: error.kind,
    message: error.message,
    ...(error.diagnosticCode ? { diagnostic_code: error.diagnosticCode } : {}),
  });
}

function sendClientError(res: Response, kind: ErrorKind, message: string): void {
  sendError(res, { kind, message, retryable: false });
}

export class WebServer {
  private app: Express;
  private httpServer: HttpServer | null = null;
  private readonly debugLog: DebugLog;

  constructor(
    private orchestrator: OrchestratorService,
    private reports: ReportService,
    private store: IConversationStore,
    private options: WebServerOptions
  ) {
    this.debugLog = options.debugLog ?? noopDebugLog;
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandler();
  }

  private setupMiddleware(): void {
    const origins = this.options.corsOrigins;
    this.app.use(cors({ origin: origins.includes('*') ? '*' : origins }));
    this.app.use(express.json({ limit: this.options.bodyLimit ?? '1mb' }));
  }

  private setupRoutes(): void {
    this.app.get('/health', (req: Request, res: Response) => {
      res.json({
        status: 'ok',
        model: this.options.model,
        has_api_key: this.options.hasApiKey,
        sessions: this.store.listSessions().length,
      });
    });

    this.app.get('/ping', (req: Request, res: Response) => {
      res.json({ pong: true });
    });

    // API: Ask a question
    this.app.post('/api/query', async (req: Request, res: Response) => {
      const parsed = QueryBodySchema.safeParse(req.body);
      if (!parsed.success) {
        sendClientError(res, 'invalid_query', parsed.error.errors[0].message);
        return;
      }

      // Stop retrying once the caller has gone away
      const controller = abortOnClose(res);

      const result = await this.orchestrator.handle(
        { sessionId: parsed.data.session_id, query: parsed.data.query },
        controller.signal
      );

      if (controller.signal.aborted) {
        this.debugLog('[WebServer] Client disconnected before the answer was ready');
        return;
      }

      if (result.ok) {
        res.json({ session_id: result.value.sessionId, answer: result.value.answer });
      } else {
        sendError(res, result.error);
      }
    });

    // API: One-paragraph summary of the top anomalies
    this.app.post('/executive_summary', async (req: Request, res: Response) => {
      const parsed = ExecutiveSummaryBodySchema.safeParse(req.body);
      if (!parsed.success) {
        sendClientError(res, 'invalid_query', parsed.error.errors[0].message);
        return;
      }

      const controller = abortOnClose(res);
      const result = await this.reports.executiveSummary(
        { datasetSummary: parsed.data.dataset_summary, topAnomalies: parsed.data.top_anomalies },
        controller.signal
      );

      if (controller.signal.aborted) {
        return;
      }
      if (result.ok) {
        res.json({ executive_summary: result.value });
      } else {
        sendError(res, result.error);
      }
    });

    // API: Explain a single transaction row
    this.app.post('/explain_anomaly', async (req: Request, res: Response) => {
      const parsed = ExplainAnomalyBodySchema.safeParse(req.body);
      if (!parsed.success) {
        sendClientError(res, 'invalid_query', parsed.error.errors[0].message);
        return;
      }

      const controller = abortOnClose(res);
      const result = await this.reports.explainAnomaly(
        { datasetSummary: parsed.data.dataset_summary, row: parsed.data.row },
        controller.signal
      );

      if (controller.signal.aborted) {
        return;
      }
      if (result.ok) {
        res.json({ explanation: serializeExplanation(result.value) });
      } else {
        sendError(res, result.error);
      }
    });

    // API: Get all sessions
    this.app.get('/api/sessions', (req: Request, res: Response) => {
      const sessions = this.store.listSessions().map((session) => ({
        session_id: session.sessionId,
        message_count: session.messageCount,
        created_at: session.createdAt.toISOString(),
        last_updated: session.lastUpdated.toISOString(),
      }));
      res.json({ success: true, data: sessions });
    });

    // API: Get conversation history
    this.app.get('/api/sessions/:sessionId', (req: Request, res: Response) => {
      const { sessionId } = req.params;
      try {
        const messages = this.store.getMessages(sessionId);
        res.json({
          success: true,
          data: { session_id: sessionId, messages: messages.map(serializeMessage) },
        });
      } catch (error) {
        sendError(res, toOrchestratorError(error));
      }
    });

    // API: Clear conversation history
    this.app.delete('/api/sessions/:sessionId', async (req: Request, res: Response) => {
      const { sessionId } = req.params;
      const deleted = await this.store.deleteSession(sessionId);
      if (!deleted) {
        sendError(res, toOrchestratorError(new UnknownSessionError(sessionId)));
        return;
      }
      this.debugLog(`[WebServer] Session ${sessionId} cleared`);
      res.json({ success: true, message: 'Conversation cleared' });
    });
  }

  private setupErrorHandler(): void {
    // express.json() reports malformed and oversized bodies through here
    this.app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
      if (res.headersSent) {
        next(error);
        return;
      }

      const type = typeof error === 'object' && error !== null && 'type' in error ? error.type : undefined;
      if (type === 'entity.too.large') {
        sendClientError(res, 'input_too_large', 'Request body is too large');
        return;
      }
      if (type === 'entity.parse.failed') {
        sendClientError(res, 'invalid_query', 'Request body must be valid JSON');
        return;
      }

      console.error('[WebServer] Unhandled error:', error);
      sendError(res, toOrchestratorError(error));
    });
  }

  /**
   * Start listening; resolves with the bound port
   */
  public start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.options.port, () => {
        const address = server.address();
        const port = typeof address === 'object' && address !== null ? address.port : this.options.port;
        console.error(`[WebServer] Backend API available at http://localhost:${port}`);
        resolve(port);
      });

      server.on('error', (error) => {
        console.error('[WebServer] Server error:', error);
        reject(error);
      });

      this.httpServer = server;
    });
  }

  public stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.httpServer) {
        resolve();
        return;
      }

      this.httpServer.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        console.error('[WebServer] HTTP server closed');
        resolve();
      });
      this.httpServer = null;
    });
  }

  isRunning(): boolean {
    return this.httpServer !== null;
  }
}

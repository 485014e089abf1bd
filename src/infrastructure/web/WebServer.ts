import express, { Express, NextFunction, Request, Response } from 'express';
import { Server as HttpServer } from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import cors from 'cors';
import { z } from 'zod';
import type { RunService, RunEvent } from '../../application/services/RunService.js';
import { archiveFileName, sceneFileName } from '../../application/services/ArchivePackager.js';
import { MAX_IMAGE_COUNT, MIN_IMAGE_COUNT } from '../../application/services/BatchOrchestrator.js';
import { MAX_REFERENCE_IMAGES, ReferenceImage } from '../../core/entities/ReferenceImage.js';
import { Run } from '../../core/entities/Run.js';
import { GenerationJob } from '../../core/entities/GenerationJob.js';
import {
  ConfigurationError,
  EmptyArchiveError,
  errorMessageOf,
} from '../../core/errors/GenerationErrors.js';

const ReferenceBodySchema = z.object({
  data: z
    .string()
    .min(1, 'Reference image data must not be empty')
    .base64('Reference image data must be base64 encoded'),
  mimeType: z.enum(['image/png', 'image/jpeg']),
  description: z.string().trim().min(1, 'Reference description must not be empty'),
  tags: z.array(z.string().trim().min(1)).default([]),
});

const CreateRunBodySchema = z.object({
  script: z.union([z.string(), z.array(z.string())]),
  imageCount: z.number().int().min(MIN_IMAGE_COUNT).max(MAX_IMAGE_COUNT),
  references: z.array(ReferenceBodySchema).max(MAX_REFERENCE_IMAGES).default([]),
});

export type ServerMessage =
  | { type: 'connected'; message: string }
  | { type: 'run_progress' | 'run_completed'; event: RunEvent; run: SerializedRun };

/**
 * Extra fields for the health endpoint (configuration summary, circuit breaker)
 */
export type HealthProbe = () => Record<string, unknown>;

const FINAL_EVENTS: ReadonlySet<RunEvent> = new Set(['completed', 'failed', 'cancelled']);

export interface SerializedJob {
  index: number;
  line_number: number;
  line: string;
  prompt: string;
  status: GenerationJob['status'];
  remote_job_id?: string;
  image_available: boolean;
  file_name?: string;
  error?: string;
  error_code?: string;
  started_at?: string;
  completed_at?: string;
}

export interface SerializedRun {
  id: string;
  status: Run['status'];
  progress: number;
  completed_count: number;
  total_count: number;
  image_count: number;
  reference_count: number;
  created_at: string;
  started_at?: string;
  completed_at?: string;
  error?: string;
  summary?: { requested: number; succeeded: number; failed: number; cancelled: number };
  jobs: SerializedJob[];
}

function serializeJob(job: GenerationJob): SerializedJob {
  const serialized: SerializedJob = {
    index: job.index,
    line_number: job.lineNumber,
    line: job.line,
    prompt: job.prompt,
    status: job.status,
    remote_job_id: job.remoteJobId,
    image_available: job.status === 'succeeded',
    started_at: job.startedAt?.toISOString(),
    completed_at: job.completedAt?.toISOString(),
  };
  if (job.status === 'succeeded') {
    serialized.file_name = sceneFileName(job);
  } else if (job.status === 'failed' || job.status === 'timed_out' || job.status === 'cancelled') {
    serialized.error = job.error;
    serialized.error_code = job.errorCode;
  }
  return serialized;
}

export function serializeRun(run: Run): SerializedRun {
  return {
    id: run.id,
    status: run.status,
    progress: run.progress,
    completed_count: run.completedCount,
    total_count: run.totalCount,
    image_count: run.imageCount,
    reference_count: run.referenceCount,
    created_at: run.createdAt.toISOString(),
    started_at: run.startedAt?.toISOString(),
    completed_at: run.completedAt?.toISOString(),
    error: run.error,
    summary: run.result && {
      requested: run.result.requested,
      succeeded: run.result.succeeded,
      failed: run.result.failed,
      cancelled: run.result.cancelled,
    },
    jobs: run.jobs.map(serializeJob),
  };
}

/**
 * HTTP + WebSocket surface over the run registry
 */
export class WebServer {
  private app: Express;
  private httpServer: HttpServer | null = null;
  private wss: WebSocketServer | null = null;
  private clients: Set<WebSocket> = new Set();

  constructor(
    private runService: RunService,
    private port: number = 3001,
    private healthProbe: HealthProbe = () => ({})
  ) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
    this.runService.onRunUpdated((run, event) => {
      this.broadcast({
        type: FINAL_EVENTS.has(event) ? 'run_completed' : 'run_progress',
        event,
        run: serializeRun(run),
      });
    });
  }

  private setupMiddleware(): void {
    this.app.use(cors());
    // Reference images travel base64-encoded in the JSON body
    this.app.use(express.json({ limit: '25mb' }));
  }

  private setupRoutes(): void {
    this.app.get('/api/health', (req: Request, res: Response) => {
      res.json({
        success: true,
        data: {
          status: 'ok',
          ...this.healthProbe(),
          runs: this.runService.getStatistics(),
        },
      });
    });

    // API: Start a run
    this.app.post('/api/runs', (req: Request, res: Response) => {
      const parsed = CreateRunBodySchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({
          success: false,
          error: parsed.error.errors
            .map((err) => `${err.path.join('.') || 'body'}: ${err.message}`)
            .join('; '),
        });
        return;
      }

      const references: ReferenceImage[] = parsed.data.references.map((ref) => ({
        data: Buffer.from(ref.data, 'base64'),
        mimeType: ref.mimeType,
        description: ref.description,
        tags: ref.tags,
      }));

      try {
        const runId = this.runService.startRun({
          script: parsed.data.script,
          imageCount: parsed.data.imageCount,
          references,
        });
        res.status(202).json({ success: true, data: { runId } });
      } catch (error) {
        this.sendError(res, error);
      }
    });

    // API: List runs
    this.app.get('/api/runs', (req: Request, res: Response) => {
      const runs = this.runService.getAllRuns().map(serializeRun);
      res.json({ success: true, data: runs });
    });

    // API: Get one run
    this.app.get('/api/runs/:id', (req: Request, res: Response) => {
      const run = this.runService.getRun(req.params.id);
      if (!run) {
        res.status(404).json({ success: false, error: 'Run not found' });
        return;
      }
      res.json({ success: true, data: serializeRun(run) });
    });

    // API: Cancel a run
    this.app.post('/api/runs/:id/cancel', (req: Request, res: Response) => {
      if (!this.runService.getRun(req.params.id)) {
        res.status(404).json({ success: false, error: 'Run not found' });
        return;
      }
      const cancelled = this.runService.cancelRun(req.params.id);
      if (!cancelled) {
        res.status(409).json({ success: false, error: 'Run has already finished' });
        return;
      }
      res.json({ success: true, message: 'Run cancellation requested' });
    });

    // API: Download one scene image
    this.app.get('/api/runs/:id/images/:lineNumber', (req: Request, res: Response) => {
      const lineNumber = Number(req.params.lineNumber);
      if (!Number.isInteger(lineNumber) || lineNumber < 1) {
        res.status(400).json({ success: false, error: 'lineNumber must be a positive integer' });
        return;
      }

      const image = this.runService.getSceneImage(req.params.id, lineNumber);
      if (!image) {
        res.status(404).json({ success: false, error: 'Image not found' });
        return;
      }

      res
        .status(200)
        .type('image/png')
        .attachment(sceneFileName({ lineNumber }))
        .send(image);
    });

    // API: Download the archive of succeeded scenes
    this.app.get('/api/runs/:id/archive', (req: Request, res: Response, next: NextFunction) => {
      this.sendArchive(req.params.id, res).catch(next);
    });

    this.app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
      // Malformed JSON from express.json()
      if (err instanceof SyntaxError) {
        res.status(400).json({ success: false, error: 'Request body is not valid JSON' });
        return;
      }
      console.error('[WebServer] Unhandled request error:', err);
      this.sendError(res, err);
    });
  }

  private async sendArchive(runId: string, res: Response): Promise<void> {
    try {
      const archive = await this.runService.getArchive(runId);
      if (!archive) {
        res.status(404).json({ success: false, error: 'Run not found' });
        return;
      }
      res
        .status(200)
        .type('application/zip')
        .attachment(archiveFileName(`run-${runId}`))
        .send(archive);
    } catch (error) {
      this.sendError(res, error);
    }
  }

  private sendError(res: Response, error: unknown): void {
    if (error instanceof ConfigurationError) {
      res.status(400).json({ success: false, error: error.message });
    } else if (error instanceof EmptyArchiveError) {
      res.status(409).json({ success: false, error: error.message });
    } else {
      res.status(500).json({ success: false, error: errorMessageOf(error) });
    }
  }

  private setupWebSocket(server: HttpServer): void {
    this.wss = new WebSocketServer({ server });

    this.wss.on('connection', (ws: WebSocket) => {
      this.clients.add(ws);
      ws.send(JSON.stringify({ type: 'connected', message: 'Connected to run updates' }));

      ws.on('close', () => {
        this.clients.delete(ws);
      });

      ws.on('error', (error) => {
        console.error('[WebServer] WebSocket error:', error);
        this.clients.delete(ws);
      });
    });
  }

  broadcast(message: ServerMessage): void {
    const payload = JSON.stringify(message);
    this.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        client.send(payload);
      }
    });
  }

  /**
   * Port the server is bound to; differs from the configured one when started on port 0
   */
  getPort(): number {
    const address = this.httpServer?.address();
    if (address && typeof address === 'object') {
      return address.port;
    }
    return this.port;
  }

  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.port, () => {
        this.httpServer = server;
        this.setupWebSocket(server);
        console.error(`[WebServer] API available at http://localhost:${this.getPort()}`);
        resolve();
      });

      server.on('error', (error) => {
        console.error('[WebServer] Server error:', error);
        reject(error);
      });
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve) => {
      this.clients.forEach((client) => client.close());
      this.clients.clear();

      if (this.wss) {
        this.wss.close();
        this.wss = null;
      }

      const server = this.httpServer;
      this.httpServer = null;
      if (!server) {
        resolve();
        return;
      }
      server.close(() => {
        console.error('[WebServer] HTTP server closed');
        resolve();
      });
      // Keep-alive sockets would otherwise hold close() open
      server.closeAllConnections();
    });
  }
}

import { Config } from '../config.js';
import { LeonardoApiClient, FetchFn } from '../infrastructure/http/LeonardoApiClient.js';
import { WebServer } from '../infrastructure/web/WebServer.js';
import { BatchOrchestrator } from '../application/services/BatchOrchestrator.js';
import { ArchivePackager } from '../application/services/ArchivePackager.js';
import { RunService } from '../application/services/RunService.js';
import { CinematicPromptBuilder, PromptStyleFactory } from '../core/prompts/index.js';
import { CircuitBreaker } from '../utils/retry.js';
import { CliRunner } from './CliRunner.js';

const CLEANUP_INTERVAL_MS = 60 * 60 * 1000;

/**
 * Wires the generation components from configuration and runs them either as
 * a one-shot CLI batch or as the HTTP service
 */
export class StoryboardApp {
  private client: LeonardoApiClient;
  private orchestrator: BatchOrchestrator;
  private packager: ArchivePackager;
  private runService: RunService | null = null;
  private webServer: WebServer | null = null;
  private cleanupTimer: NodeJS.Timeout | null = null;
  private debugLog: (message: string) => void;

  constructor(
    private config: Config,
    fetchFn?: FetchFn
  ) {
    this.debugLog = (message: string) => {
      if (config.server.debug) {
        console.error(`[DEBUG] ${message}`);
      }
    };

    this.client = new LeonardoApiClient(config.leonardo, {
      polling: {
        intervalMs: config.polling.intervalMs,
        maxIntervalMs: config.polling.maxIntervalMs,
        timeoutMs: config.polling.jobTimeoutMs,
        maxConsecutiveErrors: config.polling.maxConsecutiveErrors,
      },
      retry: {
        maxAttempts: config.retry.maxAttempts,
        initialDelayMs: config.retry.initialDelayMs,
        maxDelayMs: config.retry.maxDelayMs,
        multiplier: 2,
        timeoutMs: config.retry.requestTimeoutMs,
      },
      circuitBreaker: new CircuitBreaker(5, 60000),
      fetchFn,
      debug: config.server.debug,
    });

    const promptBuilder = new CinematicPromptBuilder(PromptStyleFactory.getStyle(config.prompt.style));
    this.orchestrator = new BatchOrchestrator(this.client, promptBuilder, {
      maxConcurrentJobs: config.batch.maxConcurrentJobs,
      jobTimeoutMs: config.polling.jobTimeoutMs,
    });
    this.packager = new ArchivePackager();

    this.debugLog(`Prompt style: ${promptBuilder.getStyle().label}`);
  }

  /**
   * Run the configured CLI batch; resolves to the exit code
   */
  async runCli(signal?: AbortSignal): Promise<number> {
    if (!this.config.cli) {
      throw new Error('No --script given; nothing to run in CLI mode');
    }
    const runner = new CliRunner(this.orchestrator, this.packager);
    return runner.run(this.config.cli, signal);
  }

  async startServer(): Promise<void> {
    this.runService = new RunService(this.orchestrator, this.packager, this.config.batch.maxConcurrentRuns);
    this.webServer = new WebServer(this.runService, this.config.web.port, () => this.healthInfo());
    await this.webServer.start();

    const runService = this.runService;
    this.cleanupTimer = setInterval(() => {
      const cleared = runService.clearOldRuns(24);
      if (cleared > 0) {
        this.debugLog(`Cleared ${cleared} finished run(s)`);
      }
    }, CLEANUP_INTERVAL_MS);
    this.cleanupTimer.unref();
  }

  private healthInfo() {
    const breaker = this.client.getCircuitBreakerStats();
    return {
      config: {
        modelId: this.config.leonardo.modelId,
        size: `${this.config.leonardo.width}x${this.config.leonardo.height}`,
        style: this.config.prompt.style,
        maxConcurrentJobs: this.config.batch.maxConcurrentJobs,
        jobTimeoutMs: this.config.polling.jobTimeoutMs,
        apiKeyConfigured: this.config.leonardo.apiKey.length > 0,
      },
      circuitBreaker: {
        state: breaker.state,
        failureCount: breaker.failureCount,
        lastFailureTime: breaker.lastFailureTime,
      },
    };
  }

  async shutdown(): Promise<void> {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }

    if (this.runService) {
      for (const run of this.runService.getAllRuns()) {
        this.runService.cancelRun(run.id);
      }
    }

    if (this.webServer) {
      await this.webServer.stop();
      this.webServer = null;
    }
  }

  printStats(): void {
    const stats = this.client.getCircuitBreakerStats();
    console.error(`\n🔌 Circuit breaker: ${stats.state} (${stats.failureCount} recent failure(s))`);
    if (this.runService) {
      const runs = this.runService.getStatistics();
      console.error(`🎬 Runs: ${runs.total} total, ${runs.imagesGenerated} image(s) generated`);
    }
  }
}

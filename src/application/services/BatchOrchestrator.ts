import { IGenerationClient } from '../../core/interfaces/IGenerationClient.js';
import { CinematicPromptBuilder } from '../../core/prompts/CinematicPromptBuilder.js';
import { parseScript } from '../../core/script/parseScript.js';
import { ScriptLine } from '../../core/entities/ScriptLine.js';
import { MAX_REFERENCE_IMAGES, ReferenceImageSet } from '../../core/entities/ReferenceImage.js';
import {
  ActiveGenerationJob,
  BatchProgress,
  GenerationJob,
  RunResult,
  summarizeJobs,
  toUnsuccessfulJob,
} from '../../core/entities/GenerationJob.js';
import {
  AuthError,
  CancelledError,
  ConfigurationError,
  errorMessageOf,
} from '../../core/errors/GenerationErrors.js';
import { GenerationQueue } from '../../infrastructure/queue/GenerationQueue.js';

export const MIN_IMAGE_COUNT = 1;
export const MAX_IMAGE_COUNT = 252;

export interface BatchOrchestratorConfig {
  maxConcurrentJobs: number;
  jobTimeoutMs: number;
}

export const DEFAULT_BATCH_CONFIG: BatchOrchestratorConfig = {
  maxConcurrentJobs: 1,
  jobTimeoutMs: 60000,
};

export interface BatchRunOptions {
  signal?: AbortSignal;
  onProgress?: (progress: BatchProgress) => void;
}

/**
 * Drives one generation job per script line and collects the outcomes in
 * script order.
 *
 * Fill policy: when imageCount exceeds the number of non-blank lines the run
 * is truncated to the available lines; lines are never repeated.
 */
export class BatchOrchestrator {
  private config: BatchOrchestratorConfig;

  constructor(
    private client: IGenerationClient,
    private promptBuilder: CinematicPromptBuilder,
    config: Partial<BatchOrchestratorConfig> = {}
  ) {
    this.config = { ...DEFAULT_BATCH_CONFIG, ...config };
  }

  /**
   * Validate the run settings and select the lines that will be generated
   */
  planJobs(
    script: string | readonly string[],
    imageCount: number,
    references: ReferenceImageSet = []
  ): ScriptLine[] {
    if (
      !Number.isInteger(imageCount) ||
      imageCount < MIN_IMAGE_COUNT ||
      imageCount > MAX_IMAGE_COUNT
    ) {
      throw new ConfigurationError(
        `imageCount must be an integer between ${MIN_IMAGE_COUNT} and ${MAX_IMAGE_COUNT}, got ${imageCount}`
      );
    }
    if (references.length > MAX_REFERENCE_IMAGES) {
      throw new ConfigurationError(
        `At most ${MAX_REFERENCE_IMAGES} reference images are allowed, got ${references.length}`
      );
    }

    return parseScript(script).slice(0, imageCount);
  }

  /**
   * Planned lines as pending jobs with their prompts built
   */
  prepareJobs(
    script: string | readonly string[],
    imageCount: number,
    references: ReferenceImageSet = []
  ): ActiveGenerationJob[] {
    return this.planJobs(script, imageCount, references).map((line): ActiveGenerationJob => ({
      index: line.index,
      lineNumber: line.lineNumber,
      line: line.text,
      prompt: this.promptBuilder.build(line.text, {
        sceneNumber: line.lineNumber,
        references,
      }),
      status: 'pending',
    }));
  }

  async run(
    scriptLines: string | readonly string[],
    imageCount: number,
    references: ReferenceImageSet = [],
    options: BatchRunOptions = {}
  ): Promise<RunResult> {
    const { signal, onProgress } = options;
    const jobs = this.prepareJobs(scriptLines, imageCount, references);

    if (jobs.length === 0) {
      console.error('[BatchOrchestrator] Script has no scenes, nothing to generate');
      return summarizeJobs(jobs);
    }

    await this.verifyCredentials(signal);

    console.error(
      `[BatchOrchestrator] Generating ${jobs.length} image(s) (requested ${imageCount}, ` +
        `${this.config.maxConcurrentJobs} at a time)`
    );

    const results: GenerationJob[] = [...jobs];
    const queue = new GenerationQueue<GenerationJob>(this.config.maxConcurrentJobs);
    let completed = 0;

    queue.onTaskSettled((outcome) => {
      const position = Number(outcome.id);
      const job = results[position];

      let settledJob: GenerationJob;
      if (outcome.status === 'fulfilled') {
        settledJob = outcome.value;
      } else if (outcome.status === 'cancelled') {
        settledJob = toUnsuccessfulJob(job, new CancelledError('Cancelled before submission'));
      } else {
        settledJob = toUnsuccessfulJob(job, outcome.error);
      }

      results[position] = settledJob;
      completed++;
      this.logOutcome(settledJob, completed, jobs.length);
      onProgress?.({ completed, total: jobs.length, job: settledJob });
    });

    const onAbort = () => {
      const dropped = queue.cancelPending();
      console.error(`[BatchOrchestrator] Run cancelled, ${dropped} queued job(s) dropped`);
    };

    if (signal?.aborted) {
      onAbort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    jobs.forEach((job, position) => {
      if (signal?.aborted) {
        results[position] = toUnsuccessfulJob(job, new CancelledError('Cancelled before submission'));
        completed++;
        onProgress?.({ completed, total: jobs.length, job: results[position] });
        return;
      }
      queue.enqueue({
        id: String(position),
        run: () => this.runJob(job, references, signal),
      });
    });

    await queue.whenIdle();
    signal?.removeEventListener('abort', onAbort);

    const result = summarizeJobs(results);
    console.error(
      `[BatchOrchestrator] Run finished: ${result.succeeded} succeeded, ${result.failed} failed, ` +
        `${result.cancelled} cancelled`
    );
    return result;
  }

  /**
   * Only a missing or rejected key is fatal. When the check itself cannot
   * reach the service each job records its own submission error.
   */
  private async verifyCredentials(signal?: AbortSignal): Promise<void> {
    try {
      await this.client.verifyCredentials(signal);
    } catch (error) {
      if (error instanceof AuthError) {
        throw error;
      }
      if (!(error instanceof CancelledError)) {
        console.warn(
          `[BatchOrchestrator] Credential check inconclusive, continuing: ${errorMessageOf(error)}`
        );
      }
    }
  }

  /**
   * Submit one scene and wait for its image within the job deadline; never throws
   */
  private async runJob(
    job: ActiveGenerationJob,
    references: ReferenceImageSet,
    signal?: AbortSignal
  ): Promise<GenerationJob> {
    if (signal?.aborted) {
      return toUnsuccessfulJob(job, new CancelledError('Cancelled before submission'));
    }

    let running: ActiveGenerationJob = { ...job, status: 'running', startedAt: new Date() };
    const deadline = Date.now() + this.config.jobTimeoutMs;

    try {
      const remoteJobId = await this.client.submit(job.prompt, references, { deadline, signal });
      running = { ...running, remoteJobId };

      const image = await this.client.awaitImage(remoteJobId, {
        timeoutMs: this.config.jobTimeoutMs,
        deadline,
        signal,
      });

      return { ...running, status: 'succeeded', image, completedAt: new Date() };
    } catch (error) {
      return toUnsuccessfulJob(running, error);
    }
  }

  private logOutcome(job: GenerationJob, completed: number, total: number): void {
    const prefix = `[BatchOrchestrator] [${completed}/${total}] Scene ${job.lineNumber}`;
    if (job.status === 'succeeded') {
      console.error(`${prefix} succeeded`);
    } else if (job.status === 'failed' || job.status === 'timed_out' || job.status === 'cancelled') {
      console.error(`${prefix} ${job.status}: ${job.error}`);
    }
  }
}

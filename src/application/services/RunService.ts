import { randomUUID } from 'crypto';
import { Run } from '../../core/entities/Run.js';
import { ReferenceImageSet } from '../../core/entities/ReferenceImage.js';
import {
  BatchProgress,
  GenerationJob,
  isSucceeded,
  summarizeJobs,
  toUnsuccessfulJob,
} from '../../core/entities/GenerationJob.js';
import { CancelledError, errorMessageOf } from '../../core/errors/GenerationErrors.js';
import { GenerationQueue } from '../../infrastructure/queue/GenerationQueue.js';
import { BatchOrchestrator } from './BatchOrchestrator.js';
import { ArchivePackager } from './ArchivePackager.js';

export interface RunRequest {
  script: string | readonly string[];
  imageCount: number;
  references?: ReferenceImageSet;
}

export type RunEvent = 'created' | 'started' | 'progress' | 'completed' | 'failed' | 'cancelled';

export type RunListener = (run: Run, event: RunEvent) => void;

/**
 * In-memory registry of batches started from the web surface.
 * Runs wait on a queue so only maxConcurrentRuns batches talk to the
 * generation API at once.
 */
export class RunService {
  private runs: Map<string, Run> = new Map();
  private controllers: Map<string, AbortController> = new Map();
  private queue: GenerationQueue<void>;
  private listeners: RunListener[] = [];

  constructor(
    private orchestrator: BatchOrchestrator,
    private packager: ArchivePackager,
    maxConcurrentRuns: number = 1
  ) {
    this.queue = new GenerationQueue<void>(maxConcurrentRuns);
  }

  /**
   * Validate and queue a run, returning its id.
   * Throws ConfigurationError for an invalid image count or reference set.
   */
  startRun(request: RunRequest): string {
    const references = request.references ?? [];
    const jobs = this.orchestrator.prepareJobs(request.script, request.imageCount, references);

    const run: Run = {
      id: randomUUID(),
      status: 'pending',
      progress: 0,
      completedCount: 0,
      totalCount: jobs.length,
      imageCount: request.imageCount,
      referenceCount: references.length,
      createdAt: new Date(),
      jobs,
      progressUpdates: [],
    };

    const controller = new AbortController();
    this.runs.set(run.id, run);
    this.controllers.set(run.id, controller);
    console.error(`[RunService] Run ${run.id} queued (${jobs.length} scene(s))`);
    this.emit(run, 'created');

    this.queue.enqueue({
      id: run.id,
      run: () => this.execute(run, request, controller.signal),
    });

    return run.id;
  }

  getRun(runId: string): Run | null {
    return this.runs.get(runId) ?? null;
  }

  /**
   * All runs, newest first
   */
  getAllRuns(): Run[] {
    return Array.from(this.runs.values()).sort(
      (a, b) => b.createdAt.getTime() - a.createdAt.getTime()
    );
  }

  /**
   * Stop a run. Queued runs never start; running ones keep the images that
   * already succeeded.
   */
  cancelRun(runId: string): boolean {
    const run = this.runs.get(runId);
    if (!run) {
      return false;
    }

    if (run.status === 'pending') {
      this.queue.cancel(runId);
      this.controllers.get(runId)?.abort();
      this.controllers.delete(runId);
      run.jobs = run.jobs.map((job) =>
        toUnsuccessfulJob(job, new CancelledError('Run cancelled before it started'))
      );
      run.result = summarizeJobs(run.jobs);
      run.status = 'cancelled';
      run.completedAt = new Date();
      console.error(`[RunService] Run ${runId} cancelled before it started`);
      this.emit(run, 'cancelled');
      return true;
    }

    if (run.status === 'running') {
      this.controllers.get(runId)?.abort();
      console.error(`[RunService] Cancelling run ${runId}`);
      return true;
    }

    return false;
  }

  /**
   * Image bytes of one succeeded scene, by its 1-based line number
   */
  getSceneImage(runId: string, lineNumber: number): Buffer | null {
    const job = this.runs.get(runId)?.jobs.find((j) => j.lineNumber === lineNumber);
    return job && isSucceeded(job) ? job.image : null;
  }

  /**
   * ZIP of every scene that has succeeded so far; null for an unknown run.
   * Throws EmptyArchiveError when there is nothing to package.
   */
  async getArchive(runId: string): Promise<Buffer | null> {
    const run = this.runs.get(runId);
    if (!run) {
      return null;
    }
    return this.packager.package(summarizeJobs(run.jobs));
  }

  onRunUpdated(listener: RunListener): void {
    this.listeners.push(listener);
  }

  getStatistics() {
    const all = Array.from(this.runs.values());
    const count = (status: Run['status']) => all.filter((r) => r.status === status).length;
    return {
      total: all.length,
      pending: count('pending'),
      running: count('running'),
      completed: count('completed'),
      failed: count('failed'),
      cancelled: count('cancelled'),
      imagesGenerated: all.reduce((sum, r) => sum + r.jobs.filter(isSucceeded).length, 0),
    };
  }

  /**
   * Drop finished runs (and their images) older than hoursOld
   */
  clearOldRuns(hoursOld: number = 24): number {
    const cutoffTime = new Date(Date.now() - hoursOld * 60 * 60 * 1000);
    let cleared = 0;

    for (const [runId, run] of this.runs.entries()) {
      if (run.completedAt && run.completedAt < cutoffTime) {
        this.runs.delete(runId);
        cleared++;
      }
    }

    return cleared;
  }

  private async execute(run: Run, request: RunRequest, signal: AbortSignal): Promise<void> {
    if (run.status === 'cancelled') {
      return;
    }

    run.status = 'running';
    run.startedAt = new Date();
    this.recordProgress(run, 0, `Generating ${run.totalCount} image(s)`);
    this.emit(run, 'started');

    let finalStatus: 'completed' | 'failed' | 'cancelled';
    try {
      const result = await this.orchestrator.run(
        request.script,
        request.imageCount,
        request.references ?? [],
        { signal, onProgress: (progress) => this.onProgress(run, progress) }
      );

      finalStatus = signal.aborted ? 'cancelled' : 'completed';
      run.jobs = result.jobs;
      run.result = result;
      if (finalStatus === 'completed') {
        this.recordProgress(run, 100, `${result.succeeded} of ${result.requested} image(s) generated`);
      }
    } catch (error) {
      finalStatus = 'failed';
      run.error = errorMessageOf(error);
      // Scenes that never ran carry the run's error instead of staying pending
      run.jobs = run.jobs.map((job): GenerationJob =>
        job.status === 'pending' || job.status === 'running' ? toUnsuccessfulJob(job, error) : job
      );
      console.error(`[RunService] ✗ Run ${run.id} failed:`, run.error);
    } finally {
      run.completedAt = new Date();
      this.controllers.delete(run.id);
    }

    run.status = finalStatus;
    console.error(`[RunService] Run ${run.id} ${finalStatus}`);
    this.emit(run, finalStatus);
  }

  private onProgress(run: Run, progress: BatchProgress): void {
    run.jobs = run.jobs.map((job): GenerationJob => (job.index === progress.job.index ? progress.job : job));
    run.completedCount = progress.completed;

    const percentage = progress.total > 0 ? Math.round((progress.completed / progress.total) * 100) : 100;
    this.recordProgress(
      run,
      percentage,
      `Scene ${progress.job.lineNumber} ${progress.job.status} (${progress.completed}/${progress.total})`
    );
    this.emit(run, 'progress');
  }

  private recordProgress(run: Run, percentage: number, message: string): void {
    run.progress = Math.min(100, Math.max(0, percentage));
    run.progressUpdates.push({ timestamp: new Date(), message, percentage: run.progress });
  }

  private emit(run: Run, event: RunEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(run, event);
      } catch (error) {
        console.error(`[RunService] Listener failed for run ${run.id}:`, error);
      }
    }
  }
}

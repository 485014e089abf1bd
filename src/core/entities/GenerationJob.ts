import {
  CancelledError,
  GenerationErrorCode,
  TimeoutError,
  errorCodeOf,
  errorMessageOf,
} from '../errors/GenerationErrors.js';

export type GenerationJobStatus =
  | 'pending'
  | 'running'
  | 'succeeded'
  | 'failed'
  | 'timed_out'
  | 'cancelled';

export interface GenerationJobBase {
  index: number;
  lineNumber: number;
  line: string;
  prompt: string;
  remoteJobId?: string;
  startedAt?: Date;
  completedAt?: Date;
}

export interface ActiveGenerationJob extends GenerationJobBase {
  status: 'pending' | 'running';
}

export interface SucceededGenerationJob extends GenerationJobBase {
  status: 'succeeded';
  image: Buffer;
}

export interface UnsuccessfulGenerationJob extends GenerationJobBase {
  status: 'failed' | 'timed_out' | 'cancelled';
  error: string;
  errorCode: GenerationErrorCode;
}

/**
 * One scene's request/response cycle with the remote service.
 * Image bytes exist only on succeeded jobs.
 */
export type GenerationJob =
  | ActiveGenerationJob
  | SucceededGenerationJob
  | UnsuccessfulGenerationJob;

/**
 * Jobs of one batch in original script order
 */
export interface RunResult {
  jobs: GenerationJob[];
  requested: number;
  succeeded: number;
  failed: number;
  cancelled: number;
}

export interface BatchProgress {
  completed: number;
  total: number;
  job: GenerationJob;
}

export function isSucceeded(job: GenerationJob): job is SucceededGenerationJob {
  return job.status === 'succeeded';
}

export function summarizeJobs(jobs: readonly GenerationJob[]): RunResult {
  const ordered = [...jobs].sort((a, b) => a.index - b.index);
  return {
    jobs: ordered,
    requested: ordered.length,
    succeeded: ordered.filter((j) => j.status === 'succeeded').length,
    failed: ordered.filter((j) => j.status === 'failed' || j.status === 'timed_out').length,
    cancelled: ordered.filter((j) => j.status === 'cancelled').length,
  };
}

/**
 * Terminal unsuccessful state for a job: timed_out for TimeoutError,
 * cancelled for CancelledError, failed otherwise
 */
export function toUnsuccessfulJob(job: GenerationJob, error: unknown): UnsuccessfulGenerationJob {
  let status: UnsuccessfulGenerationJob['status'] = 'failed';
  if (error instanceof TimeoutError) {
    status = 'timed_out';
  } else if (error instanceof CancelledError) {
    status = 'cancelled';
  }

  return {
    index: job.index,
    lineNumber: job.lineNumber,
    line: job.line,
    prompt: job.prompt,
    remoteJobId: job.remoteJobId,
    startedAt: job.startedAt,
    completedAt: new Date(),
    status,
    error: errorMessageOf(error),
    errorCode: errorCodeOf(error),
  };
}

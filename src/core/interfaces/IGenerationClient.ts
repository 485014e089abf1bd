import { ReferenceImageSet } from '../entities/ReferenceImage.js';

export type JobId = string;

/**
 * Non-terminal or successful remote state; remote failures are thrown
 */
export type JobStatus =
  | { state: 'pending' | 'running' }
  | { state: 'succeeded'; imageUrl: string };

/**
 * Limits shared by every request a job makes
 */
export interface JobBudget {
  /** Epoch milliseconds after which the job counts as timed out */
  deadline?: number;
  signal?: AbortSignal;
}

export interface AwaitImageOptions extends JobBudget {
  timeoutMs?: number;
}

/**
 * Client for an asynchronous image-generation service
 */
export interface IGenerationClient {
  /**
   * Pre-flight credential check, throws AuthError for a missing or rejected key
   */
  verifyCredentials(signal?: AbortSignal): Promise<void>;

  /**
   * Submit a prompt, returning the remote job id
   */
  submit(prompt: string, references: ReferenceImageSet, options?: JobBudget): Promise<JobId>;

  /**
   * Read the remote job status once
   */
  poll(jobId: JobId, options?: JobBudget): Promise<JobStatus>;

  /**
   * Poll until the image is ready and return its bytes
   */
  awaitImage(jobId: JobId, options?: AwaitImageOptions): Promise<Buffer>;
}

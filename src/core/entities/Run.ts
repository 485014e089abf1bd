import { GenerationJob, RunResult } from './GenerationJob.js';

/**
 * A batch tracked by the run registry
 */
export interface Run {
  id: string;
  status: 'pending' | 'running' | 'completed' | 'failed' | 'cancelled';
  progress: number; // 0-100
  completedCount: number;
  totalCount: number;
  imageCount: number;
  referenceCount: number;
  createdAt: Date;
  startedAt?: Date;
  completedAt?: Date;
  jobs: GenerationJob[];
  result?: RunResult;
  error?: string;
  progressUpdates: ProgressUpdate[];
}

export interface ProgressUpdate {
  timestamp: Date;
  message: string;
  percentage: number;
}

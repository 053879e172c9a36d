import type { ClassifiedError } from '@/shared/common/errors/scrape.errors';
import type { TaskParams } from '@/shared/tasks/interfaces/task.interface';
import type { TaskMetrics } from '@/shared/metrics/services/metrics.service';

export enum JobStatus {
  PENDING = 'pending',
  RUNNING = 'running',
  FINISHED = 'finished',
  ERROR = 'error',
}

export type JobError = ClassifiedError;

export interface JobRecord {
  jobId: string;
  taskName: string;
  params: TaskParams;
  status: JobStatus;
  createdAt: Date;
  startedAt?: Date;
  finishedAt?: Date;
  workerId?: string;
  result?: object;
  error?: JobError;
}

export interface JobSnapshot extends Readonly<JobRecord> {
  elapsedMs?: number;
  /** `running 12s` while running, the bare status otherwise. */
  statusWithElapsed: string;
}

export type JobStatusCounts = Record<JobStatus, number>;

export interface JobStats extends JobStatusCounts {
  waiting: number;
  busyWorkers: number;
  concurrency: number;
  maxQueueDepth: number;
  /** Lifetime counters per task name; not affected by retention. */
  byTask: Record<string, TaskMetrics>;
}

import { Injectable, Logger } from '@nestjs/common';
import { formatDuration } from '@/shared/lib/util';
import {
  JobError,
  JobRecord,
  JobSnapshot,
  JobStatus,
  JobStatusCounts,
} from '../interfaces/job.interface';

const TERMINAL = new Set<JobStatus>([JobStatus.FINISHED, JobStatus.ERROR]);

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL.has(status);
}

export function toJobSnapshot(record: JobRecord, now: Date): JobSnapshot {
  let elapsedMs: number | undefined;
  if (record.startedAt) {
    const end = record.finishedAt ?? now;
    elapsedMs = Math.max(0, end.getTime() - record.startedAt.getTime());
  }

  const statusWithElapsed =
    record.status === JobStatus.RUNNING && elapsedMs !== undefined
      ? `${record.status} ${formatDuration(elapsedMs)}`
      : record.status;

  return {
    ...record,
    params: { ...record.params },
    ...(record.error ? { error: { ...record.error } } : {}),
    ...(elapsedMs !== undefined ? { elapsedMs } : {}),
    statusWithElapsed,
  };
}

/**
 * In-memory job table. Lives and dies with the process.
 */
@Injectable()
export class JobStoreService {
  private readonly logger = new Logger(JobStoreService.name);
  private readonly jobs = new Map<string, JobRecord>();

  get size(): number {
    return this.jobs.size;
  }

  insert(record: JobRecord): void {
    if (this.jobs.has(record.jobId)) {
      throw new Error(`Job ${record.jobId} already exists`);
    }
    this.jobs.set(record.jobId, record);
  }

  get(jobId: string): JobRecord | undefined {
    return this.jobs.get(jobId);
  }

  snapshot(jobId: string, now = new Date()): JobSnapshot | undefined {
    const record = this.jobs.get(jobId);
    return record ? toJobSnapshot(record, now) : undefined;
  }

  markRunning(
    jobId: string,
    workerId: string,
    at = new Date(),
  ): JobRecord | undefined {
    const record = this.jobs.get(jobId);
    if (!record || record.status !== JobStatus.PENDING) {
      this.logger.warn(
        `Cannot start job ${jobId}: ${record ? `status is ${record.status}` : 'not found'}`,
      );
      return undefined;
    }
    record.status = JobStatus.RUNNING;
    record.startedAt = at;
    record.workerId = workerId;
    return record;
  }

  complete(jobId: string, result: object, at = new Date()): boolean {
    const record = this.settleable(jobId);
    if (!record) return false;
    record.status = JobStatus.FINISHED;
    record.result = result;
    record.finishedAt = at;
    return true;
  }

  fail(jobId: string, error: JobError, at = new Date()): boolean {
    const record = this.settleable(jobId);
    if (!record) return false;
    record.status = JobStatus.ERROR;
    record.error = error;
    record.finishedAt = at;
    return true;
  }

  countByStatus(): JobStatusCounts {
    const counts: JobStatusCounts = {
      [JobStatus.PENDING]: 0,
      [JobStatus.RUNNING]: 0,
      [JobStatus.FINISHED]: 0,
      [JobStatus.ERROR]: 0,
    };
    for (const record of this.jobs.values()) {
      counts[record.status]++;
    }
    return counts;
  }

  /** Drops terminal jobs that finished before `cutoff`. */
  pruneFinishedBefore(cutoff: Date): number {
    let removed = 0;
    for (const [jobId, record] of this.jobs) {
      if (
        isTerminal(record.status) &&
        record.finishedAt &&
        record.finishedAt.getTime() < cutoff.getTime()
      ) {
        this.jobs.delete(jobId);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.jobs.clear();
  }

  private settleable(jobId: string): JobRecord | undefined {
    const record = this.jobs.get(jobId);
    if (!record) {
      this.logger.warn(`Ignoring transition for unknown job ${jobId}`);
      return undefined;
    }
    if (isTerminal(record.status)) {
      this.logger.warn(
        `Job ${jobId} already settled as ${record.status}, ignoring second transition`,
      );
      return undefined;
    }
    return record;
  }
}

import { Injectable } from '@nestjs/common';
import { JobError, JobSnapshot } from '@/shared/jobs/interfaces/job.interface';

export interface JobAcceptedDto {
  job_id: string;
}

export interface JobStatusDto {
  job_id: string;
  task_name: string;
  status: string;
  status_with_elapsed: string;
  created_at: string;
  started_at: string | null;
  finished_at: string | null;
  elapsed_ms: number | null;
  result?: object;
  error?: JobError;
}

@Injectable()
export class JobMapper {
  toAccepted(jobId: string): JobAcceptedDto {
    return { job_id: jobId };
  }

  toStatus(job: JobSnapshot): JobStatusDto {
    return {
      job_id: job.jobId,
      task_name: job.taskName,
      status: job.status,
      status_with_elapsed: job.statusWithElapsed,
      created_at: job.createdAt.toISOString(),
      started_at: job.startedAt?.toISOString() ?? null,
      finished_at: job.finishedAt?.toISOString() ?? null,
      elapsed_ms: job.elapsedMs ?? null,
      ...(job.result !== undefined ? { result: job.result } : {}),
      ...(job.error !== undefined ? { error: job.error } : {}),
    };
  }
}

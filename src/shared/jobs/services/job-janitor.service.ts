import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Interval } from '@nestjs/schedule';
import { JOB_DEFAULTS, JOB_JANITOR_INTERVAL_MS } from '../jobs.constants';
import { JobStoreService } from './job-store.service';

@Injectable()
export class JobJanitorService {
  private readonly logger = new Logger(JobJanitorService.name);
  private readonly retentionMs: number;

  constructor(
    private readonly configService: ConfigService,
    private readonly store: JobStoreService,
  ) {
    const minutes =
      this.configService.get<number>('JOB_RETENTION_MINUTES') ??
      JOB_DEFAULTS.retentionMinutes;
    this.retentionMs = minutes * 60_000;
  }

  @Interval(JOB_JANITOR_INTERVAL_MS)
  pruneExpiredJobs(now = new Date()): number {
    if (this.retentionMs <= 0) return 0;

    const cutoff = new Date(now.getTime() - this.retentionMs);
    const removed = this.store.pruneFinishedBefore(cutoff);
    if (removed > 0) {
      this.logger.log(
        `Pruned ${removed} finished jobs older than ${cutoff.toISOString()}`,
      );
    }
    return removed;
  }
}

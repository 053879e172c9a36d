import { Controller, Get } from '@nestjs/common';
import type { BrowserRuntimeStats } from '@/shared/browser/interfaces/browser-session.interface';
import { BrowserRuntimeService } from '@/shared/browser/services/browser-runtime.service';
import type { JobStats } from '@/shared/jobs/interfaces/job.interface';
import { JobManagerService } from '@/shared/jobs/services/job-manager.service';
import {
  MetricsService,
  RequestCount,
} from '@/shared/metrics/services/metrics.service';
import {
  TaskDescription,
  TaskRegistryService,
} from '@/shared/tasks/services/task-registry.service';

export interface HealthDto {
  status: 'ok';
  timestamp: string;
  service: string;
  tasks: TaskDescription[];
  jobs: JobStats;
  requests: RequestCount[];
  browser: BrowserRuntimeStats;
}

@Controller('healthz')
export class HealthController {
  constructor(
    private readonly jobManager: JobManagerService,
    private readonly registry: TaskRegistryService,
    private readonly metrics: MetricsService,
    private readonly browserRuntime: BrowserRuntimeService,
  ) {}

  @Get()
  getHealth(): HealthDto {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      service: 'scrape-jobs',
      tasks: this.registry.describe(),
      jobs: this.jobManager.getStats(),
      requests: this.metrics.requestCounts(),
      browser: this.browserRuntime.getRuntimeStats(),
    };
  }
}

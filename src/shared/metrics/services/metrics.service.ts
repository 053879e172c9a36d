import { Injectable } from '@nestjs/common';
import type { ScrapeErrorKind } from '@/shared/common/errors/scrape.errors';

/** Submissions refused before a task was resolved land here. */
export const UNKNOWN_TASK_BUCKET = '<unknown>';

export interface TaskMetrics {
  submitted: number;
  rejected: number;
  finished: number;
  failed: number;
  errorsByKind: Partial<Record<ScrapeErrorKind, number>>;
  totalRunMs: number;
}

export interface RequestCount {
  method: string;
  route: string;
  statusCode: number;
  count: number;
}

/**
 * Process-lifetime counters. Unlike the job table these survive retention
 * pruning.
 */
@Injectable()
export class MetricsService {
  private readonly tasks = new Map<string, TaskMetrics>();
  private readonly requests = new Map<string, RequestCount>();

  recordSubmitted(taskName: string): void {
    this.forTask(taskName).submitted++;
  }

  recordRejected(taskName: string): void {
    this.forTask(taskName).rejected++;
  }

  recordFinished(taskName: string, runMs: number): void {
    const metrics = this.forTask(taskName);
    metrics.finished++;
    metrics.totalRunMs += runMs;
  }

  recordFailed(taskName: string, kind: ScrapeErrorKind, runMs: number): void {
    const metrics = this.forTask(taskName);
    metrics.failed++;
    metrics.errorsByKind[kind] = (metrics.errorsByKind[kind] ?? 0) + 1;
    metrics.totalRunMs += runMs;
  }

  recordRequest(method: string, route: string, statusCode: number): void {
    const key = `${method} ${route} ${statusCode}`;
    const entry = this.requests.get(key);
    if (entry) {
      entry.count++;
    } else {
      this.requests.set(key, { method, route, statusCode, count: 1 });
    }
  }

  taskMetrics(): Record<string, TaskMetrics> {
    const snapshot: Record<string, TaskMetrics> = {};
    for (const [taskName, metrics] of [...this.tasks].sort(([a], [b]) =>
      a.localeCompare(b),
    )) {
      snapshot[taskName] = {
        ...metrics,
        errorsByKind: { ...metrics.errorsByKind },
      };
    }
    return snapshot;
  }

  requestCounts(): RequestCount[] {
    return [...this.requests.values()]
      .map((entry) => ({ ...entry }))
      .sort(
        (a, b) =>
          a.route.localeCompare(b.route) ||
          a.method.localeCompare(b.method) ||
          a.statusCode - b.statusCode,
      );
  }

  private forTask(taskName: string): TaskMetrics {
    let metrics = this.tasks.get(taskName);
    if (!metrics) {
      metrics = {
        submitted: 0,
        rejected: 0,
        finished: 0,
        failed: 0,
        errorsByKind: {},
        totalRunMs: 0,
      };
      this.tasks.set(taskName, metrics);
    }
    return metrics;
  }
}

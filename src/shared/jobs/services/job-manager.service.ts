import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import {
  BROWSER_SESSION_PROVIDER,
  BrowserSession,
  BrowserSessionProvider,
} from '@/shared/browser/interfaces/browser-session.interface';
import {
  InvalidParamsError,
  JobNotFoundError,
  JobTimeoutError,
  QueueClosedError,
  QueueFullError,
  UnknownTaskError,
  classifyError,
  errorMessage,
} from '@/shared/common/errors/scrape.errors';
import { isPlainObject } from '@/shared/lib/util';
import {
  MetricsService,
  UNKNOWN_TASK_BUCKET,
} from '@/shared/metrics/services/metrics.service';
import { ScrapeTask, TaskParams } from '@/shared/tasks/interfaces/task.interface';
import { TaskRegistryService } from '@/shared/tasks/services/task-registry.service';
import { JobSnapshot, JobStats, JobStatus } from '../interfaces/job.interface';
import { JOB_DEFAULTS } from '../jobs.constants';
import { JobStoreService } from './job-store.service';
import { ResultWriterService } from './result-writer.service';

interface QueuedJob {
  task: ScrapeTask;
  input: unknown;
}

/** Session handle shared between a running job and the code that settles it. */
interface SessionLease {
  session?: BrowserSession;
  released: boolean;
  abort: AbortController;
}

type WorkerWake = (jobId: string | null) => void;

/**
 * Bounded in-process worker pool. Jobs are dispatched in submission order
 * to `MAX_CONCURRENT_JOBS` worker loops; each job runs in its own browser
 * session under a global timeout and settles exactly once.
 */
@Injectable()
export class JobManagerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(JobManagerService.name);

  private readonly concurrency: number;
  private readonly maxQueueDepth: number;
  private readonly jobTimeoutMs: number;

  private readonly waiting: string[] = [];
  private readonly queued = new Map<string, QueuedJob>();
  private readonly idleWorkers: WorkerWake[] = [];
  private workers: Promise<void>[] = [];
  private busyWorkers = 0;
  private running = false;

  constructor(
    private readonly configService: ConfigService,
    private readonly registry: TaskRegistryService,
    private readonly store: JobStoreService,
    private readonly resultWriter: ResultWriterService,
    private readonly metrics: MetricsService,
    @Inject(BROWSER_SESSION_PROVIDER)
    private readonly sessions: BrowserSessionProvider,
  ) {
    this.concurrency = Math.max(
      1,
      this.configService.get<number>('MAX_CONCURRENT_JOBS') ??
        JOB_DEFAULTS.concurrency,
    );
    this.maxQueueDepth =
      this.configService.get<number>('MAX_QUEUE_DEPTH') ??
      JOB_DEFAULTS.maxQueueDepth;
    this.jobTimeoutMs =
      (this.configService.get<number>('JOB_TIMEOUT_SECONDS') ??
        JOB_DEFAULTS.timeoutSeconds) * 1000;
  }

  onModuleInit() {
    this.start();
  }

  async onModuleDestroy() {
    await this.stop();
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.workers = Array.from({ length: this.concurrency }, (_, index) =>
      this.workerLoop(`worker-${index + 1}`),
    );
    this.logger.log(
      `Started ${this.concurrency} workers (queue depth ${this.maxQueueDepth || 'unbounded'}, timeout ${this.jobTimeoutMs ? `${this.jobTimeoutMs / 1000}s` : 'none'})`,
    );
  }

  /** Lets in-flight jobs settle, then drops every job record. */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    for (const wake of this.idleWorkers.splice(0)) {
      wake(null);
    }
    await Promise.all(this.workers);
    this.workers = [];

    const dropped = this.waiting.splice(0).length;
    this.queued.clear();
    this.store.clear();
    this.logger.log(
      `Job manager stopped${dropped ? `, ${dropped} waiting jobs dropped` : ''}`,
    );
  }

  /**
   * Validates and enqueues a job. Never waits on execution; every
   * submission-time failure is thrown before a record exists.
   */
  submit(taskName: string, params: unknown): string {
    const task = this.registry.get(taskName);
    if (!task) {
      this.metrics.recordRejected(UNKNOWN_TASK_BUCKET);
      throw new UnknownTaskError(taskName);
    }

    let jobId: string;
    try {
      jobId = this.enqueue(task, params);
    } catch (error) {
      this.metrics.recordRejected(task.name);
      throw error;
    }
    this.metrics.recordSubmitted(task.name);
    return jobId;
  }

  private enqueue(task: ScrapeTask, params: unknown): string {
    if (!isPlainObject(params)) {
      throw new InvalidParamsError(['params must be a JSON object']);
    }

    const input = task.parseParams(params);

    if (!this.running) {
      throw new QueueClosedError();
    }
    if (
      this.maxQueueDepth > 0 &&
      this.idleWorkers.length === 0 &&
      this.waiting.length >= this.maxQueueDepth
    ) {
      throw new QueueFullError(this.maxQueueDepth);
    }

    const jobId = uuidv4();
    this.store.insert({
      jobId,
      taskName: task.name,
      params: { ...params },
      status: JobStatus.PENDING,
      createdAt: new Date(),
    });
    this.queued.set(jobId, { task, input });
    this.dispatch(jobId);

    this.logger.log(`Enqueued job ${jobId} for task '${task.name}'`);
    return jobId;
  }

  getStatus(jobId: string): JobSnapshot {
    const snapshot = this.store.snapshot(jobId);
    if (!snapshot) {
      throw new JobNotFoundError(jobId);
    }
    return snapshot;
  }

  getStats(): JobStats {
    return {
      ...this.store.countByStatus(),
      waiting: this.waiting.length,
      busyWorkers: this.busyWorkers,
      concurrency: this.concurrency,
      maxQueueDepth: this.maxQueueDepth,
      byTask: this.metrics.taskMetrics(),
    };
  }

  private dispatch(jobId: string): void {
    const wake = this.idleWorkers.shift();
    if (wake) {
      wake(jobId);
    } else {
      this.waiting.push(jobId);
    }
  }

  private nextJobId(): Promise<string | null> {
    if (!this.running) return Promise.resolve(null);

    const jobId = this.waiting.shift();
    if (jobId !== undefined) return Promise.resolve(jobId);

    return new Promise((resolve) => this.idleWorkers.push(resolve));
  }

  private async workerLoop(workerId: string): Promise<void> {
    for (;;) {
      const jobId = await this.nextJobId();
      if (jobId === null) break;

      try {
        await this.execute(jobId, workerId);
      } catch (error) {
        this.logger.error(
          `${workerId} hit an unexpected error on job ${jobId}: ${errorMessage(error)}`,
        );
      }
    }
    this.logger.debug(`${workerId} stopped`);
  }

  private async execute(jobId: string, workerId: string): Promise<void> {
    const queued = this.queued.get(jobId);
    this.queued.delete(jobId);

    const record = this.store.markRunning(jobId, workerId);
    if (!record || !queued) return;

    this.busyWorkers++;
    this.logger.log(`${workerId} started job ${jobId} (${record.taskName})`);

    const lease: SessionLease = {
      released: false,
      abort: new AbortController(),
    };
    const startedAt = Date.now();
    try {
      const result = await this.withTimeout(
        jobId,
        this.runTask(jobId, record.params, queued, lease),
      );
      this.store.complete(jobId, result);
      this.metrics.recordFinished(record.taskName, Date.now() - startedAt);
      this.logger.log(`Job ${jobId} finished`);
      await this.persistResult(record.taskName, jobId, result);
    } catch (error) {
      const failure = classifyError(error);
      this.store.fail(jobId, failure);
      this.metrics.recordFailed(
        record.taskName,
        failure.kind,
        Date.now() - startedAt,
      );
      this.logger.error(
        `Job ${jobId} failed (${failure.kind}): ${failure.message}`,
      );
    } finally {
      this.busyWorkers--;
      await this.release(lease);
    }
  }

  private async runTask(
    jobId: string,
    params: TaskParams,
    { task, input }: QueuedJob,
    lease: SessionLease,
  ): Promise<object> {
    const userAgent =
      typeof params.user_agent === 'string' ? params.user_agent : undefined;
    const session = await this.sessions.openSession({ jobId, userAgent });

    if (lease.released) {
      await session.close();
      throw new Error(`Job ${jobId} settled before its browser session opened`);
    }
    lease.session = session;

    const logger = new Logger(`${task.name}:${jobId.slice(0, 8)}`);
    return task.run(input, {
      jobId,
      session,
      logger,
      signal: lease.abort.signal,
    });
  }

  private withTimeout<T>(jobId: string, work: Promise<T>): Promise<T> {
    if (this.jobTimeoutMs <= 0) return work;

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new JobTimeoutError(jobId, this.jobTimeoutMs)),
        this.jobTimeoutMs,
      );
    });
    return Promise.race([work, timeout]).finally(() => clearTimeout(timer));
  }

  private async release(lease: SessionLease): Promise<void> {
    lease.released = true;
    lease.abort.abort();
    if (!lease.session) return;
    try {
      await lease.session.close();
    } catch (error) {
      this.logger.warn(`Failed to close browser session: ${errorMessage(error)}`);
    }
  }

  private async persistResult(
    taskName: string,
    jobId: string,
    result: object,
  ): Promise<void> {
    try {
      await this.resultWriter.write(taskName, jobId, result);
    } catch (error) {
      this.logger.warn(
        `Could not write result file for job ${jobId}: ${errorMessage(error)}`,
      );
    }
  }
}

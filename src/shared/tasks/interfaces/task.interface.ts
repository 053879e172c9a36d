import type { Logger } from '@nestjs/common';
import type { BrowserSession } from '@/shared/browser/interfaces/browser-session.interface';

export const SCRAPE_TASKS = 'SCRAPE_TASKS';

export type TaskParams = Record<string, unknown>;

export interface TaskContext {
  jobId: string;
  /** Owned by the job manager; tasks open pages from it but never close it. */
  session: BrowserSession;
  logger: Logger;
  /** Aborted once the job settles, including on timeout. */
  signal: AbortSignal;
}

/**
 * A named unit of scraping work. `parseParams` runs synchronously at
 * submission time so bad input is rejected before a job record exists.
 */
export interface ScrapeTask<TInput = unknown, TResult extends object = object> {
  readonly name: string;
  readonly description: string;
  parseParams(params: TaskParams): TInput;
  run(input: TInput, context: TaskContext): Promise<TResult>;
}

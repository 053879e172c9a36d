import type { Page } from 'playwright';

export const BROWSER_SESSION_PROVIDER = 'BROWSER_SESSION_PROVIDER';

export interface SessionOptions {
  jobId: string;
  userAgent?: string;
}

/**
 * One isolated browsing context owned by a single job.
 * Closing it closes every page the job opened.
 */
export interface BrowserSession {
  readonly id: string;
  readonly jobId: string;
  newPage(): Promise<Page>;
  close(): Promise<void>;
}

export interface BrowserSessionProvider {
  openSession(options: SessionOptions): Promise<BrowserSession>;
}

export interface BrowserRuntimeStats {
  connected: boolean;
  headless: boolean;
  activeSessions: number;
  sessionsOpened: number;
  relaunches: number;
  launchedAt: Date | null;
}

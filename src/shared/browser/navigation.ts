import { Logger } from '@nestjs/common';
import type { Page } from 'playwright';
import {
  NavigationFailureError,
  errorMessage,
} from '@/shared/common/errors/scrape.errors';
import { retryWithBackoff } from '@/shared/lib/util';

export interface NavigationOptions {
  timeoutMs: number;
  attempts: number;
  baseDelayMs?: number;
  waitUntil?: 'load' | 'domcontentloaded' | 'networkidle' | 'commit';
}

/**
 * `page.goto` with a bounded number of attempts and exponential backoff.
 * Throws NavigationFailureError once the attempts are spent.
 */
export async function gotoWithRetry(
  page: Pick<Page, 'goto'>,
  url: string,
  options: NavigationOptions,
  logger?: Logger,
): Promise<void> {
  try {
    await retryWithBackoff(
      () =>
        page.goto(url, {
          timeout: options.timeoutMs,
          waitUntil: options.waitUntil ?? 'domcontentloaded',
        }),
      {
        attempts: options.attempts,
        baseDelayMs: options.baseDelayMs ?? 1000,
        onRetry: (error, attempt, delayMs) =>
          logger?.warn(
            `Navigation to ${url} failed (attempt ${attempt}/${options.attempts}), retrying in ${delayMs}ms: ${errorMessage(error)}`,
          ),
      },
    );
  } catch (error) {
    throw new NavigationFailureError(url, errorMessage(error));
  }
}

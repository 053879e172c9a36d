import { Injectable, Logger } from '@nestjs/common';
import { errorMessage } from '@/shared/common/errors/scrape.errors';
import { retryWithBackoff } from '@/shared/lib/util';
import {
  FetchPage,
  PaginatedPage,
  PaginationOptions,
  PaginationRun,
  PaginationStopReason,
  ReviewPage,
} from '../interfaces/extraction.interface';

const DEFAULT_FETCH_ATTEMPTS = 3;
const DEFAULT_FETCH_BACKOFF_MS = 1000;

@Injectable()
export class PaginationService {
  private readonly logger = new Logger(PaginationService.name);

  /**
   * Walks pages from index 0 until the page says there is no next one,
   * the page limit is hit, or `stallLimit` pages in a row add nothing new.
   * A page that keeps failing ends the run early; pages gathered so far are kept.
   */
  async paginate<TItem>(
    fetchPage: FetchPage<TItem>,
    options: PaginationOptions<TItem>,
  ): Promise<PaginationRun<TItem>> {
    const maxPages = Math.max(1, Math.floor(options.maxPages));
    const stallLimit = Math.max(1, Math.floor(options.stallLimit));
    const attempts = options.retry?.attempts ?? DEFAULT_FETCH_ATTEMPTS;
    const baseDelayMs = options.retry?.baseDelayMs ?? DEFAULT_FETCH_BACKOFF_MS;

    const seen = new Set<string>();
    const items: TItem[] = [];
    const pages: PaginatedPage<TItem>[] = [];
    let stalledPages = 0;

    const finish = (
      stopReason: PaginationStopReason,
      error?: string,
    ): PaginationRun<TItem> => {
      this.logger.debug(
        `Pagination stopped (${stopReason}) after ${pages.length} pages, ${items.length} unique items`,
      );
      return {
        pages,
        items,
        partial: stopReason === 'fetch-failed',
        stopReason,
        ...(error !== undefined ? { error } : {}),
      };
    };

    for (let pageIndex = 0; ; pageIndex++) {
      let page: ReviewPage<TItem>;
      try {
        page = await retryWithBackoff(() => fetchPage(pageIndex), {
          attempts,
          baseDelayMs,
          onRetry: (error, attempt, delayMs) =>
            this.logger.warn(
              `Page ${pageIndex} fetch failed (attempt ${attempt}/${attempts}), retrying in ${delayMs}ms: ${errorMessage(error)}`,
            ),
        });
      } catch (error) {
        this.logger.warn(
          `Giving up on page ${pageIndex}, keeping ${pages.length} pages gathered so far: ${errorMessage(error)}`,
        );
        return finish('fetch-failed', errorMessage(error));
      }

      let newItemCount = 0;
      for (const item of page.items) {
        const key = options.fingerprint(item);
        if (seen.has(key)) continue;
        seen.add(key);
        items.push(item);
        newItemCount++;
      }

      pages.push({ ...page, pageIndex, newItemCount });
      stalledPages = newItemCount === 0 ? stalledPages + 1 : 0;

      if (!page.hasNext) {
        return finish('end-of-data');
      }
      if (pageIndex + 1 >= maxPages) {
        return finish('max-pages');
      }
      if (stalledPages >= stallLimit) {
        return finish('stalled');
      }
    }
  }
}

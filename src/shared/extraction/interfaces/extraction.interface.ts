import { ClassifiedError } from '@/shared/common/errors/scrape.errors';
import { RetryOptions } from '@/shared/lib/util';

export type ExtractionLevelNumber = 1 | 2 | 3 | 4;

export enum ExtractionMethod {
  LEVEL_1_QUICK_SEARCH = 'LEVEL_1_QUICK_SEARCH',
  LEVEL_2_FULL_DATA = 'LEVEL_2_FULL_DATA',
  LEVEL_3_BASIC_REVIEWS = 'LEVEL_3_BASIC_REVIEWS',
  LEVEL_4_DEEP_REVIEWS = 'LEVEL_4_DEEP_REVIEWS',
  LEVEL_4_FALLBACK_TO_LEVEL_3 = 'LEVEL_4_FALLBACK_TO_LEVEL_3',
}

export type ExtractionFieldGroup = 'summary' | 'details' | 'reviews';

export interface ExtractionLevel {
  level: ExtractionLevelNumber;
  methodName: ExtractionMethod;
  description: string;
  produces: readonly ExtractionFieldGroup[];
  paginates: boolean;
}

/** One fetched page of paginated content. */
export interface ReviewPage<TItem> {
  pageIndex: number;
  items: TItem[];
  /** Reported by the page itself, never inferred. */
  hasNext: boolean;
  rawItemCount: number;
}

export interface PaginatedPage<TItem> extends ReviewPage<TItem> {
  newItemCount: number;
}

export type FetchPage<TItem> = (pageIndex: number) => Promise<ReviewPage<TItem>>;

export type PaginationStopReason =
  | 'end-of-data'
  | 'max-pages'
  | 'stalled'
  | 'fetch-failed';

export interface PaginationOptions<TItem> {
  maxPages: number;
  /** Consecutive pages without a new fingerprint before giving up. */
  stallLimit: number;
  fingerprint: (item: TItem) => string;
  retry?: Partial<Pick<RetryOptions, 'attempts' | 'baseDelayMs'>>;
}

export interface PaginationRun<TItem> {
  pages: PaginatedPage<TItem>[];
  /** Deduplicated, in first-seen order. */
  items: TItem[];
  partial: boolean;
  stopReason: PaginationStopReason;
  error?: string;
}

/** What a single rung of the ladder hands back. */
export interface LevelOutput<TEntity, TItem> {
  entity: TEntity;
  reviews?: TItem[];
  claimedReviewCount?: number;
  pagesProcessed: number;
  partial: boolean;
}

export type LevelHandler<TTarget, TEntity, TItem> = (
  target: TTarget,
) => Promise<LevelOutput<TEntity, TItem>>;

export type LevelLadder<TTarget, TEntity, TItem> = Record<
  ExtractionLevelNumber,
  LevelHandler<TTarget, TEntity, TItem>
>;

export interface LevelAttemptFlags {
  level1Attempted: boolean;
  level2Attempted: boolean;
  level3Attempted: boolean;
  level4Attempted: boolean;
}

export interface ExtractionResult<TEntity, TItem> {
  entity: TEntity;
  reviews?: TItem[];
  /** Count the source claims; reported, never reconciled with the extracted one. */
  claimedReviewCount?: number;
  extractedReviewCount: number;
  pagesProcessed: number;
  partial: boolean;
  extractionMethod: ExtractionMethod;
  levelsAttempted: LevelAttemptFlags;
}

export type ExtractionAttempt<TEntity, TItem> =
  | {
      state: 'succeeded';
      level: ExtractionLevelNumber;
      result: ExtractionResult<TEntity, TItem>;
    }
  | {
      state: 'fell-back';
      level: 4;
      to: 3;
      result: ExtractionResult<TEntity, TItem>;
    }
  | {
      state: 'failed';
      level: ExtractionLevelNumber;
      error: ClassifiedError;
      levelsAttempted: LevelAttemptFlags;
    };

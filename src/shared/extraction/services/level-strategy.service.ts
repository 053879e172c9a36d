import { Injectable, Logger } from '@nestjs/common';
import { classifyError } from '@/shared/common/errors/scrape.errors';
import { EXTRACTION_LEVELS, assertExtractionLevel } from '../extraction-levels';
import {
  ExtractionAttempt,
  ExtractionLevelNumber,
  ExtractionMethod,
  ExtractionResult,
  LevelAttemptFlags,
  LevelLadder,
  LevelOutput,
} from '../interfaces/extraction.interface';

/**
 * Routes a requested level to the one ladder rung that implements it.
 *
 * Attempted(level) resolves to Succeeded(level), FellBack(4 -> 3) or
 * Failed(level). Fallback happens only when level 4 comes back without
 * reviews while the entity claims to have some.
 */
@Injectable()
export class LevelStrategyService {
  private readonly logger = new Logger(LevelStrategyService.name);

  async extract<TTarget, TEntity, TItem>(
    level: unknown,
    target: TTarget,
    ladder: LevelLadder<TTarget, TEntity, TItem>,
  ): Promise<ExtractionAttempt<TEntity, TItem>> {
    const requested = assertExtractionLevel(level);
    const attempted: LevelAttemptFlags = {
      level1Attempted: false,
      level2Attempted: false,
      level3Attempted: false,
      level4Attempted: false,
    };

    try {
      markAttempted(attempted, requested);
      const output = await ladder[requested](target);

      if (requested === 4 && this.shouldFallBack(output)) {
        this.logger.warn(
          `Level 4 returned no reviews although ${output.claimedReviewCount} are claimed, falling back to level 3`,
        );
        markAttempted(attempted, 3);
        const fallback = await ladder[3](target);

        return {
          state: 'fell-back',
          level: 4,
          to: 3,
          result: toResult(
            fallback,
            ExtractionMethod.LEVEL_4_FALLBACK_TO_LEVEL_3,
            attempted,
          ),
        };
      }

      return {
        state: 'succeeded',
        level: requested,
        result: toResult(
          output,
          EXTRACTION_LEVELS[requested].methodName,
          attempted,
        ),
      };
    } catch (error) {
      const classified = classifyError(error);
      this.logger.warn(
        `Level ${requested} extraction failed (${classified.kind}): ${classified.message}`,
      );
      return {
        state: 'failed',
        level: requested,
        error: classified,
        levelsAttempted: attempted,
      };
    }
  }

  private shouldFallBack<TEntity, TItem>(
    output: LevelOutput<TEntity, TItem>,
  ): boolean {
    const extracted = output.reviews?.length ?? 0;
    return extracted === 0 && (output.claimedReviewCount ?? 0) > 0;
  }
}

function markAttempted(
  flags: LevelAttemptFlags,
  level: ExtractionLevelNumber,
): void {
  switch (level) {
    case 1:
      flags.level1Attempted = true;
      break;
    case 2:
      flags.level2Attempted = true;
      break;
    case 3:
      flags.level3Attempted = true;
      break;
    case 4:
      flags.level4Attempted = true;
      break;
  }
}

function toResult<TEntity, TItem>(
  output: LevelOutput<TEntity, TItem>,
  extractionMethod: ExtractionMethod,
  attempted: LevelAttemptFlags,
): ExtractionResult<TEntity, TItem> {
  return {
    entity: output.entity,
    ...(output.reviews !== undefined ? { reviews: output.reviews } : {}),
    ...(output.claimedReviewCount !== undefined
      ? { claimedReviewCount: output.claimedReviewCount }
      : {}),
    extractedReviewCount: output.reviews?.length ?? 0,
    pagesProcessed: output.pagesProcessed,
    partial: output.partial,
    extractionMethod,
    levelsAttempted: { ...attempted },
  };
}

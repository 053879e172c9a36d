import { Test } from '@nestjs/testing';
import {
  InvalidLevelError,
  NavigationFailureError,
  ScrapeErrorKind,
} from '@/shared/common/errors/scrape.errors';
import {
  ExtractionMethod,
  LevelLadder,
  LevelOutput,
} from '../interfaces/extraction.interface';
import { LevelStrategyService } from './level-strategy.service';

interface Target {
  name: string;
}
interface Entity {
  name: string;
  level: number;
}
type Review = string;

const output = (
  level: number,
  extra: Partial<LevelOutput<Entity, Review>> = {},
): LevelOutput<Entity, Review> => ({
  entity: { name: 'Marina Hotel', level },
  pagesProcessed: 0,
  partial: false,
  ...extra,
});

function ladderWith(
  overrides: Partial<LevelLadder<Target, Entity, Review>> = {},
) {
  const ladder = {
    1: jest.fn(async () => output(1)),
    2: jest.fn(async () => output(2)),
    3: jest.fn(async () =>
      output(3, { reviews: ['nice pool'], claimedReviewCount: 40, pagesProcessed: 1 }),
    ),
    4: jest.fn(async () =>
      output(4, {
        reviews: ['nice pool', 'quiet room'],
        claimedReviewCount: 40,
        pagesProcessed: 2,
      }),
    ),
  };
  return { ...ladder, ...overrides };
}

describe('LevelStrategyService', () => {
  let strategy: LevelStrategyService;
  const target: Target = { name: 'Marina Hotel' };

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [LevelStrategyService],
    }).compile();
    strategy = moduleRef.get(LevelStrategyService);
  });

  it.each([1, 2, 3, 4] as const)('runs only the level %i handler', async (level) => {
    const ladder = ladderWith();

    const attempt = await strategy.extract(level, target, ladder);

    expect(attempt.state).toBe('succeeded');
    for (const other of [1, 2, 3, 4] as const) {
      expect(ladder[other]).toHaveBeenCalledTimes(other === level ? 1 : 0);
    }
  });

  it('tags the result with the level method and attempt flags', async () => {
    const attempt = await strategy.extract(2, target, ladderWith());

    expect(attempt).toEqual({
      state: 'succeeded',
      level: 2,
      result: {
        entity: { name: 'Marina Hotel', level: 2 },
        extractedReviewCount: 0,
        pagesProcessed: 0,
        partial: false,
        extractionMethod: ExtractionMethod.LEVEL_2_FULL_DATA,
        levelsAttempted: {
          level1Attempted: false,
          level2Attempted: true,
          level3Attempted: false,
          level4Attempted: false,
        },
      },
    });
  });

  it.each([0, 5, 2.5, '3', null])(
    'rejects level %p before any handler runs',
    async (level) => {
      const ladder = ladderWith();

      await expect(strategy.extract(level, target, ladder)).rejects.toBeInstanceOf(
        InvalidLevelError,
      );
      expect(ladder[1]).not.toHaveBeenCalled();
      expect(ladder[2]).not.toHaveBeenCalled();
      expect(ladder[3]).not.toHaveBeenCalled();
      expect(ladder[4]).not.toHaveBeenCalled();
    },
  );

  it('falls back to level 3 when level 4 finds no reviews but some are claimed', async () => {
    const ladder = ladderWith({
      4: jest.fn(async () =>
        output(4, { reviews: [], claimedReviewCount: 40, pagesProcessed: 1 }),
      ),
    });

    const attempt = await strategy.extract(4, target, ladder);

    expect(attempt.state).toBe('fell-back');
    if (attempt.state !== 'fell-back') return;
    expect(attempt.result.extractionMethod).toBe(
      ExtractionMethod.LEVEL_4_FALLBACK_TO_LEVEL_3,
    );
    expect(attempt.result.reviews).toEqual(['nice pool']);
    expect(attempt.result.levelsAttempted).toEqual({
      level1Attempted: false,
      level2Attempted: false,
      level3Attempted: true,
      level4Attempted: true,
    });
    expect(ladder[3]).toHaveBeenCalledTimes(1);
  });

  it('does not fall back when nothing is claimed', async () => {
    const ladder = ladderWith({
      4: jest.fn(async () => output(4, { reviews: [], claimedReviewCount: 0 })),
    });

    const attempt = await strategy.extract(4, target, ladder);

    expect(attempt.state).toBe('succeeded');
    expect(ladder[3]).not.toHaveBeenCalled();
  });

  it('turns a handler failure into a failed attempt', async () => {
    const ladder = ladderWith({
      2: jest.fn(async () => {
        throw new NavigationFailureError('https://hotel.test', 'net::ERR_TIMED_OUT');
      }),
    });

    const attempt = await strategy.extract(2, target, ladder);

    expect(attempt).toEqual({
      state: 'failed',
      level: 2,
      error: {
        kind: ScrapeErrorKind.NAVIGATION_FAILURE,
        message: 'Navigation to https://hotel.test failed: net::ERR_TIMED_OUT',
      },
      levelsAttempted: {
        level1Attempted: false,
        level2Attempted: true,
        level3Attempted: false,
        level4Attempted: false,
      },
    });
  });
});

import { InvalidLevelError } from '@/shared/common/errors/scrape.errors';
import {
  ExtractionLevel,
  ExtractionLevelNumber,
  ExtractionMethod,
} from './interfaces/extraction.interface';

export const EXTRACTION_LEVELS: Readonly<
  Record<ExtractionLevelNumber, ExtractionLevel>
> = {
  1: {
    level: 1,
    methodName: ExtractionMethod.LEVEL_1_QUICK_SEARCH,
    description: 'Quick search - listing fields only',
    produces: ['summary'],
    paginates: false,
  },
  2: {
    level: 2,
    methodName: ExtractionMethod.LEVEL_2_FULL_DATA,
    description: 'Full data - detail page fields',
    produces: ['summary', 'details'],
    paginates: false,
  },
  3: {
    level: 3,
    methodName: ExtractionMethod.LEVEL_3_BASIC_REVIEWS,
    description: 'Basic reviews - first review page',
    produces: ['summary', 'details', 'reviews'],
    paginates: false,
  },
  4: {
    level: 4,
    methodName: ExtractionMethod.LEVEL_4_DEEP_REVIEWS,
    description: 'Deep reviews - every review page',
    produces: ['summary', 'details', 'reviews'],
    paginates: true,
  },
};

export function isExtractionLevel(
  value: unknown,
): value is ExtractionLevelNumber {
  return value === 1 || value === 2 || value === 3 || value === 4;
}

export function assertExtractionLevel(value: unknown): ExtractionLevelNumber {
  if (!isExtractionLevel(value)) {
    throw new InvalidLevelError(value);
  }
  return value;
}

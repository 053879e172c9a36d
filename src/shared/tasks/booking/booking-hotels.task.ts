import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InvalidParamsError } from '@/shared/common/errors/scrape.errors';
import {
  EXTRACTION_LEVELS,
  assertExtractionLevel,
} from '@/shared/extraction/extraction-levels';
import {
  ExtractionAttempt,
  ExtractionMethod,
  LevelLadder,
  LevelOutput,
} from '@/shared/extraction/interfaces/extraction.interface';
import { contentFingerprint } from '@/shared/extraction/lib/fingerprint';
import {
  computeSuccessRate,
  hasPopulatedField,
} from '@/shared/extraction/lib/success-rate';
import { LevelStrategyService } from '@/shared/extraction/services/level-strategy.service';
import { PaginationService } from '@/shared/extraction/services/pagination.service';
import {
  ScrapeTask,
  TaskContext,
  TaskParams,
} from '../interfaces/task.interface';
import { parseParams } from '../lib/parse-params';
import { isoDateFromToday, nightsBetween } from './booking-parsers';
import {
  BOOKING_SITE_FACTORY,
  BookingSite,
  BookingSiteFactory,
} from './booking-site.interface';
import {
  BookingHotelsInput,
  BookingHotelsResult,
  HotelEntity,
  HotelFilters,
  HotelRecord,
  HotelReview,
  HotelSummary,
} from './booking.types';
import { BookingHotelsParamsDto } from './dto/booking-hotels-params.dto';

const DEFAULT_LOCATION = 'Dubai';
const DEFAULT_LEVEL = 2;
const DEFAULT_MAX_RESULTS = 10;
const MAX_RESULTS_CAP = 50;
const LEVEL_3_REVIEW_SAMPLE = 5;

/** Extracted fields; identity fields (id, name, url) do not make a hotel usable. */
const USABLE_HOTEL_FIELDS: readonly (keyof HotelRecord)[] = [
  'pricePerNight',
  'rating',
  'reviewCount',
  'address',
  'description',
  'amenities',
  'images',
  'latitude',
  'longitude',
];

type HotelOutput = LevelOutput<HotelEntity, HotelReview>;

@Injectable()
export class BookingHotelsTask
  implements ScrapeTask<BookingHotelsInput, BookingHotelsResult>
{
  readonly name = 'booking-hotels';
  readonly description =
    'Hotel search with four extraction levels, from search cards to paginated reviews';

  private readonly logger = new Logger(BookingHotelsTask.name);
  private readonly defaultReviewPages: number;
  private readonly stallLimit: number;

  constructor(
    private readonly configService: ConfigService,
    private readonly levelStrategy: LevelStrategyService,
    private readonly pagination: PaginationService,
    @Inject(BOOKING_SITE_FACTORY)
    private readonly siteFactory: BookingSiteFactory,
  ) {
    this.defaultReviewPages =
      this.configService.get<number>('REVIEW_MAX_PAGES') ?? 50;
    this.stallLimit = this.configService.get<number>('REVIEW_STALL_LIMIT') ?? 2;
  }

  parseParams(params: TaskParams): BookingHotelsInput {
    const level = assertExtractionLevel(
      params.level ?? params.scrape_level ?? DEFAULT_LEVEL,
    );
    const dto = parseParams(BookingHotelsParamsDto, params);

    const checkIn = dto.check_in ?? isoDateFromToday(7);
    const checkOut = dto.check_out ?? isoDateFromToday(10);
    const nights = nightsBetween(checkIn, checkOut);
    if (!(nights > 0)) {
      throw new InvalidParamsError(['check_out must be after check_in']);
    }

    if (
      dto.min_price !== undefined &&
      dto.max_price !== undefined &&
      dto.min_price > dto.max_price
    ) {
      throw new InvalidParamsError(['min_price must not exceed max_price']);
    }

    return {
      level,
      query: {
        location: dto.location ?? DEFAULT_LOCATION,
        checkIn,
        checkOut,
        adults: dto.adults ?? 2,
        rooms: dto.rooms ?? 1,
        maxResults: Math.min(
          dto.max_results ?? DEFAULT_MAX_RESULTS,
          MAX_RESULTS_CAP,
        ),
      },
      nights,
      filters: {
        ...(dto.min_price !== undefined ? { minPrice: dto.min_price } : {}),
        ...(dto.max_price !== undefined ? { maxPrice: dto.max_price } : {}),
        ...(dto.min_rating !== undefined ? { minRating: dto.min_rating } : {}),
      },
      maxReviewPages: dto.max_review_pages ?? this.defaultReviewPages,
    };
  }

  async run(
    input: BookingHotelsInput,
    { session, logger }: TaskContext,
  ): Promise<BookingHotelsResult> {
    const { level, query } = input;
    logger.log(
      `Level ${level} (${EXTRACTION_LEVELS[level].description}) for ${query.location}, ${query.checkIn} to ${query.checkOut}`,
    );

    const site = this.siteFactory(session, logger);
    const listings = (await site.searchHotels(query)).slice(0, query.maxResults);
    const ladder = this.buildLadder(site, input);

    const hotels: HotelRecord[] = [];
    for (const [index, listing] of listings.entries()) {
      logger.log(`Hotel ${index + 1}/${listings.length}: ${listing.name}`);
      const attempt = await this.levelStrategy.extract(level, listing, ladder);
      hotels.push(toHotelRecord(listing, attempt));
    }

    const successRate = computeSuccessRate(
      hotels,
      listings.length,
      (hotel) =>
        hotel.outcome !== 'failed' &&
        hasPopulatedField(hotel, USABLE_HOTEL_FIELDS),
    );
    const returned = applyFilters(hotels, input.filters);
    if (returned.length !== hotels.length) {
      logger.log(`Filters kept ${returned.length} of ${hotels.length} hotels`);
    }

    const priced = returned.filter((hotel) => hotel.pricePerNight > 0);
    const averagePrice = priced.length
      ? priced.reduce((sum, hotel) => sum + hotel.pricePerNight, 0) /
        priced.length
      : 0;

    logger.log(
      `Completed: ${returned.length} hotels, success rate ${(successRate * 100).toFixed(1)}%`,
    );

    return {
      searchMetadata: {
        location: query.location,
        checkIn: query.checkIn,
        checkOut: query.checkOut,
        nights: input.nights,
        scrapeLevel: level,
        extractionMethod: EXTRACTION_LEVELS[level].methodName,
        totalFound: listings.length,
        totalReturned: returned.length,
        fellBackCount: hotels.filter((h) => h.outcome === 'fell-back').length,
        failedCount: hotels.filter((h) => h.outcome === 'failed').length,
        successRate,
        averagePrice,
        claimedReviewTotal: sum(returned, (h) => h.claimedReviewCount ?? 0),
        extractedReviewTotal: sum(returned, (h) => h.extractedReviewCount),
        searchCompletedAt: new Date().toISOString(),
      },
      hotels: returned,
    };
  }

  private buildLadder(
    site: BookingSite,
    input: BookingHotelsInput,
  ): LevelLadder<HotelSummary, HotelEntity, HotelReview> {
    const withDetails = async (hotel: HotelSummary) => {
      const { reviewCount, ...details } = await site.loadHotelDetails(hotel);
      return {
        entity: { ...hotel, ...details },
        claimedReviewCount: reviewCount ?? hotel.reviewCount,
      };
    };

    return {
      1: async (hotel): Promise<HotelOutput> => ({
        entity: { ...hotel },
        claimedReviewCount: hotel.reviewCount,
        pagesProcessed: 0,
        partial: false,
      }),

      2: async (hotel): Promise<HotelOutput> => ({
        ...(await withDetails(hotel)),
        pagesProcessed: 0,
        partial: false,
      }),

      3: async (hotel): Promise<HotelOutput> => {
        const { entity, claimedReviewCount } = await withDetails(hotel);
        const source = await site.openReviews(hotel);
        try {
          const first = await source.fetchPage(0);
          return {
            entity,
            reviews: first.items.slice(0, LEVEL_3_REVIEW_SAMPLE),
            claimedReviewCount: source.claimedReviewCount ?? claimedReviewCount,
            pagesProcessed: 1,
            partial: false,
          };
        } finally {
          await source.close();
        }
      },

      4: async (hotel): Promise<HotelOutput> => {
        const { entity, claimedReviewCount } = await withDetails(hotel);
        const source = await site.openReviews(hotel);
        try {
          const run = await this.pagination.paginate(
            (pageIndex) => source.fetchPage(pageIndex),
            {
              maxPages: input.maxReviewPages,
              stallLimit: this.stallLimit,
              fingerprint: (review) =>
                contentFingerprint(review.reviewerName, review.reviewText),
            },
          );
          this.logger.debug(
            `${hotel.name}: ${run.items.length} reviews over ${run.pages.length} pages (${run.stopReason})`,
          );
          return {
            entity,
            reviews: run.items,
            claimedReviewCount: source.claimedReviewCount ?? claimedReviewCount,
            pagesProcessed: run.pages.length,
            partial: run.partial,
          };
        } finally {
          await source.close();
        }
      },
    };
  }
}

function toHotelRecord(
  listing: HotelSummary,
  attempt: ExtractionAttempt<HotelEntity, HotelReview>,
): HotelRecord {
  const scrapedAt = new Date().toISOString();

  if (attempt.state === 'failed') {
    return {
      ...listing,
      claimedReviewCount: listing.reviewCount,
      extractedReviewCount: 0,
      pagesProcessed: 0,
      partial: true,
      extractionLevel: attempt.level,
      extractionMethod: ExtractionMethod.LEVEL_1_QUICK_SEARCH,
      levelsAttempted: attempt.levelsAttempted,
      outcome: 'failed',
      error: attempt.error.message,
      scrapedAt,
    };
  }

  const { result } = attempt;
  return {
    ...result.entity,
    ...(result.reviews !== undefined ? { reviews: result.reviews } : {}),
    ...(result.claimedReviewCount !== undefined
      ? { claimedReviewCount: result.claimedReviewCount }
      : {}),
    extractedReviewCount: result.extractedReviewCount,
    pagesProcessed: result.pagesProcessed,
    partial: result.partial,
    extractionLevel: attempt.level,
    extractionMethod: result.extractionMethod,
    levelsAttempted: result.levelsAttempted,
    outcome: attempt.state,
    scrapedAt,
  };
}

export function applyFilters(
  hotels: HotelRecord[],
  filters: HotelFilters,
): HotelRecord[] {
  return hotels.filter(
    (hotel) =>
      (filters.minPrice === undefined ||
        hotel.pricePerNight >= filters.minPrice) &&
      (filters.maxPrice === undefined ||
        hotel.pricePerNight <= filters.maxPrice) &&
      (filters.minRating === undefined || hotel.rating >= filters.minRating),
  );
}

function sum<T>(items: readonly T[], pick: (item: T) => number): number {
  return items.reduce((total, item) => total + pick(item), 0);
}

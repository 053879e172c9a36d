import type { Logger } from '@nestjs/common';
import type { BrowserSession } from '@/shared/browser/interfaces/browser-session.interface';
import type { ReviewPage } from '@/shared/extraction/interfaces/extraction.interface';
import type {
  HotelDetails,
  HotelReview,
  HotelSearchQuery,
  HotelSummary,
} from './booking.types';

export const BOOKING_SITE_FACTORY = 'BOOKING_SITE_FACTORY';

/** An open review listing for one hotel; pages are fetched in order from 0. */
export interface ReviewSource {
  claimedReviewCount?: number;
  fetchPage(pageIndex: number): Promise<ReviewPage<HotelReview>>;
  close(): Promise<void>;
}

export interface BookingSite {
  searchHotels(query: HotelSearchQuery): Promise<HotelSummary[]>;
  loadHotelDetails(hotel: HotelSummary): Promise<HotelDetails>;
  openReviews(hotel: HotelSummary): Promise<ReviewSource>;
}

export type BookingSiteFactory = (
  session: BrowserSession,
  logger: Logger,
) => BookingSite;

import type {
  ExtractionLevelNumber,
  ExtractionMethod,
  LevelAttemptFlags,
} from '@/shared/extraction/interfaces/extraction.interface';

export interface HotelSearchQuery {
  location: string;
  checkIn: string;
  checkOut: string;
  adults: number;
  rooms: number;
  maxResults: number;
}

/** What a search result card shows. */
export interface HotelSummary {
  hotelId: string;
  name: string;
  bookingUrl: string;
  pricePerNight: number;
  rating: number;
  reviewCount: number;
}

export interface HotelDetails {
  address: string;
  description: string;
  amenities: string[];
  images: string[];
  latitude: number | null;
  longitude: number | null;
  googleMapsUrl: string;
  reviewCount?: number;
}

export interface HotelReview {
  reviewerName?: string;
  reviewText: string;
  pageNumber: number;
}

export type HotelEntity = HotelSummary & Partial<Omit<HotelDetails, 'reviewCount'>>;

export type HotelOutcome = 'succeeded' | 'fell-back' | 'failed';

export interface HotelRecord extends HotelEntity {
  reviews?: HotelReview[];
  claimedReviewCount?: number;
  extractedReviewCount: number;
  pagesProcessed: number;
  partial: boolean;
  extractionLevel: ExtractionLevelNumber;
  extractionMethod: ExtractionMethod;
  levelsAttempted: LevelAttemptFlags;
  outcome: HotelOutcome;
  error?: string;
  scrapedAt: string;
}

export interface HotelFilters {
  minPrice?: number;
  maxPrice?: number;
  minRating?: number;
}

export interface BookingHotelsInput {
  level: ExtractionLevelNumber;
  query: HotelSearchQuery;
  nights: number;
  filters: HotelFilters;
  maxReviewPages: number;
}

export interface BookingSearchMetadata {
  location: string;
  checkIn: string;
  checkOut: string;
  nights: number;
  scrapeLevel: ExtractionLevelNumber;
  extractionMethod: ExtractionMethod;
  totalFound: number;
  totalReturned: number;
  fellBackCount: number;
  failedCount: number;
  successRate: number;
  averagePrice: number;
  claimedReviewTotal: number;
  extractedReviewTotal: number;
  searchCompletedAt: string;
}

export interface BookingHotelsResult {
  searchMetadata: BookingSearchMetadata;
  hotels: HotelRecord[];
}

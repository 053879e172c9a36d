import { Logger } from '@nestjs/common';
import type { Locator, Page } from 'playwright';
import type { BrowserSession } from '@/shared/browser/interfaces/browser-session.interface';
import { NavigationOptions, gotoWithRetry } from '@/shared/browser/navigation';
import { errorMessage } from '@/shared/common/errors/scrape.errors';
import type { ReviewPage } from '@/shared/extraction/interfaces/extraction.interface';
import {
  absoluteBookingUrl,
  buildReviewsUrl,
  buildSearchUrl,
  googleMapsUrl,
  hotelIdFromUrl,
  isValidReviewText,
  isValidReviewerName,
  normalizeImageUrl,
  parseLatLng,
  parsePrice,
  parseRating,
  parseReviewCount,
} from './booking-parsers';
import type { BookingSite, ReviewSource } from './booking-site.interface';
import type {
  HotelDetails,
  HotelReview,
  HotelSearchQuery,
  HotelSummary,
} from './booking.types';

const SELECTORS = {
  popups: [
    "button:has-text('Accept')",
    "button:has-text('OK')",
    "[data-testid='close-dialog']",
    '.modal-mask .close-button',
  ],
  cards: [
    "[data-testid='property-card']",
    "[data-testid='hotel-card']",
    '.sr-hotel__wrapper',
    "[class*='property-card']",
  ],
  cardPrices: [
    "[data-testid='price-and-discounted-price']",
    "[data-testid*='price']",
  ],
  cardName: ["[data-testid='title']", 'h3', '.sr-hotel__name'],
  cardRating: [
    "[data-testid='review-score']",
    '.bui-review-score__badge',
    "[aria-label*='Scored']",
  ],
  cardReviewCount: [
    "[data-testid='review-score'] + div",
    '.bui-review-score__text',
  ],
  address: [
    "[data-testid='PropertyHeaderAddressDesktop-wrapper']",
    "[data-testid*='address']",
    '.hp_address_subtitle',
    "[class*='address']",
  ],
  description: [
    "[data-testid='property-description']",
    '#hp_hotel_description',
    "[class*='description']",
  ],
  amenities: [
    "[data-testid='property-highlights'] li",
    "[data-testid='property-most-popular-facilities-wrapper'] [data-testid='facility-name']",
    '.hp_desc_important_facilities li',
    "[data-testid='facility-name']",
  ],
  images: [
    "img[data-testid='hotel-photo']",
    "[data-testid='property-section-images'] img",
    '.bh-photo-grid img',
    "img[src*='bstatic']",
  ],
  coordinates: '[data-atlas-latlng]',
  detailReviewCount: [
    "[data-testid='review-score-component']",
    "[data-testid='review-score-right-component']",
  ],
  reviewCards: [
    "#reviewCardsSection [data-testid='review-card']",
    "[data-testid='review-card']",
  ],
  reviewText: [
    "[data-testid='review-positive-text']",
    "[data-testid='review-negative-text']",
    '.c-review__body',
  ],
  reviewerName: ["[data-testid='reviewer-name']", '.bui-reviewer-name'],
  nextReviewPage: [
    "button[aria-label='Next page']",
    "[data-testid='pagination-next']",
    '.pagination-next',
  ],
} as const;

const MAX_AMENITIES = 15;
const MAX_IMAGES = 10;
const SETTLE_MS = {
  search: 3000,
  reviews: 3000,
  nextPage: 2000,
  popup: 500,
} as const;

/**
 * Booking.com through a job's browser session. Selectors are tried in order;
 * the first that matches wins.
 */
export class PlaywrightBookingSite implements BookingSite {
  private searchPage: Page | null = null;

  constructor(
    private readonly session: BrowserSession,
    private readonly navigation: NavigationOptions,
    private readonly logger: Logger,
  ) {}

  async searchHotels(query: HotelSearchQuery): Promise<HotelSummary[]> {
    const page = await this.getSearchPage();
    const url = buildSearchUrl(query);
    this.logger.log(`Searching ${url}`);

    await gotoWithRetry(page, url, this.navigation, this.logger);
    await page.waitForTimeout(SETTLE_MS.search);
    await this.dismissPopups(page);

    const cards = await firstMatching(page, SELECTORS.cards);
    if (!cards) {
      this.logger.warn('No hotel cards found on the search page');
      return [];
    }

    const count = Math.min(await cards.count(), query.maxResults);
    const prices = await this.readCardPrices(page, count);
    const hotels: HotelSummary[] = [];

    for (let i = 0; i < count; i++) {
      try {
        const hotel = await this.readCard(cards.nth(i), prices[i] ?? 0);
        if (hotel) hotels.push(hotel);
      } catch (error) {
        this.logger.warn(`Skipping card ${i + 1}: ${errorMessage(error)}`);
      }
    }

    this.logger.log(`Search returned ${hotels.length} of ${count} cards`);
    return hotels;
  }

  async loadHotelDetails(hotel: HotelSummary): Promise<HotelDetails> {
    const page = await this.session.newPage();
    try {
      await gotoWithRetry(page, hotel.bookingUrl, this.navigation, this.logger);
      await this.dismissPopups(page);

      const address = await firstVisibleText(page, SELECTORS.address);
      const description = await firstVisibleText(page, SELECTORS.description);
      const amenities = await this.readAmenities(page);
      const images = await this.readImages(page);
      const coordinates = parseLatLng(
        await page
          .locator(SELECTORS.coordinates)
          .first()
          .getAttribute('data-atlas-latlng', { timeout: 2000 })
          .catch(() => null),
      );
      const reviewCount = parseReviewCount(
        await firstVisibleText(page, SELECTORS.detailReviewCount),
      );

      return {
        address: address ?? '',
        description: description ?? '',
        amenities,
        images,
        latitude: coordinates?.latitude ?? null,
        longitude: coordinates?.longitude ?? null,
        googleMapsUrl: coordinates
          ? googleMapsUrl(coordinates.latitude, coordinates.longitude)
          : '',
        ...(reviewCount !== undefined ? { reviewCount } : {}),
      };
    } finally {
      await page.close();
    }
  }

  async openReviews(hotel: HotelSummary): Promise<ReviewSource> {
    const page = await this.session.newPage();
    try {
      await gotoWithRetry(
        page,
        buildReviewsUrl(hotel.bookingUrl),
        this.navigation,
        this.logger,
      );
      await page.waitForTimeout(SETTLE_MS.reviews);
      await this.dismissPopups(page);
    } catch (error) {
      await page.close();
      throw error;
    }

    const claimedReviewCount = parseReviewCount(
      await firstVisibleText(page, SELECTORS.detailReviewCount),
    );
    let currentIndex = 0;

    return {
      ...(claimedReviewCount !== undefined ? { claimedReviewCount } : {}),
      fetchPage: async (pageIndex: number): Promise<ReviewPage<HotelReview>> => {
        while (currentIndex < pageIndex) {
          if (!(await this.clickNextPage(page))) {
            throw new Error(`Review page ${pageIndex + 1} is not reachable`);
          }
          currentIndex++;
          await page.waitForTimeout(SETTLE_MS.nextPage);
        }

        const { reviews, rawItemCount } = await this.readReviews(
          page,
          pageIndex + 1,
        );
        return {
          pageIndex,
          items: reviews,
          rawItemCount,
          hasNext: await this.hasNextPage(page),
        };
      },
      close: () => page.close(),
    };
  }

  private async getSearchPage(): Promise<Page> {
    if (!this.searchPage) {
      this.searchPage = await this.session.newPage();
    }
    return this.searchPage;
  }

  private async dismissPopups(page: Page): Promise<void> {
    for (const selector of SELECTORS.popups) {
      const button = page.locator(selector).first();
      if (await button.isVisible().catch(() => false)) {
        await button.click({ timeout: 2000 }).catch((error: unknown) => {
          this.logger.debug(
            `Popup ${selector} did not close: ${errorMessage(error)}`,
          );
        });
        await page.waitForTimeout(SETTLE_MS.popup);
      }
    }
  }

  private async readCardPrices(page: Page, expected: number): Promise<number[]> {
    for (const selector of SELECTORS.cardPrices) {
      const elements = page.locator(selector);
      if ((await elements.count()) < expected) continue;

      const texts = await elements.allInnerTexts();
      return texts.slice(0, expected).map((text) => parsePrice(text) ?? 0);
    }
    return new Array<number>(expected).fill(0);
  }

  private async readCard(
    card: Locator,
    pricePerNight: number,
  ): Promise<HotelSummary | null> {
    const name = await firstVisibleText(card, SELECTORS.cardName);
    if (!name) return null;

    const href = await card
      .locator('a')
      .first()
      .getAttribute('href', { timeout: 2000 })
      .catch(() => null);
    const bookingUrl = href ? absoluteBookingUrl(href) : '';

    return {
      hotelId: hotelIdFromUrl(bookingUrl || name),
      name,
      bookingUrl,
      pricePerNight,
      rating: parseRating(await firstVisibleText(card, SELECTORS.cardRating)) ?? 0,
      reviewCount:
        parseReviewCount(
          await firstVisibleText(card, SELECTORS.cardReviewCount),
        ) ?? 0,
    };
  }

  private async readAmenities(page: Page): Promise<string[]> {
    for (const selector of SELECTORS.amenities) {
      const texts = await page.locator(selector).allInnerTexts();
      const amenities = texts
        .map((text) => text.trim())
        .filter((text) => text.length > 0 && text.length < 100);
      if (amenities.length > 0) {
        return [...new Set(amenities)].slice(0, MAX_AMENITIES);
      }
    }
    return [];
  }

  private async readImages(page: Page): Promise<string[]> {
    for (const selector of SELECTORS.images) {
      const sources = await page
        .locator(selector)
        .evaluateAll((nodes) =>
          nodes.map(
            (node) =>
              node.getAttribute('src') ?? node.getAttribute('data-src') ?? '',
          ),
        );
      const images = [
        ...new Set(
          sources
            .filter((src) => src.length > 0)
            .map(normalizeImageUrl)
            .filter((src) => src.includes('bstatic.com')),
        ),
      ];
      if (images.length > 0) {
        return images.slice(0, MAX_IMAGES);
      }
    }
    return [];
  }

  private async readReviews(
    page: Page,
    pageNumber: number,
  ): Promise<{ reviews: HotelReview[]; rawItemCount: number }> {
    const cards = await firstMatching(page, SELECTORS.reviewCards);
    if (!cards) return { reviews: [], rawItemCount: 0 };

    const count = await cards.count();
    const reviews: HotelReview[] = [];

    for (let i = 0; i < count; i++) {
      const card = cards.nth(i);
      const texts: string[] = [];
      for (const selector of SELECTORS.reviewText) {
        for (const text of await card.locator(selector).allInnerTexts()) {
          if (isValidReviewText(text)) texts.push(text.trim());
        }
      }
      if (texts.length === 0) continue;

      const name = await firstVisibleText(card, SELECTORS.reviewerName);
      reviews.push({
        ...(name && isValidReviewerName(name) ? { reviewerName: name } : {}),
        reviewText: texts.join(' | '),
        pageNumber,
      });
    }

    return { reviews, rawItemCount: count };
  }

  private async nextPageButton(page: Page): Promise<Locator | null> {
    for (const selector of SELECTORS.nextReviewPage) {
      const button = page.locator(selector).first();
      const usable =
        (await button.isVisible().catch(() => false)) &&
        (await button.isEnabled().catch(() => false));
      if (usable) return button;
    }
    return null;
  }

  private async hasNextPage(page: Page): Promise<boolean> {
    return (await this.nextPageButton(page)) !== null;
  }

  private async clickNextPage(page: Page): Promise<boolean> {
    const button = await this.nextPageButton(page);
    if (!button) return false;
    await button.click();
    return true;
  }
}

async function firstMatching(
  scope: Page | Locator,
  selectors: readonly string[],
): Promise<Locator | null> {
  for (const selector of selectors) {
    const locator = scope.locator(selector);
    if ((await locator.count()) > 0) return locator;
  }
  return null;
}

async function firstVisibleText(
  scope: Page | Locator,
  selectors: readonly string[],
): Promise<string | undefined> {
  for (const selector of selectors) {
    const element = scope.locator(selector).first();
    if (!(await element.isVisible().catch(() => false))) continue;

    const text = (await element.innerText()).trim();
    if (text) return text;
  }
  return undefined;
}

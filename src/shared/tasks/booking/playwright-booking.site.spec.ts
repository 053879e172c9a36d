import { Logger } from '@nestjs/common';
import type { BrowserSession } from '@/shared/browser/interfaces/browser-session.interface';
import { NavigationFailureError } from '@/shared/common/errors/scrape.errors';
import { HotelSummary } from './booking.types';
import { PlaywrightBookingSite } from './playwright-booking.site';

/** The slice of a Playwright Locator the review reader touches. */
interface LocatorStub {
  first(): LocatorStub;
  nth(index: number): LocatorStub;
  locator(selector: string): LocatorStub;
  count(): Promise<number>;
  isVisible(): Promise<boolean>;
  isEnabled(): Promise<boolean>;
  innerText(): Promise<string>;
  allInnerTexts(): Promise<string[]>;
  click(): Promise<void>;
}

const absent: LocatorStub = {
  first: () => absent,
  nth: () => absent,
  locator: () => absent,
  count: async () => 0,
  isVisible: async () => false,
  isEnabled: async () => false,
  innerText: async () => '',
  allInnerTexts: async () => [],
  click: async () => {
    throw new Error('Element is not attached');
  },
};

interface ReviewListing {
  pages: string[][];
  current: number;
  clicks: number;
  nextHidden: boolean;
}

/** A reviews tab that shows one page of cards and a "Next page" button. */
function reviewsPage(listing: ReviewListing) {
  const card = (text: string): LocatorStub => ({
    ...absent,
    locator: (selector) =>
      selector === "[data-testid='review-positive-text']"
        ? { ...absent, allInnerTexts: async () => [text] }
        : absent,
  });
  const cards: LocatorStub = {
    ...absent,
    count: async () => listing.pages[listing.current].length,
    nth: (index) => card(listing.pages[listing.current][index]),
  };
  const nextButton: LocatorStub = {
    ...absent,
    first: () => nextButton,
    isVisible: async () =>
      !listing.nextHidden && listing.current < listing.pages.length - 1,
    isEnabled: async () => true,
    click: async () => {
      listing.clicks++;
      listing.current++;
    },
  };

  return {
    goto: jest.fn(async () => null),
    waitForTimeout: jest.fn(async () => undefined),
    close: jest.fn(async () => undefined),
    locator: (selector: string): LocatorStub => {
      if (selector === "#reviewCardsSection [data-testid='review-card']") {
        return cards;
      }
      if (selector === "button[aria-label='Next page']") {
        return nextButton;
      }
      return absent;
    },
  };
}

const hotel: HotelSummary = {
  hotelId: 'a1b2c3d4',
  name: 'Marina Tower',
  bookingUrl: 'https://www.booking.com/hotel/ae/marina-tower.html?aid=1',
  pricePerNight: 450,
  rating: 8.6,
  reviewCount: 6,
};

describe('PlaywrightBookingSite.openReviews', () => {
  let listing: ReviewListing;
  let page: ReturnType<typeof reviewsPage>;
  let site: PlaywrightBookingSite;

  beforeEach(() => {
    listing = {
      pages: [
        ['Quiet room with a great view', 'Breakfast was fresh and varied'],
        ['Staff helped with late check in'],
        ['Pool area was clean and calm', 'Walkable to the marina promenade'],
      ],
      current: 0,
      clicks: 0,
      nextHidden: false,
    };
    page = reviewsPage(listing);
    const session: BrowserSession = {
      id: 'session-1',
      jobId: 'job-1',
      newPage: jest.fn().mockResolvedValue(page),
      close: jest.fn(async () => undefined),
    };
    site = new PlaywrightBookingSite(
      session,
      { timeoutMs: 1000, attempts: 1 },
      new Logger('test'),
    );
  });

  it('opens the reviews tab and reads the first page', async () => {
    const source = await site.openReviews(hotel);
    const first = await source.fetchPage(0);

    expect(page.goto).toHaveBeenCalledWith(
      'https://www.booking.com/hotel/ae/marina-tower.html#tab-reviews',
      { timeout: 1000, waitUntil: 'domcontentloaded' },
    );
    expect(source).not.toHaveProperty('claimedReviewCount');
    expect(first).toEqual({
      pageIndex: 0,
      items: [
        { reviewText: 'Quiet room with a great view', pageNumber: 1 },
        { reviewText: 'Breakfast was fresh and varied', pageNumber: 1 },
      ],
      rawItemCount: 2,
      hasNext: true,
    });
    expect(listing.clicks).toBe(0);
  });

  it('clicks forward to reach a later page', async () => {
    const source = await site.openReviews(hotel);
    const third = await source.fetchPage(2);

    expect(listing.clicks).toBe(2);
    expect(third.items.map((review) => review.pageNumber)).toEqual([3, 3]);
    expect(third.hasNext).toBe(false);
  });

  it('advances one click per page when read in order', async () => {
    const source = await site.openReviews(hotel);

    for (const pageIndex of [0, 1, 2]) {
      await source.fetchPage(pageIndex);
    }

    expect(listing.clicks).toBe(2);
  });

  it('throws when the next button is gone before the requested page', async () => {
    const source = await site.openReviews(hotel);
    await source.fetchPage(2);

    await expect(source.fetchPage(3)).rejects.toThrow(
      'Review page 4 is not reachable',
    );
    expect(listing.clicks).toBe(2);
  });

  it('throws when pagination disappears mid-listing', async () => {
    const source = await site.openReviews(hotel);
    listing.nextHidden = true;

    await expect(source.fetchPage(1)).rejects.toThrow(
      'Review page 2 is not reachable',
    );
    expect(listing.clicks).toBe(0);
  });

  it('closes its page', async () => {
    const source = await site.openReviews(hotel);
    await source.close();

    expect(page.close).toHaveBeenCalledTimes(1);
  });

  it('closes the page and rethrows when the tab cannot be opened', async () => {
    page.goto.mockRejectedValue(new Error('net::ERR_CONNECTION_RESET'));

    await expect(site.openReviews(hotel)).rejects.toBeInstanceOf(
      NavigationFailureError,
    );
    expect(page.close).toHaveBeenCalledTimes(1);
  });
});

import {
  buildReviewsUrl,
  buildSearchUrl,
  hotelIdFromUrl,
  isValidReviewText,
  isValidReviewerName,
  nightsBetween,
  normalizeImageUrl,
  parseLatLng,
  parsePrice,
  parseRating,
  parseReviewCount,
} from './booking-parsers';

describe('booking parsers', () => {
  it('parses prices and drops values outside the plausible range', () => {
    expect(parsePrice('AED 1,250')).toBe(1250);
    expect(parsePrice('From US$45.50 per night')).toBe(45.5);
    expect(parsePrice('€ 5')).toBeUndefined();
    expect(parsePrice('Sold out')).toBeUndefined();
    expect(parsePrice(null)).toBeUndefined();
  });

  it('parses review scores on a 1..10 scale', () => {
    expect(parseRating('Scored 8.7')).toBe(8.7);
    expect(parseRating('9')).toBe(9);
    expect(parseRating('Scored 0')).toBeUndefined();
    expect(parseRating('no score')).toBeUndefined();
  });

  it('parses review counts with thousand separators', () => {
    expect(parseReviewCount('1,234 reviews')).toBe(1234);
    expect(parseReviewCount('Very good · 268 reviews')).toBe(268);
    expect(parseReviewCount('1 review')).toBe(1);
    expect(parseReviewCount('Wonderful')).toBeUndefined();
  });

  it('builds a search url from the query', () => {
    expect(
      buildSearchUrl({
        location: 'Dubai Marina',
        checkIn: '2026-11-01',
        checkOut: '2026-11-04',
        adults: 2,
        rooms: 1,
        maxResults: 10,
      }),
    ).toBe(
      'https://www.booking.com/searchresults.html?ss=Dubai+Marina&checkin=2026-11-01&checkout=2026-11-04&group_adults=2&no_rooms=1&offset=0',
    );
  });

  it('points the reviews url at the reviews tab', () => {
    expect(
      buildReviewsUrl('https://www.booking.com/hotel/ae/marina-view.html?aid=1#map'),
    ).toBe('https://www.booking.com/hotel/ae/marina-view.html#tab-reviews');
  });

  it('derives the same id for the same property slug', () => {
    const a = hotelIdFromUrl('https://www.booking.com/hotel/ae/marina-view.html?aid=1');
    const b = hotelIdFromUrl('/hotel/ae/marina-view.html?aid=2');
    expect(a).toBe(b);
    expect(a).toMatch(/^[0-9a-f]{8}$/);
  });

  it('validates review text and reviewer names', () => {
    expect(isValidReviewText('Great location near the beach')).toBe(true);
    expect(isValidReviewText('Good')).toBe(false);
    expect(isValidReviewerName('Fatima')).toBe(true);
    expect(isValidReviewerName('Anonymous')).toBe(false);
    expect(isValidReviewerName('12')).toBe(false);
  });

  it('normalizes image urls', () => {
    expect(
      normalizeImageUrl('//cf.bstatic.com/images/hotel/max1024x768/1.jpg?k=abc'),
    ).toBe('https://cf.bstatic.com/images/hotel/max1024x768/1.jpg');
    expect(normalizeImageUrl('http://cf.bstatic.com/a.jpg')).toBe(
      'https://cf.bstatic.com/a.jpg',
    );
  });

  it('parses coordinates', () => {
    expect(parseLatLng('25.0805, 55.1403')).toEqual({
      latitude: 25.0805,
      longitude: 55.1403,
    });
    expect(parseLatLng('91,10')).toBeUndefined();
    expect(parseLatLng('25.08')).toBeUndefined();
  });

  it('counts nights between two dates', () => {
    expect(nightsBetween('2026-11-01', '2026-11-04')).toBe(3);
    expect(nightsBetween('2026-11-04', '2026-11-01')).toBe(-3);
  });
});

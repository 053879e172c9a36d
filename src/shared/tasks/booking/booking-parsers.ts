import { createHash } from 'crypto';
import type { HotelSearchQuery } from './booking.types';

export const BOOKING_BASE_URL = 'https://www.booking.com';

const PRICE_NOISE = /from\s+|per\s+night|USD|AED|SAR|EUR|€|\$|£/gi;
const MIN_PRICE = 10;
const MAX_PRICE = 50_000;

const GENERIC_REVIEWER_NAMES = [
  'wonderful',
  'excellent',
  'great',
  'good',
  'nice',
  'anonymous',
  'guest',
  'user',
  'reviewer',
  'customer',
];

export function parsePrice(text: string | null | undefined): number | undefined {
  if (!text) return undefined;
  const match = text.replace(PRICE_NOISE, '').match(/\d[\d,]*(?:\.\d+)?/);
  if (!match) return undefined;

  const price = Number(match[0].replace(/,/g, ''));
  if (!Number.isFinite(price) || price < MIN_PRICE || price > MAX_PRICE) {
    return undefined;
  }
  return price;
}

/** Review scores are on a 1..10 scale; anything else is noise. */
export function parseRating(text: string | null | undefined): number | undefined {
  if (!text) return undefined;
  const match = text.match(/\d+(?:\.\d+)?/);
  if (!match) return undefined;

  const rating = Number(match[0]);
  return rating >= 1 && rating <= 10 ? rating : undefined;
}

export function parseReviewCount(
  text: string | null | undefined,
): number | undefined {
  if (!text) return undefined;
  const match = text.match(/(\d[\d,.]*)\s*reviews?/i);
  if (!match) return undefined;

  const count = Number(match[1].replace(/[,.]/g, ''));
  return Number.isInteger(count) ? count : undefined;
}

/** Short stable id derived from the property slug in a hotel URL. */
export function hotelIdFromUrl(url: string): string {
  let slug: string | undefined;
  try {
    slug = new URL(url, BOOKING_BASE_URL).pathname
      .split('/')
      .find((part) => part.length > 5 && !/^\d+$/.test(part));
  } catch {
    slug = undefined;
  }
  return createHash('md5')
    .update(slug ?? url)
    .digest('hex')
    .slice(0, 8);
}

export function absoluteBookingUrl(href: string): string {
  return href.startsWith('/') ? `${BOOKING_BASE_URL}${href}` : href;
}

export function buildSearchUrl(query: HotelSearchQuery): string {
  const params = new URLSearchParams({
    ss: query.location,
    checkin: query.checkIn,
    checkout: query.checkOut,
    group_adults: String(query.adults),
    no_rooms: String(query.rooms),
    offset: '0',
  });
  return `${BOOKING_BASE_URL}/searchresults.html?${params.toString()}`;
}

export function buildReviewsUrl(bookingUrl: string): string {
  const base = bookingUrl.split('#')[0].split('?')[0];
  return `${base}#tab-reviews`;
}

export function isValidReviewText(text: string): boolean {
  const trimmed = text.trim();
  return trimmed.length >= 10 && trimmed.split(/\s+/).length >= 3;
}

export function isValidReviewerName(name: string): boolean {
  const trimmed = name.trim();
  if (trimmed.length < 2 || !/[a-zA-Z]/.test(trimmed)) return false;
  const lower = trimmed.toLowerCase();
  return !GENERIC_REVIEWER_NAMES.some((generic) => lower.includes(generic));
}

/** Drops the size token and forces https so image URLs point at the full asset. */
export function normalizeImageUrl(url: string): string {
  let normalized = url.replace(/[?&]k=[^&]+/g, '');
  if (normalized.startsWith('//')) {
    normalized = `https:${normalized}`;
  } else if (normalized.startsWith('http:')) {
    normalized = `https:${normalized.slice('http:'.length)}`;
  }
  return normalized;
}

export function parseLatLng(
  value: string | null | undefined,
): { latitude: number; longitude: number } | undefined {
  if (!value) return undefined;
  const parts = value.split(',').map((part) => Number(part.trim()));
  if (parts.length !== 2) return undefined;

  const [latitude, longitude] = parts;
  if (
    !Number.isFinite(latitude) ||
    !Number.isFinite(longitude) ||
    Math.abs(latitude) > 90 ||
    Math.abs(longitude) > 180
  ) {
    return undefined;
  }
  return { latitude, longitude };
}

export function googleMapsUrl(latitude: number, longitude: number): string {
  return `https://www.google.com/maps?q=${latitude},${longitude}`;
}

export function nightsBetween(checkIn: string, checkOut: string): number {
  const start = Date.parse(`${checkIn}T00:00:00Z`);
  const end = Date.parse(`${checkOut}T00:00:00Z`);
  return Math.round((end - start) / 86_400_000);
}

export function isoDateFromToday(days: number, today = new Date()): string {
  const date = new Date(today.getTime() + days * 86_400_000);
  return date.toISOString().slice(0, 10);
}

import { CATEGORY_RULES, firstMatch } from '../config/businessCategories';
import { Business, RawPlaceRecord, WEEKDAYS, WeeklyHours } from '../types/business';
import { clamp } from '../utils/numbers';
import { isRecord, parseInteger, parseNumber, parseText, withDefault } from './fieldParsers';

/** Name placeholder used upstream for records without a name; such records are dropped */
export const UNKNOWN_BUSINESS_NAME = 'Unknown Business';

const STREET_SUFFIXES: Readonly<Record<string, string>> = Object.freeze({
  st: 'Street',
  ave: 'Avenue',
  blvd: 'Boulevard',
  rd: 'Road',
  dr: 'Drive',
});

const STREET_SUFFIX_PATTERN = /\b(st|ave|blvd|rd|dr)\b/gi;
const DISALLOWED_CHARS = /[^\p{L}\p{N}_\s\-.,]/gu;
const HOURS_RANGE_PATTERN =
  /(\d{1,2}(?::\d{2})?\s*(?:AM|PM)?)\s*-\s*(\d{1,2}(?::\d{2})?\s*(?:AM|PM)?)/i;

/**
 * Strip characters outside word characters, whitespace, hyphen, period and
 * comma, then collapse whitespace. Non-string input yields ''.
 */
export function cleanText(value: unknown): string {
  if (typeof value !== 'string') return '';
  return value.replace(DISALLOWED_CHARS, '').replace(/\s+/g, ' ').trim();
}

/** Upper-cases the first letter of every run of letters and lower-cases the rest */
export function titleCase(text: string): string {
  return text.replace(/\p{L}+/gu, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

export function cleanAddress(value: unknown): string {
  const cleaned = cleanText(value);
  if (!cleaned) return '';
  const expanded = cleaned.replace(
    STREET_SUFFIX_PATTERN,
    (suffix) => STREET_SUFFIXES[suffix.toLowerCase()] ?? suffix,
  );
  return titleCase(expanded);
}

export function standardizeCategory(value: unknown): string {
  const category = typeof value === 'string' ? value : '';
  if (!category) return 'Other';
  return firstMatch(category, CATEGORY_RULES) ?? titleCase(category);
}

/** US-style formatting for 10-digit (or 1 + 10-digit) numbers; anything else is returned as given */
export function cleanPhone(value: unknown): string {
  const phone = withDefault(parseText(value), '');
  if (!phone) return '';

  const digits = phone.replace(/\D/g, '');
  if (digits.length === 10) {
    return `(${digits.slice(0, 3)}) ${digits.slice(3, 6)}-${digits.slice(6)}`;
  }
  if (digits.length === 11 && digits.startsWith('1')) {
    return `(${digits.slice(1, 4)}) ${digits.slice(4, 7)}-${digits.slice(7)}`;
  }
  return phone;
}

export function cleanUrl(value: unknown): string {
  if (typeof value !== 'string') return '';
  const url = value.trim();
  if (!url) return '';
  return /^https?:\/\//.test(url) ? url : `https://${url}`;
}

/**
 * Accepts either a weekday-keyed mapping (keys matched case-insensitively) or a
 * "Mon-Fri 9AM-5PM" style string, which fills Monday to Friday only.
 */
export function parseHours(value: unknown): WeeklyHours {
  const hours: WeeklyHours = {};

  if (isRecord(value)) {
    const byLowerKey = new Map(Object.entries(value).map(([k, v]) => [k.toLowerCase(), v]));
    for (const day of WEEKDAYS) {
      const text = withDefault(parseText(byLowerKey.get(day.toLowerCase())), '').trim();
      if (text) hours[day] = text;
    }
    return hours;
  }

  if (typeof value === 'string' && value.toLowerCase().includes('mon-fri')) {
    const match = HOURS_RANGE_PATTERN.exec(value);
    if (match) {
      const range = `${match[1]} - ${match[2]}`;
      for (const day of WEEKDAYS.slice(0, 5)) {
        hours[day] = range;
      }
    }
  }

  return hours;
}

/**
 * Normalize one upstream record. Returns null when the record has no usable
 * name; every other field degrades to its default.
 */
export function toBusiness(raw: RawPlaceRecord): Business | null {
  const name = cleanText(raw.name ?? UNKNOWN_BUSINESS_NAME);
  if (!name || name === UNKNOWN_BUSINESS_NAME) return null;

  return {
    id: withDefault(parseText(raw.id), ''),
    name,
    category: standardizeCategory(raw.category ?? 'Other'),
    address: cleanAddress(raw.address),
    distance: Math.max(0, withDefault(parseInteger(raw.distance), 0)),
    rating: clamp(withDefault(parseNumber(raw.rating), 0), 0, 5),
    latitude: clamp(withDefault(parseNumber(raw.latitude), 0), -180, 180),
    longitude: clamp(withDefault(parseNumber(raw.longitude), 0), -180, 180),
    priceLevel: withDefault(parseNumber(raw.price_level ?? raw.priceLevel), 0),
    phone: cleanPhone(raw.phone),
    website: cleanUrl(raw.website),
    hours: parseHours(raw.hours),
  };
}

/** Clean a batch of upstream records, preserving order and skipping unusable ones */
export function cleanBusinessRecords(records: readonly unknown[]): Business[] {
  const cleaned: Business[] = [];
  for (const record of records) {
    if (!isRecord(record)) continue;
    const business = toBusiness(record);
    if (business) cleaned.push(business);
  }
  return cleaned;
}

/**
 * Domain types shared by the cleaning, scoring and reporting layers.
 */

export const WEEKDAYS = [
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
  'Sunday',
] as const;

export type Weekday = (typeof WEEKDAYS)[number];

/** Free-text opening hours keyed by weekday; days without data are absent */
export type WeeklyHours = Partial<Record<Weekday, string>>;

/** Loosely-typed record as handed over by a places data source */
export type RawPlaceRecord = Record<string, unknown>;

/** Canonical business entity produced by the record cleaner */
export interface Business {
  id: string;
  name: string;
  category: string;
  address: string;
  /** Metres from the search centre */
  distance: number;
  /** 0–5 */
  rating: number;
  latitude: number;
  longitude: number;
  /** 0–4, as reported upstream */
  priceLevel: number;
  phone: string;
  website: string;
  hours: WeeklyHours;
}

export const BUSINESS_TYPES = [
  'restaurant',
  'retail',
  'fitness',
  'beauty',
  'professional',
  'healthcare',
  'education',
  'general',
] as const;

export type BusinessType = (typeof BUSINESS_TYPES)[number];

export interface AddressComponents {
  street?: string;
  city?: string;
  state?: string;
}

export interface ValidatedLocation {
  original: string;
  cleaned: string;
  /** [lat, lng] */
  coordinates: [number, number] | null;
  addressComponents: AddressComponents;
}

export interface ValidatedBusinessType {
  original: string;
  /** One of BUSINESS_TYPES, or the lower-cased input when nothing matched */
  standardized: string;
  categoryKeywords: readonly string[];
}

export interface ValidatedRequest {
  location?: ValidatedLocation;
  businessType?: ValidatedBusinessType;
  radius?: number;
  /** ISO-8601 */
  processedAt: string;
}

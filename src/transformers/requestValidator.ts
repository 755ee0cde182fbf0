import { BUSINESS_TYPE_RULES, firstMatch, keywordsForBusinessType } from '../config/businessCategories';
import {
  AddressComponents,
  ValidatedBusinessType,
  ValidatedLocation,
  ValidatedRequest,
} from '../types/business';
import { clamp } from '../utils/numbers';
import { cleanText } from './businessRecordCleaner';
import { parseInteger } from './fieldParsers';

export const MIN_RADIUS = 100;
export const MAX_RADIUS = 10_000;

/**
 * Best-effort split of "street, city, state". Not geocoding: the first segment
 * is the street, the second-to-last the city and the last the state.
 */
export function parseAddress(address: string): AddressComponents {
  if (!address) return {};
  const parts = address.split(',').map((p) => p.trim());
  const components: AddressComponents = { street: parts[0] };
  if (parts.length >= 2) components.city = parts[parts.length - 2];
  if (parts.length >= 3) components.state = parts[parts.length - 1];
  return components;
}

/** [lat, lng] from a two-element numeric sequence inside the valid ranges, else null */
export function extractCoordinates(value: unknown): [number, number] | null {
  if (!Array.isArray(value) || value.length !== 2) return null;
  const [lat, lng]: unknown[] = value;
  if (typeof lat !== 'number' || typeof lng !== 'number') return null;
  if (!Number.isFinite(lat) || !Number.isFinite(lng)) return null;
  if (lat < -90 || lat > 90 || lng < -180 || lng > 180) return null;
  return [lat, lng];
}

/**
 * Map free text onto the business-type vocabulary by the first matching keyword
 * rule, vocabulary words included ("healthcare" contains "health"). Unmatched
 * input comes back lower-cased rather than as "general".
 */
export function standardizeBusinessType(value: string): string {
  const lower = value.toLowerCase().trim();
  if (!lower) return 'general';
  return firstMatch(lower, BUSINESS_TYPE_RULES) ?? lower;
}

export function clampRadius(radius: number): number {
  return clamp(radius, MIN_RADIUS, MAX_RADIUS);
}

function validateLocation(raw: Record<string, unknown>): ValidatedLocation {
  const original = typeof raw.location === 'string' ? raw.location : '';
  return {
    original,
    cleaned: cleanText(original),
    coordinates: extractCoordinates(raw.coordinates),
    addressComponents: parseAddress(original),
  };
}

function validateBusinessType(value: unknown): ValidatedBusinessType {
  const original = typeof value === 'string' ? value : '';
  const standardized = standardizeBusinessType(original);
  return {
    original,
    standardized,
    categoryKeywords: keywordsForBusinessType(standardized) ?? [],
  };
}

/**
 * Normalize caller-supplied request parameters. Keys absent from `raw` stay
 * absent from the result; nothing here throws. Presence of the required keys is
 * enforced by the routes.
 */
export function validateRequest(raw: Record<string, unknown>, now: Date = new Date()): ValidatedRequest {
  const validated: ValidatedRequest = { processedAt: now.toISOString() };

  if ('location' in raw) {
    validated.location = validateLocation(raw);
  }

  if ('business_type' in raw) {
    validated.businessType = validateBusinessType(raw.business_type);
  }

  if ('radius' in raw) {
    const radius = parseInteger(raw.radius);
    if (radius.ok) validated.radius = clampRadius(radius.value);
  }

  return validated;
}

import { BUSINESS_TYPES, BusinessType } from '../types/business';

type KeywordRule<T extends string> = readonly [keyword: string, value: T];

/**
 * Keyword → standardized category label. Evaluated in order, first match wins:
 * "pizza" must be tested before "restaurant" and "coffee" before "shop" so that
 * an already-standardized label maps back onto itself.
 */
export const CATEGORY_RULES: readonly KeywordRule<string>[] = Object.freeze([
  ['coffee', 'Coffee Shop'],
  ['cafe', 'Coffee Shop'],
  ['pizza', 'Pizza Restaurant'],
  ['restaurant', 'Restaurant'],
  ['fast food', 'Fast Food'],
  ['gym', 'Fitness Center'],
  ['fitness', 'Fitness Center'],
  ['salon', 'Beauty Salon'],
  ['spa', 'Beauty Salon'],
  ['store', 'Retail Store'],
  ['shop', 'Retail Store'],
  ['clinic', 'Healthcare'],
  ['doctor', 'Healthcare'],
] as const);

/** Free-text business type → canonical type, first match wins */
export const BUSINESS_TYPE_RULES: readonly KeywordRule<BusinessType>[] = Object.freeze([
  ['food', 'restaurant'],
  ['dining', 'restaurant'],
  ['cafe', 'restaurant'],
  ['coffee', 'restaurant'],
  ['shop', 'retail'],
  ['store', 'retail'],
  ['boutique', 'retail'],
  ['gym', 'fitness'],
  ['health', 'fitness'],
  ['wellness', 'fitness'],
  ['salon', 'beauty'],
  ['spa', 'beauty'],
  ['barber', 'beauty'],
  ['office', 'professional'],
  ['service', 'professional'],
  ['clinic', 'healthcare'],
  ['medical', 'healthcare'],
  ['school', 'education'],
  ['training', 'education'],
] as const);

/** Keywords that mark a business (by category or name) as a competitor of the given type */
export const BUSINESS_CATEGORY_KEYWORDS: Readonly<Record<Exclude<BusinessType, 'general'>, readonly string[]>> =
  Object.freeze({
    restaurant: ['restaurant', 'cafe', 'bar', 'food', 'dining', 'pizza', 'burger', 'coffee'],
    retail: ['store', 'shop', 'boutique', 'market', 'mall', 'clothing', 'electronics'],
    fitness: ['gym', 'fitness', 'yoga', 'studio', 'wellness', 'health club', 'crossfit'],
    beauty: ['salon', 'spa', 'barber', 'nail', 'beauty', 'cosmetics', 'massage'],
    professional: ['office', 'law', 'accounting', 'consulting', 'real estate', 'insurance'],
    healthcare: ['clinic', 'doctor', 'dental', 'medical', 'pharmacy', 'hospital'],
    education: ['school', 'college', 'university', 'training', 'education', 'tutoring'],
  });

export function isBusinessType(value: string): value is BusinessType {
  return (BUSINESS_TYPES as readonly string[]).includes(value);
}

/** Competitor keywords for a business type, or undefined when the type has none */
export function keywordsForBusinessType(type: string): readonly string[] | undefined {
  if (!isBusinessType(type) || type === 'general') return undefined;
  return BUSINESS_CATEGORY_KEYWORDS[type];
}

export function firstMatch<T extends string>(
  text: string,
  rules: readonly KeywordRule<T>[],
): T | undefined {
  const lower = text.toLowerCase();
  return rules.find(([keyword]) => lower.includes(keyword))?.[1];
}

import { keywordsForBusinessType } from '../config/businessCategories';
import { Business } from '../types/business';
import { mean, roundTo } from '../utils/numbers';

export type Tier = 'Low' | 'Medium' | 'High';
export type GapSeverity = 'Critical' | 'High' | 'Medium' | 'Low';

export interface CategoryShare {
  count: number;
  /** 0–100, one decimal */
  percentage: number;
}

export interface MarketDensity {
  densityScore: number;
  businessesPerKm2: number;
  categoryDistribution: Record<string, CategoryShare>;
  saturationLevel: Tier;
  totalBusinesses: number;
}

export interface PriceAnalysis {
  average: number;
  distribution: {
    budget?: number;
    moderate?: number;
    expensive?: number;
    veryExpensive?: number;
  };
  recommendation: string;
}

export interface MarketLeader {
  name: string;
  rating: number;
  distance: number;
  score: number;
}

export interface CompetitionStrength {
  competitionStrength: Tier;
  averageRating: number;
  priceAnalysis: PriceAnalysis;
  marketLeaders: MarketLeader[];
  weakCompetitors: Business[];
  competitorCount: number;
}

export interface MarketGap {
  businessType: string;
  currentCount: number;
  expectedCount: number;
  gapSize: number;
  severity: GapSeverity;
  opportunityScore: number;
}

export interface LocationFactors {
  businessDensity: number;
  businessDiversity: number;
  areaQuality: number;
}

export interface LocationScore {
  score: number;
  factors: Partial<LocationFactors>;
  recommendation: string;
}

export interface HealthIndicators {
  businessDiversity: number;
  serviceQuality: number;
  marketActivity: number;
}

export interface MarketHealth {
  healthScore: number;
  indicators: Partial<HealthIndicators>;
  assessment: string;
}

export interface MarketOverview {
  totalBusinesses: number;
  /** Standardized category label → number of businesses */
  categories: Record<string, number>;
  marketScore: number;
  opportunityCount: number;
  saturationLevel: Tier;
  location: string;
  radius: number;
}

interface ExpectedBusiness {
  businessType: string;
  expectedCount: number;
  keywords: readonly string[];
}

/** Baseline composition of a balanced neighbourhood */
const EXPECTED_BUSINESSES: readonly ExpectedBusiness[] = Object.freeze([
  { businessType: 'Coffee Shop', expectedCount: 3, keywords: ['coffee', 'cafe'] },
  { businessType: 'Restaurant', expectedCount: 8, keywords: ['restaurant', 'dining', 'food'] },
  { businessType: 'Convenience Store', expectedCount: 2, keywords: ['convenience', 'market', 'corner'] },
  { businessType: 'Fitness Center', expectedCount: 2, keywords: ['fitness', 'gym', 'health'] },
  { businessType: 'Beauty Salon', expectedCount: 2, keywords: ['salon', 'beauty', 'spa'] },
  { businessType: 'Pharmacy', expectedCount: 1, keywords: ['pharmacy', 'drug', 'cvs', 'walgreens'] },
  { businessType: 'Bank/ATM', expectedCount: 1, keywords: ['bank/atm'] },
  { businessType: 'Gas Station', expectedCount: 1, keywords: ['gas'] },
  { businessType: 'Grocery Store', expectedCount: 2, keywords: ['grocery', 'supermarket', 'food store'] },
  { businessType: 'Auto Services', expectedCount: 2, keywords: ['auto'] },
]);

const DEFAULT_RADIUS_METRES = 1000;
/** Mean rating assumed for an area where nothing is rated */
const UNRATED_AREA_RATING = 3.5;

function countByCategory(businesses: readonly Business[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const b of businesses) {
    counts.set(b.category, (counts.get(b.category) ?? 0) + 1);
  }
  return counts;
}

function ratedValues(businesses: readonly Business[]): number[] {
  return businesses.map((b) => b.rating).filter((r) => r > 0);
}

function distinctCategories(businesses: readonly Business[]): number {
  return new Set(businesses.map((b) => b.category)).size;
}

function containsAny(text: string, keywords: readonly string[]): boolean {
  const lower = text.toLowerCase();
  return keywords.some((k) => lower.includes(k));
}

export function saturationFromScore(densityScore: number): Tier {
  if (densityScore < 3) return 'Low';
  if (densityScore < 7) return 'Medium';
  return 'High';
}

export function calculateMarketDensity(
  businesses: readonly Business[],
  radius: number = DEFAULT_RADIUS_METRES,
): MarketDensity {
  if (businesses.length === 0) {
    return {
      densityScore: 0,
      businessesPerKm2: 0,
      categoryDistribution: {},
      saturationLevel: 'Low',
      totalBusinesses: 0,
    };
  }

  const total = businesses.length;
  const areaKm2 = Math.PI * (radius / 1000) ** 2;
  const perKm2 = areaKm2 > 0 ? total / areaKm2 : 0;
  const densityScore = Math.min(10, perKm2 / 10);

  const categoryDistribution: Record<string, CategoryShare> = {};
  for (const [category, count] of countByCategory(businesses)) {
    categoryDistribution[category] = { count, percentage: roundTo((count / total) * 100, 1) };
  }

  return {
    densityScore: roundTo(densityScore, 1),
    businessesPerKm2: roundTo(perKm2, 1),
    categoryDistribution,
    saturationLevel: saturationFromScore(densityScore),
    totalBusinesses: total,
  };
}

/** Competitors whose category or name carries one of the type's keywords; unknown types keep everyone */
export function filterRelevantCompetitors(
  competitors: readonly Business[],
  businessType: string,
): Business[] {
  const keywords = keywordsForBusinessType(businessType);
  if (!keywords) return [...competitors];
  return competitors.filter((c) => containsAny(c.category, keywords) || containsAny(c.name, keywords));
}

export function analyzePriceDistribution(priceLevels: readonly number[]): PriceAnalysis {
  if (priceLevels.length === 0) {
    return { average: 0, distribution: {}, recommendation: 'Medium pricing' };
  }

  const total = priceLevels.length;
  const share = (level: number): number =>
    roundTo((priceLevels.filter((p) => p === level).length / total) * 100, 1);
  const average = mean(priceLevels);

  let recommendation: string;
  if (average < 2) {
    recommendation = 'Consider moderate pricing for differentiation';
  } else if (average > 3) {
    recommendation = 'Budget-friendly pricing could capture underserved market';
  } else {
    recommendation = 'Competitive pricing environment - focus on value';
  }

  return {
    average: roundTo(average, 1),
    distribution: {
      budget: share(1),
      moderate: share(2),
      expensive: share(3),
      veryExpensive: share(4),
    },
    recommendation,
  };
}

export function identifyMarketLeaders(competitors: readonly Business[]): MarketLeader[] {
  return competitors
    .map((c) => ({
      name: c.name,
      rating: c.rating,
      distance: c.distance,
      score: roundTo(c.rating * 0.6 + (1 / Math.max(1, c.distance / 100)) * 0.4, 2),
    }))
    .sort((a, b) => b.score - a.score)
    .slice(0, 3);
}

/** Up to three competitors rated below 3.5 (unrated entries count as 0) */
export function identifyWeakCompetitors(competitors: readonly Business[]): Business[] {
  return competitors.filter((c) => c.rating < 3.5).slice(0, 3);
}

export function competitionStrengthTier(competitorCount: number, averageRating: number): Tier {
  const combined = Math.min(1, competitorCount / 10) * 0.6 + (averageRating / 5) * 0.4;
  if (combined < 0.3) return 'Low';
  if (combined < 0.7) return 'Medium';
  return 'High';
}

export function analyzeCompetitionStrength(
  competitors: readonly Business[],
  businessType: string,
): CompetitionStrength {
  const relevant = filterRelevantCompetitors(competitors, businessType);
  const averageRating = mean(ratedValues(relevant));
  const priceLevels = relevant.map((c) => c.priceLevel).filter((p) => p > 0);

  return {
    competitionStrength: competitionStrengthTier(relevant.length, averageRating),
    averageRating: roundTo(averageRating, 1),
    priceAnalysis: analyzePriceDistribution(priceLevels),
    marketLeaders: identifyMarketLeaders(relevant),
    weakCompetitors: identifyWeakCompetitors(relevant),
    competitorCount: relevant.length,
  };
}

export function gapSeverity(current: number, expected: number): GapSeverity {
  const ratio = (expected - current) / expected;
  if (ratio >= 0.8) return 'Critical';
  if (ratio >= 0.5) return 'High';
  if (ratio >= 0.3) return 'Medium';
  return 'Low';
}

export function gapOpportunityScore(current: number, expected: number, totalBusinesses: number): number {
  const marketSizeFactor = Math.min(2, totalBusinesses / 50);
  return roundTo(Math.min(10, (expected - current) * 2 * marketSizeFactor), 1);
}

export function identifyMarketGaps(businesses: readonly Business[]): MarketGap[] {
  const counts = countByCategory(businesses);
  const gaps: MarketGap[] = [];

  for (const { businessType, expectedCount, keywords } of EXPECTED_BUSINESSES) {
    let currentCount = 0;
    for (const [category, count] of counts) {
      if (containsAny(category, keywords)) currentCount += count;
    }
    if (currentCount >= expectedCount) continue;

    gaps.push({
      businessType,
      currentCount,
      expectedCount,
      gapSize: expectedCount - currentCount,
      severity: gapSeverity(currentCount, expectedCount),
      opportunityScore: gapOpportunityScore(currentCount, expectedCount, businesses.length),
    });
  }

  return gaps.sort((a, b) => b.opportunityScore - a.opportunityScore);
}

/** Medium density scores best: ramps up to 7 below 20 businesses, 10 up to 49, then decays to a floor of 3 */
export function densityFactor(count: number): number {
  if (count < 20) return (count / 20) * 7;
  if (count < 50) return 10;
  return Math.max(3, 10 - (count - 50) / 10);
}

function locationRecommendation(score: number): string {
  if (score >= 8) return 'Excellent location with strong market potential';
  if (score >= 6) return 'Good location with moderate opportunities';
  if (score >= 4) return 'Average location - consider market positioning carefully';
  return 'Challenging location - strong differentiation required';
}

export function calculateLocationScore(businesses: readonly Business[]): LocationScore {
  if (businesses.length === 0) {
    return { score: 5.0, factors: {}, recommendation: locationRecommendation(5.0) };
  }

  const factors: LocationFactors = {
    businessDensity: roundTo(densityFactor(businesses.length), 1),
    businessDiversity: roundTo(Math.min(10, distinctCategories(businesses) / 3), 1),
    areaQuality: roundTo((mean(ratedValues(businesses), UNRATED_AREA_RATING) / 5) * 10, 1),
  };

  const overall =
    factors.businessDensity * 0.4 + factors.businessDiversity * 0.3 + factors.areaQuality * 0.3;

  return {
    score: roundTo(overall, 1),
    factors,
    recommendation: locationRecommendation(overall),
  };
}

function healthAssessment(score: number): string {
  if (score >= 8) return 'Thriving market with strong fundamentals';
  if (score >= 6) return 'Healthy market with good potential';
  if (score >= 4) return 'Developing market with mixed indicators';
  return 'Challenging market conditions - careful analysis required';
}

export function calculateMarketHealth(businesses: readonly Business[]): MarketHealth {
  if (businesses.length === 0) {
    return { healthScore: 0, indicators: {}, assessment: healthAssessment(0) };
  }

  const indicators: HealthIndicators = {
    businessDiversity: roundTo(Math.min(10, distinctCategories(businesses) / 2), 1),
    serviceQuality: roundTo((mean(ratedValues(businesses), UNRATED_AREA_RATING) / 5) * 10, 1),
    marketActivity: roundTo(Math.min(10, businesses.length / 5), 1),
  };

  const healthScore =
    indicators.businessDiversity * 0.3 + indicators.serviceQuality * 0.4 + indicators.marketActivity * 0.3;

  return {
    healthScore: roundTo(healthScore, 1),
    indicators,
    assessment: healthAssessment(healthScore),
  };
}

function saturationFromCount(count: number): Tier {
  if (count < 20) return 'Low';
  if (count < 50) return 'Medium';
  return 'High';
}

/** Category composition of an area, the input to opportunity identification */
export function summarizeMarket(
  businesses: readonly Business[],
  location: string,
  radius: number,
): MarketOverview {
  const total = businesses.length;
  return {
    totalBusinesses: total,
    categories: Object.fromEntries(countByCategory(businesses)),
    marketScore: Math.min(10, Math.max(1, total / 10)),
    opportunityCount: Math.max(0, 15 - Math.floor(total / 5)),
    saturationLevel: saturationFromCount(total),
    location,
    radius,
  };
}

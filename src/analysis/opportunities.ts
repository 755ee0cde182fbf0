import { roundTo } from '../utils/numbers';

export interface Opportunity {
  category: string;
  score: number;
  description: string;
  icon: string;
  marketGap: number;
}

/** Category-count summary, typically from `summarizeMarket` */
export interface CategorySummary {
  categories: Record<string, number>;
  totalBusinesses: number;
}

interface OpportunityCategory {
  name: string;
  /** Opportunity exists while the local count is at or below this */
  threshold: number;
  icon: string;
  multiplier: number;
  describe: (count: number) => string;
}

const OPPORTUNITY_CATEGORIES: readonly OpportunityCategory[] = Object.freeze([
  {
    name: 'Specialty Coffee Shop',
    threshold: 2,
    icon: 'fa-coffee',
    multiplier: 1.2,
    describe: (n: number) =>
      `High demand area with only ${n} specialty coffee options. Strong foot traffic from nearby offices and residential areas.`,
  },
  {
    name: 'Fitness Studio',
    threshold: 3,
    icon: 'fa-dumbbell',
    multiplier: 1.1,
    describe: (n: number) =>
      `Growing residential area with ${n} fitness options. Young professional demographic seeking convenient workout solutions.`,
  },
  {
    name: 'Pet Services',
    threshold: 1,
    icon: 'fa-paw',
    multiplier: 1.3,
    describe: (n: number) =>
      `High pet ownership density with minimal grooming and pet care services. Only ${n} competitors identified.`,
  },
  {
    name: 'Coworking Space',
    threshold: 1,
    icon: 'fa-laptop',
    multiplier: 1.4,
    describe: (n: number) =>
      `Emerging business district with ${n} coworking options. Remote workers and freelancers need flexible workspace.`,
  },
  {
    name: 'Healthy Fast Food',
    threshold: 5,
    icon: 'fa-leaf',
    multiplier: 1.1,
    describe: (n: number) =>
      `Health-conscious area with limited quick healthy dining options. Gap in market for ${n} existing providers.`,
  },
  {
    name: 'Mobile Phone Repair',
    threshold: 2,
    icon: 'fa-mobile-alt',
    multiplier: 1.0,
    describe: (n: number) =>
      `Tech-savvy area with ${n} repair shops. High smartphone usage creates consistent demand.`,
  },
  {
    name: 'Tutoring Center',
    threshold: 2,
    icon: 'fa-graduation-cap',
    multiplier: 1.0,
    describe: (n: number) =>
      `Family-oriented neighborhood with ${n} educational support services. Strong demand for academic assistance.`,
  },
  {
    name: 'Laundromat',
    threshold: 1,
    icon: 'fa-tshirt',
    multiplier: 1.0,
    describe: (n: number) =>
      `Residential area with ${n} laundry services. Apartment dwellers need convenient laundry solutions.`,
  },
]);

const MAX_OPPORTUNITIES = 6;

/** Number of businesses whose label contains any word of the opportunity name */
function existingCount(name: string, categories: Record<string, number>): number {
  const keywords = name.toLowerCase().split(/\s+/);
  let total = 0;
  for (const [label, count] of Object.entries(categories)) {
    const lower = label.toLowerCase();
    if (keywords.some((k) => lower.includes(k))) total += count;
  }
  return total;
}

export function opportunityScore(
  currentCount: number,
  threshold: number,
  totalBusinesses: number,
  multiplier = 1.0,
): number {
  const gapScore = Math.max(0, threshold - currentCount) * 2;
  const marketSizeScore = Math.min(5, totalBusinesses / 20);
  return roundTo(Math.min(10, (gapScore + marketSizeScore) * multiplier), 1);
}

/** Under-served opportunity categories, best first, at most six */
export function identifyOpportunities(summary: CategorySummary): Opportunity[] {
  const opportunities: Opportunity[] = [];

  for (const category of OPPORTUNITY_CATEGORIES) {
    const count = existingCount(category.name, summary.categories);
    if (count > category.threshold) continue;

    opportunities.push({
      category: category.name,
      score: opportunityScore(count, category.threshold, summary.totalBusinesses, category.multiplier),
      description: category.describe(count),
      icon: category.icon,
      marketGap: category.threshold - count,
    });
  }

  return opportunities.sort((a, b) => b.score - a.score).slice(0, MAX_OPPORTUNITIES);
}

export function filterByFocusIndustry(opportunities: readonly Opportunity[], focusIndustry: string): Opportunity[] {
  const focus = focusIndustry.trim().toLowerCase();
  if (!focus) return [...opportunities];
  return opportunities.filter((o) => o.category.toLowerCase().includes(focus));
}

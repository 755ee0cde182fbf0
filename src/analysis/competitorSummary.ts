import { Business } from '../types/business';
import { mean, roundTo } from '../utils/numbers';
import { Tier } from './marketMetrics';

export interface CompetitorSummary {
  marketDensity: Tier;
  competitionLevel: Tier;
  averageRating: number;
  totalCompetitors: number;
  recommendations: string[];
}

export function competitorCountTier(count: number): Tier {
  if (count <= 3) return 'Low';
  if (count <= 8) return 'Medium';
  return 'High';
}

function competitorRecommendations(density: Tier, averageRating: number): string[] {
  switch (density) {
    case 'Low':
      return [
        '🎯 Excellent location with low competition - great opportunity!',
        '📈 Focus on building strong local brand presence',
        '💡 Consider premium pricing strategy due to limited competition',
      ];
    case 'Medium':
      return [
        '⚖️ Balanced competition level - focus on differentiation',
        `🏆 Aim to exceed average rating of ${averageRating.toFixed(1)} stars`,
        '📊 Monitor competitor pricing and service offerings closely',
      ];
    case 'High':
      return [
        '🚨 High competition area - strong differentiation required',
        '💪 Focus on unique value proposition and superior service',
        '🎨 Consider niche specialization to stand out',
      ];
  }
}

/** Headline read of the competitor list: density tier by head count plus tier-specific advice */
export function analyzeCompetitors(competitors: readonly Business[]): CompetitorSummary {
  if (competitors.length === 0) {
    return {
      marketDensity: 'Low',
      competitionLevel: 'Low',
      averageRating: 0,
      totalCompetitors: 0,
      recommendations: ['Great location with minimal competition!'],
    };
  }

  const averageRating = mean(competitors.map((c) => c.rating).filter((r) => r > 0));
  const tier = competitorCountTier(competitors.length);

  return {
    marketDensity: tier,
    competitionLevel: tier,
    averageRating: roundTo(averageRating, 1),
    totalCompetitors: competitors.length,
    recommendations: competitorRecommendations(tier, averageRating),
  };
}

import { Business } from '../types/business';
import { CompetitionStrength, MarketDensity, MarketGap, MarketHealth, MarketLeader, Tier } from './marketMetrics';
import { Opportunity } from './opportunities';

export interface InsightSummary {
  totalCompetitors: number;
  marketScore: number;
  topOpportunity: string;
  competitionLevel: Tier;
}

export interface MarketInsights {
  summary: InsightSummary;
  keyFindings: string[];
  actionItems: string[];
  riskFactors: string[];
  successFactors: string[];
}

export interface ComprehensiveReport {
  executiveSummary: {
    marketAttractiveness: 'Excellent' | 'Good' | 'Fair' | 'Poor';
    competitionIntensity: 'Low' | 'Moderate' | 'High' | 'Very High';
    primaryOpportunity: string;
    overallRecommendation: string;
  };
  marketAnalysis: {
    totalBusinesses: number;
    marketHealth: MarketHealth;
    growthIndicators: string[];
    marketGaps: MarketGap[];
  };
  competitiveLandscape: {
    directCompetitors: number;
    marketLeaders: MarketLeader[];
    competitiveAdvantages: string[];
    barriersToEntry: string[];
  };
  opportunities: Opportunity[];
  recommendations: string[];
  riskAssessment: {
    riskFactors: string[];
    successFactors: string[];
  };
}

export interface ReportInput {
  competitors: readonly Business[];
  allBusinesses: readonly Business[];
  /** Density of all local businesses; its score is the report's market score */
  density: MarketDensity;
  competition: CompetitionStrength;
  opportunities: readonly Opportunity[];
  marketGaps: readonly MarketGap[];
  marketHealth: MarketHealth;
}

const GROWTH_KEYWORDS = ['tech', 'fitness', 'organic', 'specialty'];

export function competitionLevel(competitorCount: number, marketScore: number): Tier {
  if (competitorCount < 5 && marketScore < 5) return 'Low';
  if (competitorCount < 15 && marketScore < 7) return 'Medium';
  return 'High';
}

function keyFindings(
  competitorCount: number,
  marketScore: number,
  opportunities: readonly Opportunity[],
): string[] {
  const findings: string[] = [];

  if (competitorCount < 5) {
    findings.push('Low competition environment presents first-mover advantages');
  } else if (competitorCount > 15) {
    findings.push('Highly competitive market requires strong differentiation strategy');
  }

  if (marketScore > 7) {
    findings.push('High market activity indicates strong consumer demand');
  } else if (marketScore < 3) {
    findings.push('Emerging market with potential for growth');
  }

  const top = opportunities[0];
  if (top) {
    findings.push(`Top opportunity identified: ${top.category} with ${top.score} score`);
  }

  return findings;
}

function actionItems(marketScore: number, opportunities: readonly Opportunity[]): string[] {
  const actions: string[] = [];

  if (marketScore < 4) {
    actions.push('Conduct additional market validation through local surveys');
    actions.push('Consider phased market entry approach');
  } else if (marketScore > 7) {
    actions.push('Move quickly to establish market presence');
    actions.push('Prepare for competitive response strategies');
  }

  const top = opportunities[0];
  if (top) {
    actions.push(`Research ${top.category} market requirements`);
    actions.push('Validate opportunity through local community engagement');
  }

  actions.push('Monitor competitor activities and market changes');
  actions.push('Develop unique value proposition for market differentiation');
  return actions;
}

function riskFactors(competitors: readonly Business[], marketScore: number): string[] {
  const risks: string[] = [];

  if (competitors.length > 10) {
    risks.push('High competition may impact market share and pricing power');
  }
  if (marketScore > 8) {
    risks.push('Market saturation risk - new entrants may struggle');
  }
  if (competitors.filter((c) => c.rating > 4.3).length > 3) {
    risks.push('Multiple strong competitors present - differentiation critical');
  }
  if (marketScore < 3) {
    risks.push('Low market activity may indicate limited consumer demand');
  }

  return risks;
}

function successFactors(density: MarketDensity, opportunities: readonly Opportunity[]): string[] {
  const factors: string[] = [];
  const marketScore = density.densityScore;

  if (marketScore >= 4 && marketScore <= 7) {
    factors.push('Balanced market conditions favor new entrants');
  }
  if (opportunities.some((o) => o.score > 7)) {
    factors.push('High-scoring opportunities identified in market gaps');
  }
  if (Object.keys(density.categoryDistribution).length > 8) {
    factors.push('Diverse business ecosystem supports cross-customer traffic');
  }

  factors.push(
    'Local market shows consistent business activity',
    'Multiple entry strategies available based on opportunity analysis',
    'Market intelligence provides competitive advantage over uninformed competitors',
  );
  return factors;
}

export function aggregateMarketInsights(
  competitors: readonly Business[],
  density: MarketDensity,
  opportunities: readonly Opportunity[],
): MarketInsights {
  const marketScore = density.densityScore;

  return {
    summary: {
      totalCompetitors: competitors.length,
      marketScore,
      topOpportunity: opportunities[0]?.category ?? 'No clear opportunities',
      competitionLevel: competitionLevel(competitors.length, marketScore),
    },
    keyFindings: keyFindings(competitors.length, marketScore, opportunities),
    actionItems: actionItems(marketScore, opportunities),
    riskFactors: riskFactors(competitors, marketScore),
    successFactors: successFactors(density, opportunities),
  };
}

export function marketAttractiveness(score: number): ComprehensiveReport['executiveSummary']['marketAttractiveness'] {
  if (score >= 8) return 'Excellent';
  if (score >= 6) return 'Good';
  if (score >= 4) return 'Fair';
  return 'Poor';
}

export function competitionIntensity(count: number): ComprehensiveReport['executiveSummary']['competitionIntensity'] {
  if (count <= 3) return 'Low';
  if (count <= 8) return 'Moderate';
  if (count <= 15) return 'High';
  return 'Very High';
}

export function overallRecommendation(marketScore: number, competitorCount: number): string {
  if (marketScore >= 6 && competitorCount <= 8) {
    return 'Recommended - Favorable market conditions';
  }
  if (marketScore >= 4 && competitorCount <= 12) {
    return 'Proceed with caution - Moderate market conditions';
  }
  return 'Not recommended - Challenging market conditions';
}

function growthIndicators(marketScore: number, businesses: readonly Business[]): string[] {
  const indicators: string[] = [];

  if (marketScore > 6) {
    indicators.push('High business activity indicates growing market');
  }

  const modern = businesses.filter((b) => {
    const category = b.category.toLowerCase();
    return GROWTH_KEYWORDS.some((k) => category.includes(k));
  }).length;
  if (modern > businesses.length * 0.2) {
    indicators.push('Presence of modern business types suggests market evolution');
  }

  return indicators;
}

function competitiveAdvantages(competitors: readonly Business[], marketGaps: readonly MarketGap[]): string[] {
  const advantages: string[] = [];
  if (competitors.some((c) => c.rating < 3.5)) {
    advantages.push('Opportunity to outperform underperforming competitors');
  }
  if (marketGaps.some((g) => g.opportunityScore > 7)) {
    advantages.push('Clear market gaps present first-mover opportunities');
  }
  return advantages;
}

function barriersToEntry(competitors: readonly Business[], marketScore: number): string[] {
  const barriers: string[] = [];
  if (competitors.filter((c) => c.rating > 4.2).length > 5) {
    barriers.push('Multiple established high-quality competitors');
  }
  if (marketScore > 8) {
    barriers.push('High market saturation may limit customer acquisition');
  }
  return barriers;
}

export function generateComprehensiveReport(input: ReportInput): ComprehensiveReport {
  const { competitors, allBusinesses, density, competition, opportunities, marketGaps, marketHealth } = input;
  const marketScore = density.densityScore;
  const insights = aggregateMarketInsights(competitors, density, opportunities);

  return {
    executiveSummary: {
      marketAttractiveness: marketAttractiveness(marketScore),
      competitionIntensity: competitionIntensity(competitors.length),
      primaryOpportunity: opportunities[0]?.category ?? 'None identified',
      overallRecommendation: overallRecommendation(marketScore, competitors.length),
    },
    marketAnalysis: {
      totalBusinesses: allBusinesses.length,
      marketHealth,
      growthIndicators: growthIndicators(marketScore, allBusinesses),
      marketGaps: [...marketGaps],
    },
    competitiveLandscape: {
      directCompetitors: competitors.length,
      marketLeaders: competition.marketLeaders,
      competitiveAdvantages: competitiveAdvantages(competitors, marketGaps),
      barriersToEntry: barriersToEntry(competitors, marketScore),
    },
    opportunities: [...opportunities],
    recommendations: insights.actionItems,
    riskAssessment: {
      riskFactors: insights.riskFactors,
      successFactors: insights.successFactors,
    },
  };
}

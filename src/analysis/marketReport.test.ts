import { makeBusiness, makeBusinesses } from '../__fixtures__/businesses';
import { MarketDensity, MarketGap, analyzeCompetitionStrength, calculateMarketDensity, calculateMarketHealth } from './marketMetrics';
import {
  aggregateMarketInsights,
  competitionIntensity,
  competitionLevel,
  generateComprehensiveReport,
  marketAttractiveness,
  overallRecommendation,
} from './marketReport';
import { Opportunity } from './opportunities';

const LAUNDROMAT: Opportunity = {
  category: 'Laundromat',
  score: 8,
  description: 'Residential area with 0 laundry services.',
  icon: 'fa-tshirt',
  marketGap: 1,
};

const PHARMACY_GAP: MarketGap = {
  businessType: 'Pharmacy',
  currentCount: 0,
  expectedCount: 1,
  gapSize: 1,
  severity: 'Critical',
  opportunityScore: 8,
};

function densityWithScore(densityScore: number): MarketDensity {
  return {
    densityScore,
    businessesPerKm2: densityScore * 10,
    categoryDistribution: {},
    saturationLevel: 'Medium',
    totalBusinesses: 12,
  };
}

describe('marketReport', () => {
  describe('labels', () => {
    it('grades competition from count and market score together', () => {
      expect(competitionLevel(3, 4)).toBe('Low');
      expect(competitionLevel(10, 6)).toBe('Medium');
      expect(competitionLevel(3, 8)).toBe('High');
    });

    it('grades market attractiveness', () => {
      expect(marketAttractiveness(8)).toBe('Excellent');
      expect(marketAttractiveness(6)).toBe('Good');
      expect(marketAttractiveness(4.5)).toBe('Fair');
      expect(marketAttractiveness(1)).toBe('Poor');
    });

    it('grades competition intensity with fixed bands', () => {
      expect(competitionIntensity(3)).toBe('Low');
      expect(competitionIntensity(8)).toBe('Moderate');
      expect(competitionIntensity(15)).toBe('High');
      expect(competitionIntensity(16)).toBe('Very High');
    });

    it('picks one of three overall recommendations', () => {
      expect(overallRecommendation(6, 8)).toBe('Recommended - Favorable market conditions');
      expect(overallRecommendation(7, 9)).toBe('Proceed with caution - Moderate market conditions');
      expect(overallRecommendation(3, 2)).toBe('Not recommended - Challenging market conditions');
    });
  });

  describe('aggregateMarketInsights', () => {
    it('is well-formed for an empty market', () => {
      expect(aggregateMarketInsights([], calculateMarketDensity([], 1000), [])).toEqual({
        summary: {
          totalCompetitors: 0,
          marketScore: 0,
          topOpportunity: 'No clear opportunities',
          competitionLevel: 'Low',
        },
        keyFindings: [
          'Low competition environment presents first-mover advantages',
          'Emerging market with potential for growth',
        ],
        actionItems: [
          'Conduct additional market validation through local surveys',
          'Consider phased market entry approach',
          'Monitor competitor activities and market changes',
          'Develop unique value proposition for market differentiation',
        ],
        riskFactors: ['Low market activity may indicate limited consumer demand'],
        successFactors: [
          'Local market shows consistent business activity',
          'Multiple entry strategies available based on opportunity analysis',
          'Market intelligence provides competitive advantage over uninformed competitors',
        ],
      });
    });

    it('names the top opportunity', () => {
      const insights = aggregateMarketInsights(makeBusinesses(20), densityWithScore(8), [LAUNDROMAT]);
      expect(insights.summary.topOpportunity).toBe('Laundromat');
      expect(insights.summary.competitionLevel).toBe('High');
      expect(insights.keyFindings).toEqual([
        'Highly competitive market requires strong differentiation strategy',
        'High market activity indicates strong consumer demand',
        'Top opportunity identified: Laundromat with 8 score',
      ]);
      expect(insights.riskFactors).toEqual(['High competition may impact market share and pricing power']);
    });
  });

  describe('generateComprehensiveReport', () => {
    const competitors = makeBusinesses(4, { category: 'Restaurant', rating: 4.5, distance: 100 });
    const allBusinesses = [
      ...competitors,
      ...makeBusinesses(3, { category: 'Fitness Center', rating: 4 }),
      ...makeBusinesses(5, { category: 'Retail Store', rating: 3 }),
    ];
    const competition = analyzeCompetitionStrength(competitors, 'restaurant');
    const marketHealth = calculateMarketHealth(allBusinesses);

    const report = generateComprehensiveReport({
      competitors,
      allBusinesses,
      density: densityWithScore(6.5),
      competition,
      opportunities: [LAUNDROMAT],
      marketGaps: [PHARMACY_GAP],
      marketHealth,
    });

    it('summarizes the market for an executive reader', () => {
      expect(report.executiveSummary).toEqual({
        marketAttractiveness: 'Good',
        competitionIntensity: 'Moderate',
        primaryOpportunity: 'Laundromat',
        overallRecommendation: 'Recommended - Favorable market conditions',
      });
    });

    it('describes the market and the competitive landscape', () => {
      expect(report.marketAnalysis).toEqual({
        totalBusinesses: 12,
        marketHealth,
        growthIndicators: [
          'High business activity indicates growing market',
          'Presence of modern business types suggests market evolution',
        ],
        marketGaps: [PHARMACY_GAP],
      });
      expect(report.competitiveLandscape).toEqual({
        directCompetitors: 4,
        marketLeaders: competition.marketLeaders,
        competitiveAdvantages: ['Clear market gaps present first-mover opportunities'],
        barriersToEntry: [],
      });
    });

    it('reuses the market insights for recommendations and risks', () => {
      expect(report.opportunities).toEqual([LAUNDROMAT]);
      expect(report.recommendations).toEqual([
        'Research Laundromat market requirements',
        'Validate opportunity through local community engagement',
        'Monitor competitor activities and market changes',
        'Develop unique value proposition for market differentiation',
      ]);
      expect(report.riskAssessment).toEqual({
        riskFactors: ['Multiple strong competitors present - differentiation critical'],
        successFactors: [
          'Balanced market conditions favor new entrants',
          'High-scoring opportunities identified in market gaps',
          'Local market shows consistent business activity',
          'Multiple entry strategies available based on opportunity analysis',
          'Market intelligence provides competitive advantage over uninformed competitors',
        ],
      });
    });

    it('falls back when there are no opportunities', () => {
      const bare = generateComprehensiveReport({
        competitors: [],
        allBusinesses: [],
        density: calculateMarketDensity([], 1000),
        competition: analyzeCompetitionStrength([], 'retail'),
        opportunities: [],
        marketGaps: [],
        marketHealth: calculateMarketHealth([]),
      });
      expect(bare.executiveSummary.primaryOpportunity).toBe('None identified');
      expect(bare.executiveSummary.marketAttractiveness).toBe('Poor');
      expect(bare.competitiveLandscape.competitiveAdvantages).toEqual([]);
    });

    it('notes underperforming competitors', () => {
      const withWeak = generateComprehensiveReport({
        competitors: [makeBusiness({ rating: 2.5 })],
        allBusinesses: [],
        density: densityWithScore(2),
        competition: analyzeCompetitionStrength([], 'retail'),
        opportunities: [],
        marketGaps: [],
        marketHealth: calculateMarketHealth([]),
      });
      expect(withWeak.competitiveLandscape.competitiveAdvantages).toEqual([
        'Opportunity to outperform underperforming competitors',
      ]);
    });
  });
});

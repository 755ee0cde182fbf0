import { AreaQuery, CompetitorQuery, DataSourceAdapter } from '../adapters/DataSourceAdapter';
import { CompetitorSummary, analyzeCompetitors } from '../analysis/competitorSummary';
import { HoursRecommendation, recommendHours } from '../analysis/hoursAdvisor';
import { LocalHoursAnalysis, analyzeLocalHours } from '../analysis/localHours';
import {
  CompetitionStrength,
  LocationScore,
  MarketDensity,
  MarketGap,
  MarketHealth,
  MarketOverview,
  analyzeCompetitionStrength,
  calculateLocationScore,
  calculateMarketDensity,
  calculateMarketHealth,
  identifyMarketGaps,
  summarizeMarket,
} from '../analysis/marketMetrics';
import { ComprehensiveReport, MarketInsights, aggregateMarketInsights, generateComprehensiveReport } from '../analysis/marketReport';
import { Opportunity, filterByFocusIndustry, identifyOpportunities } from '../analysis/opportunities';
import { cleanBusinessRecords } from '../transformers/businessRecordCleaner';
import { Business, ValidatedLocation } from '../types/business';
import { CacheService } from './CacheService';

export interface AreaRequest {
  location: ValidatedLocation;
  /** Metres, already clamped */
  radius: number;
}

export interface BusinessRequest extends AreaRequest {
  /** Standardized business type */
  businessType: string;
}

export interface HoursRequest extends BusinessRequest {
  currentHours: string;
}

export interface ScanRequest extends AreaRequest {
  focusIndustry: string;
}

/** Cache outcome of a run: HIT only when every places lookup came from the cache */
export type CacheStatus = 'HIT' | 'MISS';

export interface AnalysisResult<T> {
  data: T;
  cache: CacheStatus;
}

export interface CompetitorAnalysis {
  competitors: Business[];
  analysis: CompetitorSummary & MarketDensity & CompetitionStrength;
  locationInfo: ValidatedLocation;
  processedAt: string;
}

export interface HoursOptimization {
  recommendation: HoursRecommendation;
  hoursAnalysis: LocalHoursAnalysis;
  currentHours: string;
  locationInfo: ValidatedLocation;
  businessCount: number;
}

export interface MarketScan {
  marketData: MarketOverview & MarketHealth & LocationScore;
  opportunities: Opportunity[];
  marketGaps: MarketGap[];
  insights: MarketInsights;
  locationInfo: ValidatedLocation;
  scanParameters: {
    radius: number;
    focusIndustry: string;
    totalBusinessesAnalyzed: number;
  };
}

interface Fetched {
  businesses: Business[];
  hit: boolean;
}

function cacheStatus(...fetches: Fetched[]): CacheStatus {
  return fetches.every((f) => f.hit) ? 'HIT' : 'MISS';
}

/**
 * Runs the places lookups an operation needs (through the cache), cleans the
 * records, and hands them to the analyses. Returns plain data; wrapping it in
 * the response envelope is left to the routes.
 */
export class MarketAnalysisService {
  constructor(
    private readonly source: DataSourceAdapter,
    private readonly cache: CacheService,
  ) {}

  async analyzeCompetitors(req: BusinessRequest, now: Date = new Date()): Promise<AnalysisResult<CompetitorAnalysis>> {
    const fetched = await this.competitors(req);
    const competitors = fetched.businesses;

    return {
      data: {
        competitors,
        analysis: {
          ...analyzeCompetitors(competitors),
          ...calculateMarketDensity(competitors, req.radius),
          ...analyzeCompetitionStrength(competitors, req.businessType),
        },
        locationInfo: req.location,
        processedAt: now.toISOString(),
      },
      cache: cacheStatus(fetched),
    };
  }

  async optimizeHours(req: HoursRequest): Promise<AnalysisResult<HoursOptimization>> {
    const fetched = await this.localBusinesses(req);
    const businesses = fetched.businesses;

    return {
      data: {
        recommendation: recommendHours(req.businessType),
        hoursAnalysis: analyzeLocalHours(businesses),
        currentHours: req.currentHours,
        locationInfo: req.location,
        businessCount: businesses.length,
      },
      cache: cacheStatus(fetched),
    };
  }

  async scanMarket(req: ScanRequest): Promise<AnalysisResult<MarketScan>> {
    const fetched = await this.localBusinesses(req);
    const businesses = fetched.businesses;

    const overview = summarizeMarket(businesses, req.location.cleaned, req.radius);
    const opportunities = filterByFocusIndustry(identifyOpportunities(overview), req.focusIndustry);
    const density = calculateMarketDensity(businesses, req.radius);

    return {
      data: {
        marketData: {
          ...overview,
          ...calculateMarketHealth(businesses),
          ...calculateLocationScore(businesses),
        },
        opportunities,
        marketGaps: identifyMarketGaps(businesses),
        insights: aggregateMarketInsights([], density, opportunities),
        locationInfo: req.location,
        scanParameters: {
          radius: req.radius,
          focusIndustry: req.focusIndustry,
          totalBusinessesAnalyzed: businesses.length,
        },
      },
      cache: cacheStatus(fetched),
    };
  }

  async generateReport(req: BusinessRequest): Promise<AnalysisResult<ComprehensiveReport>> {
    const [competitorFetch, localFetch] = await Promise.all([this.competitors(req), this.localBusinesses(req)]);
    const competitors = competitorFetch.businesses;
    const allBusinesses = localFetch.businesses;

    const overview = summarizeMarket(allBusinesses, req.location.cleaned, req.radius);
    const report = generateComprehensiveReport({
      competitors,
      allBusinesses,
      density: calculateMarketDensity(allBusinesses, req.radius),
      competition: analyzeCompetitionStrength(competitors, req.businessType),
      opportunities: identifyOpportunities(overview),
      marketGaps: identifyMarketGaps(allBusinesses),
      marketHealth: calculateMarketHealth(allBusinesses),
    });

    return { data: report, cache: cacheStatus(competitorFetch, localFetch) };
  }

  private competitors(req: BusinessRequest): Promise<Fetched> {
    const query: CompetitorQuery = { ...this.areaQuery(req), businessType: req.businessType };
    return this.fetchCleaned('competitors', query, () => this.source.searchCompetitors(query));
  }

  private localBusinesses(req: AreaRequest): Promise<Fetched> {
    const query = this.areaQuery(req);
    return this.fetchCleaned('local', query, () => this.source.fetchLocalBusinesses(query));
  }

  private areaQuery(req: AreaRequest): AreaQuery {
    return {
      near: req.location.cleaned,
      coordinates: req.location.coordinates,
      radiusMetres: req.radius,
    };
  }

  /** Raw records are cached; cleaning runs on every request */
  private async fetchCleaned(
    endpoint: string,
    query: AreaQuery | CompetitorQuery,
    fetch: () => Promise<unknown[]>,
  ): Promise<Fetched> {
    const cacheKey = CacheService.buildKey(this.source.sourceId, endpoint, { ...query });

    const cached = await this.cache.get<unknown>(cacheKey);
    if (Array.isArray(cached)) {
      return { businesses: cleanBusinessRecords(cached), hit: true };
    }

    const records = await fetch();
    await this.cache.set(cacheKey, records);
    return { businesses: cleanBusinessRecords(records), hit: false };
  }
}

import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { PlacesUpstreamError } from '../adapters/DataSourceAdapter';
import { FoursquarePlacesAdapter } from '../adapters/FoursquarePlacesAdapter';
import { env } from '../config/env';
import { cacheService } from '../services/CacheService';
import { AnalysisResult, BusinessRequest, MarketAnalysisService } from '../services/MarketAnalysisService';
import { validateRequest } from '../transformers/requestValidator';
import {
  toCompetitorCsv,
  toErrorResponse,
  toResponseEnvelope,
  toSummaryText,
} from '../transformers/responseEnvelope';
import { ValidatedLocation, ValidatedRequest } from '../types/business';

const router = Router();
const service = new MarketAnalysisService(new FoursquarePlacesAdapter(), cacheService);

// Presence only; the validator keeps the caller's text as `original`.
const isPresent = (value: string): boolean => value.trim().length > 0;

// Field shapes beyond presence are the request validator's job: bad radius or
// coordinates fall back to defaults instead of failing the request.
const passThroughFields = {
  radius: z.unknown().optional(),
  coordinates: z.unknown().optional(),
  current_hours: z.string().catch(''),
  focus_industry: z.string().catch(''),
};

const businessBodySchema = z
  .object({
    location: z.string().refine(isPresent, 'location is required'),
    business_type: z.string().refine(isPresent, 'business_type is required'),
    ...passThroughFields,
  })
  .passthrough();

const scanBodySchema = z
  .object({
    location: z.string().refine(isPresent, 'location is required'),
    business_type: z.string().optional(),
    ...passThroughFields,
  })
  .passthrough();

const competitorFormatSchema = z.object({ format: z.enum(['json', 'csv']).default('json') });
const scanFormatSchema = z.object({ format: z.enum(['json', 'text']).default('json') });

const BUSINESS_FIELDS_REQUIRED = 'Location and business type are required';
const LOCATION_REQUIRED = 'Location is required';

export const asyncHandler = (fn: (req: Request, res: Response) => Promise<void>) =>
  (req: Request, res: Response, next: NextFunction): void => {
    void Promise.resolve(fn(req, res)).catch((err: unknown) => {
      next(err);
    });
  };

function radiusOf(validated: ValidatedRequest): number {
  return validated.radius ?? env.DEFAULT_SEARCH_RADIUS;
}

/** `null` when cleaning left nothing usable, e.g. a location of only punctuation */
function toBusinessRequest(validated: ValidatedRequest): BusinessRequest | null {
  const { location, businessType } = validated;
  if (!location?.cleaned || !businessType?.standardized) return null;
  return { location, businessType: businessType.standardized, radius: radiusOf(validated) };
}

function usableLocation(validated: ValidatedRequest): ValidatedLocation | null {
  return validated.location?.cleaned ? validated.location : null;
}

function sendResult<T>(res: Response, result: AnalysisResult<T>): void {
  res.setHeader('X-Cache', result.cache);
  res.json(toResponseEnvelope(result.data));
}

function sendFailure(res: Response, err: unknown, operation: string, message: string): void {
  if (err instanceof PlacesUpstreamError) {
    console.error(`${operation} upstream error:`, err.message);
    res.status(502).json(toErrorResponse('Upstream data source unavailable'));
    return;
  }
  console.error(`${operation} error:`, err);
  res.status(500).json(toErrorResponse(message));
}

/**
 * POST /api/analyze-competitors
 * Competitor list with density, strength and headline recommendations.
 * `?format=csv` returns the cleaned competitor list as CSV instead.
 */
router.post('/analyze-competitors', asyncHandler(async (req, res) => {
  const parsed = businessBodySchema.safeParse(req.body);
  const format = competitorFormatSchema.safeParse(req.query);
  if (!parsed.success) {
    res.status(400).json(toErrorResponse(BUSINESS_FIELDS_REQUIRED, parsed.error.flatten()));
    return;
  }
  if (!format.success) {
    res.status(400).json(toErrorResponse('Invalid query parameters', format.error.flatten()));
    return;
  }

  const request = toBusinessRequest(validateRequest(parsed.data));
  if (!request) {
    res.status(400).json(toErrorResponse(BUSINESS_FIELDS_REQUIRED));
    return;
  }

  try {
    const result = await service.analyzeCompetitors(request);
    if (format.data.format === 'csv') {
      res.setHeader('X-Cache', result.cache);
      res.type('text/csv').send(toCompetitorCsv(result.data.competitors));
      return;
    }
    sendResult(res, result);
  } catch (err) {
    sendFailure(res, err, 'analyzeCompetitors', 'Analysis failed. Please try again or contact support.');
  }
}));

/**
 * POST /api/optimize-hours
 * Recommended weekly schedule plus the opening-hours pattern of nearby businesses.
 */
router.post('/optimize-hours', asyncHandler(async (req, res) => {
  const parsed = businessBodySchema.safeParse(req.body);
  if (!parsed.success) {
    res.status(400).json(toErrorResponse(BUSINESS_FIELDS_REQUIRED, parsed.error.flatten()));
    return;
  }

  const request = toBusinessRequest(validateRequest(parsed.data));
  if (!request) {
    res.status(400).json(toErrorResponse(BUSINESS_FIELDS_REQUIRED));
    return;
  }

  try {
    const result = await service.optimizeHours({ ...request, currentHours: parsed.data.current_hours });
    sendResult(res, result);
  } catch (err) {
    sendFailure(res, err, 'optimizeHours', 'Hours optimization failed. Please try again.');
  }
}));

/**
 * POST /api/scan-market
 * Market health, gaps and opportunities for an area. `business_type` is optional.
 * `?format=text` returns the plain-text insight summary.
 */
router.post('/scan-market', asyncHandler(async (req, res) => {
  const parsed = scanBodySchema.safeParse(req.body);
  const format = scanFormatSchema.safeParse(req.query);
  if (!parsed.success) {
    res.status(400).json(toErrorResponse(LOCATION_REQUIRED, parsed.error.flatten()));
    return;
  }
  if (!format.success) {
    res.status(400).json(toErrorResponse('Invalid query parameters', format.error.flatten()));
    return;
  }

  const validated = validateRequest(parsed.data);
  const location = usableLocation(validated);
  if (!location) {
    res.status(400).json(toErrorResponse(LOCATION_REQUIRED));
    return;
  }

  try {
    const result = await service.scanMarket({
      location,
      radius: radiusOf(validated),
      focusIndustry: parsed.data.focus_industry,
    });
    if (format.data.format === 'text') {
      res.setHeader('X-Cache', result.cache);
      res.type('text/plain').send(toSummaryText(result.data.insights));
      return;
    }
    sendResult(res, result);
  } catch (err) {
    sendFailure(res, err, 'scanMarket', 'Market scan failed. Please try again.');
  }
}));

/**
 * POST /api/generate-report
 * Full report combining competitor, market and opportunity analyses.
 */
router.post('/generate-report', asyncHandler(async (req, res) => {
  const parsed = businessBodySchema.safeParse(req.body);
  if (!parsed.success) {
    res.status(400).json(toErrorResponse(BUSINESS_FIELDS_REQUIRED, parsed.error.flatten()));
    return;
  }

  const request = toBusinessRequest(validateRequest(parsed.data));
  if (!request) {
    res.status(400).json(toErrorResponse(BUSINESS_FIELDS_REQUIRED));
    return;
  }

  try {
    sendResult(res, await service.generateReport(request));
  } catch (err) {
    sendFailure(res, err, 'generateReport', 'Report generation failed. Please try again.');
  }
}));

export default router;

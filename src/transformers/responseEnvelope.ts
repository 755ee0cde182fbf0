import { MarketInsights } from '../analysis/marketReport';
import { Business } from '../types/business';

export const RESPONSE_METADATA = Object.freeze({
  processingTime: 'real-time',
  dataSources: ['foursquare_api', 'business_intelligence'],
  version: '1.0',
});

export interface ResponseEnvelope<T> {
  success: true;
  /** ISO-8601 */
  timestamp: string;
  data: T;
  metadata: {
    processingTime: string;
    dataSources: string[];
    version: string;
  };
}

export interface ErrorResponse {
  success: false;
  error: string;
  details?: unknown;
}

export function toResponseEnvelope<T>(data: T, now: Date = new Date()): ResponseEnvelope<T> {
  return {
    success: true,
    timestamp: now.toISOString(),
    data,
    metadata: {
      processingTime: RESPONSE_METADATA.processingTime,
      dataSources: [...RESPONSE_METADATA.dataSources],
      version: RESPONSE_METADATA.version,
    },
  };
}

export function toErrorResponse(error: string, details?: unknown): ErrorResponse {
  return details === undefined ? { success: false, error } : { success: false, error, details };
}

/** Plain-text digest: headline numbers plus the first three findings */
export function toSummaryText(insights: MarketInsights): string {
  const { summary } = insights;
  const lines = [
    'Market Analysis Summary:',
    `- Total Competitors: ${summary.totalCompetitors}`,
    `- Market Score: ${summary.marketScore}/10`,
    `- Competition Level: ${summary.competitionLevel}`,
  ];

  if (insights.keyFindings.length > 0) {
    lines.push('', 'Key Findings:');
    for (const finding of insights.keyFindings.slice(0, 3)) {
      lines.push(`- ${finding}`);
    }
  }

  return lines.join('\n');
}

function csvField(value: string | number): string {
  const text = String(value);
  return /[",\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCompetitorCsv(competitors: readonly Business[]): string {
  const lines = ['Name,Category,Address,Distance,Rating'];
  for (const c of competitors) {
    lines.push([c.name, c.category, c.address, c.distance, c.rating].map(csvField).join(','));
  }
  return lines.join('\n');
}

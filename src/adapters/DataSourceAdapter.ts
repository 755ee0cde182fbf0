/**
 * DataSourceAdapter — interface for pluggable places providers.
 *
 * Foursquare ships first; another provider implements this interface without
 * touching the analysis service. Adapters return raw, loosely-typed records;
 * normalization happens in the record cleaner.
 */

import { RawPlaceRecord } from '../types/business';

export interface AreaQuery {
  /** Free-text location, e.g. "123 Main St, Boston, MA" */
  near: string;
  /** [lat, lng]; preferred over `near` when present */
  coordinates?: [number, number] | null;
  /** Radius in metres */
  radiusMetres: number;
  limit?: number;
}

export interface CompetitorQuery extends AreaQuery {
  /** Canonical business type, used to pick search keywords */
  businessType: string;
}

export interface DataSourceAdapter {
  /** Human-readable identifier, e.g. "foursquare" */
  readonly sourceId: string;

  searchCompetitors(query: CompetitorQuery): Promise<RawPlaceRecord[]>;
  fetchLocalBusinesses(query: AreaQuery): Promise<RawPlaceRecord[]>;
}

/** The provider could not be reached or answered with an error */
export class PlacesUpstreamError extends Error {
  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'PlacesUpstreamError';
  }
}

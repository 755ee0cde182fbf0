import axios, { AxiosInstance } from 'axios';
import axiosRetry from 'axios-retry';
import { AreaQuery, CompetitorQuery, DataSourceAdapter, PlacesUpstreamError } from './DataSourceAdapter';
import { env } from '../config/env';
import { RawPlaceRecord, WEEKDAYS, WeeklyHours } from '../types/business';

/** Subset of a Foursquare v3 place that the analyses read */
export interface FoursquarePlace {
  fsq_id?: string;
  name?: string;
  categories?: Array<{ id?: number; name?: string }>;
  location?: { formatted_address?: string };
  geocodes?: { main?: { latitude?: number; longitude?: number } };
  distance?: number;
  /** 0–10 */
  rating?: number;
  /** 1–4 */
  price?: number;
  website?: string;
  tel?: string;
  hours?: {
    regular?: Array<{ day?: number; open?: string; close?: string }>;
  };
}

export interface FoursquareSearchResponse {
  results?: FoursquarePlace[];
}

const PLACE_FIELDS = 'fsq_id,name,categories,location,geocodes,distance,rating,price,website,tel,hours';

/** Search terms per business type; other types are searched by their own name */
const SEARCH_KEYWORDS: Readonly<Record<string, string>> = Object.freeze({
  restaurant: 'restaurant,cafe,food,dining,pizza,burger,coffee',
  retail: 'store,shop,boutique,market,clothing,electronics,retail',
  fitness: 'gym,fitness,yoga,studio,wellness,health',
  beauty: 'salon,spa,barber,nail,beauty,massage',
  professional: 'office,law,accounting,consulting,insurance',
  healthcare: 'clinic,doctor,dental,medical,pharmacy',
  education: 'school,college,training,education,tutoring',
});

export class FoursquarePlacesAdapter implements DataSourceAdapter {
  readonly sourceId = 'foursquare';
  private readonly client: AxiosInstance;

  constructor(
    baseUrl = env.FOURSQUARE_BASE_URL,
    apiKey = env.FOURSQUARE_API_KEY,
    private readonly maxRadius = env.MAX_PLACES_RADIUS,
  ) {
    this.client = axios.create({
      baseURL: baseUrl,
      timeout: env.PLACES_TIMEOUT_MS,
      headers: {
        Authorization: apiKey,
        Accept: 'application/json',
      },
    });

    axiosRetry(this.client, {
      retries: 3,
      retryDelay: axiosRetry.exponentialDelay,
      retryCondition: (err) => {
        const status = err.response?.status;
        return axiosRetry.isNetworkError(err) || status === 429 || (status !== undefined && status >= 500);
      },
    });
  }

  async searchCompetitors(query: CompetitorQuery): Promise<RawPlaceRecord[]> {
    const { businessType, limit = env.MAX_COMPETITORS } = query;
    const keywords = SEARCH_KEYWORDS[businessType] ?? (businessType === 'general' ? undefined : businessType);

    const places = await this.search({ ...this.areaParams(query), query: keywords, limit });
    return places.map(toRawRecord);
  }

  async fetchLocalBusinesses(query: AreaQuery): Promise<RawPlaceRecord[]> {
    const { limit = env.LOCAL_BUSINESS_LIMIT } = query;
    const places = await this.search({ ...this.areaParams(query), limit });
    return places.map(toRawRecord);
  }

  private areaParams(query: AreaQuery): Record<string, string | number> {
    const location: Record<string, string | number> = query.coordinates
      ? { ll: `${query.coordinates[0]},${query.coordinates[1]}` }
      : { near: query.near };
    return {
      ...location,
      radius: Math.min(query.radiusMetres, this.maxRadius),
      sort: 'DISTANCE',
      fields: PLACE_FIELDS,
    };
  }

  private async search(params: Record<string, string | number | undefined>): Promise<FoursquarePlace[]> {
    try {
      const { data } = await this.client.get<FoursquareSearchResponse>('/search', { params });
      return data.results ?? [];
    } catch (err) {
      if (axios.isAxiosError(err)) {
        throw new PlacesUpstreamError(`Foursquare search failed: ${err.message}`, err.response?.status, {
          cause: err,
        });
      }
      throw err;
    }
  }
}

/** "1730" → "5:30 PM"; anything that is not four digits is returned unchanged */
export function formatTime(hhmm: string): string {
  if (!/^\d{4}$/.test(hhmm)) return hhmm;
  const hour = Number(hhmm.slice(0, 2));
  const minute = hhmm.slice(2);

  if (hour === 0) return `12:${minute} AM`;
  if (hour < 12) return `${hour}:${minute} AM`;
  if (hour === 12) return `12:${minute} PM`;
  return `${hour - 12}:${minute} PM`;
}

/** Foursquare numbers days 1 (Monday) to 7 (Sunday) */
export function toWeeklyHours(hours: FoursquarePlace['hours']): WeeklyHours {
  const weekly: WeeklyHours = {};
  for (const entry of hours?.regular ?? []) {
    const day = entry.day !== undefined ? WEEKDAYS[entry.day - 1] : undefined;
    if (day && entry.open && entry.close) {
      weekly[day] = `${formatTime(entry.open)} - ${formatTime(entry.close)}`;
    }
  }
  return weekly;
}

export function toRawRecord(place: FoursquarePlace): RawPlaceRecord {
  const geocode = place.geocodes?.main;
  return {
    id: place.fsq_id ?? '',
    name: place.name,
    category: place.categories?.[0]?.name ?? 'Other',
    address: place.location?.formatted_address ?? '',
    distance: place.distance ?? 0,
    latitude: geocode?.latitude ?? 0,
    longitude: geocode?.longitude ?? 0,
    // Foursquare rates out of 10; the analyses work on a 5-star scale
    rating: place.rating !== undefined ? place.rating / 2 : 0,
    price_level: place.price ?? 0,
    website: place.website ?? '',
    phone: place.tel ?? '',
    hours: toWeeklyHours(place.hours),
  };
}

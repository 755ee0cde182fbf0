import { z } from 'zod';
import dotenv from 'dotenv';
import path from 'path';

dotenv.config({ path: path.resolve(process.cwd(), '.env') });

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(5000),

  // Foursquare Places API
  FOURSQUARE_API_KEY: z.string().min(1, 'FOURSQUARE_API_KEY is required'),
  FOURSQUARE_BASE_URL: z.string().url().default('https://api.foursquare.com/v3/places'),
  PLACES_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),

  // Search defaults
  DEFAULT_SEARCH_RADIUS: z.coerce.number().int().min(100).max(10_000).default(1000),
  // Foursquare rejects radii above 5 km
  MAX_PLACES_RADIUS: z.coerce.number().int().positive().default(5000),
  MAX_COMPETITORS: z.coerce.number().int().positive().max(50).default(20),
  LOCAL_BUSINESS_LIMIT: z.coerce.number().int().positive().max(50).default(50),

  // Redis
  REDIS_URL: z.string().default('redis://localhost:6379'),
  CACHE_TTL_SECONDS: z.coerce.number().default(3600),

  // Rate limiting
  RATE_LIMIT_WINDOW_MS: z.coerce.number().default(60_000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().default(100),

  // CORS
  CORS_ORIGIN: z.string().default('http://localhost:3000'),
});

export type Env = z.infer<typeof envSchema>;

function loadEnv(): Env {
  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    console.error('Invalid environment variables:');
    console.error(parsed.error.flatten().fieldErrors);
    process.exit(1);
  }
  return parsed.data;
}

export const env = loadEnv();

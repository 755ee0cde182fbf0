import NodeCache from 'node-cache';
import type { Redis } from 'ioredis';
import { env } from '../config/env';

interface CacheBackend {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
}

export interface CacheStats {
  backend: 'redis' | 'in-memory';
  hits: number;
  misses: number;
}

/** Every key this service writes starts with this prefix */
export const CACHE_KEY_PREFIX = 'site-scout';

class InMemoryBackend implements CacheBackend {
  private readonly store = new NodeCache({ useClones: false });

  async get(key: string): Promise<string | null> {
    const val = this.store.get<string>(key);
    return Promise.resolve(val ?? null);
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.store.set(key, value, ttlSeconds);
    return Promise.resolve();
  }
}

class RedisBackend implements CacheBackend {
  private client: Redis | null = null;
  private ready = false;

  async connect(url: string): Promise<void> {
    const { default: RedisClient } = await import('ioredis');
    this.client = new RedisClient(url, {
      lazyConnect: true,
      enableOfflineQueue: false,
      connectTimeout: 3000,
      maxRetriesPerRequest: 1,
    });

    this.client.on('ready', () => {
      this.ready = true;
    });
    this.client.on('error', (err: Error) => {
      if (this.ready) console.warn('CacheService: Redis connection lost:', err.message);
      this.ready = false;
    });

    try {
      await this.client.connect();
    } catch (err) {
      console.warn('CacheService: Redis connect failed:', err instanceof Error ? err.message : err);
      this.ready = false;
    }
  }

  get isReady(): boolean {
    return this.ready;
  }

  async get(key: string): Promise<string | null> {
    if (!this.client || !this.ready) return null;
    return this.client.get(key);
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    if (!this.client || !this.ready) return;
    await this.client.setex(key, ttlSeconds, value);
  }
}

/**
 * JSON cache for places lookups. Uses Redis when it answers at startup and an
 * in-process node-cache otherwise; read and write failures never reach callers.
 */
export class CacheService {
  private backend: CacheBackend;
  private readonly fallback = new InMemoryBackend();
  private readonly ttl: number;
  private usingRedis = false;
  private hits = 0;
  private misses = 0;

  constructor(ttlSeconds = env.CACHE_TTL_SECONDS) {
    this.ttl = ttlSeconds;
    this.backend = this.fallback;
  }

  async connect(redisUrl = env.REDIS_URL): Promise<void> {
    if (env.NODE_ENV === 'test') return;

    const redisBackend = new RedisBackend();
    await redisBackend.connect(redisUrl);

    if (redisBackend.isReady) {
      this.backend = redisBackend;
      this.usingRedis = true;
      console.info('✅ CacheService: connected to Redis');
    } else {
      console.warn('⚠️  CacheService: Redis unavailable, falling back to in-memory cache');
    }
  }

  get isRedis(): boolean {
    return this.usingRedis;
  }

  get stats(): CacheStats {
    return {
      backend: this.usingRedis ? 'redis' : 'in-memory',
      hits: this.hits,
      misses: this.misses,
    };
  }

  async get<T>(key: string): Promise<T | null> {
    try {
      const raw = await this.backend.get(key);
      if (raw === null) {
        this.misses++;
        return null;
      }
      this.hits++;
      return JSON.parse(raw) as T;
    } catch (err) {
      console.warn('CacheService.get failed:', err);
      this.misses++;
      return null;
    }
  }

  async set<T>(key: string, value: T, ttlSeconds = this.ttl): Promise<void> {
    try {
      await this.backend.set(key, JSON.stringify(value), ttlSeconds);
    } catch (err) {
      console.warn('CacheService.set failed:', err);
    }
  }

  /**
   * Build a deterministic cache key.
   * Format: site-scout:{source}:{endpoint}:{stable-hash-of-params}
   */
  static buildKey(source: string, endpoint: string, params: Record<string, unknown>): string {
    const stable = JSON.stringify(params, Object.keys(params).sort());
    // djb2
    let hash = 5381;
    for (let i = 0; i < stable.length; i++) {
      hash = ((hash << 5) + hash) ^ stable.charCodeAt(i);
    }
    return `${CACHE_KEY_PREFIX}:${source}:${endpoint}:${(hash >>> 0).toString(16)}`;
  }
}

export const cacheService = new CacheService();

import express from 'express';
import helmet from 'helmet';
import cors from 'cors';
import compression from 'compression';
import morgan from 'morgan';
import rateLimit from 'express-rate-limit';

import { env } from './config/env';
import { cacheService } from './services/CacheService';
import { RESPONSE_METADATA, toErrorResponse } from './transformers/responseEnvelope';
import { errorHandler, notFound } from './middleware/errorHandler.middleware';
import analysisRoutes from './routes/analysis.routes';

const app = express();

// ── Security headers ─────────────────────────────────────────────────────────
// JSON/CSV API only; nothing here is rendered by a browser.
app.use(
  helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'none'"],
        frameAncestors: ["'none'"],
      },
    },
    hsts: { maxAge: 31_536_000, includeSubDomains: true, preload: true },
  }),
);

// ── CORS ─────────────────────────────────────────────────────────────────────
app.use(
  cors({
    origin: env.CORS_ORIGIN,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
  }),
);

// ── Body parsing & compression ────────────────────────────────────────────────
app.use(express.json({ limit: '100kb' }));
app.use(compression());

// ── Logging ───────────────────────────────────────────────────────────────────
if (env.NODE_ENV !== 'test') {
  app.use(morgan('combined'));
}

// ── Rate limiting ─────────────────────────────────────────────────────────────
const limiter = rateLimit({
  windowMs: env.RATE_LIMIT_WINDOW_MS,
  max: env.RATE_LIMIT_MAX_REQUESTS,
  standardHeaders: true,
  legacyHeaders: false,
  message: toErrorResponse('Too many requests, please try again later.'),
});
app.use('/api/', limiter);

// ── Health checks ─────────────────────────────────────────────────────────────
app.get('/api/health', (_req, res) => {
  res.json({ status: 'ok', version: RESPONSE_METADATA.version, timestamp: new Date().toISOString() });
});

app.get('/api/health/cache', (_req, res) => {
  res.json({
    status: 'ok',
    ...cacheService.stats,
    timestamp: new Date().toISOString(),
  });
});

// ── Routes ────────────────────────────────────────────────────────────────────
app.use('/api', analysisRoutes);

// ── 404 catch-all & errors ────────────────────────────────────────────────────
app.use(notFound);
app.use(errorHandler);

// ── Startup ───────────────────────────────────────────────────────────────────
async function start(): Promise<void> {
  await cacheService.connect();

  app.listen(env.PORT, () => {
    console.info(`🚀  Server listening on http://localhost:${env.PORT}`);
    console.info(`   NODE_ENV: ${env.NODE_ENV}`);
    console.info(`   Cache backend: ${cacheService.isRedis ? 'Redis' : 'in-memory'}`);
  });
}

if (require.main === module) {
  start().catch((err: unknown) => {
    console.error('Startup failed:', err);
    process.exit(1);
  });
}

export { app };

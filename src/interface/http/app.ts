/**
 * Express Application Factory
 * Creates and configures the Express app with all middleware and routes.
 */
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { env } from '../../config/env.js';
import { getLogger } from '../../config/logger.js';
import { errorHandler, apiLimiter, requestLogger } from './middleware/index.js';
import { createHealthRouter, createPoolRouter, createLedgerRouter } from './routes/index.js';
import type { AmmCore } from '../../application/AmmCore.js';
import type { InMemoryAssetLedger } from '../../infrastructure/ledger/InMemoryAssetLedger.js';

const logger = getLogger().child({ service: 'http' });

export interface AppDependencies {
  amm: AmmCore;
  /** Funding routes are mounted only when the in-memory ledger backs the AMM */
  ledger?: InMemoryAssetLedger;
}

export function createApp(deps: AppDependencies): express.Express {
  const app = express();

  // ── Security ──
  app.use(helmet());

  const allowedOrigins = env.CORS_ORIGIN
    .split(',')
    .map((origin) => origin.trim().replace(/\/$/, ''));

  app.use(
    cors({
      origin: (origin, callback) => {
        // Non-browser clients send no origin
        if (!origin) return callback(null, true);

        if (allowedOrigins.includes(origin)) {
          callback(null, true);
        } else {
          logger.warn({ origin }, 'CORS blocked');
          callback(new Error('Not allowed by CORS'));
        }
      },
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization'],
    }),
  );

  // ── Body parsing ──
  app.use(express.json({ limit: '100kb' }));

  // ── Logging ──
  if (env.NODE_ENV !== 'production' || env.LOG_LEVEL === 'debug') {
    app.use(requestLogger);
  }

  // ── Rate limiting ──
  app.use('/v1', apiLimiter);

  // ── Routes ──
  const v1 = express.Router();

  v1.use(createHealthRouter(deps.amm));
  v1.use(createPoolRouter(deps.amm));
  if (deps.ledger) {
    v1.use(createLedgerRouter(deps.ledger));
  }

  app.use('/v1', v1);

  // ── 404 handler ──
  app.use((_req, res) => {
    res.status(404).json({
      status: 'error',
      code: 'NOT_FOUND',
      message: 'Endpoint not found',
    });
  });

  // ── Error handler ──
  app.use(errorHandler);

  return app;
}

/**
 * Health Controller
 * GET /v1/health: liveness and core status
 */
import { Router } from 'express';
import type { Request, Response } from 'express';
import type { AmmCore } from '../../../application/AmmCore.js';

const startTime = Date.now();

export function createHealthRouter(amm: AmmCore): Router {
  const router = Router();

  router.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      version: '0.1.0',
      uptime: Math.floor((Date.now() - startTime) / 1000),
      feeBps: amm.feeBps,
      pools: amm.listPools().length,
    });
  });

  return router;
}

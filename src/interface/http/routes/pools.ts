/**
 * Pool Controller
 * Pool lifecycle, liquidity and swaps
 */
import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { writeLimiter } from '../middleware/rate-limiter.js';
import {
  poolCreateSchema,
  depositSchema,
  withdrawSchema,
  swapSchema,
  quoteSchema,
  FEE_DENOMINATOR,
} from '../../../shared/index.js';
import type { AmmCore } from '../../../application/AmmCore.js';
import type { PoolSnapshot } from '../../../domain/entities/Pool.js';

/** Serialize a pool snapshot: bigint never crosses JSON as a number */
function toPoolDto(pool: PoolSnapshot) {
  return {
    poolId: pool.poolId,
    asset0: pool.asset0,
    asset1: pool.asset1,
    reserve0: pool.reserve0.toString(),
    reserve1: pool.reserve1.toString(),
    feeBps: pool.feeBps,
    feeDenominator: FEE_DENOMINATOR,
    totalShares: pool.totalShares.toString(),
    holders: pool.holders,
    createdAt: pool.createdAt.toISOString(),
    updatedAt: pool.updatedAt.toISOString(),
  };
}

export function createPoolRouter(amm: AmmCore): Router {
  const router = Router();

  /** GET /v1/pools: List pools */
  router.get('/pools', (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ data: amm.listPools().map(toPoolDto) });
    } catch (err) {
      next(err);
    }
  });

  /** GET /v1/pools/:poolId: Get pool detail */
  router.get('/pools/:poolId', (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(toPoolDto(amm.getPoolSnapshot(req.params.poolId ?? '')));
    } catch (err) {
      next(err);
    }
  });

  /** GET /v1/pools/:poolId/shares/:holder: LP share balance */
  router.get('/pools/:poolId/shares/:holder', (req: Request, res: Response, next: NextFunction) => {
    try {
      const poolId = req.params.poolId ?? '';
      const holder = req.params.holder ?? '';
      res.json({ poolId, holder, shares: amm.getShareBalance(poolId, holder).toString() });
    } catch (err) {
      next(err);
    }
  });

  /** GET /v1/pools/:poolId/quote: Price a swap without executing it */
  router.get('/pools/:poolId/quote', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { assetIn, amountIn } = quoteSchema.parse(req.query);
      const quote = amm.quote(req.params.poolId ?? '', assetIn, amountIn);
      res.json({
        assetIn: quote.assetIn,
        assetOut: quote.assetOut,
        amountIn: quote.amountIn.toString(),
        amountInAfterFee: quote.amountInAfterFee.toString(),
        fee: quote.fee.toString(),
        amountOut: quote.amountOut.toString(),
      });
    } catch (err) {
      next(err);
    }
  });

  /** POST /v1/pools: Create pool */
  router.post('/pools', writeLimiter, (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = poolCreateSchema.parse(req.body);
      const poolId = amm.connect(body.sender).createPool(body.assetA, body.assetB, body.amount0, body.amount1);
      res.status(201).json(toPoolDto(amm.getPoolSnapshot(poolId)));
    } catch (err) {
      next(err);
    }
  });

  /** POST /v1/pools/:poolId/deposit: Add liquidity */
  router.post('/pools/:poolId/deposit', writeLimiter, (req: Request, res: Response, next: NextFunction) => {
    try {
      const poolId = req.params.poolId ?? '';
      const body = depositSchema.parse(req.body);
      const sharesMinted = amm.connect(body.sender).addLiquidity(poolId, body.amount0, body.amount1);
      res.json({ poolId, sharesMinted: sharesMinted.toString() });
    } catch (err) {
      next(err);
    }
  });

  /** POST /v1/pools/:poolId/withdraw: Remove liquidity */
  router.post('/pools/:poolId/withdraw', writeLimiter, (req: Request, res: Response, next: NextFunction) => {
    try {
      const poolId = req.params.poolId ?? '';
      const body = withdrawSchema.parse(req.body);
      const [amount0, amount1] = amm.connect(body.sender).removeLiquidity(poolId, body.shareAmount);
      res.json({ poolId, amount0: amount0.toString(), amount1: amount1.toString() });
    } catch (err) {
      next(err);
    }
  });

  /** POST /v1/pools/:poolId/swap: Execute swap */
  router.post('/pools/:poolId/swap', writeLimiter, (req: Request, res: Response, next: NextFunction) => {
    try {
      const poolId = req.params.poolId ?? '';
      const body = swapSchema.parse(req.body);
      const recipient = body.recipient ?? body.sender;
      const amountOut = amm
        .connect(body.sender)
        .swap(poolId, body.assetIn, body.amountIn, body.minAmountOut, recipient);
      res.json({ poolId, recipient, amountOut: amountOut.toString() });
    } catch (err) {
      next(err);
    }
  });

  return router;
}

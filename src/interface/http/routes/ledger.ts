/**
 * Ledger Controller
 * Funding endpoints for the in-memory asset ledger (local and test networks only)
 */
import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { writeLimiter } from '../middleware/rate-limiter.js';
import { ledgerMintSchema, ledgerApproveSchema, ledgerBalanceParamsSchema } from '../../../shared/index.js';
import type { InMemoryAssetLedger } from '../../../infrastructure/ledger/InMemoryAssetLedger.js';

export function createLedgerRouter(ledger: InMemoryAssetLedger): Router {
  const router = Router();

  /** POST /v1/ledger/mint: Credit test units to an account */
  router.post('/ledger/mint', writeLimiter, (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = ledgerMintSchema.parse(req.body);
      ledger.mint(body.asset, body.account, body.amount);
      res.json({
        asset: body.asset,
        account: body.account,
        balance: ledger.balanceOf(body.asset, body.account).toString(),
      });
    } catch (err) {
      next(err);
    }
  });

  /** POST /v1/ledger/approve: Let the AMM pull up to `amount` */
  router.post('/ledger/approve', writeLimiter, (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = ledgerApproveSchema.parse(req.body);
      ledger.approve(body.asset, body.owner, body.amount);
      res.json({
        asset: body.asset,
        owner: body.owner,
        allowance: ledger.allowanceOf(body.asset, body.owner).toString(),
      });
    } catch (err) {
      next(err);
    }
  });

  /** GET /v1/ledger/:account/:asset: Balance and allowance */
  router.get('/ledger/:account/:asset', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { account, asset } = ledgerBalanceParamsSchema.parse(req.params);
      res.json({
        account,
        asset,
        balance: ledger.balanceOf(asset, account).toString(),
        allowance: ledger.allowanceOf(asset, account).toString(),
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}

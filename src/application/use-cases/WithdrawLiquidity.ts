/**
 * Use Case: Withdraw Liquidity
 */
import type pino from 'pino';
import type { IPoolStore } from '../../domain/ports/IPoolStore.js';
import type { IAssetTransferAdapter } from '../../domain/ports/IAssetTransferAdapter.js';
import type { LiquidityEngine } from '../../domain/services/LiquidityEngine.js';
import type { EventPublisher } from '../services/EventPublisher.js';
import { PoolNotFoundError } from '../../domain/errors/index.js';
import { push, settle } from '../settlement.js';

export interface WithdrawLiquidityInput {
  provider: string;
  poolId: string;
  shareAmount: bigint;
}

export interface WithdrawLiquidityOutput {
  amount0: bigint;
  amount1: bigint;
  sharesBurned: bigint;
}

export class WithdrawLiquidity {
  constructor(
    private readonly store: IPoolStore,
    private readonly transfers: IAssetTransferAdapter,
    private readonly liquidity: LiquidityEngine,
    private readonly events: EventPublisher,
    private readonly logger: pino.Logger,
  ) {}

  execute(input: WithdrawLiquidityInput): WithdrawLiquidityOutput {
    const pool = this.store.findById(input.poolId);
    if (!pool) {
      throw new PoolNotFoundError(input.poolId);
    }

    const plan = this.liquidity.withdraw(pool, input.provider, input.shareAmount);

    // Bookkeeping before any push
    pool.applyWithdrawal(input.provider, plan.amount0, plan.amount1, plan.shares);

    settle(
      this.transfers,
      [
        push(pool.asset0.id, input.provider, plan.amount0),
        push(pool.asset1.id, input.provider, plan.amount1),
      ],
      { operation: 'removeLiquidity', poolId: pool.id },
    );

    this.store.save(pool);

    this.logger.info(
      {
        poolId: pool.id,
        provider: input.provider,
        amount0: plan.amount0.toString(),
        amount1: plan.amount1.toString(),
        shares: plan.shares.toString(),
      },
      'Liquidity removed',
    );

    this.events.publish({
      type: 'LiquidityRemoved',
      poolId: pool.id,
      provider: input.provider,
      amount0: plan.amount0,
      amount1: plan.amount1,
      sharesBurned: plan.shares,
    });

    return { amount0: plan.amount0, amount1: plan.amount1, sharesBurned: plan.shares };
  }
}

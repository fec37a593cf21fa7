/**
 * Use Case: Deposit Liquidity
 * Mints shares against the binding side of the deposit and pulls both
 * desired amounts.
 */
import type pino from 'pino';
import type { IPoolStore } from '../../domain/ports/IPoolStore.js';
import type { IAssetTransferAdapter } from '../../domain/ports/IAssetTransferAdapter.js';
import type { LiquidityEngine } from '../../domain/services/LiquidityEngine.js';
import type { EventPublisher } from '../services/EventPublisher.js';
import { PoolNotFoundError } from '../../domain/errors/index.js';
import { pull, settle } from '../settlement.js';

export interface DepositLiquidityInput {
  provider: string;
  poolId: string;
  amount0Desired: bigint;
  amount1Desired: bigint;
}

export interface DepositLiquidityOutput {
  amount0: bigint;
  amount1: bigint;
  sharesMinted: bigint;
}

export class DepositLiquidity {
  constructor(
    private readonly store: IPoolStore,
    private readonly transfers: IAssetTransferAdapter,
    private readonly liquidity: LiquidityEngine,
    private readonly events: EventPublisher,
    private readonly logger: pino.Logger,
  ) {}

  execute(input: DepositLiquidityInput): DepositLiquidityOutput {
    const pool = this.store.findById(input.poolId);
    if (!pool) {
      throw new PoolNotFoundError(input.poolId);
    }

    const plan = this.liquidity.deposit(pool, input.amount0Desired, input.amount1Desired);

    settle(
      this.transfers,
      [
        pull(pool.asset0.id, input.provider, plan.amount0),
        pull(pool.asset1.id, input.provider, plan.amount1),
      ],
      { operation: 'addLiquidity', poolId: pool.id },
    );

    pool.applyDeposit(input.provider, plan.amount0, plan.amount1, plan.shares);
    this.store.save(pool);

    this.logger.info(
      {
        poolId: pool.id,
        provider: input.provider,
        amount0: plan.amount0.toString(),
        amount1: plan.amount1.toString(),
        shares: plan.shares.toString(),
      },
      'Liquidity added',
    );

    this.events.publish({
      type: 'LiquidityAdded',
      poolId: pool.id,
      provider: input.provider,
      amount0: plan.amount0,
      amount1: plan.amount1,
      sharesMinted: plan.shares,
    });

    return { amount0: plan.amount0, amount1: plan.amount1, sharesMinted: plan.shares };
  }
}

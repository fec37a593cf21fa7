/**
 * Use Case: Create Pool
 */
import type pino from 'pino';
import type { IPoolStore } from '../../domain/ports/IPoolStore.js';
import type { IAssetTransferAdapter } from '../../domain/ports/IAssetTransferAdapter.js';
import type { LiquidityEngine } from '../../domain/services/LiquidityEngine.js';
import type { EventPublisher } from '../services/EventPublisher.js';
import { PoolAlreadyExistsError } from '../../domain/errors/index.js';
import { PoolKey } from '../../domain/value-objects/PoolKey.js';
import { Pool } from '../../domain/entities/Pool.js';
import { pull, settle } from '../settlement.js';

export interface CreatePoolInput {
  creator: string;
  assetA: string;
  assetB: string;
  /** Deposit of the canonical asset0, whatever order assetA/assetB come in */
  amount0: bigint;
  /** Deposit of the canonical asset1 */
  amount1: bigint;
}

export interface CreatePoolOutput {
  poolId: string;
  asset0: string;
  asset1: string;
  sharesMinted: bigint;
}

export class CreatePool {
  constructor(
    private readonly store: IPoolStore,
    private readonly transfers: IAssetTransferAdapter,
    private readonly liquidity: LiquidityEngine,
    private readonly events: EventPublisher,
    private readonly feeBps: number,
    private readonly logger: pino.Logger,
  ) {}

  execute(input: CreatePoolInput): CreatePoolOutput {
    const key = PoolKey.of(input.assetA, input.assetB);

    // Check pair doesn't already exist
    if (this.store.findByPair(key) || this.store.findById(key.poolId)) {
      throw new PoolAlreadyExistsError(key.asset0.id, key.asset1.id, key.poolId);
    }

    const plan = this.liquidity.seed(input.amount0, input.amount1);

    settle(
      this.transfers,
      [
        pull(key.asset0.id, input.creator, plan.amount0),
        pull(key.asset1.id, input.creator, plan.amount1),
      ],
      { operation: 'createPool', poolId: key.poolId },
    );

    const pool = Pool.open(key, this.feeBps);
    pool.applyDeposit(input.creator, plan.amount0, plan.amount1, plan.shares);
    this.store.save(pool);

    this.logger.info(
      {
        poolId: pool.id,
        pair: key.pair,
        reserve0: plan.amount0.toString(),
        reserve1: plan.amount1.toString(),
        shares: plan.shares.toString(),
      },
      'Pool created',
    );

    this.events.publish({
      type: 'PoolCreated',
      poolId: pool.id,
      asset0: key.asset0.id,
      asset1: key.asset1.id,
    });

    return {
      poolId: pool.id,
      asset0: key.asset0.id,
      asset1: key.asset1.id,
      sharesMinted: plan.shares,
    };
  }
}

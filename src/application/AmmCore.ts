/**
 * AMM core: composition of the pool use cases behind the public operation surface.
 *
 * Every operation is synchronous. Nothing inside awaits, so on the event loop
 * one mutating call always completes (commit or reject) before the next starts,
 * and a read never observes a half-applied operation.
 */
import type pino from 'pino';
import { getLogger } from '../config/logger.js';
import type { IPoolStore, IAssetTransferAdapter, INotificationSink } from '../domain/ports/index.js';
import type { PoolSnapshot } from '../domain/entities/Pool.js';
import { LiquidityEngine } from '../domain/services/LiquidityEngine.js';
import { SwapEngine, type SwapQuote } from '../domain/services/SwapEngine.js';
import { InvariantViolationError } from '../domain/errors/index.js';
import { EventPublisher } from './services/EventPublisher.js';
import {
  CreatePool,
  DepositLiquidity,
  WithdrawLiquidity,
  ExecuteSwap,
  GetPoolInfo,
  GetQuote,
} from './use-cases/index.js';

export interface AmmCoreDependencies {
  store: IPoolStore;
  transfers: IAssetTransferAdapter;
  notifications?: INotificationSink;
  /** Fee in basis points for every pool this instance creates; fixed for its lifetime */
  feeBps: number;
  logger?: pino.Logger;
}

export type PoolTuple = readonly [
  asset0: string,
  asset1: string,
  reserve0: bigint,
  reserve1: bigint,
  feeBps: number,
  totalShares: bigint,
];

/** The operations a caller performs, with the caller bound in */
export interface AmmSession {
  readonly caller: string;
  createPool(assetA: string, assetB: string, amount0: bigint, amount1: bigint): string;
  addLiquidity(poolId: string, amount0: bigint, amount1: bigint): bigint;
  removeLiquidity(poolId: string, shareAmount: bigint): readonly [amount0Out: bigint, amount1Out: bigint];
  swap(poolId: string, assetIn: string, amountIn: bigint, minAmountOut: bigint, recipient: string): bigint;
  getPool(poolId: string): PoolTuple;
  getShareBalance(poolId: string, holder: string): bigint;
}

export class AmmCore {
  readonly feeBps: number;

  private readonly logger: pino.Logger;
  private readonly poolInfo: GetPoolInfo;
  private readonly quotes: GetQuote;
  private readonly creates: CreatePool;
  private readonly deposits: DepositLiquidity;
  private readonly withdrawals: WithdrawLiquidity;
  private readonly swaps: ExecuteSwap;

  constructor(deps: AmmCoreDependencies) {
    if (!Number.isInteger(deps.feeBps) || deps.feeBps < 0 || deps.feeBps > 10_000) {
      throw new RangeError(`feeBps must be an integer in [0, 10000], got ${deps.feeBps}`);
    }
    this.feeBps = deps.feeBps;
    this.logger = deps.logger ?? getLogger().child({ service: 'amm' });

    const liquidity = new LiquidityEngine();
    const swapEngine = new SwapEngine();
    const events = new EventPublisher(deps.notifications, this.logger);

    this.poolInfo = new GetPoolInfo(deps.store);
    this.quotes = new GetQuote(deps.store, swapEngine);
    this.creates = new CreatePool(deps.store, deps.transfers, liquidity, events, this.feeBps, this.logger);
    this.deposits = new DepositLiquidity(deps.store, deps.transfers, liquidity, events, this.logger);
    this.withdrawals = new WithdrawLiquidity(deps.store, deps.transfers, liquidity, events, this.logger);
    this.swaps = new ExecuteSwap(deps.store, deps.transfers, swapEngine, events, this.logger);
  }

  /** Bind a caller; the returned session exposes the public operation surface */
  connect(caller: string): AmmSession {
    if (caller.trim() === '') throw new TypeError('Caller must not be empty');

    return {
      caller,
      createPool: (assetA, assetB, amount0, amount1) =>
        this.guard(() => this.creates.execute({ creator: caller, assetA, assetB, amount0, amount1 }).poolId),
      addLiquidity: (poolId, amount0, amount1) =>
        this.guard(() =>
          this.deposits.execute({ provider: caller, poolId, amount0Desired: amount0, amount1Desired: amount1 })
            .sharesMinted,
        ),
      removeLiquidity: (poolId, shareAmount) =>
        this.guard(() => {
          const out = this.withdrawals.execute({ provider: caller, poolId, shareAmount });
          return [out.amount0, out.amount1] as const;
        }),
      swap: (poolId, assetIn, amountIn, minAmountOut, recipient) =>
        this.guard(
          () => this.swaps.execute({ sender: caller, poolId, assetIn, amountIn, minAmountOut, recipient }).amountOut,
        ),
      getPool: (poolId) => this.getPool(poolId),
      getShareBalance: (poolId, holder) => this.getShareBalance(poolId, holder),
    };
  }

  getPool(poolId: string): PoolTuple {
    const pool = this.poolInfo.getById(poolId);
    return [pool.asset0, pool.asset1, pool.reserve0, pool.reserve1, pool.feeBps, pool.totalShares];
  }

  getShareBalance(poolId: string, holder: string): bigint {
    return this.poolInfo.shareBalance(poolId, holder);
  }

  // ── Supplementary reads ──

  getPoolSnapshot(poolId: string): PoolSnapshot {
    return this.poolInfo.getById(poolId);
  }

  listPools(): PoolSnapshot[] {
    return this.poolInfo.list();
  }

  findPoolId(assetA: string, assetB: string): string | null {
    return this.poolInfo.findPoolId(assetA, assetB);
  }

  quote(poolId: string, assetIn: string, amountIn: bigint): SwapQuote {
    return this.quotes.execute({ poolId, assetIn, amountIn });
  }

  // ── Private ──

  /** Invariant violations are defects: log them at fatal before they propagate */
  private guard<T>(operation: () => T): T {
    try {
      return operation();
    } catch (err) {
      if (err instanceof InvariantViolationError) {
        this.logger.fatal({ err, context: err.context }, 'AMM invariant violated');
      }
      throw err;
    }
  }
}

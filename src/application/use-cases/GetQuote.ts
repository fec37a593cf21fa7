/**
 * Use Case: Get Quote
 * Read-only swap pricing against the current reserves.
 */
import type { IPoolStore } from '../../domain/ports/IPoolStore.js';
import type { SwapEngine, SwapQuote } from '../../domain/services/SwapEngine.js';
import { PoolNotFoundError } from '../../domain/errors/index.js';

export interface GetQuoteInput {
  poolId: string;
  assetIn: string;
  amountIn: bigint;
}

export class GetQuote {
  constructor(
    private readonly store: IPoolStore,
    private readonly swaps: SwapEngine,
  ) {}

  execute(input: GetQuoteInput): SwapQuote {
    const pool = this.store.findById(input.poolId);
    if (!pool) {
      throw new PoolNotFoundError(input.poolId);
    }
    return this.swaps.quote(pool, input.assetIn, input.amountIn);
  }
}

/**
 * Use Case: Execute Swap
 */
import type pino from 'pino';
import type { IPoolStore } from '../../domain/ports/IPoolStore.js';
import type { IAssetTransferAdapter } from '../../domain/ports/IAssetTransferAdapter.js';
import type { SwapEngine, SwapQuote } from '../../domain/services/SwapEngine.js';
import type { EventPublisher } from '../services/EventPublisher.js';
import { PoolNotFoundError } from '../../domain/errors/index.js';
import { pull, push, settle } from '../settlement.js';

export interface ExecuteSwapInput {
  sender: string;
  poolId: string;
  assetIn: string;
  amountIn: bigint;
  minAmountOut: bigint;
  recipient: string;
}

export class ExecuteSwap {
  constructor(
    private readonly store: IPoolStore,
    private readonly transfers: IAssetTransferAdapter,
    private readonly swaps: SwapEngine,
    private readonly events: EventPublisher,
    private readonly logger: pino.Logger,
  ) {}

  execute(input: ExecuteSwapInput): SwapQuote {
    const pool = this.store.findById(input.poolId);
    if (!pool) {
      throw new PoolNotFoundError(input.poolId);
    }

    const quote = this.swaps.plan(pool, input.assetIn, input.amountIn, input.minAmountOut);
    pool.applySwap(quote.amountIn, quote.amountOut, quote.zeroForOne);

    settle(
      this.transfers,
      [
        pull(quote.assetIn, input.sender, quote.amountIn),
        push(quote.assetOut, input.recipient, quote.amountOut),
      ],
      { operation: 'swap', poolId: pool.id },
    );

    this.store.save(pool);

    this.logger.info(
      {
        poolId: pool.id,
        sender: input.sender,
        recipient: input.recipient,
        assetIn: quote.assetIn,
        amountIn: quote.amountIn.toString(),
        assetOut: quote.assetOut,
        amountOut: quote.amountOut.toString(),
      },
      'Swap executed',
    );

    this.events.publish({
      type: 'Swap',
      poolId: pool.id,
      sender: input.sender,
      recipient: input.recipient,
      assetIn: quote.assetIn,
      amountIn: quote.amountIn,
      assetOut: quote.assetOut,
      amountOut: quote.amountOut,
    });

    return quote;
  }
}

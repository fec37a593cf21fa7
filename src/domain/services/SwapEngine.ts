/**
 * Domain Service: Swap Engine
 * Constant-product pricing with the fee taken from the input:
 *
 *   amountInAfterFee = floor(amountIn * (10000 - feeBps) / 10000)
 *   amountOut        = floor(amountInAfterFee * reserveOut / (reserveIn + amountInAfterFee))
 */
import type { Pool } from '../entities/Pool.js';
import { AssetId } from '../value-objects/Asset.js';
import {
  InsufficientAmountsError,
  InsufficientLiquidityError,
  InvalidTokenError,
  SlippageExceededError,
} from '../errors/index.js';
import { BPS_DENOMINATOR } from '../math/bigint.js';

export interface SwapQuote {
  assetIn: string;
  assetOut: string;
  /** true when asset0 is the input */
  zeroForOne: boolean;
  amountIn: bigint;
  amountInAfterFee: bigint;
  fee: bigint;
  amountOut: bigint;
  reserveIn: bigint;
  reserveOut: bigint;
  newReserveIn: bigint;
  newReserveOut: bigint;
}

/** Output of the constant-product formula with an input fee */
export function getAmountOut(amountIn: bigint, reserveIn: bigint, reserveOut: bigint, feeBps: number): bigint {
  const amountInAfterFee = applyFee(amountIn, feeBps);
  const denominator = reserveIn + amountInAfterFee;
  if (denominator === 0n) return 0n;
  return (amountInAfterFee * reserveOut) / denominator;
}

function applyFee(amountIn: bigint, feeBps: number): bigint {
  return (amountIn * (BPS_DENOMINATOR - BigInt(feeBps))) / BPS_DENOMINATOR;
}

export class SwapEngine {
  /** Price a trade without touching the pool */
  quote(pool: Pool, assetIn: string, amountIn: bigint): SwapQuote {
    const input = AssetId.fromString(assetIn);
    const side = pool.sideOf(input);
    if (side === undefined) {
      throw new InvalidTokenError(input.id, pool.id);
    }
    if (amountIn <= 0n) {
      throw new InsufficientAmountsError('swap input must be positive');
    }

    const zeroForOne = side === 0;
    const reserveIn = zeroForOne ? pool.reserve0 : pool.reserve1;
    const reserveOut = zeroForOne ? pool.reserve1 : pool.reserve0;

    const amountInAfterFee = applyFee(amountIn, pool.feeBps);
    const amountOut = getAmountOut(amountIn, reserveIn, reserveOut, pool.feeBps);

    return {
      assetIn: input.id,
      assetOut: (zeroForOne ? pool.asset1 : pool.asset0).id,
      zeroForOne,
      amountIn,
      amountInAfterFee,
      fee: amountIn - amountInAfterFee,
      amountOut,
      reserveIn,
      reserveOut,
      newReserveIn: reserveIn + amountIn,
      newReserveOut: reserveOut - amountOut,
    };
  }

  /** Quote, then enforce the caller's slippage bound and a non-zero output */
  plan(pool: Pool, assetIn: string, amountIn: bigint, minAmountOut: bigint): SwapQuote {
    const quote = this.quote(pool, assetIn, amountIn);

    if (quote.amountOut < minAmountOut) {
      throw new SlippageExceededError(minAmountOut, quote.amountOut);
    }
    if (quote.amountOut === 0n) {
      throw new InsufficientLiquidityError(quote.reserveOut.toString(), 'non-zero output');
    }

    return quote;
  }
}

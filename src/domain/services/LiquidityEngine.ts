/**
 * Domain Service: Liquidity Engine
 * Proportional share math for deposits and withdrawals. Pure: it reads a pool
 * and returns a plan; the caller applies the plan once the transfers settle.
 */
import type { Pool } from '../entities/Pool.js';
import { InsufficientAmountsError, InsufficientLiquidityError } from '../errors/index.js';
import { min, sqrt } from '../math/bigint.js';

export interface DepositPlan {
  /** Amounts pulled from the provider */
  amount0: bigint;
  amount1: bigint;
  shares: bigint;
}

export interface WithdrawalPlan {
  amount0: bigint;
  amount1: bigint;
  shares: bigint;
}

export class LiquidityEngine {
  /** First deposit into an empty pool: geometric mean of the two amounts */
  seed(amount0: bigint, amount1: bigint): DepositPlan {
    this.requirePositive(amount0, amount1);
    return { amount0, amount1, shares: sqrt(amount0 * amount1) };
  }

  /**
   * Shares for a deposit into a live pool:
   * min(amount0Desired * totalShares / reserve0, amount1Desired * totalShares / reserve1).
   * Both desired amounts are pulled as given; whatever the longer side brings
   * beyond the binding ratio accrues to every holder.
   */
  deposit(pool: Pool, amount0Desired: bigint, amount1Desired: bigint): DepositPlan {
    this.requirePositive(amount0Desired, amount1Desired);

    if (pool.totalShares === 0n) {
      return this.seed(amount0Desired, amount1Desired);
    }

    const shares = min(
      (amount0Desired * pool.totalShares) / pool.reserve0,
      (amount1Desired * pool.totalShares) / pool.reserve1,
    );
    if (shares === 0n) {
      throw new InsufficientLiquidityError(pool.totalShares.toString(), '0 shares minted');
    }

    return { amount0: amount0Desired, amount1: amount1Desired, shares };
  }

  /** Pro-rata reserves for burning `shares` of `provider`'s balance (floor) */
  withdraw(pool: Pool, provider: string, shares: bigint): WithdrawalPlan {
    if (shares <= 0n) {
      throw new InsufficientAmountsError('share amount must be positive');
    }

    const balance = pool.shareBalanceOf(provider);
    if (shares > balance) {
      throw new InsufficientLiquidityError(balance.toString(), shares.toString());
    }

    return {
      amount0: (pool.reserve0 * shares) / pool.totalShares,
      amount1: (pool.reserve1 * shares) / pool.totalShares,
      shares,
    };
  }

  private requirePositive(amount0: bigint, amount1: bigint): void {
    if (amount0 <= 0n || amount1 <= 0n) {
      throw new InsufficientAmountsError('both amounts must be positive');
    }
  }
}

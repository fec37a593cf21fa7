/**
 * Domain Entity: Pool
 * Reserves of a two-asset constant-product pool and the LP shares claiming them.
 * Mutators assume the engines already validated the amounts; they only guard
 * the bookkeeping invariants.
 */
import type { AssetId } from '../value-objects/Asset.js';
import type { PoolKey } from '../value-objects/PoolKey.js';
import { InvariantViolationError } from '../errors/index.js';

export interface PoolProps {
  id: string;
  asset0: AssetId;
  asset1: AssetId;
  reserve0: bigint;
  reserve1: bigint;
  feeBps: number;
  totalShares: bigint;
  shareBalances: Map<string, bigint>;
  createdAt: Date;
  updatedAt: Date;
}

/** Read-only view handed to callers; never aliases entity state */
export interface PoolSnapshot {
  poolId: string;
  asset0: string;
  asset1: string;
  reserve0: bigint;
  reserve1: bigint;
  feeBps: number;
  totalShares: bigint;
  holders: number;
  createdAt: Date;
  updatedAt: Date;
}

export class Pool {
  private props: PoolProps;

  constructor(props: PoolProps) {
    this.props = { ...props, shareBalances: new Map(props.shareBalances) };
  }

  /** Empty pool for a pair; shares and reserves arrive with the first deposit */
  static open(key: PoolKey, feeBps: number, now = new Date()): Pool {
    return new Pool({
      id: key.poolId,
      asset0: key.asset0,
      asset1: key.asset1,
      reserve0: 0n,
      reserve1: 0n,
      feeBps,
      totalShares: 0n,
      shareBalances: new Map(),
      createdAt: now,
      updatedAt: now,
    });
  }

  // ─── Getters ──────────────────────────────────────
  get id(): string { return this.props.id; }
  get asset0(): AssetId { return this.props.asset0; }
  get asset1(): AssetId { return this.props.asset1; }
  get reserve0(): bigint { return this.props.reserve0; }
  get reserve1(): bigint { return this.props.reserve1; }
  get feeBps(): number { return this.props.feeBps; }
  get totalShares(): bigint { return this.props.totalShares; }
  get createdAt(): Date { return this.props.createdAt; }
  get updatedAt(): Date { return this.props.updatedAt; }

  /** Product of the reserves */
  get k(): bigint {
    return this.props.reserve0 * this.props.reserve1;
  }

  shareBalanceOf(holder: string): bigint {
    return this.props.shareBalances.get(holder) ?? 0n;
  }

  /** Whether the asset is asset0; undefined when the pool does not trade it */
  sideOf(asset: AssetId): 0 | 1 | undefined {
    if (this.props.asset0.equals(asset)) return 0;
    if (this.props.asset1.equals(asset)) return 1;
    return undefined;
  }

  // ─── Mutations ────────────────────────────────────

  /** Add reserves and mint shares to the provider */
  applyDeposit(provider: string, amount0: bigint, amount1: bigint, shares: bigint, now = new Date()): void {
    this.props.reserve0 += amount0;
    this.props.reserve1 += amount1;
    this.props.totalShares += shares;
    this.props.shareBalances.set(provider, this.shareBalanceOf(provider) + shares);
    this.props.updatedAt = now;
  }

  /** Burn the provider's shares and release reserves */
  applyWithdrawal(provider: string, amount0: bigint, amount1: bigint, shares: bigint, now = new Date()): void {
    const balance = this.shareBalanceOf(provider);
    if (shares > balance || amount0 > this.props.reserve0 || amount1 > this.props.reserve1) {
      throw new InvariantViolationError('Withdrawal exceeds pool bookkeeping', {
        poolId: this.props.id,
        provider,
        shares: shares.toString(),
        balance: balance.toString(),
      });
    }

    this.props.reserve0 -= amount0;
    this.props.reserve1 -= amount1;
    this.props.totalShares -= shares;
    if (balance === shares) {
      this.props.shareBalances.delete(provider);
    } else {
      this.props.shareBalances.set(provider, balance - shares);
    }
    this.props.updatedAt = now;
  }

  /** Update reserves after a swap; `zeroForOne` means asset0 went in. The product may never fall. */
  applySwap(amountIn: bigint, amountOut: bigint, zeroForOne: boolean, now = new Date()): void {
    const reserve0 = zeroForOne ? this.props.reserve0 + amountIn : this.props.reserve0 - amountOut;
    const reserve1 = zeroForOne ? this.props.reserve1 - amountOut : this.props.reserve1 + amountIn;
    if (reserve0 < 0n || reserve1 < 0n || reserve0 * reserve1 < this.k) {
      throw new InvariantViolationError('Invariant violation: k decreased', {
        poolId: this.props.id,
        kBefore: this.k.toString(),
        kAfter: (reserve0 * reserve1).toString(),
        amountIn: amountIn.toString(),
        amountOut: amountOut.toString(),
      });
    }

    this.props.reserve0 = reserve0;
    this.props.reserve1 = reserve1;
    this.props.updatedAt = now;
  }

  snapshot(): PoolSnapshot {
    return {
      poolId: this.props.id,
      asset0: this.props.asset0.id,
      asset1: this.props.asset1.id,
      reserve0: this.props.reserve0,
      reserve1: this.props.reserve1,
      feeBps: this.props.feeBps,
      totalShares: this.props.totalShares,
      holders: this.props.shareBalances.size,
      createdAt: this.props.createdAt,
      updatedAt: this.props.updatedAt,
    };
  }

  /** Deep copy, used by stores so callers never hold live state */
  clone(): Pool {
    return new Pool(this.props);
  }

  /** Sum of every holder's balance; equals totalShares while bookkeeping holds */
  sumOfBalances(): bigint {
    let sum = 0n;
    for (const balance of this.props.shareBalances.values()) sum += balance;
    return sum;
  }
}

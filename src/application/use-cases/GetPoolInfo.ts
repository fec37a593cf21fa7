/**
 * Use Case: Get Pool Info
 * Read side of the store; every result is a detached snapshot.
 */
import type { IPoolStore } from '../../domain/ports/IPoolStore.js';
import type { PoolSnapshot } from '../../domain/entities/Pool.js';
import { PoolNotFoundError } from '../../domain/errors/index.js';
import { PoolKey } from '../../domain/value-objects/PoolKey.js';

export class GetPoolInfo {
  constructor(private readonly store: IPoolStore) {}

  getById(poolId: string): PoolSnapshot {
    const pool = this.store.findById(poolId);
    if (!pool) {
      throw new PoolNotFoundError(poolId);
    }
    return pool.snapshot();
  }

  shareBalance(poolId: string, holder: string): bigint {
    const pool = this.store.findById(poolId);
    if (!pool) {
      throw new PoolNotFoundError(poolId);
    }
    return pool.shareBalanceOf(holder);
  }

  /** Pool id for a pair in either order, or null when none was created */
  findPoolId(assetA: string, assetB: string): string | null {
    return this.store.findByPair(PoolKey.of(assetA, assetB))?.id ?? null;
  }

  list(): PoolSnapshot[] {
    return this.store.findAll().map((pool) => pool.snapshot());
  }
}

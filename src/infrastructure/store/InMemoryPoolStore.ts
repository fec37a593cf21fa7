/**
 * Pool Store: in-memory implementation
 */
import type { Pool } from '../../domain/entities/Pool.js';
import type { IPoolStore } from '../../domain/ports/IPoolStore.js';
import type { PoolKey } from '../../domain/value-objects/PoolKey.js';

export class InMemoryPoolStore implements IPoolStore {
  private readonly pools = new Map<string, Pool>();
  /** "asset0/asset1" → pool id */
  private readonly byPair = new Map<string, string>();

  save(pool: Pool): void {
    this.pools.set(pool.id, pool.clone());
    this.byPair.set(`${pool.asset0.id}/${pool.asset1.id}`, pool.id);
  }

  findById(id: string): Pool | null {
    return this.pools.get(id)?.clone() ?? null;
  }

  findByPair(key: PoolKey): Pool | null {
    const id = this.byPair.get(key.pair);
    return id === undefined ? null : this.findById(id);
  }

  findAll(): Pool[] {
    return Array.from(this.pools.values(), (pool) => pool.clone());
  }

  count(): number {
    return this.pools.size;
  }
}

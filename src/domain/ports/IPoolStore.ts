/**
 * Port: Pool Store Interface
 * Authoritative table of pools keyed by id, with a secondary lookup by pair.
 * Reads hand out copies: a pool only changes when a copy is saved back.
 */
import type { Pool } from '../entities/Pool.js';
import type { PoolKey } from '../value-objects/PoolKey.js';

export interface IPoolStore {
  /** Insert or replace a pool */
  save(pool: Pool): void;

  /** Find pool by ID */
  findById(id: string): Pool | null;

  /** Find pool by canonical asset pair */
  findByPair(key: PoolKey): Pool | null;

  /** All pools in creation order */
  findAll(): Pool[];

  count(): number;
}

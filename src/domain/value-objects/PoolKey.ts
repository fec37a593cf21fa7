/**
 * Domain Value Object: PoolKey
 * The canonically ordered asset pair of a pool and the pool id derived from it.
 */
import { v5 as uuidv5 } from 'uuid';
import { AssetId } from './Asset.js';
import { IdenticalAssetsError } from '../errors/index.js';

/** Fixed namespace for name-based pool ids; changing it re-keys every pool. */
const POOL_ID_NAMESPACE = '5b3c1d0e-7a52-4c6f-9e1b-2f8a4d6c0b97';

export class PoolKey {
  private constructor(
    public readonly asset0: AssetId,
    public readonly asset1: AssetId,
  ) {}

  /** Order two assets canonically; argument order never matters */
  static of(assetA: string | AssetId, assetB: string | AssetId): PoolKey {
    const a = typeof assetA === 'string' ? AssetId.fromString(assetA) : assetA;
    const b = typeof assetB === 'string' ? AssetId.fromString(assetB) : assetB;
    const order = a.compare(b);
    if (order === 0) throw new IdenticalAssetsError(a.id);
    return order < 0 ? new PoolKey(a, b) : new PoolKey(b, a);
  }

  /** "asset0/asset1" */
  get pair(): string {
    return `${this.asset0.id}/${this.asset1.id}`;
  }

  /** Deterministic pool id: name-based UUID of the ordered pair */
  get poolId(): string {
    return `pool_${uuidv5(this.pair, POOL_ID_NAMESPACE).replace(/-/g, '')}`;
  }
}

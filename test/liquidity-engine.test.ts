import { describe, it, expect } from 'vitest';
import { Pool } from '../src/domain/entities/Pool.js';
import { PoolKey } from '../src/domain/value-objects/PoolKey.js';
import { LiquidityEngine } from '../src/domain/services/LiquidityEngine.js';
import { InsufficientAmountsError, InsufficientLiquidityError } from '../src/domain/errors/index.js';
import { TOKEN_A, TOKEN_B } from './helpers.js';

function seeded(reserve0: bigint, reserve1: bigint, shares: bigint, holder = 'alice'): Pool {
  const pool = Pool.open(PoolKey.of(TOKEN_A, TOKEN_B), 30);
  pool.applyDeposit(holder, reserve0, reserve1, shares);
  return pool;
}

describe('LiquidityEngine', () => {
  const engine = new LiquidityEngine();

  it('seeds with the geometric mean', () => {
    expect(engine.seed(1000n, 4000n)).toEqual({ amount0: 1000n, amount1: 4000n, shares: 2000n });
    expect(engine.seed(2n, 3n).shares).toBe(2n);
  });

  it('rejects zero amounts', () => {
    expect(() => engine.seed(0n, 1n)).toThrow(InsufficientAmountsError);
    expect(() => engine.deposit(seeded(1000n, 4000n, 2000n), 100n, 0n)).toThrow(InsufficientAmountsError);
  });

  it('mints against the binding side and pulls both desired amounts', () => {
    const plan = engine.deposit(seeded(1000n, 4000n, 2000n), 100n, 1000n);
    expect(plan).toEqual({ amount0: 100n, amount1: 1000n, shares: 200n });
  });

  it('floors the share mint', () => {
    // 3 shares over reserves 10/10: 4 units of each are worth 1.2 shares
    const plan = engine.deposit(seeded(10n, 10n, 3n), 4n, 4n);
    expect(plan).toEqual({ amount0: 4n, amount1: 4n, shares: 1n });
  });

  it('refuses a deposit too small to mint a share', () => {
    expect(() => engine.deposit(seeded(1000n, 1000n, 10n), 50n, 50n)).toThrow(InsufficientLiquidityError);
  });

  it('re-seeds a pool whose shares were all burned', () => {
    const pool = seeded(1000n, 4000n, 2000n);
    pool.applyWithdrawal('alice', 1000n, 4000n, 2000n);
    expect(engine.deposit(pool, 9n, 16n)).toEqual({ amount0: 9n, amount1: 16n, shares: 12n });
  });

  it('withdraws pro rata with floor rounding', () => {
    const pool = seeded(1000n, 4001n, 2000n);
    expect(engine.withdraw(pool, 'alice', 500n)).toEqual({ amount0: 250n, amount1: 1000n, shares: 500n });
  });

  it('rejects burning more than the caller holds', () => {
    const pool = seeded(1000n, 4000n, 2000n);
    expect(() => engine.withdraw(pool, 'alice', 2001n)).toThrow(InsufficientLiquidityError);
    expect(() => engine.withdraw(pool, 'bob', 1n)).toThrow(InsufficientLiquidityError);
    expect(() => engine.withdraw(pool, 'alice', 0n)).toThrow(InsufficientAmountsError);
  });
});

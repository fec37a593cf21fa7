import { describe, it, expect } from 'vitest';
import { sqrt, min } from '../src/domain/math/bigint.js';

describe('bigint math', () => {
  it('sqrt floors non-squares and is exact on squares', () => {
    expect(sqrt(0n)).toBe(0n);
    expect(sqrt(1n)).toBe(1n);
    expect(sqrt(15n)).toBe(3n);
    expect(sqrt(16n)).toBe(4n);
    expect(sqrt(4_000_000n)).toBe(2000n);
    expect(sqrt(2_000_000n * 10n ** 36n)).toBe(1414213562373095048801n);
  });

  it('sqrt rejects negative input', () => {
    expect(() => sqrt(-1n)).toThrow(RangeError);
  });

  it('min', () => {
    expect(min(3n, 5n)).toBe(3n);
    expect(min(5n, 3n)).toBe(3n);
  });
});

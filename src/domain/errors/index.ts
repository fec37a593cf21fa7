/**
 * Domain-specific errors
 * Each error carries a code for API responses.
 */

export class DomainError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'DomainError';
  }
}

export class PoolAlreadyExistsError extends DomainError {
  constructor(asset0: string, asset1: string, poolId: string) {
    super('POOL_EXISTS', `A pool for ${asset0}/${asset1} already exists`, { poolId });
  }
}

export class PoolNotFoundError extends DomainError {
  constructor(poolId: string) {
    super('POOL_NOT_FOUND', `Pool ${poolId} does not exist`);
  }
}

export class InsufficientAmountsError extends DomainError {
  constructor(reason: string) {
    super('INSUFFICIENT_AMOUNTS', `Insufficient amounts: ${reason}`);
  }
}

export class InsufficientLiquidityError extends DomainError {
  constructor(available: string, requested: string) {
    super('INSUFFICIENT_LIQUIDITY', `Not enough liquidity. Available: ${available}, Requested: ${requested}`, {
      availableLiquidity: available,
      requestedAmount: requested,
    });
  }
}

export class InvalidTokenError extends DomainError {
  constructor(asset: string, poolId: string) {
    super('INVALID_TOKEN', `Asset ${asset} is not traded by pool ${poolId}`);
  }
}

export class IdenticalAssetsError extends DomainError {
  constructor(asset: string) {
    super('IDENTICAL_ASSETS', `A pool needs two distinct assets, got ${asset} twice`);
  }
}

export class SlippageExceededError extends DomainError {
  constructor(minAmountOut: bigint, amountOut: bigint) {
    super('SLIPPAGE_EXCEEDED', `Slippage exceeded. Expected min: ${minAmountOut}, got: ${amountOut}`, {
      minAmountOut: minAmountOut.toString(),
      amountOut: amountOut.toString(),
    });
  }
}

export class InsufficientAllowanceError extends DomainError {
  constructor(asset: string, owner: string, allowance: bigint, requested: bigint) {
    super('INSUFFICIENT_ALLOWANCE', `Allowance of ${owner} for ${asset} is ${allowance}, ${requested} required`, {
      asset,
      owner,
      allowance: allowance.toString(),
      requested: requested.toString(),
    });
  }
}

export class InsufficientBalanceError extends DomainError {
  constructor(asset: string, account: string, balance: bigint, requested: bigint) {
    super('INSUFFICIENT_BALANCE', `Balance of ${account} in ${asset} is ${balance}, ${requested} required`, {
      asset,
      account,
      balance: balance.toString(),
      requested: requested.toString(),
    });
  }
}

/**
 * Internal defect: the pool math or custody accounting broke an invariant.
 * Not a DomainError on purpose, so nothing maps it to a caller-correctable status.
 */
export class InvariantViolationError extends Error {
  readonly code = 'INVARIANT_VIOLATION';

  constructor(
    message: string,
    public readonly context: Record<string, string>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'InvariantViolationError';
  }
}

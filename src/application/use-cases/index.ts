export { CreatePool, type CreatePoolInput, type CreatePoolOutput } from './CreatePool.js';
export { DepositLiquidity, type DepositLiquidityInput, type DepositLiquidityOutput } from './DepositLiquidity.js';
export { WithdrawLiquidity, type WithdrawLiquidityInput, type WithdrawLiquidityOutput } from './WithdrawLiquidity.js';
export { ExecuteSwap, type ExecuteSwapInput } from './ExecuteSwap.js';
export { GetPoolInfo } from './GetPoolInfo.js';
export { GetQuote, type GetQuoteInput } from './GetQuote.js';

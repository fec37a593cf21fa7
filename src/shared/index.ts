/**
 * Shared constants and validation schemas
 *
 * Zod schemas for HTTP request validation. Amounts travel as decimal integer
 * strings and come out of the schemas as bigint.
 */
import { z } from 'zod';

// ═══════════════════════════════════════════════════════
// Protocol Constants
// ═══════════════════════════════════════════════════════

/** Fee denominator: all fees are expressed as numerator/10000 (basis points). */
export const FEE_DENOMINATOR = 10_000;

// ═══════════════════════════════════════════════════════
// Zod Validation Schemas
// ═══════════════════════════════════════════════════════

// ─── Account / asset identifiers ───
const account = z.string().trim().min(1, 'Account is required');
const assetId = z.string().trim().min(1, 'Asset is required');

// ─── Non-negative integer string (for BigInt amounts) ───
const amount = z
  .string()
  .regex(/^\d+$/, 'Must be a non-negative integer string')
  .transform((value) => BigInt(value));

// ─── Positive integer string ───
const positiveAmount = z
  .string()
  .regex(/^0*[1-9]\d*$/, 'Must be a positive integer string')
  .transform((value) => BigInt(value));

// ─── Pool schemas ───────────────────────────────────
export const poolCreateSchema = z.object({
  sender: account,
  assetA: assetId,
  assetB: assetId,
  amount0: amount,
  amount1: amount,
});

export const depositSchema = z.object({
  sender: account,
  amount0: amount,
  amount1: amount,
});

export const withdrawSchema = z.object({
  sender: account,
  shareAmount: amount,
});

export const swapSchema = z.object({
  sender: account,
  assetIn: assetId,
  amountIn: amount,
  minAmountOut: amount.default('0'),
  recipient: account.optional(),
});

export const quoteSchema = z.object({
  assetIn: assetId,
  amountIn: amount,
});

// ─── Ledger (in-memory funding) schemas ─────────────
export const ledgerMintSchema = z.object({
  asset: assetId,
  account,
  amount: positiveAmount,
});

export const ledgerBalanceParamsSchema = z.object({
  account,
  asset: assetId,
});

export const ledgerApproveSchema = z.object({
  asset: assetId,
  owner: account,
  amount,
});

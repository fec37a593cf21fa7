/**
 * In-memory fungible asset ledger.
 * Balances and allowances per (asset, account); implements the transfer port
 * with a single custody account standing for the AMM.
 */
import type { IAssetTransferAdapter } from '../../domain/ports/IAssetTransferAdapter.js';
import {
  InsufficientAllowanceError,
  InsufficientAmountsError,
  InsufficientBalanceError,
} from '../../domain/errors/index.js';
import { AssetId } from '../../domain/value-objects/Asset.js';

export class InMemoryAssetLedger implements IAssetTransferAdapter {
  /** asset → account → balance */
  private readonly balances = new Map<string, Map<string, bigint>>();
  /** asset → owner → allowance granted to custody */
  private readonly allowances = new Map<string, Map<string, bigint>>();

  constructor(public readonly custody: string) {}

  // ── Funding / account management ──

  /** Credit new units to an account (faucet) */
  mint(asset: string, account: string, amount: bigint): void {
    if (amount <= 0n) throw new InsufficientAmountsError('mint amount must be positive');
    const id = this.key(asset);
    this.credit(id, account, amount);
  }

  /** Let custody pull up to `amount` of `asset` from `owner` (replaces, like ERC-20 approve) */
  approve(asset: string, owner: string, amount: bigint): void {
    if (amount < 0n) throw new InsufficientAmountsError('allowance must not be negative');
    this.entry(this.allowances, this.key(asset)).set(owner, amount);
  }

  balanceOf(asset: string, account: string): bigint {
    return this.balances.get(this.key(asset))?.get(account) ?? 0n;
  }

  allowanceOf(asset: string, owner: string): bigint {
    return this.allowances.get(this.key(asset))?.get(owner) ?? 0n;
  }

  // ── IAssetTransferAdapter ──

  pull(asset: string, owner: string, amount: bigint): void {
    const id = this.key(asset);
    const allowance = this.allowanceOf(id, owner);
    if (allowance < amount) {
      throw new InsufficientAllowanceError(id, owner, allowance, amount);
    }
    this.debit(id, owner, amount);
    this.entry(this.allowances, id).set(owner, allowance - amount);
    this.credit(id, this.custody, amount);
  }

  push(asset: string, recipient: string, amount: bigint): void {
    const id = this.key(asset);
    this.debit(id, this.custody, amount);
    this.credit(id, recipient, amount);
  }

  // ── Private ──

  private key(asset: string): string {
    return AssetId.fromString(asset).id;
  }

  private debit(asset: string, account: string, amount: bigint): void {
    const balance = this.balanceOf(asset, account);
    if (balance < amount) {
      throw new InsufficientBalanceError(asset, account, balance, amount);
    }
    this.entry(this.balances, asset).set(account, balance - amount);
  }

  private credit(asset: string, account: string, amount: bigint): void {
    this.entry(this.balances, asset).set(account, this.balanceOf(asset, account) + amount);
  }

  private entry(table: Map<string, Map<string, bigint>>, asset: string): Map<string, bigint> {
    let accounts = table.get(asset);
    if (!accounts) {
      accounts = new Map();
      table.set(asset, accounts);
    }
    return accounts;
  }
}

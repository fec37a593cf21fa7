/**
 * Transfer settlement
 * Runs every pull before any push. When a step fails, completed pulls are
 * returned to their owners so the operation leaves no trace; a push that
 * already went out cannot be taken back, so a later failure is fatal.
 */
import type { IAssetTransferAdapter } from '../domain/ports/IAssetTransferAdapter.js';
import { InvariantViolationError } from '../domain/errors/index.js';

export interface Transfer {
  kind: 'pull' | 'push';
  asset: string;
  /** Owner for a pull, recipient for a push */
  account: string;
  amount: bigint;
}

export function pull(asset: string, account: string, amount: bigint): Transfer {
  return { kind: 'pull', asset, account, amount };
}

export function push(asset: string, account: string, amount: bigint): Transfer {
  return { kind: 'push', asset, account, amount };
}

export function settle(
  adapter: IAssetTransferAdapter,
  transfers: Transfer[],
  context: Record<string, string>,
): void {
  const ordered = [
    ...transfers.filter((t) => t.kind === 'pull'),
    ...transfers.filter((t) => t.kind === 'push'),
  ].filter((t) => t.amount > 0n);

  const done: Transfer[] = [];
  for (const transfer of ordered) {
    try {
      if (transfer.kind === 'pull') {
        adapter.pull(transfer.asset, transfer.account, transfer.amount);
      } else {
        adapter.push(transfer.asset, transfer.account, transfer.amount);
      }
      done.push(transfer);
    } catch (err) {
      unwind(adapter, done, context, err);
      throw err;
    }
  }
}

function unwind(
  adapter: IAssetTransferAdapter,
  done: Transfer[],
  context: Record<string, string>,
  cause: unknown,
): void {
  if (done.some((t) => t.kind === 'push')) {
    throw new InvariantViolationError('Transfer failed after assets left custody', context, { cause });
  }

  for (const transfer of [...done].reverse()) {
    try {
      adapter.push(transfer.asset, transfer.account, transfer.amount);
    } catch (refundErr) {
      throw new InvariantViolationError(
        'Could not return pulled assets after a failed transfer',
        { ...context, asset: transfer.asset, account: transfer.account, amount: transfer.amount.toString() },
        { cause: refundErr },
      );
    }
  }
}

import pino from 'pino';
import { AmmCore } from '../src/application/AmmCore.js';
import { InMemoryPoolStore } from '../src/infrastructure/store/InMemoryPoolStore.js';
import { InMemoryAssetLedger } from '../src/infrastructure/ledger/InMemoryAssetLedger.js';
import type { AmmEvent, INotificationSink } from '../src/domain/ports/INotificationSink.js';
import type { IAssetTransferAdapter } from '../src/domain/ports/IAssetTransferAdapter.js';

export const E18 = 10n ** 18n;

/** Two asset ids whose canonical order is TOKEN_A < TOKEN_B */
export const TOKEN_A = `0x${'a'.repeat(40)}`;
export const TOKEN_B = `0x${'b'.repeat(40)}`;
export const TOKEN_C = `0x${'c'.repeat(40)}`;

export const CUSTODY = 'amm-custody';

export class RecordingSink implements INotificationSink {
  readonly events: AmmEvent[] = [];

  publish(event: AmmEvent): void {
    this.events.push(event);
  }

  ofType<T extends AmmEvent['type']>(type: T): Extract<AmmEvent, { type: T }>[] {
    return this.events.filter((e): e is Extract<AmmEvent, { type: T }> => e.type === type);
  }
}

export function silentLogger(): pino.Logger {
  return pino({ level: 'silent' });
}

export function setup(feeBps = 30) {
  const store = new InMemoryPoolStore();
  const ledger = new InMemoryAssetLedger(CUSTODY);
  const sink = new RecordingSink();
  const amm = new AmmCore({ store, transfers: ledger, notifications: sink, feeBps, logger: silentLogger() });
  return { store, ledger, sink, amm };
}

/** Mint `amount` of each asset to `account` and approve custody for all of it */
export function fund(ledger: InMemoryAssetLedger, account: string, amount: bigint, ...assets: string[]): void {
  for (const asset of assets) {
    ledger.mint(asset, account, amount);
    ledger.approve(asset, account, amount);
  }
}

/** Deterministic 64-bit LCG for property loops */
export function lcg(seed: bigint): (max: bigint) => bigint {
  let state = seed;
  return (max: bigint) => {
    state = (state * 6364136223846793005n + 1442695040888963407n) % (1n << 64n);
    return (state % max) + 1n;
  };
}

/** Transfer adapter whose pulls always succeed and whose second push fails */
export function failingOnSecondPush(): IAssetTransferAdapter {
  let pushes = 0;
  return {
    pull: () => undefined,
    push: () => {
      pushes += 1;
      if (pushes === 2) throw new Error('custody offline');
    },
  };
}

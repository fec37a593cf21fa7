export type { IPoolStore } from './IPoolStore.js';
export type { IAssetTransferAdapter } from './IAssetTransferAdapter.js';
export type {
  INotificationSink,
  AmmEvent,
  PoolCreatedEvent,
  LiquidityAddedEvent,
  LiquidityRemovedEvent,
  SwapEvent,
} from './INotificationSink.js';

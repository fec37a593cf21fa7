/**
 * Port: Notification Sink
 * Receives a structured event after every committed operation.
 * Purely observational: the core never depends on delivery.
 */

export interface PoolCreatedEvent {
  type: 'PoolCreated';
  poolId: string;
  asset0: string;
  asset1: string;
}

export interface LiquidityAddedEvent {
  type: 'LiquidityAdded';
  poolId: string;
  provider: string;
  amount0: bigint;
  amount1: bigint;
  sharesMinted: bigint;
}

export interface LiquidityRemovedEvent {
  type: 'LiquidityRemoved';
  poolId: string;
  provider: string;
  amount0: bigint;
  amount1: bigint;
  sharesBurned: bigint;
}

export interface SwapEvent {
  type: 'Swap';
  poolId: string;
  sender: string;
  recipient: string;
  assetIn: string;
  amountIn: bigint;
  assetOut: string;
  amountOut: bigint;
}

export type AmmEvent = PoolCreatedEvent | LiquidityAddedEvent | LiquidityRemovedEvent | SwapEvent;

export interface INotificationSink {
  publish(event: AmmEvent): void;
}

/**
 * Port: Asset Transfer Adapter
 * Moves asset units between accounts and the AMM's custody.
 * Both calls are synchronous and either complete fully or throw.
 */
export interface IAssetTransferAdapter {
  /**
   * Move `amount` of `asset` from `owner` into custody.
   * @throws InsufficientAllowanceError | InsufficientBalanceError
   */
  pull(asset: string, owner: string, amount: bigint): void;

  /**
   * Move `amount` of `asset` from custody to `recipient`.
   * @throws InsufficientBalanceError when custody is short (an accounting defect)
   */
  push(asset: string, recipient: string, amount: bigint): void;
}

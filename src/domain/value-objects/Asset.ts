/**
 * Domain Value Object: Asset
 */
const HEX_ADDRESS = /^0x[0-9a-fA-F]+$/;

export class AssetId {
  private constructor(public readonly id: string) {}

  /**
   * Parse from string. `0x` hex identifiers are lower-cased so a checksummed
   * address and its plain spelling name the same asset.
   */
  static fromString(raw: string): AssetId {
    const trimmed = raw.trim();
    if (trimmed === '') throw new TypeError('Asset identifier must not be empty');
    return new AssetId(HEX_ADDRESS.test(trimmed) ? trimmed.toLowerCase() : trimmed);
  }

  /** Canonical ordering: code-unit comparison of normalised ids */
  compare(other: AssetId): number {
    if (this.id === other.id) return 0;
    return this.id < other.id ? -1 : 1;
  }

  equals(other: AssetId): boolean {
    return this.id === other.id;
  }

  toString(): string {
    return this.id;
  }
}

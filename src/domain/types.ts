export type Address = string;

export interface TokenMeta {
  symbol: string;
  name: string;
  address: Address;
  decimals: number;
}

// Immutable after registration; decimals come from the asset's token capability.
export interface AssetConfig {
  assetId: string;
  priceSourceId: string;
  decimals: number;
}

export interface PriceQuote {
  price: bigint;
  decimals: number; // scale of `price`, e.g. 8 for an 8-decimal feed
}

export interface PriceSource {
  latestPrice(priceSourceId: string): PriceQuote;
}

// Transfer capability of a collateral asset. `transfer` moves funds held by the engine.
export interface CollateralToken {
  readonly decimals: number;
  transferFrom(from: Address, to: Address, amount: bigint): boolean;
  transfer(to: Address, amount: bigint): boolean;
}

// Capability of the synthetic dollar. `burn` destroys funds held by the engine.
export interface DebtToken {
  mint(to: Address, amount: bigint): boolean;
  burn(amount: bigint): void;
  transferFrom(from: Address, to: Address, amount: bigint): boolean;
}

export type Restore = () => void;

// Anything able to capture its state and roll back to it when a transaction aborts.
export interface Checkpointable {
  checkpoint(): Restore;
}

export interface AccountInfo {
  totalDebt: bigint;
  collateralValueUsd: bigint;
}

export interface EngineParameters {
  precision: bigint;
  liquidationThreshold: bigint;
  liquidationPrecision: bigint;
  liquidationBonus: bigint;
  minHealthFactor: bigint;
}

export type EngineEvent =
  | {
      type: 'CollateralDeposited';
      user: Address;
      assetId: string;
      amount: bigint;
    }
  | {
      type: 'CollateralRedeemed';
      from: Address;
      to: Address;
      assetId: string;
      amount: bigint;
    };

export interface LiquidationResult {
  collateralAsset: string;
  user: Address;
  liquidator: Address;
  debtCovered: bigint;
  collateralSeized: bigint;
  bonus: bigint;
  healthFactorBefore: bigint;
  healthFactorAfter: bigint;
}

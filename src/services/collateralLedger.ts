import type { Address, Checkpointable, Restore } from '../domain/types';
import { InsufficientCollateral } from '../domain/errors';
import type { AssetRegistry } from './assetRegistry';
import type { PriceOracle } from './priceOracle';

// user -> assetId -> deposited amount (asset's native decimals)
export class CollateralLedger implements Checkpointable {
  private balances = new Map<Address, Map<string, bigint>>();

  constructor(
    private readonly registry: AssetRegistry,
    private readonly oracle: PriceOracle,
  ) {}

  balanceOf(user: Address, assetId: string): bigint {
    return this.balances.get(user)?.get(assetId) ?? 0n;
  }

  credit(user: Address, assetId: string, amount: bigint): void {
    this.set(user, assetId, this.balanceOf(user, assetId) + amount);
  }

  debit(user: Address, assetId: string, amount: bigint): void {
    const balance = this.balanceOf(user, assetId);
    if (amount > balance) throw new InsufficientCollateral(user, assetId, balance, amount);
    this.set(user, assetId, balance - amount);
  }

  totalCollateralValueUsd(user: Address): bigint {
    let total = 0n;
    for (const { assetId } of this.registry.list()) {
      const amount = this.balanceOf(user, assetId);
      if (amount === 0n) continue;
      total += this.oracle.usdValue(assetId, amount);
    }
    return total;
  }

  users(): Address[] {
    return [...this.balances.keys()];
  }

  checkpoint(): Restore {
    const saved = new Map([...this.balances].map(([user, assets]) => [user, new Map(assets)]));
    return () => {
      this.balances = saved;
    };
  }

  private set(user: Address, assetId: string, amount: bigint): void {
    let assets = this.balances.get(user);
    if (!assets) {
      assets = new Map();
      this.balances.set(user, assets);
    }
    assets.set(assetId, amount);
  }
}

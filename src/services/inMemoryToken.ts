import type { Address, Checkpointable, CollateralToken, DebtToken, Restore, TokenMeta } from '../domain/types';

// Balance-only token living in process memory. `owner` is the account whose
// holdings `transfer` and `burn` draw from (the engine). There is no allowance
// model: `transferFrom` succeeds whenever `from` holds enough.
export class InMemoryToken implements CollateralToken, DebtToken, Checkpointable {
  readonly symbol: string;
  readonly decimals: number;
  private balances = new Map<Address, bigint>();
  private supply = 0n;

  constructor(meta: Pick<TokenMeta, 'symbol' | 'decimals'>, private readonly owner: Address) {
    this.symbol = meta.symbol;
    this.decimals = meta.decimals;
  }

  balanceOf(account: Address): bigint {
    return this.balances.get(account) ?? 0n;
  }

  totalSupply(): bigint {
    return this.supply;
  }

  mint(to: Address, amount: bigint): boolean {
    if (amount <= 0n) return false;
    this.balances.set(to, this.balanceOf(to) + amount);
    this.supply += amount;
    return true;
  }

  burn(amount: bigint): void {
    const held = this.balanceOf(this.owner);
    if (amount <= 0n || amount > held) {
      throw new Error(`${this.symbol}: cannot burn ${amount}, owner holds ${held}`);
    }
    this.balances.set(this.owner, held - amount);
    this.supply -= amount;
  }

  transferFrom(from: Address, to: Address, amount: bigint): boolean {
    const held = this.balanceOf(from);
    if (amount > held) return false;
    this.balances.set(from, held - amount);
    this.balances.set(to, this.balanceOf(to) + amount);
    return true;
  }

  transfer(to: Address, amount: bigint): boolean {
    return this.transferFrom(this.owner, to, amount);
  }

  checkpoint(): Restore {
    const balances = new Map(this.balances);
    const supply = this.supply;
    return () => {
      this.balances = balances;
      this.supply = supply;
    };
  }
}

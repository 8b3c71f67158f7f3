import type { Address, Checkpointable, Restore } from '../domain/types';
import { InsufficientDebt } from '../domain/errors';

// user -> minted synthetic dollars (18 decimals)
export class DebtLedger implements Checkpointable {
  private minted = new Map<Address, bigint>();

  balanceOf(user: Address): bigint {
    return this.minted.get(user) ?? 0n;
  }

  increase(user: Address, amount: bigint): void {
    this.minted.set(user, this.balanceOf(user) + amount);
  }

  // Callers only repay what they verified is owed; anything else aborts.
  decrease(user: Address, amount: bigint): void {
    const balance = this.balanceOf(user);
    if (amount > balance) throw new InsufficientDebt(user, balance, amount);
    this.minted.set(user, balance - amount);
  }

  users(): Address[] {
    return [...this.minted.keys()];
  }

  checkpoint(): Restore {
    const saved = new Map(this.minted);
    return () => {
      this.minted = saved;
    };
  }
}

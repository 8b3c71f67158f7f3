import type { AccountInfo, Address } from '../domain/types';
import { HealthFactorBroken } from '../domain/errors';
import { calculateHealthFactor, isBelowMinimum } from '../utils/health';
import type { CollateralLedger } from './collateralLedger';
import type { DebtLedger } from './debtLedger';

// Read-only view over both ledgers. Only ever consulted once a call has
// finished mutating, so composite operations are judged on their net effect.
export class SolvencyChecker {
  constructor(
    private readonly collateral: CollateralLedger,
    private readonly debt: DebtLedger,
  ) {}

  accountInfo(user: Address): AccountInfo {
    return {
      totalDebt: this.debt.balanceOf(user),
      collateralValueUsd: this.collateral.totalCollateralValueUsd(user),
    };
  }

  healthFactor(user: Address): bigint {
    const totalDebt = this.debt.balanceOf(user);
    // skip pricing entirely when there is nothing to cover
    if (totalDebt === 0n) return calculateHealthFactor(0n, 0n);
    return calculateHealthFactor(totalDebt, this.collateral.totalCollateralValueUsd(user));
  }

  assertHealthy(user: Address): void {
    if (this.debt.balanceOf(user) === 0n) return;
    const healthFactor = this.healthFactor(user);
    if (isBelowMinimum(healthFactor)) throw new HealthFactorBroken(user, healthFactor);
  }
}

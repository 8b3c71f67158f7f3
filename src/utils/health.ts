import {
  LIQUIDATION_PRECISION,
  LIQUIDATION_THRESHOLD,
  MAX_HEALTH_FACTOR,
  MIN_HEALTH_FACTOR,
  PRECISION,
} from '../config/constants';

// HF (WAD) = (CollateralUsd * threshold / precision) * 1e18 / Debt
// A position without debt cannot be liquidated, so it never reaches the division.
export function calculateHealthFactor(totalDebt: bigint, collateralValueUsd: bigint): bigint {
  if (totalDebt === 0n) return MAX_HEALTH_FACTOR;
  const adjusted = (collateralValueUsd * LIQUIDATION_THRESHOLD) / LIQUIDATION_PRECISION;
  return (adjusted * PRECISION) / totalDebt;
}

export function isBelowMinimum(healthFactor: bigint): boolean {
  return healthFactor < MIN_HEALTH_FACTOR;
}

export type HealthStatus = 'healthy' | 'liquidatable' | 'debt-free';

export function statusForHealthFactor(totalDebt: bigint, healthFactor: bigint): HealthStatus {
  if (totalDebt === 0n) return 'debt-free';
  return isBelowMinimum(healthFactor) ? 'liquidatable' : 'healthy';
}

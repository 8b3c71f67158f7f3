import { maxUint256 } from 'viem';

// Solvency and liquidation parameters shared by the engine and the API.
export const PRECISION = 10n ** 18n;
export const LIQUIDATION_THRESHOLD = 50n; // 50% of collateral value counts => 200% overcollateralized
export const LIQUIDATION_PRECISION = 100n;
export const LIQUIDATION_BONUS = 10n; // 10% extra collateral for the liquidator
export const MIN_HEALTH_FACTOR = PRECISION; // 1.0
export const MAX_HEALTH_FACTOR = maxUint256; // returned for positions without debt
export const USD_DECIMALS = 18;
export const DEBT_DECIMALS = 18;

export const ENGINE_ACCOUNT = '0x00000000000000000000000000000000000e6617';
export const DEFAULT_PORT = 3000;

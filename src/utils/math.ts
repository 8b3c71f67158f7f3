import { formatUnits } from 'viem';
import { MAX_HEALTH_FACTOR, USD_DECIMALS } from '../config/constants';

export const BPS = 10_000n;

export function pow10(n: number): bigint { return 10n ** BigInt(n); }

export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  return (a * b) / denominator;
}

// Rescale a fixed-point integer between decimal precisions (truncates when shrinking).
export function scaleDecimals(value: bigint, fromDecimals: number, toDecimals: number): bigint {
  if (fromDecimals === toDecimals) return value;
  if (fromDecimals < toDecimals) return value * pow10(toDecimals - fromDecimals);
  return value / pow10(fromDecimals - toDecimals);
}

export function applyBpsDrop(value: bigint, dropBps: number): bigint {
  return mulDiv(value, BPS - BigInt(dropBps), BPS);
}

// Fixed-point integer to a plain number rounded to cents, for JSON views only.
export function toCents(value: bigint, decimals: number): number {
  return Math.round(Number(formatUnits(value, decimals)) * 100) / 100;
}

export function toUsd(usdWad: bigint): number {
  return toCents(usdWad, USD_DECIMALS);
}

export function formatHealthFactor(hfWad: bigint): string {
  if (hfWad === MAX_HEALTH_FACTOR) return 'infinite';
  return Number(formatUnits(hfWad, 18)).toFixed(4);
}


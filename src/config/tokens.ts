import { parseUnits } from 'viem';
import type { TokenMeta } from '../domain/types';

// Collateral accepted by the demo deployment. Keys double as asset ids.
export const COLLATERAL_TOKENS: Record<string, TokenMeta> = {
  WETH: {
    symbol: 'WETH',
    name: 'Wrapped Ether',
    address: '0x4200000000000000000000000000000000000006',
    decimals: 18,
  },
  WBTC: {
    symbol: 'WBTC',
    name: 'Wrapped BTC',
    address: '0x2260fac5e5542a773aa44fbcfedf7c193bc2c599',
    decimals: 8,
  },
};

export const DEBT_TOKEN: TokenMeta = {
  symbol: 'USDX',
  name: 'Overcollateralized Dollar',
  address: '0x0000000000000000000000000000000000005d58',
  decimals: 18,
};

// Each collateral asset reads its own feed; feeds quote USD with 8 decimals.
export const PRICE_SOURCES: Record<string, string> = {
  WETH: 'ETH/USD',
  WBTC: 'BTC/USD',
};

export const FEED_DECIMALS = 8;

export const INITIAL_PRICES_USD: Record<string, bigint> = {
  'ETH/USD': parseUnits('2000', FEED_DECIMALS),
  'BTC/USD': parseUnits('60000', FEED_DECIMALS),
};

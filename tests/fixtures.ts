import { parseUnits } from 'viem';
import { CollateralEngine } from '../src/services/engine';
import { InMemoryToken } from '../src/services/inMemoryToken';
import { InMemoryPriceFeed } from '../src/services/priceFeed';
import type { BusEvent } from '../src/services/eventBus';
import type { CollateralToken, DebtToken } from '../src/domain/types';

export const ENGINE = '0x00000000000000000000000000000000000e6617';
export const ALICE = '0x00000000000000000000000000000000000a11ce';
export const BOB = '0x0000000000000000000000000000000000000b0b';

export const eth = (v: string) => parseUnits(v, 18);
export const btc = (v: string) => parseUnits(v, 8);
export const usd = (v: string) => parseUnits(v, 18);
export const feedPrice = (v: string) => parseUnits(v, 8);

export function setup(overrides: { weth?: CollateralToken; debtToken?: DebtToken } = {}) {
  const feed = new InMemoryPriceFeed({ 'ETH/USD': feedPrice('2000'), 'BTC/USD': feedPrice('60000') }, 8);
  const weth = new InMemoryToken({ symbol: 'WETH', decimals: 18 }, ENGINE);
  const wbtc = new InMemoryToken({ symbol: 'WBTC', decimals: 8 }, ENGINE);
  const usdx = new InMemoryToken({ symbol: 'USDX', decimals: 18 }, ENGINE);
  const engine = new CollateralEngine({
    account: ENGINE,
    assetIds: ['WETH', 'WBTC'],
    priceSourceIds: ['ETH/USD', 'BTC/USD'],
    collateralTokens: { WETH: overrides.weth ?? weth, WBTC: wbtc },
    debtToken: overrides.debtToken ?? usdx,
    priceSource: feed,
  });
  const events: BusEvent[] = [];
  engine.subscribe((evt) => events.push(evt));
  return { engine, feed, weth, wbtc, usdx, events };
}

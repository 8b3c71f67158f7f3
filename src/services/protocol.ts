import { COLLATERAL_TOKENS, DEBT_TOKEN, FEED_DECIMALS, INITIAL_PRICES_USD, PRICE_SOURCES } from '../config/tokens';
import { ENGINE_ACCOUNT } from '../config/constants';
import type { Address, TokenMeta } from '../domain/types';
import { CollateralEngine } from './engine';
import { InMemoryToken } from './inMemoryToken';
import { InMemoryPriceFeed } from './priceFeed';
import { createEventBus, type EventBus } from './eventBus';

export interface Protocol {
  engine: CollateralEngine;
  feed: InMemoryPriceFeed;
  collateralTokens: Record<string, InMemoryToken>;
  debtToken: InMemoryToken;
  events: EventBus;
  tokenMeta(assetId: string): TokenMeta | undefined;
}

// Wire an engine against in-process tokens and feeds from the static config.
export function createProtocol(): Protocol {
  const feed = new InMemoryPriceFeed(INITIAL_PRICES_USD, FEED_DECIMALS);
  const events = createEventBus();
  const assetIds = Object.keys(COLLATERAL_TOKENS);
  const collateralTokens = Object.fromEntries(
    assetIds.map((id) => [id, new InMemoryToken(COLLATERAL_TOKENS[id], ENGINE_ACCOUNT)]),
  );
  const debtToken = new InMemoryToken(DEBT_TOKEN, ENGINE_ACCOUNT);
  const engine = new CollateralEngine({
    account: ENGINE_ACCOUNT,
    assetIds,
    priceSourceIds: assetIds.map((id) => PRICE_SOURCES[id]),
    collateralTokens,
    debtToken,
    priceSource: feed,
    events,
  });
  return {
    engine,
    feed,
    collateralTokens,
    debtToken,
    events,
    tokenMeta: (assetId) => COLLATERAL_TOKENS[assetId],
  };
}

// Centralized, in-memory instance served by the HTTP API.
let current: Protocol = createProtocol();

export function getProtocol(): Protocol {
  return current;
}

export function resetProtocol(): Protocol {
  current = createProtocol();
  return current;
}

// Demo faucet: hands out collateral so accounts have something to deposit.
export function fundAccount(protocol: Protocol, account: Address, assetId: string, amount: bigint): boolean {
  const token = protocol.collateralTokens[assetId];
  if (!token) return false;
  return token.mint(account, amount);
}

import { describe, test, expect } from 'vitest';
import { CollateralEngine } from '../src/services/engine';
import { InMemoryToken } from '../src/services/inMemoryToken';
import { InMemoryPriceFeed } from '../src/services/priceFeed';
import {
  HealthFactorBroken,
  InsufficientCollateral,
  InsufficientDebt,
  LengthMismatch,
  MintFailed,
  NeedMoreThanZero,
  NotAllowedToken,
  OracleUnavailable,
  TransferFailed,
  UnknownAsset,
} from '../src/domain/errors';
import { MAX_HEALTH_FACTOR, MIN_HEALTH_FACTOR } from '../src/config/constants';
import type { Address, DebtToken } from '../src/domain/types';
import { ALICE, BOB, ENGINE, eth, feedPrice, setup, usd } from './fixtures';

// Collateral token whose outbound transfers can be switched off.
class FreezableToken extends InMemoryToken {
  frozen = false;

  override transfer(to: Address, amount: bigint): boolean {
    if (this.frozen) return false;
    return super.transfer(to, amount);
  }
}

describe('construction', () => {
  const token = new InMemoryToken({ symbol: 'WETH', decimals: 18 }, ENGINE);
  const base = {
    account: ENGINE,
    collateralTokens: { WETH: token },
    debtToken: new InMemoryToken({ symbol: 'USDX', decimals: 18 }, ENGINE),
    priceSource: new InMemoryPriceFeed(),
  };

  test('rejects asset and price source lists of different length', () => {
    expect(() => new CollateralEngine({ ...base, assetIds: ['WETH'], priceSourceIds: [] })).toThrow(LengthMismatch);
  });

  test('rejects an asset without a token', () => {
    expect(() => new CollateralEngine({ ...base, assetIds: ['WBTC'], priceSourceIds: ['BTC/USD'] })).toThrow(
      UnknownAsset,
    );
  });

  test('registers assets in order with their token decimals', () => {
    const { engine, usdx } = setup();
    expect(engine.getDebtToken()).toBe(usdx);
    expect(engine.getCollateralAssets()).toEqual([
      { assetId: 'WETH', priceSourceId: 'ETH/USD', decimals: 18 },
      { assetId: 'WBTC', priceSourceId: 'BTC/USD', decimals: 8 },
    ]);
    expect(engine.getPriceSource('WBTC')).toBe('BTC/USD');
    expect(engine.getParameters()).toEqual({
      precision: 10n ** 18n,
      liquidationThreshold: 50n,
      liquidationPrecision: 100n,
      liquidationBonus: 10n,
      minHealthFactor: MIN_HEALTH_FACTOR,
    });
  });
});

describe('deposit', () => {
  test('credits the ledger, moves the tokens and emits an event', () => {
    const { engine, weth, events } = setup();
    weth.mint(ALICE, eth('10'));

    engine.deposit(ALICE, 'WETH', eth('4'));

    expect(engine.getCollateralBalance(ALICE, 'WETH')).toBe(eth('4'));
    expect(weth.balanceOf(ALICE)).toBe(eth('6'));
    expect(weth.balanceOf(ENGINE)).toBe(eth('4'));
    expect(engine.getCollateralValue(ALICE)).toBe(usd('8000'));
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ type: 'CollateralDeposited', user: ALICE, assetId: 'WETH', amount: eth('4') });
  });

  test('sums every registered asset', () => {
    const { engine, weth, wbtc } = setup();
    weth.mint(ALICE, eth('1'));
    wbtc.mint(ALICE, 50_000_000n);
    engine.deposit(ALICE, 'WETH', eth('1'));
    engine.deposit(ALICE, 'WBTC', 50_000_000n);
    expect(engine.getAccountInfo(ALICE)).toEqual({ totalDebt: 0n, collateralValueUsd: usd('32000') });
  });

  test('validates inputs', () => {
    const { engine } = setup();
    expect(() => engine.deposit(ALICE, 'WETH', 0n)).toThrow(NeedMoreThanZero);
    expect(() => engine.deposit(ALICE, 'DOGE', 1n)).toThrow(NotAllowedToken);
  });

  test('rolls the credit back when the transfer fails', () => {
    const { engine, weth, events } = setup();
    weth.mint(ALICE, eth('1'));

    expect(() => engine.deposit(ALICE, 'WETH', eth('2'))).toThrow(TransferFailed);

    expect(engine.getCollateralBalance(ALICE, 'WETH')).toBe(0n);
    expect(weth.balanceOf(ALICE)).toBe(eth('1'));
    expect(events).toHaveLength(0);
  });

  test('deposit then redeem restores the ledger', () => {
    const { engine, weth } = setup();
    weth.mint(ALICE, eth('3'));

    engine.deposit(ALICE, 'WETH', eth('3'));
    engine.redeem(ALICE, 'WETH', eth('3'));

    expect(engine.getCollateralBalance(ALICE, 'WETH')).toBe(0n);
    expect(weth.balanceOf(ALICE)).toBe(eth('3'));
    expect(weth.balanceOf(ENGINE)).toBe(0n);
  });
});

describe('mint', () => {
  function funded() {
    const ctx = setup();
    ctx.weth.mint(ALICE, eth('10'));
    ctx.engine.deposit(ALICE, 'WETH', eth('10'));
    return ctx;
  }

  test('mints up to a health factor of exactly 1', () => {
    const { engine, usdx } = funded();

    engine.mint(ALICE, usd('8000'));
    expect(engine.getHealthFactor(ALICE)).toBe(1_250_000_000_000_000_000n);

    engine.mint(ALICE, usd('2000'));
    expect(engine.getHealthFactor(ALICE)).toBe(MIN_HEALTH_FACTOR);
    expect(usdx.balanceOf(ALICE)).toBe(usd('10000'));
  });

  test('rejects debt that breaks the health factor and leaves the ledger untouched', () => {
    const { engine, usdx } = funded();
    engine.mint(ALICE, usd('10000'));

    let caught: unknown;
    try {
      engine.mint(ALICE, usd('1'));
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(HealthFactorBroken);
    if (caught instanceof HealthFactorBroken) {
      expect(caught.healthFactor).toBe(999_900_009_999_000_099n);
    }
    expect(engine.getAccountInfo(ALICE).totalDebt).toBe(usd('10000'));
    expect(usdx.balanceOf(ALICE)).toBe(usd('10000'));
    expect(usdx.totalSupply()).toBe(usd('10000'));
  });

  test('surfaces a refused mint and restores the debt', () => {
    const refusing: DebtToken = {
      mint: () => false,
      burn: () => undefined,
      transferFrom: () => true,
    };
    const { engine, weth } = setup({ debtToken: refusing });
    weth.mint(ALICE, eth('10'));
    engine.deposit(ALICE, 'WETH', eth('10'));

    expect(() => engine.mint(ALICE, usd('100'))).toThrow(MintFailed);
    expect(engine.getAccountInfo(ALICE).totalDebt).toBe(0n);
  });

  test('without collateral any debt is refused', () => {
    const { engine } = setup();
    expect(() => engine.mint(ALICE, 1n)).toThrow(HealthFactorBroken);
    expect(() => engine.mint(ALICE, 0n)).toThrow(NeedMoreThanZero);
  });
});

describe('depositAndMint', () => {
  test('checks the combined effect', () => {
    const { engine, weth, usdx } = setup();
    weth.mint(ALICE, eth('10'));

    engine.depositAndMint(ALICE, 'WETH', eth('10'), usd('10000'));

    expect(engine.getAccountInfo(ALICE)).toEqual({ totalDebt: usd('10000'), collateralValueUsd: usd('20000') });
    expect(usdx.balanceOf(ALICE)).toBe(usd('10000'));
  });

  test('undoes the deposit when the mint breaks health', () => {
    const { engine, weth, usdx, events } = setup();
    weth.mint(ALICE, eth('10'));

    expect(() => engine.depositAndMint(ALICE, 'WETH', eth('10'), usd('10001'))).toThrow(HealthFactorBroken);

    expect(engine.getCollateralBalance(ALICE, 'WETH')).toBe(0n);
    expect(engine.getAccountInfo(ALICE).totalDebt).toBe(0n);
    expect(weth.balanceOf(ALICE)).toBe(eth('10'));
    expect(weth.balanceOf(ENGINE)).toBe(0n);
    expect(usdx.totalSupply()).toBe(0n);
    expect(events).toHaveLength(0);
  });

  test('validates both amounts before touching anything', () => {
    const { engine } = setup();
    expect(() => engine.depositAndMint(ALICE, 'WETH', eth('1'), 0n)).toThrow(NeedMoreThanZero);
    expect(() => engine.depositAndMint(ALICE, 'DOGE', 1n, 1n)).toThrow(NotAllowedToken);
  });
});

describe('redeem', () => {
  function borrowed() {
    const ctx = setup();
    ctx.weth.mint(ALICE, eth('10'));
    ctx.engine.depositAndMint(ALICE, 'WETH', eth('10'), usd('5000'));
    return ctx;
  }

  test('returns collateral while the position stays healthy', () => {
    const { engine, weth, events } = borrowed();

    engine.redeem(ALICE, 'WETH', eth('5'));

    expect(engine.getCollateralBalance(ALICE, 'WETH')).toBe(eth('5'));
    expect(weth.balanceOf(ALICE)).toBe(eth('5'));
    expect(engine.getHealthFactor(ALICE)).toBe(MIN_HEALTH_FACTOR);
    expect(events.at(-1)).toMatchObject({
      type: 'CollateralRedeemed',
      from: ALICE,
      to: ALICE,
      assetId: 'WETH',
      amount: eth('5'),
    });
  });

  test('rejects a redeem that breaks health and keeps the collateral locked', () => {
    const { engine, weth, events } = borrowed();
    const eventsBefore = events.length;

    expect(() => engine.redeem(ALICE, 'WETH', eth('6'))).toThrow(HealthFactorBroken);

    expect(engine.getCollateralBalance(ALICE, 'WETH')).toBe(eth('10'));
    expect(weth.balanceOf(ALICE)).toBe(0n);
    expect(weth.balanceOf(ENGINE)).toBe(eth('10'));
    expect(events).toHaveLength(eventsBefore);
  });

  test('rolls the debit back when the outbound transfer fails', () => {
    const weth = new FreezableToken({ symbol: 'WETH', decimals: 18 }, ENGINE);
    const { engine, events } = setup({ weth });
    weth.mint(ALICE, eth('10'));
    engine.deposit(ALICE, 'WETH', eth('5'));
    const eventsBefore = events.length;
    weth.frozen = true;

    expect(() => engine.redeem(ALICE, 'WETH', eth('1'))).toThrow(TransferFailed);

    expect(engine.getCollateralBalance(ALICE, 'WETH')).toBe(eth('5'));
    expect(weth.balanceOf(ALICE)).toBe(eth('5'));
    expect(weth.balanceOf(ENGINE)).toBe(eth('5'));
    expect(events).toHaveLength(eventsBefore);
  });

  test('rejects more than the deposited balance', () => {
    const { engine } = borrowed();
    expect(() => engine.redeem(ALICE, 'WETH', eth('11'))).toThrow(InsufficientCollateral);
    expect(() => engine.redeem(ALICE, 'WBTC', 1n)).toThrow(InsufficientCollateral);
    expect(() => engine.redeem(ALICE, 'WETH', 0n)).toThrow(NeedMoreThanZero);
  });
});

describe('burn', () => {
  function borrowed() {
    const ctx = setup();
    ctx.weth.mint(ALICE, eth('10'));
    ctx.engine.depositAndMint(ALICE, 'WETH', eth('10'), usd('1000'));
    return ctx;
  }

  test('repays debt and destroys the tokens', () => {
    const { engine, usdx } = borrowed();

    engine.burn(ALICE, usd('400'));

    expect(engine.getAccountInfo(ALICE).totalDebt).toBe(usd('600'));
    expect(usdx.balanceOf(ALICE)).toBe(usd('600'));
    expect(usdx.balanceOf(ENGINE)).toBe(0n);
    expect(usdx.totalSupply()).toBe(usd('600'));
  });

  test('repaying everything makes the position debt-free', () => {
    const { engine } = borrowed();
    engine.burn(ALICE, usd('1000'));
    expect(engine.getHealthFactor(ALICE)).toBe(MAX_HEALTH_FACTOR);
  });

  test('refuses to repay more than is owed', () => {
    const { engine, usdx } = borrowed();
    usdx.mint(ALICE, usd('1'));
    expect(() => engine.burn(ALICE, usd('1001'))).toThrow(InsufficientDebt);
    expect(engine.getAccountInfo(ALICE).totalDebt).toBe(usd('1000'));
  });

  test('fails when the payer no longer holds the tokens', () => {
    const { engine, usdx } = borrowed();
    usdx.transferFrom(ALICE, BOB, usd('1000'));

    expect(() => engine.burn(ALICE, usd('500'))).toThrow(TransferFailed);
    expect(engine.getAccountInfo(ALICE).totalDebt).toBe(usd('1000'));
    expect(usdx.totalSupply()).toBe(usd('1000'));
  });
});

describe('redeemForBurn', () => {
  test('frees collateral that redeem alone would refuse', () => {
    const { engine, weth, usdx } = setup();
    weth.mint(ALICE, eth('10'));
    engine.depositAndMint(ALICE, 'WETH', eth('10'), usd('10000'));

    expect(() => engine.redeem(ALICE, 'WETH', eth('1'))).toThrow(HealthFactorBroken);

    engine.redeemForBurn(ALICE, 'WETH', eth('1'), usd('1000'));

    expect(engine.getAccountInfo(ALICE)).toEqual({ totalDebt: usd('9000'), collateralValueUsd: usd('18000') });
    expect(engine.getHealthFactor(ALICE)).toBe(MIN_HEALTH_FACTOR);
    expect(weth.balanceOf(ALICE)).toBe(eth('1'));
    expect(usdx.balanceOf(ALICE)).toBe(usd('9000'));
  });

  test('undoes the burn when the redeem leaves the position unhealthy', () => {
    const { engine, weth, usdx } = setup();
    weth.mint(ALICE, eth('10'));
    engine.depositAndMint(ALICE, 'WETH', eth('10'), usd('10000'));

    expect(() => engine.redeemForBurn(ALICE, 'WETH', eth('2'), usd('1000'))).toThrow(HealthFactorBroken);

    expect(engine.getAccountInfo(ALICE)).toEqual({ totalDebt: usd('10000'), collateralValueUsd: usd('20000') });
    expect(usdx.balanceOf(ALICE)).toBe(usd('10000'));
    expect(usdx.totalSupply()).toBe(usd('10000'));
    expect(weth.balanceOf(ALICE)).toBe(0n);
  });
});

describe('oracle failures', () => {
  function unpriced() {
    const ctx = setup();
    ctx.weth.mint(ALICE, eth('10'));
    ctx.engine.deposit(ALICE, 'WETH', eth('10'));
    ctx.feed.setPrice('ETH/USD', 0n);
    return ctx;
  }

  test('a mint that needs a price aborts and leaves no debt', () => {
    const { engine, usdx } = unpriced();

    expect(() => engine.mint(ALICE, usd('1'))).toThrow(OracleUnavailable);

    // only a debt-free position reports a factor without reading a price
    expect(engine.getHealthFactor(ALICE)).toBe(MAX_HEALTH_FACTOR);
    expect(usdx.totalSupply()).toBe(0n);
  });

  test('a debt-free position can still redeem everything', () => {
    const { engine, weth, events } = unpriced();

    engine.redeem(ALICE, 'WETH', eth('10'));

    expect(engine.getCollateralBalance(ALICE, 'WETH')).toBe(0n);
    expect(weth.balanceOf(ALICE)).toBe(eth('10'));
    expect(events.at(-1)).toMatchObject({ type: 'CollateralRedeemed', amount: eth('10') });
  });

  test('an indebted redeem aborts and restores the collateral', () => {
    const { engine, feed, weth } = setup();
    weth.mint(ALICE, eth('10'));
    engine.depositAndMint(ALICE, 'WETH', eth('10'), usd('1000'));
    feed.setPrice('ETH/USD', 0n);

    expect(() => engine.redeem(ALICE, 'WETH', eth('1'))).toThrow(OracleUnavailable);

    expect(engine.getCollateralBalance(ALICE, 'WETH')).toBe(eth('10'));
    expect(weth.balanceOf(ALICE)).toBe(0n);
    expect(weth.balanceOf(ENGINE)).toBe(eth('10'));
  });

  test('liquidation cannot proceed without a price', () => {
    const { engine, feed, weth, usdx } = setup();
    weth.mint(ALICE, eth('10'));
    engine.depositAndMint(ALICE, 'WETH', eth('10'), usd('10000'));
    usdx.transferFrom(ALICE, BOB, usd('100'));
    feed.setPrice('ETH/USD', 0n);

    expect(() => engine.liquidate(BOB, 'WETH', ALICE, usd('100'))).toThrow(OracleUnavailable);

    expect(engine.getCollateralBalance(ALICE, 'WETH')).toBe(eth('10'));
    expect(usdx.balanceOf(BOB)).toBe(usd('100'));
    expect(usdx.totalSupply()).toBe(usd('10000'));
    feed.setPrice('ETH/USD', feedPrice('2000'));
    expect(engine.getAccountInfo(ALICE).totalDebt).toBe(usd('10000'));
  });
});

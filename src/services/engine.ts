import type {
  AccountInfo,
  Address,
  AssetConfig,
  Checkpointable,
  CollateralToken,
  DebtToken,
  EngineParameters,
  LiquidationResult,
  PriceSource,
} from '../domain/types';
import { HealthFactorNotImproved, HealthFactorOk, MintFailed, NeedMoreThanZero, TransferFailed } from '../domain/errors';
import {
  LIQUIDATION_BONUS,
  LIQUIDATION_PRECISION,
  LIQUIDATION_THRESHOLD,
  MIN_HEALTH_FACTOR,
  PRECISION,
} from '../config/constants';
import { calculateHealthFactor, isBelowMinimum } from '../utils/health';
import { formatHealthFactor } from '../utils/math';
import { logger } from '../utils/logger';
import { AssetRegistry } from './assetRegistry';
import { PriceOracle } from './priceOracle';
import { CollateralLedger } from './collateralLedger';
import { DebtLedger } from './debtLedger';
import { SolvencyChecker } from './solvency';
import { createEventBus, type BusEvent, type EventBus } from './eventBus';
import { isCheckpointable, ReentrancyGuard, TransactionScope, type TxContext } from './transaction';

export interface CollateralEngineOptions {
  /** Address the engine holds collateral and repaid debt tokens under. */
  account: Address;
  assetIds: string[];
  priceSourceIds: string[];
  collateralTokens: Record<string, CollateralToken>;
  debtToken: DebtToken;
  priceSource: PriceSource;
  events?: EventBus;
}

const log = logger.scoped('engine');

function requirePositive(field: string, amount: bigint): void {
  if (amount <= 0n) throw new NeedMoreThanZero(field);
}

/**
 * Collateral and debt bookkeeping for an overcollateralized synthetic dollar.
 *
 * Every mutating entry point runs under the engine-wide reentrancy guard and
 * inside a transaction scope: ledgers are mutated first, external token calls
 * follow, and the solvency check runs last. Any failure restores the ledgers
 * (and every checkpointable token) to their state before the call.
 */
export class CollateralEngine {
  readonly account: Address;
  private readonly registry: AssetRegistry;
  private readonly oracle: PriceOracle;
  private readonly collateral: CollateralLedger;
  private readonly debt: DebtLedger;
  private readonly solvency: SolvencyChecker;
  private readonly debtToken: DebtToken;
  private readonly events: EventBus;
  private readonly guard = new ReentrancyGuard();
  private readonly transaction: TransactionScope;

  constructor(options: CollateralEngineOptions) {
    this.account = options.account;
    this.registry = new AssetRegistry(options.assetIds, options.priceSourceIds, options.collateralTokens);
    this.oracle = new PriceOracle(this.registry, options.priceSource);
    this.collateral = new CollateralLedger(this.registry, this.oracle);
    this.debt = new DebtLedger();
    this.solvency = new SolvencyChecker(this.collateral, this.debt);
    this.debtToken = options.debtToken;
    this.events = options.events ?? createEventBus();

    const participants = new Set<Checkpointable>([this.collateral, this.debt]);
    for (const token of [...this.registry.tokens(), this.debtToken]) {
      if (isCheckpointable(token)) participants.add(token);
    }
    this.transaction = new TransactionScope([...participants]);
  }

  // ---------------------------------------------------------------------------
  // Position operations
  // ---------------------------------------------------------------------------

  deposit(caller: Address, assetId: string, amount: bigint): void {
    requirePositive('amount', amount);
    this.registry.requireAllowed(assetId);
    this.execute('deposit', (tx) => this.depositCollateral(tx, caller, assetId, amount));
  }

  depositAndMint(caller: Address, assetId: string, collateralAmount: bigint, debtAmount: bigint): void {
    requirePositive('collateralAmount', collateralAmount);
    requirePositive('debtAmount', debtAmount);
    this.registry.requireAllowed(assetId);
    this.execute('depositAndMint', (tx) => {
      this.depositCollateral(tx, caller, assetId, collateralAmount);
      this.mintDebt(caller, debtAmount);
    });
  }

  mint(caller: Address, amount: bigint): void {
    requirePositive('amount', amount);
    this.execute('mint', () => this.mintDebt(caller, amount));
  }

  redeem(caller: Address, assetId: string, amount: bigint): void {
    requirePositive('amount', amount);
    this.execute('redeem', (tx) => {
      this.redeemCollateral(tx, assetId, amount, caller, caller);
      this.solvency.assertHealthy(caller);
    });
  }

  burn(caller: Address, amount: bigint): void {
    requirePositive('amount', amount);
    this.execute('burn', () => {
      this.burnDebt(amount, caller, caller);
      // burning only raises the factor
      this.solvency.assertHealthy(caller);
    });
  }

  redeemForBurn(caller: Address, assetId: string, collateralAmount: bigint, debtAmount: bigint): void {
    requirePositive('collateralAmount', collateralAmount);
    requirePositive('debtAmount', debtAmount);
    this.execute('redeemForBurn', (tx) => {
      this.burnDebt(debtAmount, caller, caller);
      this.redeemCollateral(tx, assetId, collateralAmount, caller, caller);
      this.solvency.assertHealthy(caller);
    });
  }

  // ---------------------------------------------------------------------------
  // Liquidation
  // ---------------------------------------------------------------------------

  /**
   * Repays `debtToCover` of `user`'s debt with the caller's tokens and pays the
   * caller the equivalent collateral plus the liquidation bonus.
   *
   * There is no insolvency backstop: if the user's balance of the asset is worth
   * less than 110% of `debtToCover`, the seize amount exceeds it and the call
   * fails with InsufficientCollateral.
   */
  liquidate(caller: Address, collateralAsset: string, user: Address, debtToCover: bigint): LiquidationResult {
    requirePositive('debtToCover', debtToCover);
    return this.execute('liquidate', (tx) => {
      const startingHealthFactor = this.solvency.healthFactor(user);
      if (!isBelowMinimum(startingHealthFactor)) throw new HealthFactorOk(user, startingHealthFactor);

      const seized = this.oracle.amountFromUsd(collateralAsset, debtToCover);
      const bonus = (seized * LIQUIDATION_BONUS) / LIQUIDATION_PRECISION;
      const totalSeized = seized + bonus;

      this.redeemCollateral(tx, collateralAsset, totalSeized, user, caller);
      this.burnDebt(debtToCover, user, caller);

      const endingHealthFactor = this.solvency.healthFactor(user);
      if (endingHealthFactor <= startingHealthFactor) {
        throw new HealthFactorNotImproved(user, startingHealthFactor, endingHealthFactor);
      }
      this.solvency.assertHealthy(caller);

      log.info('liquidate', {
        user,
        liquidator: caller,
        debtCovered: debtToCover,
        seized: `${totalSeized} ${collateralAsset}`,
        hf: `${formatHealthFactor(startingHealthFactor)}->${formatHealthFactor(endingHealthFactor)}`,
      });
      return {
        collateralAsset,
        user,
        liquidator: caller,
        debtCovered: debtToCover,
        collateralSeized: totalSeized,
        bonus,
        healthFactorBefore: startingHealthFactor,
        healthFactorAfter: endingHealthFactor,
      };
    });
  }

  // ---------------------------------------------------------------------------
  // Views
  // ---------------------------------------------------------------------------

  getAccountInfo(user: Address): AccountInfo {
    return this.solvency.accountInfo(user);
  }

  getCollateralValue(user: Address): bigint {
    return this.collateral.totalCollateralValueUsd(user);
  }

  getHealthFactor(user: Address): bigint {
    return this.solvency.healthFactor(user);
  }

  calculateHealthFactor(totalDebt: bigint, collateralValueUsd: bigint): bigint {
    return calculateHealthFactor(totalDebt, collateralValueUsd);
  }

  getCollateralBalance(user: Address, assetId: string): bigint {
    return this.collateral.balanceOf(user, assetId);
  }

  getCollateralAssets(): AssetConfig[] {
    return this.registry.list();
  }

  getPriceSource(assetId: string): string {
    return this.registry.get(assetId).priceSourceId;
  }

  getDebtToken(): DebtToken {
    return this.debtToken;
  }

  usdValue(assetId: string, amount: bigint): bigint {
    return this.oracle.usdValue(assetId, amount);
  }

  tokenAmountFromUsd(assetId: string, usdAmount: bigint): bigint {
    return this.oracle.amountFromUsd(assetId, usdAmount);
  }

  getParameters(): EngineParameters {
    return {
      precision: PRECISION,
      liquidationThreshold: LIQUIDATION_THRESHOLD,
      liquidationPrecision: LIQUIDATION_PRECISION,
      liquidationBonus: LIQUIDATION_BONUS,
      minHealthFactor: MIN_HEALTH_FACTOR,
    };
  }

  /** Every account that has ever held collateral or debt. */
  accounts(): Address[] {
    return [...new Set([...this.collateral.users(), ...this.debt.users()])];
  }

  /** Listeners run after the operation has committed and may start new operations. */
  subscribe(fn: (evt: BusEvent) => void): () => void {
    return this.events.subscribe(fn);
  }

  // ---------------------------------------------------------------------------
  // Internals: unguarded, always called from inside `execute`
  // ---------------------------------------------------------------------------

  // Events go out once the guard is released, so subscribers may call back in.
  private execute<T>(operation: string, fn: (tx: TxContext) => T): T {
    const { result, events } = this.guard.run(operation, () => this.transaction.run(fn));
    for (const event of events) this.events.emit(event);
    return result;
  }

  private depositCollateral(tx: TxContext, user: Address, assetId: string, amount: bigint): void {
    this.collateral.credit(user, assetId, amount);
    tx.record({ type: 'CollateralDeposited', user, assetId, amount });
    log.debug('deposit', { user, assetId, amount });
    const ok = this.registry.token(assetId).transferFrom(user, this.account, amount);
    if (!ok) throw new TransferFailed(assetId, user, this.account, amount);
  }

  private mintDebt(user: Address, amount: bigint): void {
    this.debt.increase(user, amount);
    this.solvency.assertHealthy(user);
    log.debug('mint', { user, amount });
    if (!this.debtToken.mint(user, amount)) throw new MintFailed(user, amount);
  }

  private redeemCollateral(tx: TxContext, assetId: string, amount: bigint, from: Address, to: Address): void {
    this.collateral.debit(from, assetId, amount);
    tx.record({ type: 'CollateralRedeemed', from, to, assetId, amount });
    log.debug('redeem', { from, to, assetId, amount });
    const ok = this.registry.token(assetId).transfer(to, amount);
    if (!ok) throw new TransferFailed(assetId, this.account, to, amount);
  }

  private burnDebt(amount: bigint, onBehalfOf: Address, payer: Address): void {
    this.debt.decrease(onBehalfOf, amount);
    log.debug('burn', { onBehalfOf, payer, amount });
    if (!this.debtToken.transferFrom(payer, this.account, amount)) {
      throw new TransferFailed('debt', payer, this.account, amount);
    }
    this.debtToken.burn(amount);
  }
}

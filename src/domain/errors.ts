export type EngineErrorCode =
  | 'NeedMoreThanZero'
  | 'NotAllowedToken'
  | 'LengthMismatch'
  | 'UnknownAsset'
  | 'OracleUnavailable'
  | 'TransferFailed'
  | 'MintFailed'
  | 'InsufficientCollateral'
  | 'InsufficientDebt'
  | 'HealthFactorBroken'
  | 'HealthFactorOk'
  | 'HealthFactorNotImproved'
  | 'ReentrantCall';

type Details = Record<string, string | number | bigint>;

// Every failure the engine surfaces. Callers branch on `code`; `details` carries
// the values needed to diagnose it (amounts, health factors, asset ids).
export class EngineError extends Error {
  readonly code: EngineErrorCode;
  readonly details: Details;

  constructor(code: EngineErrorCode, message: string, details: Details = {}) {
    super(message);
    this.name = code;
    this.code = code;
    this.details = details;
  }
}

export class NeedMoreThanZero extends EngineError {
  constructor(field: string) {
    super('NeedMoreThanZero', `${field} must be greater than zero`, { field });
  }
}

export class NotAllowedToken extends EngineError {
  constructor(assetId: string) {
    super('NotAllowedToken', `Asset ${assetId} is not accepted as collateral`, { assetId });
  }
}

export class LengthMismatch extends EngineError {
  constructor(assets: number, priceSources: number) {
    super('LengthMismatch', `Got ${assets} assets but ${priceSources} price sources`, { assets, priceSources });
  }
}

export class UnknownAsset extends EngineError {
  constructor(assetId: string) {
    super('UnknownAsset', `Asset ${assetId} is not registered`, { assetId });
  }
}

export class OracleUnavailable extends EngineError {
  constructor(assetId: string, reason: string) {
    super('OracleUnavailable', `No usable price for ${assetId}: ${reason}`, { assetId, reason });
  }
}

export class TransferFailed extends EngineError {
  constructor(asset: string, from: string, to: string, amount: bigint) {
    super('TransferFailed', `Transfer of ${amount} ${asset} from ${from} to ${to} failed`, { asset, from, to, amount });
  }
}

export class MintFailed extends EngineError {
  constructor(to: string, amount: bigint) {
    super('MintFailed', `Minting ${amount} to ${to} failed`, { to, amount });
  }
}

export class InsufficientCollateral extends EngineError {
  constructor(user: string, assetId: string, balance: bigint, requested: bigint) {
    super('InsufficientCollateral', `${user} holds ${balance} ${assetId}, cannot remove ${requested}`, {
      user,
      assetId,
      balance,
      requested,
    });
  }
}

export class InsufficientDebt extends EngineError {
  constructor(user: string, balance: bigint, requested: bigint) {
    super('InsufficientDebt', `${user} owes ${balance}, cannot repay ${requested}`, { user, balance, requested });
  }
}

export class HealthFactorBroken extends EngineError {
  readonly healthFactor: bigint;

  constructor(user: string, healthFactor: bigint) {
    super('HealthFactorBroken', `Health factor of ${user} would drop to ${healthFactor}`, { user, healthFactor });
    this.healthFactor = healthFactor;
  }
}

export class HealthFactorOk extends EngineError {
  constructor(user: string, healthFactor: bigint) {
    super('HealthFactorOk', `${user} is not liquidatable (health factor ${healthFactor})`, { user, healthFactor });
  }
}

export class HealthFactorNotImproved extends EngineError {
  constructor(user: string, before: bigint, after: bigint) {
    super('HealthFactorNotImproved', `Liquidation left ${user} at ${after}, started at ${before}`, {
      user,
      before,
      after,
    });
  }
}

export class ReentrantCall extends EngineError {
  constructor(operation: string, active: string) {
    super('ReentrantCall', `${operation} re-entered while ${active} is in progress`, { operation, active });
  }
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError;
}

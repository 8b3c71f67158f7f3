import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { formatUnits } from 'viem';
import { isEngineError, type EngineErrorCode } from '../../domain/errors';
import { logger } from '../../utils/logger';
import { RequestError } from './request';

const log = logger.scoped('http');

function replacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

export function toJson(data: unknown, pretty = false): string {
  return JSON.stringify(data, replacer, pretty ? 2 : undefined);
}

// Pretty-print JSON when `?pretty=1` or `x-pretty: 1` is supplied; otherwise
// return compact JSON. Bigints are written as decimal strings.
export function jsonRespond(c: Context, data: unknown, status: ContentfulStatusCode = 200) {
  const pretty = Boolean(c.req.query('pretty') ?? c.req.header('x-pretty'));
  return new Response(toJson(data, pretty), {
    status,
    headers: { 'content-type': 'application/json; charset=utf-8' },
  });
}

export function amountView(raw: bigint, decimals: number): { raw: string; formatted: string } {
  return { raw: raw.toString(), formatted: formatUnits(raw, decimals) };
}

const STATUS_BY_CODE: Record<EngineErrorCode, ContentfulStatusCode> = {
  NeedMoreThanZero: 400,
  NotAllowedToken: 400,
  LengthMismatch: 400,
  UnknownAsset: 404,
  OracleUnavailable: 503,
  ReentrantCall: 409,
  TransferFailed: 422,
  MintFailed: 422,
  InsufficientCollateral: 422,
  InsufficientDebt: 422,
  HealthFactorBroken: 422,
  HealthFactorOk: 422,
  HealthFactorNotImproved: 422,
};

export function errorRespond(c: Context, err: Error) {
  if (err instanceof RequestError) {
    return jsonRespond(c, { error: 'BadRequest', message: err.message }, 400);
  }
  if (isEngineError(err)) {
    log.warn(`${c.req.method} ${c.req.path} rejected`, { code: err.code, reason: err.message });
    return jsonRespond(c, { error: err.code, message: err.message, details: err.details }, STATUS_BY_CODE[err.code]);
  }
  log.error(`${c.req.method} ${c.req.path} failed`, { reason: err.stack ?? err.message });
  return jsonRespond(c, { error: 'Internal', message: 'Unexpected error' }, 500);
}

import type { Context } from 'hono';
import { parseUnits } from 'viem';
import type { Address } from '../../domain/types';

export class RequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RequestError';
  }
}

const DECIMAL_RE = /^[0-9]+(?:\.[0-9]+)?$/;

export async function readBody(c: Context): Promise<Record<string, unknown>> {
  const body: unknown = await c.req.json().catch(() => ({}));
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new RequestError('Expected a JSON object body');
  }
  return Object.fromEntries(Object.entries(body));
}

// The account performing the call, i.e. the message sender.
export function callerOf(c: Context): Address {
  const account = c.req.header('x-account');
  if (!account) throw new RequestError('x-account header required');
  return account;
}

export function stringField(body: Record<string, unknown>, key: string): string {
  const value = body[key];
  if (typeof value === 'number') return String(value);
  if (typeof value !== 'string' || value.trim() === '') throw new RequestError(`${key} required`);
  return value.trim();
}

// "1.5" at 18 decimals -> 1500000000000000000n
export function amountField(body: Record<string, unknown>, key: string, decimals: number): bigint {
  const raw = stringField(body, key);
  if (!DECIMAL_RE.test(raw)) throw new RequestError(`${key} must be a decimal amount, got "${raw}"`);
  const fraction = raw.split('.')[1] ?? '';
  if (fraction.length > decimals) throw new RequestError(`${key} has more than ${decimals} decimal places`);
  return parseUnits(raw, decimals);
}

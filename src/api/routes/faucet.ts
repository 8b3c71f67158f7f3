import { Hono } from 'hono';
import { fundAccount, getProtocol } from '../../services/protocol';
import { amountField, callerOf, readBody, RequestError, stringField } from '../utils/request';
import { jsonRespond } from '../utils/respond';
import { accountSnapshot } from './accounts';

// Hands out demo collateral to the caller's wallet.
export const faucetRoute = new Hono();

faucetRoute.post('/', async (c) => {
  const caller = callerOf(c);
  const body = await readBody(c);
  const assetId = stringField(body, 'assetId');
  const meta = getProtocol().tokenMeta(assetId);
  if (!meta) throw new RequestError(`Unknown asset ${assetId}`);
  const amount = amountField(body, 'amount', meta.decimals);
  if (!fundAccount(getProtocol(), caller, assetId, amount)) throw new RequestError('amount must be greater than zero');
  return jsonRespond(c, accountSnapshot(caller));
});

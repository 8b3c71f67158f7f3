import { Hono, type Context } from 'hono';
import { getProtocol } from '../../services/protocol';
import { DEBT_DECIMALS } from '../../config/constants';
import { amountField, callerOf, readBody, stringField } from '../utils/request';
import { jsonRespond } from '../utils/respond';
import { accountSnapshot } from './accounts';

// Position operations on behalf of the `x-account` caller. Amounts are human units.
export const positionsRoute = new Hono();

function collateralDecimals(assetId: string): number {
  const asset = getProtocol().engine.getCollateralAssets().find((a) => a.assetId === assetId);
  // unknown assets are rejected by the engine itself
  return asset?.decimals ?? 18;
}

async function collateralArgs(c: Context, amountKey: string) {
  const body = await readBody(c);
  const assetId = stringField(body, 'assetId');
  return { body, assetId, amount: amountField(body, amountKey, collateralDecimals(assetId)) };
}

positionsRoute.post('/deposit', async (c) => {
  const caller = callerOf(c);
  const { assetId, amount } = await collateralArgs(c, 'amount');
  getProtocol().engine.deposit(caller, assetId, amount);
  return jsonRespond(c, accountSnapshot(caller));
});

positionsRoute.post('/deposit-and-mint', async (c) => {
  const caller = callerOf(c);
  const { body, assetId, amount } = await collateralArgs(c, 'collateralAmount');
  const debtAmount = amountField(body, 'debtAmount', DEBT_DECIMALS);
  getProtocol().engine.depositAndMint(caller, assetId, amount, debtAmount);
  return jsonRespond(c, accountSnapshot(caller));
});

positionsRoute.post('/redeem', async (c) => {
  const caller = callerOf(c);
  const { assetId, amount } = await collateralArgs(c, 'amount');
  getProtocol().engine.redeem(caller, assetId, amount);
  return jsonRespond(c, accountSnapshot(caller));
});

positionsRoute.post('/redeem-for-burn', async (c) => {
  const caller = callerOf(c);
  const { body, assetId, amount } = await collateralArgs(c, 'collateralAmount');
  const debtAmount = amountField(body, 'debtAmount', DEBT_DECIMALS);
  getProtocol().engine.redeemForBurn(caller, assetId, amount, debtAmount);
  return jsonRespond(c, accountSnapshot(caller));
});

positionsRoute.post('/mint', async (c) => {
  const caller = callerOf(c);
  const amount = amountField(await readBody(c), 'amount', DEBT_DECIMALS);
  getProtocol().engine.mint(caller, amount);
  return jsonRespond(c, accountSnapshot(caller));
});

positionsRoute.post('/burn', async (c) => {
  const caller = callerOf(c);
  const amount = amountField(await readBody(c), 'amount', DEBT_DECIMALS);
  getProtocol().engine.burn(caller, amount);
  return jsonRespond(c, accountSnapshot(caller));
});

import { Hono } from 'hono';
import { getProtocol } from '../../services/protocol';
import { DEBT_DECIMALS } from '../../config/constants';
import { formatHealthFactor } from '../../utils/math';
import { logger } from '../../utils/logger';
import { amountField, callerOf, readBody, stringField } from '../utils/request';
import { amountView, jsonRespond } from '../utils/respond';

// The caller covers `debtToCover` (human USDX) of `user`'s debt and receives
// the equivalent `collateralAsset` plus the bonus.
export const liquidationsRoute = new Hono();

liquidationsRoute.post('/', async (c) => {
  const caller = callerOf(c);
  const body = await readBody(c);
  const collateralAsset = stringField(body, 'collateralAsset');
  const user = stringField(body, 'user');
  const debtToCover = amountField(body, 'debtToCover', DEBT_DECIMALS);

  logger.section('POST /liquidations');
  const { engine } = getProtocol();
  const res = engine.liquidate(caller, collateralAsset, user, debtToCover);
  const decimals = engine.getCollateralAssets().find((a) => a.assetId === collateralAsset)?.decimals ?? 18;

  return jsonRespond(c, {
    user: res.user,
    liquidator: res.liquidator,
    collateralAsset: res.collateralAsset,
    debtCovered: amountView(res.debtCovered, DEBT_DECIMALS),
    collateralSeized: amountView(res.collateralSeized, decimals),
    bonus: amountView(res.bonus, decimals),
    healthFactorBefore: formatHealthFactor(res.healthFactorBefore),
    healthFactorAfter: formatHealthFactor(res.healthFactorAfter),
  });
});

import { Hono } from 'hono';
import { getProtocol } from '../../services/protocol';
import { DEBT_DECIMALS } from '../../config/constants';
import { statusForHealthFactor } from '../../utils/health';
import { formatHealthFactor, toUsd } from '../../utils/math';
import { amountView, jsonRespond } from '../utils/respond';

export function accountSnapshot(account: string) {
  const { engine, collateralTokens, debtToken } = getProtocol();
  const { totalDebt, collateralValueUsd } = engine.getAccountInfo(account);
  const healthFactor = engine.getHealthFactor(account);
  return {
    account,
    debt: amountView(totalDebt, DEBT_DECIMALS),
    collateralValueUsd: toUsd(collateralValueUsd),
    healthFactor: formatHealthFactor(healthFactor),
    status: statusForHealthFactor(totalDebt, healthFactor),
    collateral: engine.getCollateralAssets().map(({ assetId, decimals }) => ({
      assetId,
      deposited: amountView(engine.getCollateralBalance(account, assetId), decimals),
      wallet: amountView(collateralTokens[assetId].balanceOf(account), decimals),
    })),
    walletDebtToken: amountView(debtToken.balanceOf(account), DEBT_DECIMALS),
  };
}

// Read-only view of one account's ledger entries and solvency.
export const accountsRoute = new Hono();

accountsRoute.get('/:account', (c) => {
  return jsonRespond(c, accountSnapshot(c.req.param('account')));
});

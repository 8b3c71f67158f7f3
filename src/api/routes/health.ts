import { Hono } from 'hono';
import { getProtocol } from '../../services/protocol';
import { DEBT_DECIMALS } from '../../config/constants';
import { statusForHealthFactor } from '../../utils/health';
import { formatHealthFactor, toUsd } from '../../utils/math';
import { amountView, jsonRespond } from '../utils/respond';

export const healthRoute = new Hono();

// Solvency overview of every account the engine has seen.
healthRoute.get('/', (c) => {
  const { engine, feed, debtToken } = getProtocol();

  const details = engine.accounts().map((account) => {
    const { totalDebt, collateralValueUsd } = engine.getAccountInfo(account);
    const hf = engine.getHealthFactor(account);
    return {
      account,
      debt: amountView(totalDebt, DEBT_DECIMALS),
      collateralValueUsd: toUsd(collateralValueUsd),
      healthFactor: formatHealthFactor(hf),
      status: statusForHealthFactor(totalDebt, hf),
    };
  });

  const summary = {
    total: details.length,
    healthy: details.filter((d) => d.status === 'healthy').length,
    liquidatable: details.filter((d) => d.status === 'liquidatable').length,
    debtFree: details.filter((d) => d.status === 'debt-free').length,
    debtSupply: amountView(debtToken.totalSupply(), DEBT_DECIMALS),
  };

  return jsonRespond(c, {
    prices: feed.snapshot(),
    summary,
    accounts: details,
  });
});

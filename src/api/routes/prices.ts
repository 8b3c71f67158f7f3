import { Hono } from 'hono';
import { parseUnits } from 'viem';
import { getProtocol } from '../../services/protocol';
import { FEED_DECIMALS } from '../../config/tokens';
import { logger } from '../../utils/logger';
import { readBody, RequestError, stringField } from '../utils/request';
import { jsonRespond } from '../utils/respond';

// Demo price control: set or crash the feed behind a collateral asset.
export const pricesRoute = new Hono();

pricesRoute.get('/', (c) => jsonRespond(c, getProtocol().feed.snapshot()));

pricesRoute.post('/:assetId', async (c) => {
  const { engine, feed } = getProtocol();
  const source = engine.getPriceSource(c.req.param('assetId'));
  const price = stringField(await readBody(c), 'price');
  if (!/^[0-9]+(?:\.[0-9]+)?$/.test(price)) throw new RequestError(`price must be a decimal, got "${price}"`);
  feed.setPrice(source, parseUnits(price, FEED_DECIMALS), FEED_DECIMALS);
  logger.info('price set', { source, price });
  return jsonRespond(c, feed.snapshot());
});

pricesRoute.post('/:assetId/crash', async (c) => {
  const { engine, feed } = getProtocol();
  const source = engine.getPriceSource(c.req.param('assetId'));
  const dropBps = Number(stringField(await readBody(c), 'dropBps'));
  if (!Number.isInteger(dropBps) || dropBps <= 0 || dropBps >= 10_000) {
    throw new RequestError('dropBps must be an integer between 1 and 9999');
  }
  const tick = feed.applyCrashTick(source, dropBps);
  logger.info('price crash', {
    source: tick.changed.source,
    dropPct: tick.changed.dropPct,
    price: `${tick.changed.old}->${tick.changed.new}`,
  });
  return jsonRespond(c, tick);
});

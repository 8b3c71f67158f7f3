import { serve } from '@hono/node-server';
import { createApp } from './api/server';
import { DEFAULT_PORT } from './config/constants';
import { logger } from './utils/logger';

const port = Number(process.env.PORT || DEFAULT_PORT);
const app = createApp();

serve({ fetch: app.fetch, port }, (info) => {
  logger.info(`Collateral engine listening on port ${info.port}`);
});

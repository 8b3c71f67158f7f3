import { Hono } from 'hono';
import { streamSSE } from 'hono/streaming';
import { getProtocol } from '../../services/protocol';
import { logger } from '../../utils/logger';
import { toJson } from '../utils/respond';

export const eventsRoute = new Hono();

// Committed engine events as Server-Sent Events.
eventsRoute.get('/', (c) => {
  return streamSSE(c, async (stream) => {
    const { engine, feed } = getProtocol();
    await stream.writeSSE({ event: 'snapshot', data: toJson({ prices: feed.snapshot(), accounts: engine.accounts() }) });

    const unsub = engine.subscribe((evt) => {
      stream.writeSSE({ event: evt.type, data: toJson(evt) }).catch((err: unknown) => {
        logger.warn(`SSE write failed: ${String(err)}`);
      });
    });

    // Keep the stream open until the client disconnects
    const abortPromise = new Promise<void>((resolve) => {
      c.req.raw.signal.addEventListener('abort', () => resolve(), { once: true });
    });
    await abortPromise;
    unsub();
  });
});

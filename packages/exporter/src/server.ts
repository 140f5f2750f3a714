import http from 'node:http';
import { getRequestListener } from '@hono/node-server';
import { type Logger, parseListenAddress } from '@pingscope/shared';
import { Hono } from 'hono';
import type { PingMetrics } from './metrics.js';

export function createExporterApp(metrics: PingMetrics): Hono {
  const app = new Hono();

  app.get('/metrics', async (c) => {
    const body = await metrics.render();
    c.header('Content-Type', metrics.contentType);
    return c.body(body);
  });

  app.get('/health', (c) => c.text('OK'));

  return app;
}

/**
 * Serve `app` on `addr` until `signal` aborts. Rejects when the address is
 * malformed or the socket cannot be bound.
 */
export async function serve(app: Hono, addr: string, signal: AbortSignal, logger: Logger): Promise<void> {
  const { host, port } = parseListenAddress(addr, 'exporter');
  if (signal.aborted) return;

  const server = http.createServer(getRequestListener(app.fetch));

  await new Promise<void>((resolve, reject) => {
    const onAbort = (): void => {
      server.close();
      server.closeAllConnections();
    };
    server.once('error', (err) => {
      signal.removeEventListener('abort', onAbort);
      reject(err);
    });
    server.once('close', () => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    });
    signal.addEventListener('abort', onAbort, { once: true });

    server.listen(port, host, () => {
      logger.info({ addr, port }, 'Prometheus exporter listening');
    });
  });

  logger.info({ addr }, 'Prometheus exporter stopped');
}

/**
 * Serve command — HTTP server plus the webhook worker pool.
 * Runs until SIGINT/SIGTERM.
 */

import { serve } from '@hono/node-server';
import { loadConfig } from '../config/config.js';
import { createApp } from '../bootstrap.js';
import * as log from '../utils/logger.js';

export interface ServeOptions {
  port?: number;
  debug?: boolean;
}

export async function runServe(opts: ServeOptions): Promise<void> {
  const server: Record<string, unknown> = {};
  if (opts.port !== undefined) server.port = opts.port;
  if (opts.debug) server.debug = true;

  const config = await loadConfig({ server });
  const app = createApp(config);

  // Graceful shutdown
  const ac = new AbortController();
  const { signal } = ac;

  process.on('SIGINT', () => {
    log.info('Shutting down...');
    ac.abort();
  });
  process.on('SIGTERM', () => ac.abort());

  log.info(`Starting ${config.app.name} v${config.app.version}`);
  log.info(`Debug mode: ${config.server.debug}`);

  app.workers.start(signal);

  const httpServer = serve({ fetch: app.http.fetch, hostname: config.server.host, port: config.server.port }, info => {
    log.info(`Listening on http://${info.address}:${info.port}`);
  });

  await new Promise<void>(resolve => signal.addEventListener('abort', () => resolve(), { once: true }));

  await new Promise<void>((resolve, reject) => {
    httpServer.close(err => (err ? reject(err) : resolve()));
  });
  await app.workers.stopped();
  log.info('Server stopped');
}

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import type { RelayConfig } from '../config/schema.js';
import type { AnswerGenerator } from '../agent/answer-generator.js';
import type { Messenger } from '../channels/telex-client.js';
import type { WebhookDispatcher } from '../webhook/dispatcher.js';
import { agentRoutes } from './routes/agent.js';
import { messageRoutes } from './routes/messages.js';
import { webhookRoutes } from './routes/webhook.js';
import { errorResponse } from './errors.js';
import * as log from '../utils/logger.js';

export interface HttpDeps {
  config: Readonly<RelayConfig>;
  generator: AnswerGenerator;
  messenger: Messenger;
  dispatcher: WebhookDispatcher;
}

export function createHttpApp(deps: HttpDeps): Hono {
  const { config } = deps;
  const app = new Hono();

  app.use('*', logger(log.request));
  app.use(
    '*',
    cors({
      origin: config.server.corsOrigins.includes('*') ? '*' : [...config.server.corsOrigins],
      allowMethods: ['GET', 'POST', 'OPTIONS'],
      allowHeaders: ['Content-Type', 'Authorization', 'X-Telex-Signature'],
    }),
  );

  app.get('/', c =>
    c.json({
      name: config.app.name,
      version: config.app.version,
      description: 'AI Agent for Yoruba History and Culture',
      status: 'active',
      endpoints: {
        health: '/health',
        webhook: '/webhook/telex',
        agent: '/agent/ask',
        messages: '/messages/send',
      },
      timestamp: new Date().toISOString(),
    }),
  );

  app.get('/health', c =>
    c.json({ status: 'healthy', version: config.app.version, timestamp: new Date().toISOString() }),
  );

  app.route('/agent', agentRoutes(deps.generator));
  app.route('/messages', messageRoutes(deps.messenger));
  app.route('/webhook', webhookRoutes(deps.dispatcher));

  app.notFound(c => c.json(errorResponse('NotFound', `No route for ${c.req.method} ${c.req.path}`), 404));

  app.onError((err, c) => {
    log.error(`Unhandled exception on ${c.req.method} ${c.req.path}: ${err.message}`);
    return c.json(
      errorResponse(
        'InternalServerError',
        'An unexpected error occurred',
        config.server.debug ? { error: err.message } : null,
      ),
      500,
    );
  });

  return app;
}

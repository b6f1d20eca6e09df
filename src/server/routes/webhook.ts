import { Hono } from 'hono';
import type { WebhookDispatcher } from '../../webhook/dispatcher.js';
import { SIGNATURE_HEADER } from '../../webhook/signature.js';

export function webhookRoutes(dispatcher: WebhookDispatcher): Hono {
  const app = new Hono();

  app.post('/telex', async c => {
    const raw = await c.req.text();
    const outcome = dispatcher.receive(raw, c.req.header(SIGNATURE_HEADER));

    switch (outcome.kind) {
      case 'unauthorized':
        return c.json({ success: false, message: 'Invalid webhook signature' }, 401);
      case 'malformed':
        return c.json({ success: false, message: outcome.message }, 400);
      case 'invalid':
        return c.json({ success: false, message: 'Invalid webhook event', data: { errors: outcome.errors } }, 422);
      case 'busy':
        return c.json({ success: false, message: 'Busy, retry later' }, 503);
      case 'scheduled':
        return c.json({ success: true, message: 'Message received and being processed' });
      case 'duplicate':
        return c.json({ success: true, message: `Duplicate event ${outcome.eventId} ignored` });
      case 'acknowledged':
        return c.json({ success: true, message: outcome.message });
    }
  });

  app.get('/health', c =>
    c.json({ status: 'healthy', service: 'webhook', timestamp: new Date().toISOString() }),
  );

  return app;
}

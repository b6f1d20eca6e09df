import { Hono } from 'hono';
import type { Messenger } from '../../channels/telex-client.js';
import { SendRequestSchema, BroadcastRequestSchema } from '../schemas.js';
import { parseJsonBody } from '../errors.js';
import * as log from '../../utils/logger.js';

export function messageRoutes(messenger: Messenger): Hono {
  const app = new Hono();

  app.post('/send', async c => {
    const body = await parseJsonBody(c, SendRequestSchema);
    if (!body.ok) return body.response;

    const { chat_id, text, reply_to_message_id, parse_mode, disable_web_page_preview } = body.data;
    log.info(`Sending message to chat ${chat_id}`);

    try {
      const delivery = await messenger.send(chat_id, text, {
        replyToMessageId: reply_to_message_id,
        parseMode: parse_mode,
        disableWebPagePreview: disable_web_page_preview,
      });
      return c.json({ success: true, message: 'Message sent successfully', data: delivery.result });
    } catch (err) {
      log.error(`Failed to send message to ${chat_id}: ${log.errorMessage(err)}`);
      return c.json({ success: false, message: `Failed to send message: ${log.errorMessage(err)}` }, 502);
    }
  });

  app.post('/broadcast', async c => {
    const body = await parseJsonBody(c, BroadcastRequestSchema);
    if (!body.ok) return body.response;

    const { chat_ids, text } = body.data;
    log.info(`Broadcasting message to ${chat_ids.length} chats`);

    const result = await messenger.broadcast(chat_ids, text);
    return c.json({
      success: result.success,
      message: result.message,
      data: {
        successful: result.successful.map(d => ({ chat_id: d.chatId, success: true, result: d.result })),
        failed: result.failed.map(f => ({ chat_id: f.chatId, error: f.error })),
        total: result.total,
      },
    });
  });

  return app;
}

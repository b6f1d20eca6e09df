import type { AnswerGenerator } from '../agent/answer-generator.js';
import type { Messenger } from '../channels/telex-client.js';
import type { TaskScheduler } from '../bus/worker-pool.js';
import { PROCESSING_APOLOGY } from '../agent/prompts.js';
import { InboundEventSchema, type InboundEvent, type Message } from './schemas.js';
import { verifySignature } from './signature.js';
import { DedupCache } from './dedup-cache.js';
import { fieldErrors, type FieldError } from '../utils/validation.js';
import * as log from '../utils/logger.js';

export type WebhookOutcome =
  | { kind: 'unauthorized' }
  | { kind: 'malformed'; message: string }
  | { kind: 'invalid'; errors: FieldError[] }
  | { kind: 'scheduled'; eventId: string }
  | { kind: 'acknowledged'; message: string }
  | { kind: 'duplicate'; eventId: string }
  | { kind: 'busy'; eventId: string };

export interface DispatcherDeps {
  generator: Pick<AnswerGenerator, 'answer'>;
  messenger: Messenger;
  scheduler: TaskScheduler;
  webhookSecret: string;
  dedup?: DedupCache;
}

/**
 * WebhookDispatcher — turns a raw webhook delivery into an outcome.
 *
 * Order: signature, JSON, schema, then classification. Only a `message`
 * event with text produces work, and only those events pass the dedup cache;
 * the reply runs on the worker pool so the webhook is acknowledged immediately.
 */
export class WebhookDispatcher {
  private readonly dedup: DedupCache;

  constructor(private readonly deps: DispatcherDeps) {
    this.dedup = deps.dedup ?? new DedupCache(0);
    if (!deps.webhookSecret) {
      log.warn('Webhook secret not configured, signature check disabled');
    }
  }

  receive(rawBody: string, signature: string | undefined): WebhookOutcome {
    if (!verifySignature(rawBody, signature, this.deps.webhookSecret)) {
      log.warn('Webhook: invalid signature');
      return { kind: 'unauthorized' };
    }

    let json: unknown;
    try {
      json = JSON.parse(rawBody);
    } catch (err) {
      return { kind: 'malformed', message: `Invalid JSON body: ${log.errorMessage(err)}` };
    }

    const parsed = InboundEventSchema.safeParse(json);
    if (!parsed.success) {
      const errors = fieldErrors(parsed.error);
      log.warn(`Webhook: invalid event (${errors.map(e => e.path).join(', ')})`);
      return { kind: 'invalid', errors };
    }

    return this.dispatch(parsed.data);
  }

  dispatch(event: InboundEvent): WebhookOutcome {
    log.info(`Webhook: ${event.event_type} ${event.event_id}`);

    switch (event.event_type) {
      case 'message':
        return this.dispatchMessage(event.event_id, event.message);
      case 'message.delivered':
      case 'message.read':
        log.info(`Webhook: message status update ${event.event_type}`);
        return { kind: 'acknowledged', message: `Event ${event.event_type} acknowledged` };
      case 'user.joined':
      case 'user.left':
        log.info(`Webhook: user event ${event.event_type}`);
        return { kind: 'acknowledged', message: `Event ${event.event_type} acknowledged` };
      default:
        return assertNever(event);
    }
  }

  private dispatchMessage(eventId: string, message: Message): WebhookOutcome {
    const text = message.text?.trim();
    if (!text) {
      log.warn(`Webhook: message ${message.message_id} has no text content`);
      return { kind: 'acknowledged', message: 'Message has no text content' };
    }

    if (this.dedup.checkAndRecord(eventId)) {
      log.info(`Webhook: duplicate event ${eventId} ignored`);
      return { kind: 'duplicate', eventId };
    }

    const accepted = this.deps.scheduler.schedule({
      name: `reply:${message.chat_id}:${message.message_id}`,
      run: () => this.processMessage(message, text),
    });

    if (!accepted) {
      // Let the platform's redelivery through
      this.dedup.forget(eventId);
      return { kind: 'busy', eventId };
    }
    return { kind: 'scheduled', eventId };
  }

  /** Background reply task. Never rejects. */
  async processMessage(message: Message, text: string): Promise<void> {
    const { chat_id: chatId, message_id: messageId, from } = message;
    log.info(`Processing message from ${from.id}: ${text.slice(0, 50)}`);

    try {
      await this.deps.messenger.sendTyping(chatId);
      const answer = await this.deps.generator.answer(text, {
        name: from.first_name || from.username || 'friend',
        id: from.id,
      });
      await this.deps.messenger.send(chatId, answer, { replyToMessageId: messageId });
      log.info(`Response sent to ${from.id} in chat ${chatId}`);
    } catch (err) {
      log.error(`Failed to process message ${messageId}: ${log.errorMessage(err)}`);
      try {
        await this.deps.messenger.send(chatId, PROCESSING_APOLOGY, { replyToMessageId: messageId });
      } catch (apologyErr) {
        log.error(`Failed to send apology to chat ${chatId}: ${log.errorMessage(apologyErr)}`);
      }
    }
  }
}

function assertNever(value: never): never {
  throw new Error(`Unhandled event: ${JSON.stringify(value)}`);
}

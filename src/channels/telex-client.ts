import type { RelayConfig } from '../config/schema.js';
import * as log from '../utils/logger.js';

const TYPING_TIMEOUT_MS = 5_000;

export type ParseMode = 'Markdown' | 'HTML';

export interface OutboundReply {
  chat_id: string;
  text: string;
  reply_to_message_id?: string;
  parse_mode?: ParseMode;
  disable_web_page_preview?: boolean;
}

export interface SendOptions {
  replyToMessageId?: string;
  parseMode?: ParseMode;
  disableWebPagePreview?: boolean;
}

export interface DeliveryResult {
  chatId: string;
  /** Platform response body (parsed JSON, or raw text when it is not JSON). */
  result: unknown;
}

export interface BroadcastResult {
  success: boolean;
  message: string;
  total: number;
  successful: DeliveryResult[];
  failed: Array<{ chatId: string; error: string }>;
}

export class TelexApiError extends Error {
  constructor(
    readonly status: number,
    readonly body: string,
    endpoint: string,
  ) {
    super(`Telex ${endpoint} ${status}: ${body.slice(0, 500)}`);
    this.name = 'TelexApiError';
  }
}

export interface Messenger {
  send(chatId: string, text: string, opts?: SendOptions): Promise<DeliveryResult>;
  broadcast(chatIds: readonly string[], text: string): Promise<BroadcastResult>;
  sendTyping(chatId: string): Promise<void>;
}

/**
 * TelexClient — outbound calls to the Telex REST API (bearer-key auth).
 */
export class TelexClient implements Messenger {
  private readonly baseUrl: string;

  constructor(
    private readonly config: Readonly<RelayConfig['telex']>,
    private readonly fetchFn: typeof fetch = fetch,
  ) {
    this.baseUrl = config.apiUrl.replace(/\/+$/, '');
  }

  async send(chatId: string, text: string, opts: SendOptions = {}): Promise<DeliveryResult> {
    if (!chatId) {
      throw new Error('chat_id is required');
    }

    const reply: OutboundReply = {
      chat_id: chatId,
      text,
      parse_mode: opts.parseMode ?? 'Markdown',
      disable_web_page_preview: opts.disableWebPagePreview ?? false,
    };
    if (opts.replyToMessageId) reply.reply_to_message_id = opts.replyToMessageId;

    const result = await this.call('messages', reply, this.config.timeoutMs);
    log.info(`Telex: message sent to chat ${chatId}`);
    return { chatId, result };
  }

  /** Sequential fan-out. Failures are collected per target; never rejects. */
  async broadcast(chatIds: readonly string[], text: string): Promise<BroadcastResult> {
    const successful: DeliveryResult[] = [];
    const failed: BroadcastResult['failed'] = [];

    for (const chatId of chatIds) {
      try {
        successful.push(await this.send(chatId, text));
      } catch (err) {
        log.warn(`Telex: broadcast to ${chatId || '<empty>'} failed: ${log.errorMessage(err)}`);
        failed.push({ chatId, error: log.errorMessage(err) });
      }
    }

    return {
      success: failed.length === 0,
      message: `Broadcast completed: ${successful.length} successful, ${failed.length} failed`,
      total: chatIds.length,
      successful,
      failed,
    };
  }

  async sendTyping(chatId: string): Promise<void> {
    try {
      await this.call('actions', { chat_id: chatId, action: 'typing' }, TYPING_TIMEOUT_MS);
      log.debug(`Telex: typing indicator sent to chat ${chatId}`);
    } catch (err) {
      log.warn(`Telex: typing indicator failed: ${log.errorMessage(err)}`);
    }
  }

  // ---- API core ----
  private async call(endpoint: string, payload: object, timeoutMs: number): Promise<unknown> {
    const res = await this.fetchFn(`${this.baseUrl}/${endpoint}`, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.config.apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(timeoutMs),
    });

    const raw = await res.text();
    if (!res.ok) {
      throw new TelexApiError(res.status, raw, endpoint);
    }
    return parseBody(raw);
  }
}

function parseBody(raw: string): unknown {
  if (!raw) return null;
  try {
    return JSON.parse(raw);
  } catch {
    // Non-JSON success body
    return raw;
  }
}

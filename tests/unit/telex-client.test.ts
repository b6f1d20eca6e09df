import { describe, it, expect } from 'vitest';
import { TelexClient, TelexApiError } from '../../src/channels/telex-client.js';
import { createTestConfig, createFakeFetch, jsonResponse } from '../helpers/test-fixtures.js';

const telexConfig = createTestConfig().telex;

describe('TelexClient.send', () => {
  it('should POST the reply with bearer auth', async () => {
    const { fetchFn, calls } = createFakeFetch(() => jsonResponse({ id: 'out-1' }));
    const client = new TelexClient(telexConfig, fetchFn);

    const result = await client.send('chat-1', 'Ẹ káàbọ̀!', { replyToMessageId: 'msg-9' });

    expect(result).toEqual({ chatId: 'chat-1', result: { id: 'out-1' } });
    expect(calls).toHaveLength(1);
    expect(calls[0]?.url).toBe('https://telex.test/v1/messages');
    expect(calls[0]?.method).toBe('POST');
    expect(calls[0]?.headers.get('authorization')).toBe('Bearer test-key');
    expect(calls[0]?.body).toEqual({
      chat_id: 'chat-1',
      text: 'Ẹ káàbọ̀!',
      parse_mode: 'Markdown',
      disable_web_page_preview: false,
      reply_to_message_id: 'msg-9',
    });
  });

  it('should throw before any request on an empty chat id', async () => {
    const { fetchFn } = createFakeFetch();
    const client = new TelexClient(telexConfig, fetchFn);

    await expect(client.send('', 'hi')).rejects.toThrow('chat_id is required');
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it('should throw TelexApiError on a non-2xx response', async () => {
    const { fetchFn } = createFakeFetch(() => new Response('upstream down', { status: 503 }));
    const client = new TelexClient(telexConfig, fetchFn);

    const err = await client.send('chat-1', 'hi').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TelexApiError);
    if (err instanceof TelexApiError) {
      expect(err.status).toBe(503);
      expect(err.message).toBe('Telex messages 503: upstream down');
    }
  });

  it('should strip a trailing slash from the API URL', async () => {
    const { fetchFn, calls } = createFakeFetch();
    const client = new TelexClient({ ...telexConfig, apiUrl: 'https://telex.test/v1/' }, fetchFn);

    await client.send('chat-1', 'hi');
    expect(calls[0]?.url).toBe('https://telex.test/v1/messages');
  });
});

describe('TelexClient.broadcast', () => {
  it('should report each target and never throw', async () => {
    const { fetchFn, calls } = createFakeFetch(call => {
      const body = call.body;
      const failing = typeof body === 'object' && body !== null && 'chat_id' in body && body.chat_id === 'c2';
      return failing ? new Response('nope', { status: 400 }) : jsonResponse({ ok: true });
    });
    const client = new TelexClient(telexConfig, fetchFn);

    const result = await client.broadcast(['c1', 'c2', 'c3'], 'Festival today');

    expect(calls.map(c => c.url)).toEqual([
      'https://telex.test/v1/messages',
      'https://telex.test/v1/messages',
      'https://telex.test/v1/messages',
    ]);
    expect(result.success).toBe(false);
    expect(result.total).toBe(3);
    expect(result.successful.map(s => s.chatId)).toEqual(['c1', 'c3']);
    expect(result.failed).toEqual([{ chatId: 'c2', error: 'Telex messages 400: nope' }]);
    expect(result.message).toBe('Broadcast completed: 2 successful, 1 failed');
  });

  it('should report an empty chat id as a failure', async () => {
    const { fetchFn } = createFakeFetch();
    const client = new TelexClient(telexConfig, fetchFn);

    const result = await client.broadcast(['c1', ''], 'hi');
    expect(result.successful).toHaveLength(1);
    expect(result.failed).toEqual([{ chatId: '', error: 'chat_id is required' }]);
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it('should succeed for an empty target list', async () => {
    const { fetchFn } = createFakeFetch();
    const result = await new TelexClient(telexConfig, fetchFn).broadcast([], 'hi');
    expect(result).toEqual({
      success: true,
      message: 'Broadcast completed: 0 successful, 0 failed',
      total: 0,
      successful: [],
      failed: [],
    });
  });
});

describe('TelexClient.sendTyping', () => {
  it('should POST a typing action', async () => {
    const { fetchFn, calls } = createFakeFetch();
    await new TelexClient(telexConfig, fetchFn).sendTyping('chat-7');

    expect(calls[0]?.url).toBe('https://telex.test/v1/actions');
    expect(calls[0]?.body).toEqual({ chat_id: 'chat-7', action: 'typing' });
  });

  it('should swallow failures', async () => {
    const { fetchFn } = createFakeFetch(() => new Response('', { status: 500 }));
    await expect(new TelexClient(telexConfig, fetchFn).sendTyping('chat-7')).resolves.toBeUndefined();
  });
});

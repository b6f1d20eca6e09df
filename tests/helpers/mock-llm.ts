/**
 * Mock LLM provider for unit and integration tests.
 * Returns canned responses in order; an Error entry is thrown instead.
 */

import type { LLMProvider, ChatRequest, ChatResponse } from '../../src/llm/types.js';

export type MockResponse = string | Error;

export class MockProvider implements LLMProvider {
  private responses: MockResponse[];
  private callIndex = 0;
  calls: ChatRequest[] = [];

  constructor(responses: MockResponse[]) {
    this.responses = responses;
  }

  async chat(request: ChatRequest): Promise<ChatResponse> {
    this.calls.push(request);

    const response = this.responses[this.callIndex] ?? 'No more canned responses';
    this.callIndex++;

    if (response instanceof Error) throw response;

    return {
      content: response,
      usage: { promptTokens: 100, completionTokens: 50, totalTokens: 150 },
      finishReason: 'stop',
    };
  }
}

/** Never settles until the request signal aborts. */
export class HangingProvider implements LLMProvider {
  calls = 0;

  chat(request: ChatRequest): Promise<ChatResponse> {
    this.calls++;
    return new Promise((_, reject) => {
      request.signal?.addEventListener('abort', () => reject(new Error('Request aborted')), { once: true });
    });
  }
}

/** Holds every completion until release() is called. */
export class GatedProvider implements LLMProvider {
  calls = 0;
  private gate: Promise<string>;
  private open: (content: string) => void = () => {};

  constructor() {
    this.gate = new Promise(resolve => {
      this.open = resolve;
    });
  }

  async chat(): Promise<ChatResponse> {
    this.calls++;
    const content = await this.gate;
    return { content, usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 }, finishReason: 'stop' };
  }

  release(content: string): void {
    this.open(content);
  }
}

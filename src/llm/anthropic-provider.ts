import Anthropic from '@anthropic-ai/sdk';
import type { LLMProvider, ChatRequest, ChatResponse } from './types.js';
import * as log from '../utils/logger.js';

/**
 * Anthropic Messages API provider using the official SDK.
 * The system message is lifted into the top-level `system` parameter.
 */
export class AnthropicProvider implements LLMProvider {
  private client: Anthropic;
  private defaultModel: string;

  constructor(config: { apiKey: string; defaultModel: string; apiBase?: string }) {
    this.client = new Anthropic({
      apiKey: config.apiKey,
      baseURL: config.apiBase,
      maxRetries: 2,
    });
    this.defaultModel = config.defaultModel;
  }

  async chat(request: ChatRequest): Promise<ChatResponse> {
    const model = (request.model || this.defaultModel).replace(/^anthropic\//, '');

    log.debug(`LLM [anthropic]: model=${model}, messages=${request.messages.length}`);

    const system = request.messages
      .filter(m => m.role === 'system')
      .map(m => m.content)
      .join('\n\n');

    const messages: Anthropic.MessageParam[] = [];
    for (const m of request.messages) {
      if (m.role === 'user' || m.role === 'assistant') {
        messages.push({ role: m.role, content: m.content });
      }
    }

    const params: Anthropic.MessageCreateParamsNonStreaming = {
      model,
      max_tokens: request.maxTokens ?? 1024,
      temperature: request.temperature ?? 0.7,
      messages,
    };

    if (system) {
      params.system = system;
    }

    const response = await this.client.messages.create(params, { signal: request.signal });

    let content = '';
    for (const block of response.content) {
      if (block.type === 'text') {
        content += block.text;
      }
    }

    const finishReason = response.stop_reason === 'max_tokens' ? 'length' as const : 'stop' as const;

    log.debug(`LLM [anthropic]: finish=${finishReason}, tokens=${response.usage.input_tokens + response.usage.output_tokens}`);

    return {
      content,
      usage: {
        promptTokens: response.usage.input_tokens,
        completionTokens: response.usage.output_tokens,
        totalTokens: response.usage.input_tokens + response.usage.output_tokens,
      },
      finishReason,
    };
  }
}

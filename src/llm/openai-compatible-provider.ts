import OpenAI from 'openai';
import type { LLMProvider, ChatRequest, ChatResponse } from './types.js';
import type { LLMProviderName } from '../config/schema.js';
import { AnthropicProvider } from './anthropic-provider.js';
import * as log from '../utils/logger.js';

const PROVIDER_DEFAULTS: Record<Exclude<LLMProviderName, 'anthropic'>, { apiBase: string; extraHeaders?: Record<string, string> }> = {
  gemini: {
    apiBase: 'https://generativelanguage.googleapis.com/v1beta/openai/',
  },
  openrouter: {
    apiBase: 'https://openrouter.ai/api/v1',
    extraHeaders: {
      'X-Title': 'Orunmila Relay',
    },
  },
  openai: {
    apiBase: 'https://api.openai.com/v1',
  },
  deepseek: {
    apiBase: 'https://api.deepseek.com/v1',
  },
  groq: {
    apiBase: 'https://api.groq.com/openai/v1',
  },
};

/**
 * OpenAI-compatible provider using the official OpenAI SDK.
 * Works with Gemini (OpenAI endpoint), OpenAI, OpenRouter, DeepSeek and Groq.
 */
export class OpenAICompatibleProvider implements LLMProvider {
  private client: OpenAI;
  private defaultModel: string;
  private name: string;

  constructor(config: {
    apiKey: string;
    defaultModel: string;
    apiBase: string;
    extraHeaders?: Record<string, string>;
    name: string;
  }) {
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.apiBase,
      defaultHeaders: config.extraHeaders,
      maxRetries: 2,
    });
    this.defaultModel = config.defaultModel;
    this.name = config.name;
  }

  async chat(request: ChatRequest): Promise<ChatResponse> {
    const model = request.model || this.defaultModel;

    log.debug(`LLM [${this.name}]: model=${model}, messages=${request.messages.length}`);

    const params: OpenAI.ChatCompletionCreateParamsNonStreaming = {
      model,
      messages: request.messages,
      temperature: request.temperature ?? 0.7,
      max_tokens: request.maxTokens ?? 1024,
    };

    const response = await this.client.chat.completions.create(params, { signal: request.signal });
    const choice = response.choices[0];

    if (!choice) {
      throw new Error(`No choices in ${this.name} response`);
    }

    const finishReason = choice.finish_reason === 'length' ? 'length' : 'stop';

    log.debug(`LLM [${this.name}]: finish=${finishReason}, tokens=${response.usage?.total_tokens ?? '?'}`);

    return {
      content: choice.message.content ?? '',
      usage: {
        promptTokens: response.usage?.prompt_tokens ?? 0,
        completionTokens: response.usage?.completion_tokens ?? 0,
        totalTokens: response.usage?.total_tokens ?? 0,
      },
      finishReason,
    };
  }
}

/**
 * Create the right provider based on config.
 */
export function createProvider(opts: {
  provider: LLMProviderName;
  apiKey: string;
  model: string;
  apiBase?: string;
}): LLMProvider {
  if (opts.provider === 'anthropic') {
    return new AnthropicProvider({
      apiKey: opts.apiKey,
      defaultModel: opts.model.replace(/^anthropic\//, ''),
      apiBase: opts.apiBase,
    });
  }

  const defaults = PROVIDER_DEFAULTS[opts.provider];

  return new OpenAICompatibleProvider({
    apiKey: opts.apiKey,
    defaultModel: opts.model,
    apiBase: opts.apiBase ?? defaults.apiBase,
    extraHeaders: defaults.extraHeaders,
    name: opts.provider,
  });
}

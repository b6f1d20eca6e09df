/**
 * Shared bootstrap — creates all dependencies, wires them together.
 * Used by both `serve` and `ask`, and by the integration tests.
 */

import type { Hono } from 'hono';
import type { RelayConfig } from './config/schema.js';
import type { LLMProvider } from './llm/types.js';
import { createProvider } from './llm/openai-compatible-provider.js';
import { ProviderRegistry } from './llm/provider-registry.js';
import { AnswerGenerator } from './agent/answer-generator.js';
import { TelexClient } from './channels/telex-client.js';
import { WorkerPool } from './bus/worker-pool.js';
import { DedupCache } from './webhook/dedup-cache.js';
import { WebhookDispatcher } from './webhook/dispatcher.js';
import { createHttpApp } from './server/app.js';
import * as log from './utils/logger.js';

export interface AppDeps {
  config: Readonly<RelayConfig>;
  llm: LLMProvider;
  generator: AnswerGenerator;
  messenger: TelexClient;
  workers: WorkerPool;
  dispatcher: WebhookDispatcher;
  http: Hono;
}

export interface AppOverrides {
  /** Replaces the provider registry built from config. */
  llm?: LLMProvider;
  /** fetch used for Telex calls. */
  fetchFn?: typeof fetch;
}

export function createApp(config: Readonly<RelayConfig>, overrides: AppOverrides = {}): AppDeps {
  log.setLogLevel(config.server.debug ? 'debug' : config.logLevel);

  const llm = overrides.llm ?? buildRegistry(config.llm);
  const generator = new AnswerGenerator(llm, config.llm);
  const messenger = new TelexClient(config.telex, overrides.fetchFn);

  const workers = new WorkerPool({ workers: config.webhook.workers, queueSize: config.webhook.queueSize });
  const dispatcher = new WebhookDispatcher({
    generator,
    messenger,
    scheduler: workers,
    webhookSecret: config.telex.webhookSecret,
    dedup: new DedupCache(config.webhook.dedupTtlMs),
  });

  const http = createHttpApp({ config, generator, messenger, dispatcher });

  return { config, llm, generator, messenger, workers, dispatcher, http };
}

export function buildRegistry(llmConfig: Readonly<RelayConfig['llm']>): ProviderRegistry {
  const registry = new ProviderRegistry();

  if (llmConfig.providers && llmConfig.providers.length > 0) {
    for (const spec of llmConfig.providers) {
      registry.register({
        name: spec.name,
        provider: createProvider({ provider: spec.provider, apiKey: spec.apiKey, model: spec.model, apiBase: spec.apiBase }),
        model: spec.model,
        priority: spec.priority ?? 0,
      });
    }
  } else if (llmConfig.apiKey) {
    registry.register({
      name: llmConfig.provider,
      provider: createProvider({
        provider: llmConfig.provider,
        apiKey: llmConfig.apiKey,
        model: llmConfig.model,
        apiBase: llmConfig.apiBase,
      }),
      model: llmConfig.model,
      priority: 0,
    });
  }

  if (registry.size === 0) {
    log.warn('No LLM provider configured; questions will receive the fallback answer');
  }
  return registry;
}

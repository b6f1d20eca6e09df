import type { LLMProvider, ChatRequest, ChatResponse, ProviderEntry } from './types.js';
import * as log from '../utils/logger.js';

/**
 * ProviderRegistry — ordered set of completion providers with failover.
 *
 * Tries each provider by ascending priority until one succeeds, each with
 * its own model. An aborted request is not failed over.
 */
export class ProviderRegistry implements LLMProvider {
  private entries: ProviderEntry[] = [];

  register(entry: ProviderEntry): void {
    this.entries.push(entry);
    this.entries.sort((a, b) => a.priority - b.priority);
    log.info(`Provider registered: "${entry.name}" (model=${entry.model}, priority=${entry.priority})`);
  }

  get(name: string): ProviderEntry | undefined {
    return this.entries.find(e => e.name === name);
  }

  list(): ProviderEntry[] {
    return [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }

  async chat(request: ChatRequest): Promise<ChatResponse> {
    if (this.entries.length === 0) {
      throw new Error('No providers available');
    }

    let lastError: Error | undefined;

    for (const entry of this.entries) {
      try {
        const req = { ...request, model: entry.model };
        log.debug(`Provider "${entry.name}": attempting request`);
        return await entry.provider.chat(req);
      } catch (err) {
        lastError = err instanceof Error ? err : new Error(String(err));
        log.warn(`Provider "${entry.name}" failed: ${lastError.message}`);

        if (request.signal?.aborted) break;
        if (this.entries.length > 1) {
          log.info('Failing over to next provider...');
        }
      }
    }

    throw lastError ?? new Error('All providers failed');
  }
}

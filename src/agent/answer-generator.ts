import type { LLMProvider, LLMMessage } from '../llm/types.js';
import type { RelayConfig } from '../config/schema.js';
import { SYSTEM_PROMPT, GREETING_TEXT, HELP_TEXT, FALLBACK_ANSWER } from './prompts.js';
import * as log from '../utils/logger.js';

export interface Requester {
  name?: string;
  id?: string;
}

/**
 * AnswerGenerator — one completion per question, no conversation state.
 *
 * `/start` and `/help` are answered locally. Any provider failure, timeout or
 * empty completion becomes FALLBACK_ANSWER, so answer() never rejects.
 */
export class AnswerGenerator {
  constructor(
    private readonly llm: LLMProvider,
    private readonly config: Readonly<RelayConfig['llm']>,
  ) {}

  async answer(question: string, requester?: Requester): Promise<string> {
    if (question === '/start') return this.greeting();
    if (question === '/help') return this.help();

    const messages: LLMMessage[] = [
      { role: 'system', content: SYSTEM_PROMPT },
      { role: 'user', content: requester ? `Question from ${requester.name || 'friend'}: ${question}` : question },
    ];

    try {
      const response = await this.llm.chat({
        model: this.config.model,
        messages,
        temperature: this.config.temperature,
        maxTokens: this.config.maxTokens,
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });

      const content = response.content.trim();
      if (!content) {
        log.warn('AnswerGenerator: empty completion, using fallback');
        return FALLBACK_ANSWER;
      }

      log.info(`AnswerGenerator: answered "${question.slice(0, 50)}" (${response.usage.totalTokens} tokens)`);
      return content;
    } catch (err) {
      log.error(`AnswerGenerator: completion failed: ${log.errorMessage(err)}`);
      return FALLBACK_ANSWER;
    }
  }

  greeting(): string {
    return GREETING_TEXT;
  }

  help(): string {
    return HELP_TEXT;
  }
}

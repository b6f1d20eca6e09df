export type LLMMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string };

export interface ChatRequest {
  model: string;
  messages: LLMMessage[];
  temperature?: number;
  maxTokens?: number;
  /** Aborts the in-flight completion (used for per-call timeouts). */
  signal?: AbortSignal;
}

export interface ChatResponse {
  content: string;
  usage: TokenUsage;
  finishReason: 'stop' | 'length';
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface LLMProvider {
  chat(request: ChatRequest): Promise<ChatResponse>;
}

export interface ProviderEntry {
  name: string;
  provider: LLMProvider;
  model: string;
  priority: number;
}

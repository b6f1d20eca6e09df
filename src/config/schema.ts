import { z } from 'zod';

export const LLM_PROVIDERS = ['gemini', 'openai', 'openrouter', 'deepseek', 'groq', 'anthropic'] as const;
export type LLMProviderName = (typeof LLM_PROVIDERS)[number];

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

const ProviderSpecSchema = z.object({
  name: z.string(),
  provider: z.enum(LLM_PROVIDERS),
  model: z.string(),
  apiKey: z.string().default(''),
  apiBase: z.string().optional(),
  priority: z.number().optional(),
});

export type ProviderSpec = z.infer<typeof ProviderSpecSchema>;

const AppSchema = z.object({
  name: z.string().default('Orunmila - Yoruba History & Culture AI Agent'),
  version: z.string().default('0.1.0'),
});

const LLMSchema = z.object({
  provider: z.enum(LLM_PROVIDERS).default('gemini'),
  apiKey: z.string().optional(),
  apiBase: z.string().optional(),
  model: z.string().default('gemini-2.5-flash'),
  maxTokens: z.number().int().positive().default(1024),
  temperature: z.number().min(0).max(2).default(0.7),
  timeoutMs: z.number().int().positive().default(30_000),
  providers: z.array(ProviderSpecSchema).optional(),
});

const TelexSchema = z.object({
  apiKey: z.string().default(''),
  apiUrl: z.string().url().default('https://api.telex.im/v1'),
  webhookSecret: z.string().default(''),
  botId: z.string().default(''),
  timeoutMs: z.number().int().positive().default(10_000),
});

const ServerSchema = z.object({
  host: z.string().default('0.0.0.0'),
  port: z.number().int().min(0).max(65_535).default(8000),
  debug: z.boolean().default(false),
  corsOrigins: z.array(z.string()).default(['*']),
});

const WebhookSchema = z.object({
  workers: z.number().int().positive().default(4),
  queueSize: z.number().int().positive().default(100),
  /** 0 disables duplicate-delivery suppression. */
  dedupTtlMs: z.number().int().min(0).default(0),
});

export const RelayConfigSchema = z.object({
  app: AppSchema.optional().transform(v => AppSchema.parse(v ?? {})),
  llm: LLMSchema.optional().transform(v => LLMSchema.parse(v ?? {})),
  telex: TelexSchema.optional().transform(v => TelexSchema.parse(v ?? {})),
  server: ServerSchema.optional().transform(v => ServerSchema.parse(v ?? {})),
  webhook: WebhookSchema.optional().transform(v => WebhookSchema.parse(v ?? {})),
  logLevel: z.enum(LOG_LEVELS).default('info'),
});

export type RelayConfig = z.infer<typeof RelayConfigSchema>;

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { RelayConfigSchema, type RelayConfig, type LLMProviderName } from './schema.js';

export const CONFIG_FILE = 'orunmila.json';

type Env = Record<string, string | undefined>;

/**
 * Load config with priority: overrides > env vars > orunmila.json > defaults.
 * The result is frozen; components receive it (or a slice of it) by reference.
 */
export async function loadConfig(
  overrides?: Record<string, unknown>,
  env: Env = process.env,
  dir = '.',
): Promise<Readonly<RelayConfig>> {
  const fileConfig = await loadJSON(resolve(dir, CONFIG_FILE));
  const envConfig = configFromEnv(env);

  const merged = deepMerge(fileConfig, envConfig, overrides ?? {});

  return deepFreeze(RelayConfigSchema.parse(merged));
}

// Priority when several keys are present: GEMINI > OPENAI > ANTHROPIC > OPENROUTER > DEEPSEEK > GROQ
const PROVIDER_KEYS: Array<[LLMProviderName, string]> = [
  ['gemini', 'GEMINI_API_KEY'],
  ['openai', 'OPENAI_API_KEY'],
  ['anthropic', 'ANTHROPIC_API_KEY'],
  ['openrouter', 'OPENROUTER_API_KEY'],
  ['deepseek', 'DEEPSEEK_API_KEY'],
  ['groq', 'GROQ_API_KEY'],
];

export function configFromEnv(env: Env): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  const found = PROVIDER_KEYS.find(([, key]) => env[key]);
  const llm: Record<string, unknown> = {
    ...(found ? { provider: found[0], apiKey: env[found[1]] } : {}),
    ...(env.ORUNMILA_MODEL ? { model: env.ORUNMILA_MODEL } : {}),
    ...(env.ORUNMILA_API_BASE ? { apiBase: env.ORUNMILA_API_BASE } : {}),
  };
  if (Object.keys(llm).length > 0) result.llm = llm;

  const telex: Record<string, unknown> = {
    ...(env.TELEX_API_KEY ? { apiKey: env.TELEX_API_KEY } : {}),
    ...(env.TELEX_API_URL ? { apiUrl: env.TELEX_API_URL } : {}),
    ...(env.TELEX_WEBHOOK_SECRET ? { webhookSecret: env.TELEX_WEBHOOK_SECRET } : {}),
    ...(env.TELEX_BOT_ID ? { botId: env.TELEX_BOT_ID } : {}),
  };
  if (Object.keys(telex).length > 0) result.telex = telex;

  const server: Record<string, unknown> = {
    ...(env.HOST ? { host: env.HOST } : {}),
    ...(env.PORT ? { port: Number(env.PORT) } : {}),
    ...(env.DEBUG ? { debug: parseBool(env.DEBUG) } : {}),
  };
  if (Object.keys(server).length > 0) result.server = server;

  if (env.LOG_LEVEL) result.logLevel = env.LOG_LEVEL.toLowerCase();

  return result;
}

function parseBool(value: string): boolean {
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

async function loadJSON(path: string): Promise<Record<string, unknown>> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    // No config file: defaults and env only
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return {};
    throw err;
  }
  const parsed: unknown = JSON.parse(content);
  if (!isPlainObject(parsed)) {
    throw new Error(`${path}: expected a JSON object`);
  }
  return parsed;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(...objects: Record<string, unknown>[]): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const obj of objects) {
    for (const [key, value] of Object.entries(obj)) {
      const existing = result[key];
      if (isPlainObject(value) && isPlainObject(existing)) {
        result[key] = deepMerge(existing, value);
      } else if (value !== undefined) {
        result[key] = value;
      }
    }
  }
  return result;
}

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const value of Object.values(obj)) {
    if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

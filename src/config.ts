import 'dotenv/config';

export type Config = {
  telegramToken?: string;
  openaiApiKey?: string;
  openaiBaseUrl?: string;
  openaiModel: string;
  // tool backend, as seen from the bot
  toolServerUrl: string;
  toolServerTimeoutMs: number;
  // tool backend, as run by src/server.ts
  toolServerHost: string;
  toolServerPort: number;
  catalogDbPath: string;
  historyMaxMessages: number;
};

function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function positiveInt(value: string | undefined, fallback: number): number {
  const n = Number(value);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

// Centralized config with sensible defaults; all values can be overridden via env.
export const config: Config = {
  telegramToken: optional(process.env.TELEGRAM_API_TOKEN),
  openaiApiKey: optional(process.env.OPENAI_API_KEY),
  openaiBaseUrl: optional(process.env.OPENAI_BASE_URL),
  openaiModel: optional(process.env.OPENAI_MODEL) ?? 'gpt-4o-mini',
  toolServerUrl: optional(process.env.TOOL_SERVER_URL) ?? 'http://127.0.0.1:8000',
  toolServerTimeoutMs: positiveInt(process.env.TOOL_SERVER_TIMEOUT_MS, 10_000),
  toolServerHost: optional(process.env.TOOL_SERVER_HOST) ?? '0.0.0.0',
  toolServerPort: positiveInt(process.env.TOOL_SERVER_PORT, 8000),
  catalogDbPath: optional(process.env.CATALOG_DB_PATH) ?? 'data/catalog.db',
  historyMaxMessages: positiveInt(process.env.HISTORY_MAX_MESSAGES, 20)
};

export type BotConfig = Config & { telegramToken: string; openaiApiKey: string };

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Fails fast when the bot is started without its credentials. */
export function assertBotConfig(cfg: Config): BotConfig {
  const { telegramToken, openaiApiKey } = cfg;
  if (!telegramToken) {
    throw new ConfigError('TELEGRAM_API_TOKEN is not set (check .env or the environment)');
  }
  if (!openaiApiKey) {
    throw new ConfigError('OPENAI_API_KEY is not set (check .env or the environment)');
  }
  return { ...cfg, telegramToken, openaiApiKey };
}

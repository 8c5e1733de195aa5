import { TelegramApi } from './adapters/telegram-api';
import { TelegramBot } from './adapters/telegram-handler';
import { assertBotConfig, config } from './config';
import { InMemoryHistoryStore } from './core/history';
import { OpenAIChatClient } from './llm/llm-base';
import { logger } from './observability/logger';
import { Orchestrator } from './orchestrator/orchestrator';
import { ToolBackendClient } from './tools/backend-client';
import { createBuiltinRegistry } from './tools/builtins';

async function start() {
  const cfg = assertBotConfig(config);
  logger.info('=== shop-assistant bot start ===');
  logger.info('bot config', { model: cfg.openaiModel, toolServer: cfg.toolServerUrl, maxHistory: cfg.historyMaxMessages });

  const backend = new ToolBackendClient({ baseUrl: cfg.toolServerUrl, timeoutMs: cfg.toolServerTimeoutMs });
  if (await backend.ping()) {
    logger.info('tool server reachable', { url: cfg.toolServerUrl });
  } else {
    logger.warn('tool server unreachable; tool calls will report errors until it is up', { url: cfg.toolServerUrl });
  }

  const orchestrator = new Orchestrator({
    llm: new OpenAIChatClient({ apiKey: cfg.openaiApiKey, baseUrl: cfg.openaiBaseUrl }),
    registry: createBuiltinRegistry(backend),
    store: new InMemoryHistoryStore(cfg.historyMaxMessages),
    model: cfg.openaiModel,
    maxHistory: cfg.historyMaxMessages
  });

  const bot = new TelegramBot(new TelegramApi(cfg.telegramToken), orchestrator);
  const shutdown = () => {
    logger.info('shutdown requested');
    bot.stop();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await bot.start();
  await bot.idle();
}

start().catch((err) => {
  logger.error('failed to start bot', err);
  process.exit(1);
});

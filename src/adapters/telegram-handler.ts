import { logger, preview } from '../observability/logger';
import { splitMessage } from './message-splitter';
import type { InlineKeyboardMarkup, TelegramMessage, TelegramTransport, TelegramUpdate } from './telegram-api';

/** What the transport needs from the conversation layer. */
export interface Conversation {
  orchestrate(userId: string, text: string): Promise<string>;
  reset(userId: string): Promise<void>;
}

// quick-menu buttons map to canned phrases sent through the normal round
export const MENU_ACTIONS: ReadonlyMap<string, string> = new Map<string, string>([
  ['action_list', 'show all products'],
  ['action_search', 'find products'],
  ['action_add', 'add a product'],
  ['action_calc', 'calculate'],
  ['action_web_search', 'search the web'],
  ['action_currency', 'show exchange rates'],
  ['action_translate', 'translate text']
]);

export const QUICK_MENU: InlineKeyboardMarkup = {
  inline_keyboard: [
    [
      { text: '📋 All products', callback_data: 'action_list' },
      { text: '🔍 Find product', callback_data: 'action_search' }
    ],
    [
      { text: '➕ Add product', callback_data: 'action_add' },
      { text: '🧮 Calculator', callback_data: 'action_calc' }
    ],
    [
      { text: '🌐 Web search', callback_data: 'action_web_search' },
      { text: '💱 Exchange rates', callback_data: 'action_currency' }
    ],
    [{ text: '🌍 Translator', callback_data: 'action_translate' }]
  ]
};

export const WELCOME_TEXT = [
  'Hi! I am the shop catalog bot.',
  '',
  'I can help you with:',
  '',
  '📦 Product catalog: list all products, find products by name, add a new product.',
  '🧮 Calculations: arithmetic, and a calculator with functions (sin, cos, sqrt, log and more).',
  '🌐 Web and information: web search (DuckDuckGo) and current exchange rates.',
  '🌍 Translation into English, German, French and Russian.',
  '',
  'Just tell me what you need, for example:',
  '"show all products"',
  '"find tea"',
  '"add product apples 120 fruit"',
  '"calculate (2 + 3) * 4"',
  '"calculate sqrt(16) + sin(pi/2)"',
  '"search the web for the weather in Berlin"',
  '"dollar exchange rate"',
  '"translate hello into German"',
  '',
  'The quick menu below gets you there faster. Send /reset to start the conversation over.'
].join('\n');

export const RESET_TEXT = 'Conversation history cleared.';
export const FAILURE_TEXT = 'Sorry, something went wrong while processing your request. Please try again later.';
export const TEXT_ONLY_TEXT = 'I can only read text messages for now.';

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

type TelegramBotOptions = {
  pollTimeoutSec?: number;
  retryDelayMs?: number;
};

/**
 * Long-polls Telegram and routes updates to the conversation. Updates are
 * handled without blocking the poll loop; ordering per user is the
 * conversation's concern.
 */
export class TelegramBot {
  private offset = 0;
  private running = false;
  private poll: AbortController | null = null;
  private inflight = new Set<Promise<void>>();
  private pollTimeoutSec: number;
  private retryDelayMs: number;

  constructor(
    private readonly api: TelegramTransport,
    private readonly conversation: Conversation,
    opts: TelegramBotOptions = {}
  ) {
    this.pollTimeoutSec = opts.pollTimeoutSec ?? 30;
    this.retryDelayMs = opts.retryDelayMs ?? 3000;
  }

  async start() {
    this.running = true;
    logger.info('telegram polling start');
    while (this.running) {
      let updates: TelegramUpdate[];
      const poll = new AbortController();
      this.poll = poll;
      try {
        updates = await this.api.getUpdates(this.offset, this.pollTimeoutSec, poll.signal);
      } catch (err) {
        if (!this.running) break;
        logger.warn('telegram poll failed', { error: err instanceof Error ? err.message : String(err) });
        await sleep(this.retryDelayMs);
        continue;
      } finally {
        this.poll = null;
      }
      for (const update of updates) {
        this.offset = Math.max(this.offset, update.update_id + 1);
        void this.dispatch(update);
      }
    }
    logger.info('telegram polling stopped');
  }

  /** Ends the polling loop, cancelling a long poll in flight. */
  stop() {
    this.running = false;
    this.poll?.abort();
  }

  /** Starts handling one update in the background; the returned promise never rejects. */
  dispatch(update: TelegramUpdate): Promise<void> {
    const task: Promise<void> = this.handleUpdate(update)
      .catch((err) => {
        logger.error('telegram update failed', {
          update_id: update.update_id,
          error: err instanceof Error ? err.message : String(err)
        });
      })
      .finally(() => {
        this.inflight.delete(task);
      });
    this.inflight.add(task);
    return task;
  }

  /** Resolves once every update dispatched so far has been handled. */
  async idle(): Promise<void> {
    await Promise.all([...this.inflight]);
  }

  private async handleUpdate(update: TelegramUpdate) {
    if (update.message) {
      await this.handleMessage(update.message);
      return;
    }
    const query = update.callback_query;
    if (query) {
      const chatId = query.message?.chat.id ?? query.from.id;
      const text = query.data ? MENU_ACTIONS.get(query.data) : undefined;
      if (!text) {
        await this.api.answerCallbackQuery(query.id, 'Unknown action');
        return;
      }
      await this.api.answerCallbackQuery(query.id, 'Processing your request...');
      await this.respond(chatId, String(query.from.id), text);
    }
  }

  private async handleMessage(message: TelegramMessage) {
    if (!message.from) return;
    const userId = String(message.from.id);
    const chatId = message.chat.id;
    const text = message.text;

    if (text === undefined) {
      await this.api.sendMessage(chatId, TEXT_ONLY_TEXT, QUICK_MENU);
      return;
    }

    const command = text.trim().split(/\s+/)[0].split('@')[0];
    if (command === '/start') {
      await this.conversation.reset(userId);
      await this.api.sendMessage(chatId, WELCOME_TEXT, QUICK_MENU);
      return;
    }
    if (command === '/reset') {
      await this.conversation.reset(userId);
      await this.api.sendMessage(chatId, RESET_TEXT, QUICK_MENU);
      return;
    }

    await this.respond(chatId, userId, text);
  }

  private async respond(chatId: number, userId: string, text: string) {
    logger.info('telegram message', { uid: userId, text: preview(text) });
    let reply: string;
    try {
      reply = await this.conversation.orchestrate(userId, text);
    } catch (err) {
      logger.error('orchestration failed', { uid: userId, error: err instanceof Error ? err.message : String(err) });
      reply = FAILURE_TEXT;
    }

    const pieces = splitMessage(reply);
    for (let i = 0; i < pieces.length; i++) {
      const last = i === pieces.length - 1;
      await this.api.sendMessage(chatId, pieces[i], last ? QUICK_MENU : undefined);
    }
  }
}

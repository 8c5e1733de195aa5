import { z } from 'zod';
import type { FetchLike } from '../tools/backend-client';

const userSchema = z.object({ id: z.number(), username: z.string().optional() });
const messageSchema = z.object({
  message_id: z.number(),
  from: userSchema.optional(),
  chat: z.object({ id: z.number() }),
  text: z.string().optional()
});
const updateSchema = z.object({
  update_id: z.number(),
  message: messageSchema.optional(),
  callback_query: z
    .object({
      id: z.string(),
      from: userSchema,
      data: z.string().optional(),
      message: messageSchema.optional()
    })
    .optional()
});
const envelopeSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional()
});

export type TelegramMessage = z.infer<typeof messageSchema>;
export type TelegramUpdate = z.infer<typeof updateSchema>;
export type InlineKeyboardMarkup = {
  inline_keyboard: Array<Array<{ text: string; callback_data: string }>>;
};

export class TelegramApiError extends Error {
  constructor(
    message: string,
    readonly status?: number
  ) {
    super(message);
    this.name = 'TelegramApiError';
  }
}

/** The Bot API calls the bot needs. Implemented by TelegramApi. */
export interface TelegramTransport {
  getUpdates(offset: number, timeoutSec: number, signal?: AbortSignal): Promise<TelegramUpdate[]>;
  sendMessage(chatId: number, text: string, replyMarkup?: InlineKeyboardMarkup): Promise<void>;
  answerCallbackQuery(callbackQueryId: string, text?: string): Promise<void>;
}

type TelegramApiOptions = {
  baseUrl?: string;
  fetchImpl?: FetchLike;
};

/**
 * Minimal Telegram Bot API client over fetch.
 */
export class TelegramApi implements TelegramTransport {
  private baseUrl: string;
  private fetchImpl: FetchLike;

  constructor(
    private readonly token: string,
    opts: TelegramApiOptions = {}
  ) {
    this.baseUrl = (opts.baseUrl ?? 'https://api.telegram.org').replace(/\/+$/, '');
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  /** Long poll; `signal` cancels it early, e.g. on shutdown. */
  async getUpdates(offset: number, timeoutSec: number, signal?: AbortSignal): Promise<TelegramUpdate[]> {
    const result = await this.call(
      'getUpdates',
      { offset, timeout: timeoutSec, allowed_updates: ['message', 'callback_query'] },
      (timeoutSec + 10) * 1000,
      signal
    );
    const parsed = z.array(z.unknown()).safeParse(result);
    if (!parsed.success) {
      throw new TelegramApiError('getUpdates returned a non-array result');
    }
    const updates: TelegramUpdate[] = [];
    for (const raw of parsed.data) {
      const update = updateSchema.safeParse(raw);
      if (update.success) updates.push(update.data);
    }
    return updates;
  }

  async sendMessage(chatId: number, text: string, replyMarkup?: InlineKeyboardMarkup): Promise<void> {
    await this.call('sendMessage', {
      chat_id: chatId,
      text,
      ...(replyMarkup ? { reply_markup: replyMarkup } : {})
    });
  }

  async answerCallbackQuery(callbackQueryId: string, text?: string): Promise<void> {
    await this.call('answerCallbackQuery', {
      callback_query_id: callbackQueryId,
      ...(text ? { text } : {})
    });
  }

  private async call(
    method: string,
    body: Record<string, unknown>,
    timeoutMs = 15_000,
    signal?: AbortSignal
  ): Promise<unknown> {
    const timeout = AbortSignal.timeout(timeoutMs);
    const response = await this.fetchImpl(`${this.baseUrl}/bot${this.token}/${method}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
      signal: signal ? AbortSignal.any([signal, timeout]) : timeout
    });

    const payload: unknown = await response.json().catch(() => null);
    const envelope = envelopeSchema.safeParse(payload);
    if (!response.ok || !envelope.success || !envelope.data.ok) {
      const description = envelope.success ? envelope.data.description : undefined;
      throw new TelegramApiError(
        `Telegram ${method} failed with ${response.status}: ${description ?? 'unknown error'}`,
        response.status
      );
    }
    return envelope.data.result;
  }
}

import Ajv, { Schema } from 'ajv';
import { BotEvent, InlineKeyboard, TelegramApi, TelegramUpdate, TelegramUser, UpdateParseResult } from './types';
import { env } from '../config/env';
import { logger } from '../observability/logger';

const ajv = new Ajv({ allErrors: true });

const USER_SCHEMA: Schema = {
  type: 'object',
  required: ['id'],
  properties: {
    id: { type: 'integer' },
    is_bot: { type: 'boolean' },
    first_name: { type: 'string' },
    username: { type: 'string' },
  },
};

const MESSAGE_SCHEMA: Schema = {
  type: 'object',
  required: ['message_id', 'chat'],
  properties: {
    message_id: { type: 'integer' },
    from: USER_SCHEMA,
    chat: {
      type: 'object',
      required: ['id'],
      properties: { id: { type: 'integer' }, type: { type: 'string' } },
    },
    date: { type: 'integer' },
    text: { type: 'string' },
  },
};

const UPDATE_SCHEMA: Schema = {
  type: 'object',
  required: ['update_id'],
  properties: {
    update_id: { type: 'integer' },
    message: MESSAGE_SCHEMA,
    callback_query: {
      type: 'object',
      required: ['id', 'from'],
      properties: {
        id: { type: 'string' },
        from: USER_SCHEMA,
        message: MESSAGE_SCHEMA,
        data: { type: 'string' },
      },
    },
  },
};

export const validateUpdate = ajv.compile<TelegramUpdate>(UPDATE_SCHEMA);

// "/agent_languages@DeskBot en,es" → command "agent_languages", args "en,es"
const COMMAND_PATTERN = /^\/([a-z0-9_]+)(?:@\S+)?(?:\s+([\s\S]*))?$/i;

function displayNameOf(user?: TelegramUser): string | undefined {
  return user?.first_name || user?.username || undefined;
}

/**
 * Parse a raw Telegram update into a normalized BotEvent.
 */
export function parseTelegramUpdate(payload: unknown): UpdateParseResult {
  if (!validateUpdate(payload)) {
    const reason = validateUpdate.errors?.map((e) => `${e.instancePath || '/'} ${e.message}`).join('; ');
    return { ok: false, reason: `Invalid update: ${reason ?? 'unknown error'}`, malformed: true };
  }

  const update = payload;
  const query = update.callback_query;
  if (query) {
    if (!query.data) return { ok: false, reason: 'Callback query without data', malformed: false };
    return {
      ok: true,
      event: {
        kind: 'button',
        updateId: update.update_id,
        senderId: String(query.from.id),
        displayName: displayNameOf(query.from),
        callbackQueryId: query.id,
        data: query.data,
      },
    };
  }

  const message = update.message;
  if (!message) return { ok: false, reason: 'Unsupported update type', malformed: false };
  if (message.chat.type && message.chat.type !== 'private') {
    return { ok: false, reason: 'Only private chats are supported', malformed: false };
  }
  const text = message.text?.trim();
  if (!text) return { ok: false, reason: 'Missing message text', malformed: false };

  const base = {
    updateId: update.update_id,
    senderId: String(message.from?.id ?? message.chat.id),
    displayName: displayNameOf(message.from),
  };

  const command = COMMAND_PATTERN.exec(text);
  const event: BotEvent = command
    ? { ...base, kind: 'command', command: command[1].toLowerCase(), args: (command[2] ?? '').trim() }
    : { ...base, kind: 'text', text };
  return { ok: true, event };
}

/**
 * Telegram Bot API client. Sends replies and notifications through the Bot API.
 */
export class TelegramClient implements TelegramApi {
  private readonly baseUrl: string;
  private readonly botToken: string;
  private readonly timeoutMs: number;

  constructor() {
    this.baseUrl = env.telegram.apiBaseUrl;
    this.botToken = env.telegram.botToken;
    this.timeoutMs = env.telegram.timeoutMs;
  }

  private async apiCall(method: string, body: Record<string, unknown>): Promise<unknown> {
    const url = `${this.baseUrl}/bot${this.botToken}/${method}`;
    const log = logger.child({ adapter: 'telegram', method });

    try {
      const res = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!res.ok) {
        const errBody = await res.text();
        log.error({ status: res.status, errBody }, 'Telegram API error');
        throw new Error(`Telegram API ${res.status}: ${errBody}`);
      }

      return res.json();
    } catch (err) {
      log.error({ err }, 'Telegram API call failed');
      throw err;
    }
  }

  async sendMessage(chatId: string, text: string, keyboard?: InlineKeyboard): Promise<void> {
    await this.apiCall('sendMessage', {
      chat_id: chatId,
      text,
      ...(keyboard ? { reply_markup: { inline_keyboard: keyboard } } : {}),
    });
  }

  async answerCallbackQuery(callbackQueryId: string, text?: string): Promise<void> {
    await this.apiCall('answerCallbackQuery', {
      callback_query_id: callbackQueryId,
      ...(text ? { text } : {}),
    });
  }
}

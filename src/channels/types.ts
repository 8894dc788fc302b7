/** Subset of the Telegram Bot API update payload the desk reads */
export interface TelegramUser {
  id: number;
  is_bot?: boolean;
  first_name?: string;
  username?: string;
}

export interface TelegramChat {
  id: number;
  type?: string;
}

export interface TelegramMessage {
  message_id: number;
  from?: TelegramUser;
  chat: TelegramChat;
  date?: number;
  text?: string;
}

export interface TelegramCallbackQuery {
  id: string;
  from: TelegramUser;
  message?: TelegramMessage;
  data?: string;
}

export interface TelegramUpdate {
  update_id: number;
  message?: TelegramMessage;
  callback_query?: TelegramCallbackQuery;
}

export interface InlineButton {
  text: string;
  callback_data: string;
}

/** One row per inner array */
export type InlineKeyboard = InlineButton[][];

/** Outbound Bot API calls the desk makes */
export interface TelegramApi {
  sendMessage(chatId: string, text: string, keyboard?: InlineKeyboard): Promise<void>;
  answerCallbackQuery(callbackQueryId: string, text?: string): Promise<void>;
}

interface BotEventBase {
  updateId: number;
  /** Stable chat identity of the sender; doubles as the private chat id */
  senderId: string;
  displayName?: string;
}

/** A normalized inbound update */
export type BotEvent =
  | (BotEventBase & { kind: 'command'; command: string; args: string })
  | (BotEventBase & { kind: 'text'; text: string })
  | (BotEventBase & { kind: 'button'; callbackQueryId: string; data: string });

/**
 * Update parse result. `malformed` marks a body that is not a Telegram update
 * at all; a well-formed update the desk does not handle is merely ignored.
 */
export type UpdateParseResult =
  | { ok: true; event: BotEvent }
  | { ok: false; reason: string; malformed: boolean };

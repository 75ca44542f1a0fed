/**
 * The client handle handlers receive. The dispatch core never calls it; the
 * scheduler that owns the network session supplies an implementation.
 */

import type { TgInlineKeyboardButton, TgMessage, TgMessageEntity } from "./types.js";

export type ParseMode = "HTML" | "Markdown" | "MarkdownV2";

export interface SendMessageOptions {
  message_thread_id?: number;
  parse_mode?: ParseMode;
  entities?: TgMessageEntity[];
  reply_markup?: { inline_keyboard: TgInlineKeyboardButton[][] };
  disable_notification?: boolean;
}

export interface EditMessageOptions {
  parse_mode?: ParseMode;
  entities?: TgMessageEntity[];
  reply_markup?: { inline_keyboard: TgInlineKeyboardButton[][] };
}

export interface AnswerCallbackOptions {
  text?: string;
  show_alert?: boolean;
  url?: string;
}

export interface TelegramClient {
  sendMessage(chatId: number, text: string, options?: SendMessageOptions): Promise<TgMessage>;
  editMessageText(chatId: number, messageId: number, text: string, options?: EditMessageOptions): Promise<TgMessage | boolean>;
  deleteMessage(chatId: number, messageId: number): Promise<boolean>;
  answerCallbackQuery(callbackQueryId: string, options?: AnswerCallbackOptions): Promise<boolean>;
  sendChatAction(chatId: number, action: string, options?: { message_thread_id?: number }): Promise<boolean>;
}

/**
 * Wrap a client so every send into a chat lands in the given forum thread.
 * Without a thread the client is returned as is.
 */
export function scopedClient(client: TelegramClient, threadId: number | undefined): TelegramClient {
  if (!threadId) return client;
  return {
    sendMessage: (chatId, text, options?) =>
      client.sendMessage(chatId, text, { ...options, message_thread_id: threadId }),
    editMessageText: (chatId, messageId, text, options?) =>
      client.editMessageText(chatId, messageId, text, options),
    deleteMessage: (chatId, messageId) => client.deleteMessage(chatId, messageId),
    answerCallbackQuery: (id, options?) => client.answerCallbackQuery(id, options),
    sendChatAction: (chatId, action, options?) =>
      client.sendChatAction(chatId, action, { ...options, message_thread_id: threadId }),
  };
}

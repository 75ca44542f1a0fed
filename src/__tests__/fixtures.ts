import { readFileSync } from "node:fs";
import { vi } from "vitest";
import type { TelegramClient } from "../telegram/client.js";
import type { TgUpdate, TgUser } from "../telegram/types.js";
import { decodeUpdate } from "../telegram/update.js";

function readSamples(name: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(readFileSync(new URL(`./fixtures/${name}`, import.meta.url), "utf8"));
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error(`${name} must hold a JSON object`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

/** One payload per update kind */
export const updateSamples = readSamples("update-samples.json");

/** One value per message content field */
export const contentSamples = readSamples("content-samples.json");

export const alice: TgUser = { id: 1001, is_bot: false, first_name: "Alice" };

export function updateOfKind(kind: string, updateId = 1): TgUpdate {
  return decodeUpdate({ update_id: updateId, [kind]: updateSamples[kind] });
}

/** A message-bearing update whose message carries `content`. */
export function messageUpdate(content: Record<string, unknown>, kind = "message"): TgUpdate {
  return decodeUpdate({
    update_id: 2,
    [kind]: {
      message_id: 20,
      date: 1700001000,
      chat: { id: -100200, type: "supergroup", title: "Test group", is_forum: true },
      from: alice,
      ...content,
    },
  });
}

export function contentUpdate(field: string, kind = "message"): TgUpdate {
  return messageUpdate({ [field]: contentSamples[field] }, kind);
}

export function fakeClient(): TelegramClient {
  return {
    sendMessage: vi.fn<TelegramClient["sendMessage"]>(),
    editMessageText: vi.fn<TelegramClient["editMessageText"]>(),
    deleteMessage: vi.fn<TelegramClient["deleteMessage"]>(),
    answerCallbackQuery: vi.fn<TelegramClient["answerCallbackQuery"]>(),
    sendChatAction: vi.fn<TelegramClient["sendChatAction"]>(),
  };
}

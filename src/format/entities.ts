import type { TgMessageEntity, TgPlainEntityType, TgUser } from "../telegram/types.js";

export function plainEntity(type: TgPlainEntityType, offset: number, length: number): TgMessageEntity {
  return { type, offset, length };
}

export function preEntity(offset: number, length: number, language?: string): TgMessageEntity {
  return language === undefined ? { type: "pre", offset, length } : { type: "pre", offset, length, language };
}

export function textLinkEntity(offset: number, length: number, url: string): TgMessageEntity {
  return { type: "text_link", offset, length, url };
}

export function textMentionEntity(offset: number, length: number, user: TgUser): TgMessageEntity {
  return { type: "text_mention", offset, length, user };
}

export function customEmojiEntity(offset: number, length: number, customEmojiId: string): TgMessageEntity {
  return { type: "custom_emoji", offset, length, custom_emoji_id: customEmojiId };
}

/** Outer entities first: by offset, then longest first. */
export function sortEntities(entities: TgMessageEntity[]): TgMessageEntity[] {
  return [...entities].sort((a, b) => a.offset - b.offset || b.length - a.length);
}

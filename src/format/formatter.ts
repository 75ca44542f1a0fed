import type { TgMessageEntity, TgPlainEntityType } from "../telegram/types.js";

export type FormatterErrorKind = "empty_text" | "range_out_of_bounds";

export class FormatterError extends Error {
  constructor(
    readonly kind: FormatterErrorKind,
    message: string,
  ) {
    super(message);
    this.name = "FormatterError";
  }
}

/**
 * Wire syntax for one parse mode. The decoration methods wrap text that is
 * already quoted; `quote` escapes plain text for the target syntax.
 */
export interface Formatter {
  readonly parseMode: "HTML" | "Markdown";

  bold(text: string): string;
  italic(text: string): string;
  underline(text: string): string;
  strikethrough(text: string): string;
  spoiler(text: string): string;
  blockquote(text: string): string;
  code(text: string): string;
  pre(text: string, language?: string): string;
  textLink(text: string, url: string): string;
  textMention(text: string, userId: number): string;
  customEmoji(text: string, emojiId: string): string;
  quote(text: string): string;

  /**
   * Quote plain `text` and decorate the span `entity` addresses. Offsets
   * are UTF-16 code units of the plain text.
   */
  applyEntity(text: string, entity: TgMessageEntity): string;

  /** Apply a data-less entity type to the whole of `text`. */
  applyEntityType(text: string, type: TgPlainEntityType): string;

  /** Decorate a span of text that is already in wire syntax. Nothing is quoted. */
  spliceEntity(wire: string, entity: TgMessageEntity): string;
}

/** Throws unless `entity` addresses a span inside non-empty `text`. */
export function checkRange(text: string, entity: TgMessageEntity): void {
  if (text.length === 0) {
    throw new FormatterError("empty_text", "The text is empty");
  }
  const { offset, length } = entity;
  if (!Number.isInteger(offset) || !Number.isInteger(length) || offset < 0 || length < 0) {
    throw new FormatterError("range_out_of_bounds", `Invalid entity range (offset ${offset}, length ${length})`);
  }
  if (offset + length > text.length) {
    throw new FormatterError(
      "range_out_of_bounds",
      `Entity range ${offset}..${offset + length} exceeds text length ${text.length}`,
    );
  }
}

/** Shared entity dispatch; subclasses supply the syntax. */
export abstract class EntityFormatter implements Formatter {
  abstract readonly parseMode: "HTML" | "Markdown";

  abstract bold(text: string): string;
  abstract italic(text: string): string;
  abstract underline(text: string): string;
  abstract strikethrough(text: string): string;
  abstract spoiler(text: string): string;
  abstract blockquote(text: string): string;
  abstract code(text: string): string;
  abstract pre(text: string, language?: string): string;
  abstract textLink(text: string, url: string): string;
  abstract textMention(text: string, userId: number): string;
  abstract customEmoji(text: string, emojiId: string): string;
  abstract quote(text: string): string;

  applyEntity(text: string, entity: TgMessageEntity): string {
    checkRange(text, entity);
    const end = entity.offset + entity.length;
    return (
      this.quote(text.slice(0, entity.offset)) +
      this.decorate(this.quote(text.slice(entity.offset, end)), entity) +
      this.quote(text.slice(end))
    );
  }

  applyEntityType(text: string, type: TgPlainEntityType): string {
    return this.applyEntity(text, { type, offset: 0, length: text.length });
  }

  spliceEntity(wire: string, entity: TgMessageEntity): string {
    checkRange(wire, entity);
    const end = entity.offset + entity.length;
    return wire.slice(0, entity.offset) + this.decorate(wire.slice(entity.offset, end), entity) + wire.slice(end);
  }

  protected decorate(span: string, entity: TgMessageEntity): string {
    switch (entity.type) {
      case "mention":
        return `@${span}`;
      case "hashtag":
        return `#${span}`;
      case "cashtag":
        return `$${span}`;
      case "bot_command":
        return `/${span}`;
      case "url":
      case "email":
      case "phone_number":
        return span;
      case "bold":
        return this.bold(span);
      case "italic":
        return this.italic(span);
      case "underline":
        return this.underline(span);
      case "strikethrough":
        return this.strikethrough(span);
      case "spoiler":
        return this.spoiler(span);
      case "blockquote":
        return this.blockquote(span);
      case "code":
        return this.code(span);
      case "pre":
        return this.pre(span, entity.language);
      case "text_link":
        return this.textLink(span, entity.url);
      case "text_mention":
        return this.textMention(span, entity.user.id);
      case "custom_emoji":
        return this.customEmoji(span, entity.custom_emoji_id);
    }
  }
}

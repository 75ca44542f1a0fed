/**
 * Accumulates outbound wire text. Annotated spans are quoted, appended and
 * decorated in one step; entity offsets and lengths are measured on the
 * wire text built so far, in UTF-16 code units.
 *
 * ```ts
 * new TextBuilder(new HtmlFormatter()).text("Hello, ").bold("world").quote("!").build();
 * // "Hello, <b>world</b>!"
 * ```
 */

import { createLogger, type Logger } from "../logger.js";
import type { TgMessageEntity, TgPlainEntityType, TgUser } from "../telegram/types.js";
import { customEmojiEntity, plainEntity, preEntity, textLinkEntity, textMentionEntity } from "./entities.js";
import { FormatterError, type Formatter } from "./formatter.js";

interface Span {
  start: number;
  end: number;
}

export class TextBuilder {
  private wire = "";
  private last: Span | undefined;
  private readonly logger: Logger;

  constructor(
    private readonly formatter: Formatter,
    logger?: Logger,
  ) {
    this.logger = logger ?? createLogger({ component: "format", parseMode: formatter.parseMode });
  }

  /** UTF-16 length of the wire text so far. */
  get length(): number {
    return this.wire.length;
  }

  /** Append text as is; it must already be valid wire syntax. */
  text(text: string): this {
    return this.append(text);
  }

  texts(texts: Iterable<string>): this {
    return this.append([...texts].join(""));
  }

  /** Append plain text, quoted for the target syntax. */
  quote(text: string): this {
    return this.append(this.formatter.quote(text));
  }

  quotes(texts: Iterable<string>): this {
    return this.append([...texts].map((text) => this.formatter.quote(text)).join(""));
  }

  bold(text: string): this {
    return this.annotated(text, (offset, length) => plainEntity("bold", offset, length));
  }

  italic(text: string): this {
    return this.annotated(text, (offset, length) => plainEntity("italic", offset, length));
  }

  underline(text: string): this {
    return this.annotated(text, (offset, length) => plainEntity("underline", offset, length));
  }

  strikethrough(text: string): this {
    return this.annotated(text, (offset, length) => plainEntity("strikethrough", offset, length));
  }

  spoiler(text: string): this {
    return this.annotated(text, (offset, length) => plainEntity("spoiler", offset, length));
  }

  blockquote(text: string): this {
    return this.annotated(text, (offset, length) => plainEntity("blockquote", offset, length));
  }

  code(text: string): this {
    return this.annotated(text, (offset, length) => plainEntity("code", offset, length));
  }

  pre(text: string, language?: string): this {
    return this.annotated(text, (offset, length) => preEntity(offset, length, language));
  }

  textLink(text: string, url: string): this {
    return this.annotated(text, (offset, length) => textLinkEntity(offset, length, url));
  }

  textMention(text: string, user: TgUser): this {
    return this.annotated(text, (offset, length) => textMentionEntity(offset, length, user));
  }

  customEmoji(emoji: string, customEmojiId: string): this {
    return this.annotated(emoji, (offset, length) => customEmojiEntity(offset, length, customEmojiId));
  }

  mention(username: string): this {
    return this.prefixed(username, "mention");
  }

  hashtag(tag: string): this {
    return this.prefixed(tag, "hashtag");
  }

  cashtag(tag: string): this {
    return this.prefixed(tag, "cashtag");
  }

  botCommand(command: string): this {
    return this.prefixed(command, "bot_command");
  }

  url(url: string): this {
    return this.prefixed(url, "url");
  }

  email(email: string): this {
    return this.prefixed(email, "email");
  }

  phoneNumber(phoneNumber: string): this {
    return this.prefixed(phoneNumber, "phone_number");
  }

  /**
   * Decorate part of the most recently appended span. The entity is in wire
   * coordinates and must not reach outside that span.
   */
  entity(entity: TgMessageEntity): this {
    const span = this.last;
    if (!span || entity.offset < span.start || entity.offset + entity.length > span.end) {
      throw new FormatterError(
        "range_out_of_bounds",
        `Entity ${entity.offset}..${entity.offset + entity.length} is outside the last appended span`,
      );
    }

    this.logger.trace({ entity, wireLength: this.wire.length }, "Splicing entity");
    const before = this.wire.length;
    this.wire = this.formatter.spliceEntity(this.wire, entity);
    span.end += this.wire.length - before;
    return this;
  }

  build(): string {
    return this.wire;
  }

  private append(text: string): this {
    this.last = { start: this.wire.length, end: this.wire.length + text.length };
    this.wire += text;
    return this;
  }

  private annotated(text: string, make: (offset: number, length: number) => TgMessageEntity): this {
    const span = this.formatter.quote(text);
    const entity = make(this.wire.length, span.length);
    return this.append(span).entity(entity);
  }

  private prefixed(text: string, type: TgPlainEntityType): this {
    return this.annotated(text, (offset, length) => plainEntity(type, offset, length));
  }
}

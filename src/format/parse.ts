/**
 * Decoding of wire text back into plain text and entities, the inverse of
 * {@link Formatter.applyEntity}. Prefix kinds (mention, hashtag, cashtag,
 * bot command) and pass-through kinds (url, email, phone number) leave no
 * markup behind and are not recovered.
 */

import { load } from "cheerio";
import { isTag, isText, type AnyNode, type Element } from "domhandler";
import type { TgMessageEntity, TgPlainEntityType } from "../telegram/types.js";
import { customEmojiEntity, plainEntity, preEntity, sortEntities, textLinkEntity, textMentionEntity } from "./entities.js";

export interface ParsedText {
  text: string;
  entities: TgMessageEntity[];
}

const USER_LINK = /^tg:\/\/user\?id=(\d+)$/;
const EMOJI_LINK = /^tg:\/\/emoji\?id=(.+)$/;

function linkEntity(offset: number, length: number, url: string): TgMessageEntity {
  const user = USER_LINK.exec(url);
  if (user?.[1]) return textMentionEntity(offset, length, { id: Number(user[1]), is_bot: false, first_name: "" });
  const emoji = EMOJI_LINK.exec(url);
  if (emoji?.[1]) return customEmojiEntity(offset, length, emoji[1]);
  return textLinkEntity(offset, length, url);
}

// HTML

const HTML_TAGS: Record<string, TgPlainEntityType> = {
  b: "bold",
  strong: "bold",
  i: "italic",
  em: "italic",
  u: "underline",
  ins: "underline",
  s: "strikethrough",
  strike: "strikethrough",
  del: "strikethrough",
  "tg-spoiler": "spoiler",
  blockquote: "blockquote",
  code: "code",
};

function htmlEntity(element: Element, offset: number, length: number): TgMessageEntity | undefined {
  const { name, attribs } = element;
  if (name === "a" && attribs.href !== undefined) return linkEntity(offset, length, attribs.href);
  if (name === "tg-emoji") {
    const emojiId = attribs["emoji-id"] ?? attribs["data-emoji-id"];
    return emojiId === undefined ? undefined : customEmojiEntity(offset, length, emojiId);
  }
  if (name === "span" && attribs.class === "tg-spoiler") return plainEntity("spoiler", offset, length);
  const type = HTML_TAGS[name];
  return type === undefined ? undefined : plainEntity(type, offset, length);
}

function preLanguage(pre: Element): { language: string; body: Element } | undefined {
  const [only] = pre.children;
  if (pre.children.length !== 1 || !only || !isTag(only) || only.name !== "code") return undefined;
  const language = /^language-(.+)$/.exec(only.attribs.class ?? "")?.[1];
  return language === undefined ? undefined : { language, body: only };
}

function walkHtml(nodes: AnyNode[], out: ParsedText): void {
  for (const node of nodes) {
    if (isText(node)) {
      out.text += node.data;
      continue;
    }
    if (!isTag(node)) continue;

    const start = out.text.length;
    if (node.name === "pre") {
      const tagged = preLanguage(node);
      walkHtml(tagged ? tagged.body.children : node.children, out);
      out.entities.push(preEntity(start, out.text.length - start, tagged?.language));
      continue;
    }

    walkHtml(node.children, out);
    const entity = htmlEntity(node, start, out.text.length - start);
    if (entity) out.entities.push(entity);
  }
}

// htmlparser2 in HTML mode: text keeps its newlines and carriage returns as written.
const HTML_OPTIONS = { xml: { xmlMode: false, decodeEntities: true } };

export function parseHtml(wire: string): ParsedText {
  const $ = load(wire, HTML_OPTIONS, false);
  const out: ParsedText = { text: "", entities: [] };
  walkHtml($.root().contents().toArray(), out);
  return { text: out.text, entities: sortEntities(out.entities) };
}

// Markdown

type Toggle = "bold" | "italic" | "underline" | "strikethrough" | "spoiler";

const MARKERS: [string, Toggle][] = [
  ["__\r", "underline"],
  ["_\r", "italic"],
  ["*", "bold"],
  ["~", "strikethrough"],
  ["|", "spoiler"],
];

function unescapeMarkdown(text: string): string {
  return text.replace(/\\([\s\S])/g, "$1");
}

/** Index of the first unescaped `char` at or after `from`, or -1. */
function findUnescaped(wire: string, char: string, from: number): number {
  for (let i = from; i < wire.length; i++) {
    if (wire.charAt(i) === "\\") i++;
    else if (wire.charAt(i) === char) return i;
  }
  return -1;
}

export function parseMarkdown(wire: string): ParsedText {
  let text = "";
  const entities: TgMessageEntity[] = [];
  const open: { type: Toggle; start: number }[] = [];
  const links: number[] = [];
  let quoteStart: number | undefined;

  let i = 0;
  scan: while (i < wire.length) {
    const ch = wire.charAt(i);

    if (ch === "\\" && i + 1 < wire.length) {
      text += wire.charAt(i + 1);
      i += 2;
      continue;
    }

    if (wire.startsWith("```", i)) {
      const newline = wire.indexOf("\n", i + 3);
      const close = newline === -1 ? -1 : wire.indexOf("\n```", newline);
      if (close !== -1) {
        const language = wire.slice(i + 3, newline);
        const start = text.length;
        text += unescapeMarkdown(wire.slice(newline + 1, close));
        entities.push(preEntity(start, text.length - start, language || undefined));
        i = close + 4;
        continue;
      }
    }

    if (ch === "`") {
      const close = findUnescaped(wire, "`", i + 1);
      if (close !== -1) {
        const start = text.length;
        text += unescapeMarkdown(wire.slice(i + 1, close));
        entities.push(plainEntity("code", start, text.length - start));
        i = close + 1;
        continue;
      }
    }

    for (const [marker, type] of MARKERS) {
      if (!wire.startsWith(marker, i)) continue;
      const at = open.map((entry) => entry.type).lastIndexOf(type);
      const opened = at === -1 ? undefined : open.splice(at, 1)[0];
      if (opened) entities.push(plainEntity(type, opened.start, text.length - opened.start));
      else open.push({ type, start: text.length });
      i += marker.length;
      continue scan;
    }

    if (ch === "[") {
      links.push(text.length);
      i++;
      continue;
    }

    if (ch === "]" && wire.charAt(i + 1) === "(" && links.length > 0) {
      const close = findUnescaped(wire, ")", i + 2);
      const start = links.pop();
      if (close !== -1 && start !== undefined) {
        entities.push(linkEntity(start, text.length - start, unescapeMarkdown(wire.slice(i + 2, close))));
        i = close + 1;
        continue;
      }
    }

    if (ch === ">") {
      if (quoteStart === undefined) quoteStart = text.length;
      else if (!text.endsWith("\n")) text += ch;
      i++;
      continue;
    }

    if (ch === "\n" && quoteStart !== undefined && wire.charAt(i + 1) !== ">") {
      entities.push(plainEntity("blockquote", quoteStart, text.length - quoteStart));
      quoteStart = undefined;
    }

    text += ch;
    i++;
  }

  if (quoteStart !== undefined) {
    entities.push(plainEntity("blockquote", quoteStart, text.length - quoteStart));
  }
  return { text, entities: sortEntities(entities) };
}

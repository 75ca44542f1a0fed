import { EntityFormatter } from "./formatter.js";

// Legacy Markdown specials plus the strikethrough, spoiler and blockquote markers.
const QUOTE_PATTERN = /([_*~|`[\]>\\])/g;

export function escapeMarkdown(text: string): string {
  return text.replace(QUOTE_PATTERN, "\\$1");
}

// Inside the (...) part of a link only ")" and "\" are escaped.
function escapeLinkTarget(url: string): string {
  return url.replace(/[)\\]/g, "\\$&");
}

/**
 * `parse_mode: "Markdown"`. Italic and underline markers are followed by a
 * carriage return so `_` and `__` stay distinguishable when nested.
 */
export class MarkdownFormatter extends EntityFormatter {
  readonly parseMode = "Markdown";

  bold(text: string): string {
    return `*${text}*`;
  }

  italic(text: string): string {
    return `_\r${text}_\r`;
  }

  underline(text: string): string {
    return `__\r${text}__\r`;
  }

  strikethrough(text: string): string {
    return `~${text}~`;
  }

  spoiler(text: string): string {
    return `|${text}|`;
  }

  blockquote(text: string): string {
    return text
      .split("\n")
      .map((line) => `>${line}`)
      .join("\n");
  }

  code(text: string): string {
    return `\`${text}\``;
  }

  pre(text: string, language?: string): string {
    return `\`\`\`${language ?? ""}\n${text}\n\`\`\``;
  }

  textLink(text: string, url: string): string {
    return `[${text}](${escapeLinkTarget(url)})`;
  }

  textMention(text: string, userId: number): string {
    return this.textLink(text, `tg://user?id=${userId}`);
  }

  customEmoji(text: string, emojiId: string): string {
    return this.textLink(text, `tg://emoji?id=${emojiId}`);
  }

  quote(text: string): string {
    return escapeMarkdown(text);
  }
}

import { EntityFormatter } from "./formatter.js";

const HTML_ESCAPE_MAP: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>]/g, (ch) => HTML_ESCAPE_MAP[ch] ?? ch);
}

function escapeAttribute(value: string): string {
  return value.replace(/[&<>"]/g, (ch) => HTML_ESCAPE_MAP[ch] ?? ch);
}

/** `parse_mode: "HTML"` */
export class HtmlFormatter extends EntityFormatter {
  readonly parseMode = "HTML";

  bold(text: string): string {
    return `<b>${text}</b>`;
  }

  italic(text: string): string {
    return `<i>${text}</i>`;
  }

  underline(text: string): string {
    return `<u>${text}</u>`;
  }

  strikethrough(text: string): string {
    return `<s>${text}</s>`;
  }

  spoiler(text: string): string {
    return `<tg-spoiler>${text}</tg-spoiler>`;
  }

  blockquote(text: string): string {
    return `<blockquote>${text}</blockquote>`;
  }

  code(text: string): string {
    return `<code>${text}</code>`;
  }

  pre(text: string, language?: string): string {
    if (language) {
      return `<pre><code class="language-${escapeAttribute(language)}">${text}</code></pre>`;
    }
    return `<pre>${text}</pre>`;
  }

  textLink(text: string, url: string): string {
    return `<a href="${escapeAttribute(url)}">${text}</a>`;
  }

  textMention(text: string, userId: number): string {
    return this.textLink(text, `tg://user?id=${userId}`);
  }

  customEmoji(text: string, emojiId: string): string {
    return `<tg-emoji emoji-id="${escapeAttribute(emojiId)}">${text}</tg-emoji>`;
  }

  quote(text: string): string {
    return escapeHtml(text);
  }
}

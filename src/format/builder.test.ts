import pino from "pino";
import { describe, expect, it } from "vitest";
import { alice } from "../__tests__/fixtures.js";
import { TextBuilder } from "./builder.js";
import { plainEntity } from "./entities.js";
import { FormatterError } from "./formatter.js";
import { HtmlFormatter } from "./html.js";
import { MarkdownFormatter } from "./markdown.js";

const html = new HtmlFormatter();
const markdown = new MarkdownFormatter();

describe("TextBuilder", () => {
  it("should chain plain, quoted and annotated text", () => {
    expect(new TextBuilder(html).text("Hello, ").bold("world").quote("!").build()).toBe("Hello, <b>world</b>!");
    expect(new TextBuilder(markdown).text("Hello, ").bold("world").quote("!").build()).toBe("Hello, *world*!");
  });

  it("should quote annotated text before decorating it", () => {
    expect(new TextBuilder(html).bold("a<b").build()).toBe("<b>a&lt;b</b>");
    expect(new TextBuilder(markdown).italic("snake_case").build()).toBe("_\rsnake\\_case_\r");
  });

  it("should append raw and quoted sequences", () => {
    const builder = new TextBuilder(html).texts(["<i>", "a", "</i>"]).quotes(["<", ">"]);

    expect(builder.build()).toBe("<i>a</i>&lt;&gt;");
    expect(builder.length).toBe(16);
  });

  it("should nest entities inside the last appended span", () => {
    const wire = new TextBuilder(html)
      .text("x ")
      .quote("bold italic")
      .entity(plainEntity("italic", 7, 6))
      .entity(plainEntity("bold", 2, 18))
      .build();

    expect(wire).toBe("x <b>bold <i>italic</i></b>");
  });

  it("should refuse an entity outside the last appended span", () => {
    const builder = new TextBuilder(html).text("ab").text("cd");

    expect(() => builder.entity(plainEntity("bold", 0, 2))).toThrow(FormatterError);
    expect(() => builder.entity(plainEntity("bold", 2, 3))).toThrow(
      "Entity 2..5 is outside the last appended span",
    );
  });

  it("should refuse an entity before anything was appended", () => {
    expect(() => new TextBuilder(html).entity(plainEntity("bold", 0, 0))).toThrow(FormatterError);
  });

  it("should report an empty annotated span on an empty builder", () => {
    try {
      new TextBuilder(html).bold("");
      throw new Error("expected a FormatterError");
    } catch (e) {
      expect(e).toBeInstanceOf(FormatterError);
      expect(e instanceof FormatterError && e.kind).toBe("empty_text");
    }
  });

  it("should measure offsets in UTF-16 code units", () => {
    expect(new TextBuilder(html).quote("🐈 ").bold("cats").build()).toBe("🐈 <b>cats</b>");
  });

  it("should write prefix and pass-through kinds", () => {
    const wire = new TextBuilder(html)
      .mention("alice")
      .text(" ")
      .hashtag("news")
      .text(" ")
      .cashtag("USD")
      .text(" ")
      .botCommand("start")
      .text(" ")
      .url("https://example.org")
      .build();

    expect(wire).toBe("@alice #news $USD /start https://example.org");
  });

  it("should write links, mentions and emoji", () => {
    expect(new TextBuilder(html).textMention("Alice", alice).build()).toBe('<a href="tg://user?id=1001">Alice</a>');
    expect(new TextBuilder(markdown).textLink("docs", "https://example.org/docs").build()).toBe(
      "[docs](https://example.org/docs)",
    );
    expect(new TextBuilder(markdown).customEmoji("👍", "5368").build()).toBe("[👍](tg://emoji?id=5368)");
  });

  it("should write code blocks", () => {
    expect(new TextBuilder(markdown).pre("let x = 1;", "ts").build()).toBe("```ts\nlet x = 1;\n```");
    expect(new TextBuilder(html).code("a && b").build()).toBe("<code>a &amp;&amp; b</code>");
  });

  it("should log each splice at trace level", () => {
    const lines: Record<string, unknown>[] = [];
    const logger = pino({ level: "trace" }, { write: (line: string) => lines.push(JSON.parse(line)) });

    new TextBuilder(html, logger).text("> ").bold("x");

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 10,
      msg: "Splicing entity",
      entity: { type: "bold", offset: 2, length: 1 },
      wireLength: 3,
    });
  });
});

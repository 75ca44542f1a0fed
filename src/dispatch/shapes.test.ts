import { describe, expect, it } from "vitest";
import { contentUpdate, fakeClient, updateOfKind } from "../__tests__/fixtures.js";
import { CONTENT_TYPES, UPDATE_TYPES, classify } from "../classify/index.js";
import { Context } from "./context.js";
import { ShapeMismatchError } from "./errors.js";
import { AnyMessage, Messages, Updates } from "./shapes.js";

const client = fakeClient();
const context = new Context();

const corpus = [
  ...UPDATE_TYPES.map((kind) => updateOfKind(kind)),
  ...CONTENT_TYPES.map((field) => contentUpdate(field)),
  contentUpdate("photo", "channel_post"),
  contentUpdate("voice", "edited_message"),
];

describe("Updates", () => {
  it("should have one extractor per update kind", () => {
    expect(Object.keys(Updates)).toEqual([...UPDATE_TYPES]);
  });

  describe.each(Object.entries(Updates))("Updates.%s", (kind, shape) => {
    it("should succeed exactly when the update classifies as that kind", async () => {
      for (const update of corpus) {
        const outcome = await shape.extract(client, update, context);
        expect(outcome.ok).toBe(classify(update).updateType === kind);
      }
    });
  });

  it("should produce the payload itself", async () => {
    const update = updateOfKind("callback_query");

    const outcome = await Updates.callback_query.extract(client, update, context);

    expect(outcome).toEqual({ ok: true, value: update.callback_query });
  });
});

describe("Messages", () => {
  it("should have one extractor per content type", () => {
    expect(Object.keys(Messages)).toEqual([...CONTENT_TYPES]);
  });

  describe.each(Object.entries(Messages))("Messages.%s", (field, shape) => {
    it("should succeed exactly when the message classifies as that content type", async () => {
      for (const update of corpus) {
        const outcome = await shape.extract(client, update, context);
        expect(outcome.ok).toBe(classify(update).contentType === field);
      }
    });
  });

  it("should accept any message-bearing kind", async () => {
    const update = contentUpdate("photo", "channel_post");

    const outcome = await Messages.photo.extract(client, update, context);

    expect(outcome).toEqual({ ok: true, value: update.channel_post });
  });

  it("should name both shapes when a callback query is asked for as a text message", async () => {
    const outcome = await Messages.text.extract(client, updateOfKind("callback_query"), context);

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error).toBeInstanceOf(ShapeMismatchError);
    expect(outcome.error.requested).toBe("message:text");
    expect(outcome.error.actual).toBe("callback_query");
    expect(outcome.error.message).toBe("Expected message:text, got callback_query");
  });

  it("should name the content type on a content mismatch", async () => {
    const outcome = await Messages.text.extract(client, contentUpdate("photo"), context);

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error.actual).toBe("message:photo");
  });
});

describe("AnyMessage", () => {
  it("should take the message of every message-bearing kind", async () => {
    for (const kind of ["message", "edited_message", "channel_post", "edited_channel_post"] as const) {
      const update = updateOfKind(kind);
      const outcome = await AnyMessage.extract(client, update, context);
      expect(outcome).toEqual({ ok: true, value: update[kind] });
    }
  });

  it("should fail on other kinds", async () => {
    const outcome = await AnyMessage.extract(client, updateOfKind("poll"), context);

    expect(outcome).toEqual({ ok: false, error: new ShapeMismatchError("message:*", "poll") });
  });
});

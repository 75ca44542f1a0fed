import { describe, expect, it } from "vitest";
import { updateOfKind } from "../__tests__/fixtures.js";
import { UpdateDecodeError, decodeUpdate, updateChat, updateText, updateThreadId, updateUser } from "./update.js";

describe("decodeUpdate", () => {
  it("should accept an update envelope and keep unknown fields", () => {
    const raw = { update_id: 1, business_message: { text: "hi" } };

    expect(decodeUpdate(raw)).toBe(raw);
  });

  it("should reject a value that is not an object", () => {
    expect(() => decodeUpdate("update")).toThrow(UpdateDecodeError);
  });

  it("should name the offending path", () => {
    try {
      decodeUpdate({ update_id: 1, message: { message_id: 1, date: 0 } });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(UpdateDecodeError);
      if (!(e instanceof UpdateDecodeError)) return;
      expect(e.path).toBe("/message/chat");
    }
  });

  it("should reject a chat boost without its boost source", () => {
    try {
      decodeUpdate({ update_id: 1, chat_boost: { chat: { id: 1, type: "channel" } } });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(UpdateDecodeError);
      if (!(e instanceof UpdateDecodeError)) return;
      expect(e.path).toBe("/chat_boost/boost");
    }
  });

  it("should reject a removed chat boost without its source", () => {
    expect(() =>
      decodeUpdate({ update_id: 1, removed_chat_boost: { chat: { id: 1, type: "channel" }, boost_id: "b" } }),
    ).toThrow(UpdateDecodeError);
  });

  it("should reject a negative update id", () => {
    expect(() => decodeUpdate({ update_id: -1 })).toThrow(/update_id/);
  });
});

describe("update accessors", () => {
  it("should read the user, chat, text and thread of the update's kind", () => {
    const query = updateOfKind("inline_query");

    expect(updateUser(query)?.id).toBe(1001);
    expect(updateChat(query)).toBeUndefined();
    expect(updateText(query)).toBe("cats");
    expect(updateThreadId(query)).toBeUndefined();
  });

  it("should read the voter of a poll answer", () => {
    expect(updateUser(updateOfKind("poll_answer"))?.first_name).toBe("Bob");
  });

  it("should read the invoice payload of payment queries", () => {
    expect(updateText(updateOfKind("shipping_query"))).toBe("order-42");
    expect(updateText(updateOfKind("pre_checkout_query"))).toBe("order-42");
  });

  it("should read the question of a poll", () => {
    expect(updateText(updateOfKind("poll"))).toBe("Lunch?");
  });

  it("should read no user from a boost whose source names none", () => {
    const update = decodeUpdate({
      update_id: 1,
      chat_boost: { chat: { id: -100300, type: "channel" }, boost: { source: { source: "gift_code" } } },
    });

    expect(updateUser(update)).toBeUndefined();
    expect(updateChat(update)?.id).toBe(-100300);
  });

  it("should read the chat of member updates", () => {
    expect(updateChat(updateOfKind("chat_join_request"))?.id).toBe(-100200);
    expect(updateUser(updateOfKind("chat_join_request"))?.first_name).toBe("Carol");
  });
});

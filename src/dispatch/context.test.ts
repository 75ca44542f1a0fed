import { describe, expect, it } from "vitest";
import { alice, updateOfKind } from "../__tests__/fixtures.js";
import { Context, seedEventContext } from "./context.js";

describe("Context", () => {
  it("should store and report typed values", () => {
    const context = new Context().set("eventThreadId", 3);

    expect(context.get("eventThreadId")).toBe(3);
    expect(context.has("eventThreadId")).toBe(true);
    expect(context.has("eventUser")).toBe(false);
    expect(context.keys()).toEqual(["eventThreadId"]);
  });

  it("should forget deleted values", () => {
    const context = new Context().set("eventThreadId", 3);

    expect(context.delete("eventThreadId")).toBe(true);
    expect(context.get("eventThreadId")).toBeUndefined();
    expect(context.keys()).toEqual([]);
    expect(context.delete("eventThreadId")).toBe(false);
  });
});

describe("seedEventContext", () => {
  it("should store the sender, chat and thread of a message", () => {
    const context = seedEventContext(new Context(), updateOfKind("message"));

    expect(context.keys()).toEqual(["eventUser", "eventChat", "eventThreadId"]);
    expect(context.get("eventUser")).toEqual(alice);
    expect(context.get("eventChat")?.id).toBe(-100200);
    expect(context.get("eventThreadId")).toBe(7);
  });

  it("should take the chat and thread of a callback query from its message", () => {
    const context = seedEventContext(new Context(), updateOfKind("callback_query"));

    expect(context.get("eventChat")?.id).toBe(-100200);
    expect(context.get("eventThreadId")).toBe(7);
  });

  it("should store nothing for an update without sender or chat", () => {
    expect(seedEventContext(new Context(), updateOfKind("poll")).keys()).toEqual([]);
  });

  it("should take the boosting user of a chat boost", () => {
    const context = seedEventContext(new Context(), updateOfKind("chat_boost"));

    expect(context.get("eventUser")?.first_name).toBe("Bob");
    expect(context.get("eventChat")?.type).toBe("channel");
  });
});

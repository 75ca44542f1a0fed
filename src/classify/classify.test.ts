import { describe, expect, it } from "vitest";
import { contentSamples, contentUpdate, messageUpdate, updateOfKind } from "../__tests__/fixtures.js";
import type { TgMessage, TgUpdate } from "../telegram/types.js";
import { decodeUpdate } from "../telegram/update.js";
import {
  CONTENT_TYPES,
  UPDATE_TYPES,
  classify,
  classifyUpdate,
  contentTypeOf,
  describeClassification,
  isMessageBearing,
  isMessageBearingType,
  messageOf,
  updateTypeOf,
} from "./index.js";

function messageIn(update: TgUpdate): TgMessage {
  const message = messageOf(update);
  if (!message) throw new Error("update carries no message");
  return message;
}

describe("classifyUpdate", () => {
  it.each(UPDATE_TYPES)("should classify a %s update by its field", (kind) => {
    const update = updateOfKind(kind);
    const classified = classifyUpdate(update);

    expect(classified.type).toBe(kind);
    expect(classified.payload).toBe(update[kind]);
  });

  it("should classify an update without a known field as unknown", () => {
    expect(classifyUpdate(decodeUpdate({ update_id: 5 }))).toEqual({ type: "unknown", payload: undefined });
  });

  it("should let the first field in probe order win on malformed input", () => {
    const update = decodeUpdate({
      update_id: 6,
      edited_message: updateOfKind("edited_message").edited_message,
      channel_post: updateOfKind("channel_post").channel_post,
    });

    expect(updateTypeOf(update)).toBe("channel_post");
  });

  it("should recognise message-bearing kinds by name", () => {
    expect(isMessageBearingType("edited_channel_post")).toBe(true);
    expect(isMessageBearingType("poll")).toBe(false);
    expect(isMessageBearingType("business_message")).toBe(false);
  });

  it("should mark exactly the four message kinds as message-bearing", () => {
    const bearing = UPDATE_TYPES.filter((kind) => isMessageBearing(classifyUpdate(updateOfKind(kind))));

    expect(bearing).toEqual(["message", "channel_post", "edited_message", "edited_channel_post"]);
  });
});

describe("contentTypeOf", () => {
  it("should have a sample for every content type", () => {
    expect(Object.keys(contentSamples).sort()).toEqual([...CONTENT_TYPES].sort());
  });

  it.each(CONTENT_TYPES)("should classify a %s message by its field", (field) => {
    expect(contentTypeOf(messageIn(contentUpdate(field)))).toBe(field);
  });

  it("should prefer animation over the document sent alongside it", () => {
    const update = messageUpdate({ animation: contentSamples.animation, document: contentSamples.document });

    expect(contentTypeOf(messageIn(update))).toBe("animation");
  });

  it("should prefer venue over the location sent alongside it", () => {
    const update = messageUpdate({ venue: contentSamples.venue, location: contentSamples.location });

    expect(contentTypeOf(messageIn(update))).toBe("venue");
  });

  it("should prefer text over anything else present", () => {
    const update = messageUpdate({ text: "see map", location: contentSamples.location });

    expect(contentTypeOf(messageIn(update))).toBe("text");
  });

  it("should classify a message with no content field as unknown", () => {
    expect(contentTypeOf(messageIn(messageUpdate({})))).toBe("unknown");
  });

  it("should classify spoilered media by the media", () => {
    const update = messageUpdate({ photo: contentSamples.photo, has_media_spoiler: true });

    expect(contentTypeOf(messageIn(update))).toBe("photo");
  });

  it("should not treat the media spoiler flag as content", () => {
    expect(contentTypeOf(messageIn(messageUpdate({ has_media_spoiler: true })))).toBe("unknown");
  });
});

describe("classify", () => {
  it("should give both levels for message-bearing kinds", () => {
    const classification = classify(contentUpdate("photo", "edited_message"));

    expect(classification).toEqual({ updateType: "edited_message", contentType: "photo" });
    expect(describeClassification(classification)).toBe("edited_message:photo");
  });

  it("should give only the kind for other updates", () => {
    const classification = classify(updateOfKind("callback_query"));

    expect(classification).toEqual({ updateType: "callback_query" });
    expect(describeClassification(classification)).toBe("callback_query");
  });

  it("should be deterministic", () => {
    const update = contentUpdate("sticker");

    expect(classify(update)).toEqual(classify(update));
  });
});

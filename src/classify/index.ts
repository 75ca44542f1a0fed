/**
 * Two-level update classification: the update's kind, then, for
 * message-bearing kinds, the message's content type.
 */

import type { TgUpdate } from "../telegram/types.js";
import { contentTypeOf, type ContentType } from "./content-type.js";
import { classifyUpdate, isMessageBearing, type UpdateType } from "./update-type.js";

export * from "./update-type.js";
export * from "./content-type.js";

export interface Classification {
  updateType: UpdateType | "unknown";
  /** Set only for message-bearing kinds */
  contentType?: ContentType;
}

export function classify(update: TgUpdate): Classification {
  const kind = classifyUpdate(update);
  if (isMessageBearing(kind)) {
    return { updateType: kind.type, contentType: contentTypeOf(kind.payload) };
  }
  return { updateType: kind.type };
}

/** Render a classification as `kind` or `kind:content`, e.g. `message:photo`. */
export function describeClassification(classification: Classification): string {
  return classification.contentType
    ? `${classification.updateType}:${classification.contentType}`
    : classification.updateType;
}

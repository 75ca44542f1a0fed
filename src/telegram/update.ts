/**
 * Update envelope validation and the per-update accessors the extractors
 * and the event context build on.
 */

import { Type, type TProperties, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import {
  UPDATE_TYPES,
  classifyUpdate,
  isMessageBearing,
  isMessageBearingType,
  type UpdateType,
} from "../classify/update-type.js";
import type { TgChat, TgMaybeInaccessibleMessage, TgMessage, TgUpdate, TgUser } from "./types.js";

const Payload = Type.Object({}, { additionalProperties: true });

const ChatRef = Type.Object({ id: Type.Integer(), type: Type.String() }, { additionalProperties: true });

const BoostSource = Type.Object({ source: Type.String() }, { additionalProperties: true });

const MessagePayload = Type.Object(
  {
    message_id: Type.Integer(),
    date: Type.Integer(),
    chat: ChatRef,
  },
  { additionalProperties: true },
);

// Nested objects the accessors below dereference without a check.
const NESTED_PAYLOADS: Partial<Record<UpdateType, TSchema>> = {
  chat_boost: Type.Object(
    { chat: ChatRef, boost: Type.Object({ source: BoostSource }, { additionalProperties: true }) },
    { additionalProperties: true },
  ),
  removed_chat_boost: Type.Object({ chat: ChatRef, source: BoostSource }, { additionalProperties: true }),
};

const envelopeFields: TProperties = { update_id: Type.Integer({ minimum: 0 }) };
for (const type of UPDATE_TYPES) {
  const payload = isMessageBearingType(type) ? MessagePayload : (NESTED_PAYLOADS[type] ?? Payload);
  envelopeFields[type] = Type.Optional(payload);
}

const UpdateEnvelope = Type.Object(envelopeFields, { additionalProperties: true });

export class UpdateDecodeError extends Error {
  constructor(
    message: string,
    readonly path: string,
  ) {
    super(message);
    this.name = "UpdateDecodeError";
  }
}

function isUpdateEnvelope(value: unknown): value is TgUpdate {
  return Value.Check(UpdateEnvelope, value);
}

/**
 * Validate a decoded JSON value as an update envelope. Payload objects are
 * checked for shape only where the classification depends on them.
 */
export function decodeUpdate(value: unknown): TgUpdate {
  if (isUpdateEnvelope(value)) return value;
  const first = Value.Errors(UpdateEnvelope, value).First();
  throw new UpdateDecodeError(
    `Invalid update${first ? ` at ${first.path || "/"}: ${first.message}` : ""}`,
    first?.path ?? "",
  );
}

// Inaccessible messages are reported with a zero date.
export function isAccessibleMessage(message: TgMaybeInaccessibleMessage): message is TgMessage {
  return message.date !== 0;
}

/** The user who caused the update, if the update names one. */
export function updateUser(update: TgUpdate): TgUser | undefined {
  const kind = classifyUpdate(update);
  if (isMessageBearing(kind)) return kind.payload.from;
  switch (kind.type) {
    case "inline_query":
    case "chosen_inline_result":
    case "callback_query":
    case "shipping_query":
    case "pre_checkout_query":
    case "my_chat_member":
    case "chat_member":
    case "chat_join_request":
      return kind.payload.from;
    case "poll_answer":
    case "message_reaction":
      return kind.payload.user;
    case "chat_boost":
      return kind.payload.boost.source.user;
    case "removed_chat_boost":
      return kind.payload.source.user;
    default:
      return undefined;
  }
}

/** The chat the update happened in, if there is one. */
export function updateChat(update: TgUpdate): TgChat | undefined {
  const kind = classifyUpdate(update);
  if (isMessageBearing(kind)) return kind.payload.chat;
  switch (kind.type) {
    case "callback_query":
      return kind.payload.message?.chat;
    case "my_chat_member":
    case "chat_member":
    case "chat_join_request":
    case "message_reaction":
    case "message_reaction_count":
    case "chat_boost":
    case "removed_chat_boost":
      return kind.payload.chat;
    default:
      return undefined;
  }
}

/**
 * The text an update carries: message text or caption, inline query text,
 * callback data, invoice payload or poll question.
 */
export function updateText(update: TgUpdate): string | undefined {
  const kind = classifyUpdate(update);
  if (isMessageBearing(kind)) return kind.payload.text ?? kind.payload.caption;
  switch (kind.type) {
    case "inline_query":
    case "chosen_inline_result":
      return kind.payload.query;
    case "callback_query":
      return kind.payload.data;
    case "shipping_query":
    case "pre_checkout_query":
      return kind.payload.invoice_payload;
    case "poll":
      return kind.payload.question;
    default:
      return undefined;
  }
}

/** The forum thread of the update's message, if it was sent to one. */
export function updateThreadId(update: TgUpdate): number | undefined {
  const kind = classifyUpdate(update);
  if (isMessageBearing(kind)) return kind.payload.message_thread_id;
  if (kind.type === "callback_query") {
    const message = kind.payload.message;
    return message && isAccessibleMessage(message) ? message.message_thread_id : undefined;
  }
  return undefined;
}

import type { TgMessage, TgUpdate } from "../telegram/types.js";

/**
 * Update kinds in the order they are probed. An update carries at most one
 * of these fields; the order only matters for malformed input, where the
 * first present field wins.
 */
export const UPDATE_TYPES = [
  "message",
  "inline_query",
  "chosen_inline_result",
  "callback_query",
  "channel_post",
  "edited_message",
  "edited_channel_post",
  "message_reaction",
  "message_reaction_count",
  "shipping_query",
  "pre_checkout_query",
  "poll",
  "poll_answer",
  "my_chat_member",
  "chat_member",
  "chat_join_request",
  "chat_boost",
  "removed_chat_boost",
] as const;

export type UpdateType = (typeof UPDATE_TYPES)[number];

export const MESSAGE_BEARING_TYPES = [
  "message",
  "edited_message",
  "channel_post",
  "edited_channel_post",
] as const satisfies readonly UpdateType[];

export type MessageBearingType = (typeof MESSAGE_BEARING_TYPES)[number];

export type UpdatePayload<K extends UpdateType> = NonNullable<TgUpdate[K]>;

export type UpdateKind =
  | { [K in UpdateType]: { type: K; payload: UpdatePayload<K> } }[UpdateType]
  | { type: "unknown"; payload: undefined };

export type MessageBearingKind = Extract<UpdateKind, { type: MessageBearingType }>;

type Probe = (update: TgUpdate) => UpdateKind | undefined;

const PROBES: { [K in UpdateType]: Probe } = {
  message: (u) => (u.message ? { type: "message", payload: u.message } : undefined),
  inline_query: (u) => (u.inline_query ? { type: "inline_query", payload: u.inline_query } : undefined),
  chosen_inline_result: (u) =>
    u.chosen_inline_result ? { type: "chosen_inline_result", payload: u.chosen_inline_result } : undefined,
  callback_query: (u) => (u.callback_query ? { type: "callback_query", payload: u.callback_query } : undefined),
  channel_post: (u) => (u.channel_post ? { type: "channel_post", payload: u.channel_post } : undefined),
  edited_message: (u) => (u.edited_message ? { type: "edited_message", payload: u.edited_message } : undefined),
  edited_channel_post: (u) =>
    u.edited_channel_post ? { type: "edited_channel_post", payload: u.edited_channel_post } : undefined,
  message_reaction: (u) =>
    u.message_reaction ? { type: "message_reaction", payload: u.message_reaction } : undefined,
  message_reaction_count: (u) =>
    u.message_reaction_count ? { type: "message_reaction_count", payload: u.message_reaction_count } : undefined,
  shipping_query: (u) => (u.shipping_query ? { type: "shipping_query", payload: u.shipping_query } : undefined),
  pre_checkout_query: (u) =>
    u.pre_checkout_query ? { type: "pre_checkout_query", payload: u.pre_checkout_query } : undefined,
  poll: (u) => (u.poll ? { type: "poll", payload: u.poll } : undefined),
  poll_answer: (u) => (u.poll_answer ? { type: "poll_answer", payload: u.poll_answer } : undefined),
  my_chat_member: (u) => (u.my_chat_member ? { type: "my_chat_member", payload: u.my_chat_member } : undefined),
  chat_member: (u) => (u.chat_member ? { type: "chat_member", payload: u.chat_member } : undefined),
  chat_join_request: (u) =>
    u.chat_join_request ? { type: "chat_join_request", payload: u.chat_join_request } : undefined,
  chat_boost: (u) => (u.chat_boost ? { type: "chat_boost", payload: u.chat_boost } : undefined),
  removed_chat_boost: (u) =>
    u.removed_chat_boost ? { type: "removed_chat_boost", payload: u.removed_chat_boost } : undefined,
};

export function classifyUpdate(update: TgUpdate): UpdateKind {
  for (const type of UPDATE_TYPES) {
    const kind = PROBES[type](update);
    if (kind) return kind;
  }
  return { type: "unknown", payload: undefined };
}

export function updateTypeOf(update: TgUpdate): UpdateType | "unknown" {
  return classifyUpdate(update).type;
}

const MESSAGE_BEARING = new Set<string>(MESSAGE_BEARING_TYPES);

export function isMessageBearingType(type: string): type is MessageBearingType {
  return MESSAGE_BEARING.has(type);
}

export function isMessageBearing(kind: UpdateKind): kind is MessageBearingKind {
  return isMessageBearingType(kind.type);
}

/** The message an update carries, if its kind is message-bearing. */
export function messageOf(update: TgUpdate): TgMessage | undefined {
  const kind = classifyUpdate(update);
  return isMessageBearing(kind) ? kind.payload : undefined;
}

/**
 * One extractor per narrow shape. `Updates.<kind>` yields the payload of an
 * update of that kind; `Messages.<content>` yields a message whose content
 * type is `<content>`, from any message-bearing kind. Both succeed exactly
 * when the update's classification matches.
 */

import {
  classify,
  classifyUpdate,
  contentTypeOf,
  describeClassification,
  hasContent,
  isMessageBearing,
  type ContentField,
  type MessageWith,
  type UpdatePayload,
  type UpdateType,
} from "../classify/index.js";
import type { TgMessage, TgUpdate } from "../telegram/types.js";
import { ShapeMismatchError } from "./errors.js";
import { extractor, failed, isPresent, produced, type Extractor } from "./extractor.js";

function mismatch(requested: string, update: TgUpdate): { ok: false; error: ShapeMismatchError } {
  return failed(new ShapeMismatchError(requested, describeClassification(classify(update))));
}

export function updateOf<K extends UpdateType>(type: K): Extractor<UpdatePayload<K>, ShapeMismatchError> {
  return extractor<UpdatePayload<K>, ShapeMismatchError>(type, (_client, update) => {
    const payload = update[type];
    if (classifyUpdate(update).type !== type || !isPresent(payload)) return mismatch(type, update);
    return produced(payload);
  });
}

export function messageWith<F extends ContentField>(field: F): Extractor<MessageWith<F>, ShapeMismatchError> {
  const requested = `message:${field}`;
  return extractor<MessageWith<F>, ShapeMismatchError>(requested, (_client, update) => {
    const kind = classifyUpdate(update);
    if (!isMessageBearing(kind)) return mismatch(requested, update);
    const message = kind.payload;
    if (contentTypeOf(message) !== field || !hasContent(message, field)) return mismatch(requested, update);
    return produced(message);
  });
}

/** The message of any message-bearing update, whatever its content. */
export const AnyMessage = extractor<TgMessage, ShapeMismatchError>("message:*", (_client, update) => {
  const kind = classifyUpdate(update);
  return isMessageBearing(kind) ? produced(kind.payload) : mismatch("message:*", update);
});

export const Updates = {
  message: updateOf("message"),
  inline_query: updateOf("inline_query"),
  chosen_inline_result: updateOf("chosen_inline_result"),
  callback_query: updateOf("callback_query"),
  channel_post: updateOf("channel_post"),
  edited_message: updateOf("edited_message"),
  edited_channel_post: updateOf("edited_channel_post"),
  message_reaction: updateOf("message_reaction"),
  message_reaction_count: updateOf("message_reaction_count"),
  shipping_query: updateOf("shipping_query"),
  pre_checkout_query: updateOf("pre_checkout_query"),
  poll: updateOf("poll"),
  poll_answer: updateOf("poll_answer"),
  my_chat_member: updateOf("my_chat_member"),
  chat_member: updateOf("chat_member"),
  chat_join_request: updateOf("chat_join_request"),
  chat_boost: updateOf("chat_boost"),
  removed_chat_boost: updateOf("removed_chat_boost"),
} satisfies { [K in UpdateType]: Extractor<UpdatePayload<K>, ShapeMismatchError> };

export const Messages = {
  text: messageWith("text"),
  animation: messageWith("animation"),
  audio: messageWith("audio"),
  document: messageWith("document"),
  photo: messageWith("photo"),
  sticker: messageWith("sticker"),
  story: messageWith("story"),
  video: messageWith("video"),
  video_note: messageWith("video_note"),
  voice: messageWith("voice"),
  contact: messageWith("contact"),
  dice: messageWith("dice"),
  game: messageWith("game"),
  poll: messageWith("poll"),
  venue: messageWith("venue"),
  location: messageWith("location"),
  new_chat_members: messageWith("new_chat_members"),
  left_chat_member: messageWith("left_chat_member"),
  new_chat_title: messageWith("new_chat_title"),
  new_chat_photo: messageWith("new_chat_photo"),
  delete_chat_photo: messageWith("delete_chat_photo"),
  group_chat_created: messageWith("group_chat_created"),
  supergroup_chat_created: messageWith("supergroup_chat_created"),
  channel_chat_created: messageWith("channel_chat_created"),
  message_auto_delete_timer_changed: messageWith("message_auto_delete_timer_changed"),
  migrate_to_chat_id: messageWith("migrate_to_chat_id"),
  migrate_from_chat_id: messageWith("migrate_from_chat_id"),
  pinned_message: messageWith("pinned_message"),
  invoice: messageWith("invoice"),
  successful_payment: messageWith("successful_payment"),
  user_shared: messageWith("user_shared"),
  chat_shared: messageWith("chat_shared"),
  connected_website: messageWith("connected_website"),
  write_access_allowed: messageWith("write_access_allowed"),
  passport_data: messageWith("passport_data"),
  proximity_alert_triggered: messageWith("proximity_alert_triggered"),
  forum_topic_created: messageWith("forum_topic_created"),
  forum_topic_edited: messageWith("forum_topic_edited"),
  forum_topic_closed: messageWith("forum_topic_closed"),
  forum_topic_reopened: messageWith("forum_topic_reopened"),
  general_forum_topic_hidden: messageWith("general_forum_topic_hidden"),
  general_forum_topic_unhidden: messageWith("general_forum_topic_unhidden"),
  video_chat_scheduled: messageWith("video_chat_scheduled"),
  video_chat_started: messageWith("video_chat_started"),
  video_chat_ended: messageWith("video_chat_ended"),
  video_chat_participants_invited: messageWith("video_chat_participants_invited"),
  web_app_data: messageWith("web_app_data"),
} satisfies { [F in ContentField]: Extractor<MessageWith<F>, ShapeMismatchError> };

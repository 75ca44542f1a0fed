import type { TgMessage } from "../telegram/types.js";

/**
 * Message content types in priority order. Each name is also the message
 * field that carries the content; the first present field decides the
 * type. This order is part of the public contract:
 *
 * - `text` comes first, so a text message is never reclassified by an
 *   attached preview or location.
 * - `animation` precedes `document`, and `venue` precedes `location`: the
 *   platform fills the second field alongside the first for older clients.
 * - media precede service notices, which follow the Bot API listing order.
 *
 * `has_media_spoiler` is a flag on the media fields above, not content of
 * its own, so it is not listed.
 */
export const CONTENT_TYPES = [
  "text",
  "animation",
  "audio",
  "document",
  "photo",
  "sticker",
  "story",
  "video",
  "video_note",
  "voice",
  "contact",
  "dice",
  "game",
  "poll",
  "venue",
  "location",
  "new_chat_members",
  "left_chat_member",
  "new_chat_title",
  "new_chat_photo",
  "delete_chat_photo",
  "group_chat_created",
  "supergroup_chat_created",
  "channel_chat_created",
  "message_auto_delete_timer_changed",
  "migrate_to_chat_id",
  "migrate_from_chat_id",
  "pinned_message",
  "invoice",
  "successful_payment",
  "user_shared",
  "chat_shared",
  "connected_website",
  "write_access_allowed",
  "passport_data",
  "proximity_alert_triggered",
  "forum_topic_created",
  "forum_topic_edited",
  "forum_topic_closed",
  "forum_topic_reopened",
  "general_forum_topic_hidden",
  "general_forum_topic_unhidden",
  "video_chat_scheduled",
  "video_chat_started",
  "video_chat_ended",
  "video_chat_participants_invited",
  "web_app_data",
] as const satisfies readonly (keyof TgMessage)[];

export type ContentField = (typeof CONTENT_TYPES)[number];

export type ContentType = ContentField | "unknown";

/** A message whose content field `F` is known to be present. */
export type MessageWith<F extends ContentField> = TgMessage & { [P in F]-?: NonNullable<TgMessage[P]> };

export function hasContent<F extends ContentField>(message: TgMessage, field: F): message is MessageWith<F> {
  return message[field] !== undefined;
}

export function contentTypeOf(message: TgMessage): ContentType {
  for (const field of CONTENT_TYPES) {
    if (hasContent(message, field)) return field;
  }
  return "unknown";
}

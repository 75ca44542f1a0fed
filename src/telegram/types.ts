/**
 * Telegram Bot API schema types, as consumed by the dispatch core.
 * Only the fields the core reads are spelled out; payload objects keep
 * their identifying fields and are otherwise treated as opaque data.
 */

export interface TgUser {
  id: number;
  is_bot: boolean;
  first_name: string;
  last_name?: string;
  username?: string;
  language_code?: string;
  is_premium?: boolean;
}

export interface TgChat {
  id: number;
  type: "private" | "group" | "supergroup" | "channel";
  title?: string;
  username?: string;
  first_name?: string;
  last_name?: string;
  is_forum?: boolean;
}

export interface TgPhotoSize {
  file_id: string;
  file_unique_id: string;
  width: number;
  height: number;
  file_size?: number;
}

interface TgFileBase {
  file_id: string;
  file_unique_id: string;
  file_size?: number;
}

export interface TgAnimation extends TgFileBase {
  width: number;
  height: number;
  duration: number;
  file_name?: string;
  mime_type?: string;
}

export interface TgAudio extends TgFileBase {
  duration: number;
  performer?: string;
  title?: string;
  file_name?: string;
  mime_type?: string;
}

export interface TgDocument extends TgFileBase {
  file_name?: string;
  mime_type?: string;
}

export interface TgSticker extends TgFileBase {
  type: "regular" | "mask" | "custom_emoji";
  width: number;
  height: number;
  is_animated: boolean;
  is_video: boolean;
  emoji?: string;
  set_name?: string;
  custom_emoji_id?: string;
}

export interface TgStory {
  chat: TgChat;
  id: number;
}

export interface TgVideo extends TgFileBase {
  width: number;
  height: number;
  duration: number;
  file_name?: string;
  mime_type?: string;
}

export interface TgVideoNote extends TgFileBase {
  length: number;
  duration: number;
}

export interface TgVoice extends TgFileBase {
  duration: number;
  mime_type?: string;
}

export interface TgContact {
  phone_number: string;
  first_name: string;
  last_name?: string;
  user_id?: number;
  vcard?: string;
}

export interface TgDice {
  emoji: string;
  value: number;
}

export interface TgGame {
  title: string;
  description: string;
  photo: TgPhotoSize[];
  text?: string;
}

export interface TgPollOption {
  text: string;
  voter_count: number;
}

export interface TgPoll {
  id: string;
  question: string;
  options: TgPollOption[];
  total_voter_count: number;
  is_closed: boolean;
  is_anonymous: boolean;
  type: "regular" | "quiz";
  allows_multiple_answers: boolean;
}

export interface TgLocation {
  longitude: number;
  latitude: number;
  horizontal_accuracy?: number;
  live_period?: number;
}

export interface TgVenue {
  location: TgLocation;
  title: string;
  address: string;
  foursquare_id?: string;
}

export interface TgMessageAutoDeleteTimerChanged {
  message_auto_delete_time: number;
}

export interface TgInvoice {
  title: string;
  description: string;
  start_parameter: string;
  currency: string;
  total_amount: number;
}

export interface TgSuccessfulPayment {
  currency: string;
  total_amount: number;
  invoice_payload: string;
  telegram_payment_charge_id: string;
  provider_payment_charge_id: string;
}

export interface TgUserShared {
  request_id: number;
  user_id: number;
}

export interface TgChatShared {
  request_id: number;
  chat_id: number;
}

export interface TgWriteAccessAllowed {
  from_request?: boolean;
  web_app_name?: string;
  from_attachment_menu?: boolean;
}

export interface TgPassportData {
  data: unknown[];
  credentials: { data: string; hash: string; secret: string };
}

export interface TgProximityAlertTriggered {
  traveler: TgUser;
  watcher: TgUser;
  distance: number;
}

export interface TgForumTopicCreated {
  name: string;
  icon_color: number;
  icon_custom_emoji_id?: string;
}

export interface TgForumTopicEdited {
  name?: string;
  icon_custom_emoji_id?: string;
}

// Service payloads that currently hold no information.
export type TgForumTopicClosed = Record<string, never>;
export type TgForumTopicReopened = Record<string, never>;
export type TgGeneralForumTopicHidden = Record<string, never>;
export type TgGeneralForumTopicUnhidden = Record<string, never>;
export type TgVideoChatStarted = Record<string, never>;

export interface TgVideoChatScheduled {
  start_date: number;
}

export interface TgVideoChatEnded {
  duration: number;
}

export interface TgVideoChatParticipantsInvited {
  users: TgUser[];
}

export interface TgWebAppData {
  data: string;
  button_text: string;
}

export type TgEntityType =
  | "mention"
  | "hashtag"
  | "cashtag"
  | "bot_command"
  | "url"
  | "email"
  | "phone_number"
  | "bold"
  | "italic"
  | "underline"
  | "strikethrough"
  | "spoiler"
  | "blockquote"
  | "code"
  | "pre"
  | "text_link"
  | "text_mention"
  | "custom_emoji";

/** Entity types that carry nothing besides their range. */
export type TgPlainEntityType = Exclude<TgEntityType, "pre" | "text_link" | "text_mention" | "custom_emoji">;

interface TgEntityRange {
  /** Offset in UTF-16 code units to the start of the entity */
  offset: number;
  /** Length of the entity in UTF-16 code units */
  length: number;
}

export type TgMessageEntity =
  | (TgEntityRange & { type: TgPlainEntityType })
  | (TgEntityRange & { type: "pre"; language?: string })
  | (TgEntityRange & { type: "text_link"; url: string })
  | (TgEntityRange & { type: "text_mention"; user: TgUser })
  | (TgEntityRange & { type: "custom_emoji"; custom_emoji_id: string });

export interface TgInlineKeyboardButton {
  text: string;
  callback_data?: string;
  url?: string;
}

export interface TgMessage {
  message_id: number;
  message_thread_id?: number;
  date: number;
  chat: TgChat;
  from?: TgUser;
  sender_chat?: TgChat;
  is_topic_message?: boolean;
  reply_to_message?: TgMessage;
  via_bot?: TgUser;
  edit_date?: number;
  media_group_id?: string;
  author_signature?: string;
  text?: string;
  entities?: TgMessageEntity[];
  animation?: TgAnimation;
  audio?: TgAudio;
  document?: TgDocument;
  photo?: TgPhotoSize[];
  sticker?: TgSticker;
  story?: TgStory;
  video?: TgVideo;
  video_note?: TgVideoNote;
  voice?: TgVoice;
  caption?: string;
  caption_entities?: TgMessageEntity[];
  has_media_spoiler?: boolean;
  contact?: TgContact;
  dice?: TgDice;
  game?: TgGame;
  poll?: TgPoll;
  venue?: TgVenue;
  location?: TgLocation;
  new_chat_members?: TgUser[];
  left_chat_member?: TgUser;
  new_chat_title?: string;
  new_chat_photo?: TgPhotoSize[];
  delete_chat_photo?: true;
  group_chat_created?: true;
  supergroup_chat_created?: true;
  channel_chat_created?: true;
  message_auto_delete_timer_changed?: TgMessageAutoDeleteTimerChanged;
  migrate_to_chat_id?: number;
  migrate_from_chat_id?: number;
  pinned_message?: TgMessage;
  invoice?: TgInvoice;
  successful_payment?: TgSuccessfulPayment;
  user_shared?: TgUserShared;
  chat_shared?: TgChatShared;
  connected_website?: string;
  write_access_allowed?: TgWriteAccessAllowed;
  passport_data?: TgPassportData;
  proximity_alert_triggered?: TgProximityAlertTriggered;
  forum_topic_created?: TgForumTopicCreated;
  forum_topic_edited?: TgForumTopicEdited;
  forum_topic_closed?: TgForumTopicClosed;
  forum_topic_reopened?: TgForumTopicReopened;
  general_forum_topic_hidden?: TgGeneralForumTopicHidden;
  general_forum_topic_unhidden?: TgGeneralForumTopicUnhidden;
  video_chat_scheduled?: TgVideoChatScheduled;
  video_chat_started?: TgVideoChatStarted;
  video_chat_ended?: TgVideoChatEnded;
  video_chat_participants_invited?: TgVideoChatParticipantsInvited;
  web_app_data?: TgWebAppData;
  reply_markup?: { inline_keyboard: TgInlineKeyboardButton[][] };
}

export interface TgInaccessibleMessage {
  chat: TgChat;
  message_id: number;
  date: 0;
}

export type TgMaybeInaccessibleMessage = TgMessage | TgInaccessibleMessage;

export interface TgInlineQuery {
  id: string;
  from: TgUser;
  query: string;
  offset: string;
  chat_type?: "sender" | TgChat["type"];
  location?: TgLocation;
}

export interface TgChosenInlineResult {
  result_id: string;
  from: TgUser;
  query: string;
  location?: TgLocation;
  inline_message_id?: string;
}

export interface TgCallbackQuery {
  id: string;
  from: TgUser;
  message?: TgMaybeInaccessibleMessage;
  inline_message_id?: string;
  chat_instance: string;
  data?: string;
  game_short_name?: string;
}

export interface TgShippingAddress {
  country_code: string;
  state: string;
  city: string;
  street_line1: string;
  street_line2: string;
  post_code: string;
}

export interface TgShippingQuery {
  id: string;
  from: TgUser;
  invoice_payload: string;
  shipping_address: TgShippingAddress;
}

export interface TgPreCheckoutQuery {
  id: string;
  from: TgUser;
  currency: string;
  total_amount: number;
  invoice_payload: string;
  shipping_option_id?: string;
}

export interface TgPollAnswer {
  poll_id: string;
  voter_chat?: TgChat;
  user?: TgUser;
  option_ids: number[];
}

export interface TgChatMember {
  status: "creator" | "administrator" | "member" | "restricted" | "left" | "kicked";
  user: TgUser;
}

export interface TgChatInviteLink {
  invite_link: string;
  creator: TgUser;
  creates_join_request: boolean;
  is_primary: boolean;
  is_revoked: boolean;
  name?: string;
}

export interface TgChatMemberUpdated {
  chat: TgChat;
  from: TgUser;
  date: number;
  old_chat_member: TgChatMember;
  new_chat_member: TgChatMember;
  invite_link?: TgChatInviteLink;
}

export interface TgChatJoinRequest {
  chat: TgChat;
  from: TgUser;
  user_chat_id: number;
  date: number;
  bio?: string;
  invite_link?: TgChatInviteLink;
}

export type TgReactionType =
  | { type: "emoji"; emoji: string }
  | { type: "custom_emoji"; custom_emoji_id: string };

export interface TgMessageReactionUpdated {
  chat: TgChat;
  message_id: number;
  user?: TgUser;
  actor_chat?: TgChat;
  date: number;
  old_reaction: TgReactionType[];
  new_reaction: TgReactionType[];
}

export interface TgReactionCount {
  type: TgReactionType;
  total_count: number;
}

export interface TgMessageReactionCountUpdated {
  chat: TgChat;
  message_id: number;
  date: number;
  reactions: TgReactionCount[];
}

export interface TgChatBoostSource {
  source: "premium" | "gift_code" | "giveaway";
  user?: TgUser;
}

export interface TgChatBoost {
  boost_id: string;
  add_date: number;
  expiration_date: number;
  source: TgChatBoostSource;
}

export interface TgChatBoostUpdated {
  chat: TgChat;
  boost: TgChatBoost;
}

export interface TgChatBoostRemoved {
  chat: TgChat;
  boost_id: string;
  remove_date: number;
  source: TgChatBoostSource;
}

/**
 * An incoming update. At most one of the optional fields is present in any
 * given update.
 */
export interface TgUpdate {
  update_id: number;
  message?: TgMessage;
  edited_message?: TgMessage;
  channel_post?: TgMessage;
  edited_channel_post?: TgMessage;
  message_reaction?: TgMessageReactionUpdated;
  message_reaction_count?: TgMessageReactionCountUpdated;
  inline_query?: TgInlineQuery;
  chosen_inline_result?: TgChosenInlineResult;
  callback_query?: TgCallbackQuery;
  shipping_query?: TgShippingQuery;
  pre_checkout_query?: TgPreCheckoutQuery;
  poll?: TgPoll;
  poll_answer?: TgPollAnswer;
  my_chat_member?: TgChatMemberUpdated;
  chat_member?: TgChatMemberUpdated;
  chat_join_request?: TgChatJoinRequest;
  chat_boost?: TgChatBoostUpdated;
  removed_chat_boost?: TgChatBoostRemoved;
}

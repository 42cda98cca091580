import { z } from "zod";

// Vendor payloads keep their wire names so a record can be sent back as-is.

const maybeString = z.string().nullish();
const maybeNumber = z.number().nullish();
const maybeBoolean = z.boolean().nullish();

export const userTypeSchema = z.enum(["BLUE", "GREEN", "YELLOW", "ORANGE", "RED"]);
export const genderSchema = z.enum(["M", "F"]);
export const callTypeSchema = z.enum(["missed", "outgoing", "incoming"]);
export const commentStatusSchema = z.enum(["approved", "ignored", "waiting"]);

export const userSchema = z.object({
  uuid: z.string(),
  phone_number: maybeNumber,
  first_name: maybeString,
  last_name: maybeString,
  email: maybeString,
  profile_picture: maybeString,
  gender: maybeString,
  slogan: maybeString,
  is_verified: maybeBoolean,
  is_premium: maybeBoolean,
  verify_subscription: maybeBoolean,
  id: maybeNumber,
  comment_count: maybeNumber,
  location_enabled: maybeBoolean,
  distance: maybeNumber,
});

export const contactSchema = z.object({
  id: maybeNumber,
  name: maybeString,
  picture: maybeString,
  phone_number: z.number(),
  user: userSchema.nullish(),
  user_type: userTypeSchema.nullish(),
  suggested_as_spam: z.number().default(0),
  is_permanent: maybeBoolean,
  is_pending_name_change: maybeBoolean,
  cached: maybeBoolean,
  is_my_contact: maybeBoolean,
  is_shared_location: maybeBoolean,
});

export const socialPostSchema = z.object({
  posted_at: maybeString,
  photo: maybeString,
  text_first: maybeString,
  text_second: maybeString,
  author: maybeString,
  owner: maybeString,
  redirect_id: maybeString,
});

export const socialNetworkSchema = z.object({
  is_active: z.boolean().default(false),
  is_hidden: z.boolean().default(true),
  profile_id: maybeString,
  posts: z.array(socialPostSchema).default([]),
});

export const SOCIAL_NETWORKS = [
  "facebook",
  "fakebook",
  "instagram",
  "linkedin",
  "pinterest",
  "spotify",
  "tiktok",
  "twitter",
] as const;

export type SocialNetworkName = (typeof SOCIAL_NETWORKS)[number];

export const socialSchema = z.object({
  facebook: socialNetworkSchema.optional(),
  fakebook: socialNetworkSchema.optional(),
  instagram: socialNetworkSchema.optional(),
  linkedin: socialNetworkSchema.optional(),
  pinterest: socialNetworkSchema.optional(),
  spotify: socialNetworkSchema.optional(),
  tiktok: socialNetworkSchema.optional(),
  twitter: socialNetworkSchema.optional(),
});

export const mutualContactSchema = z.object({
  phone_number: z.number(),
  name: maybeString,
  referenced_user: userSchema.nullish(),
  date_of_birth: maybeString,
});

export const commentSchema = z.object({
  id: z.number(),
  message: z.string(),
  status: commentStatusSchema.nullish(),
  author: userSchema.nullish(),
  like_count: z.number().default(0),
  is_liked: maybeBoolean,
  comments_blocked: maybeBoolean,
  created_at: maybeString,
  comment_likes: z.array(z.object({ author: userSchema })).nullish(),
  profile_uuid: maybeString,
});

export const profileDetailsSchema = z.object({
  uuid: z.string(),
  phone_number: maybeNumber,
  phone_prefix: maybeString,
  first_name: maybeString,
  last_name: maybeString,
  email: maybeString,
  gender: maybeString,
  slogan: maybeString,
  profile_picture: maybeString,
  date_of_birth: maybeString,
  country_code: maybeString,
  carrier: maybeString,
  device_type: maybeString,
  login_type: maybeString,
  facebook_url: maybeString,
  google_url: maybeString,
  location_enabled: maybeBoolean,
  location_name: maybeString,
  location_latitude: maybeNumber,
  location_longitude: maybeNumber,
  distance: maybeNumber,
  comments_enabled: maybeBoolean,
  gdpr_consent: maybeBoolean,
  is_premium: maybeBoolean,
  is_verified: maybeBoolean,
  me_in_contacts: maybeBoolean,
  user_type: userTypeSchema.nullish(),
  verify_subscription: maybeBoolean,
  who_deleted_enabled: maybeBoolean,
  who_watched_enabled: maybeBoolean,
});

const profileExtrasSchema = z.object({
  comments_blocked: maybeBoolean,
  is_he_blocked_me: maybeBoolean,
  is_permanent: maybeBoolean,
  is_shared_location: maybeBoolean,
  share_location: maybeBoolean,
  last_comment: commentSchema.nullish(),
  mutual_contacts_available: maybeBoolean,
  mutual_contacts: z.array(mutualContactSchema).default([]),
  social: socialSchema.nullish(),
});

export const profileSchema = profileDetailsSchema.merge(profileExtrasSchema);

/** `GET /main/users/profile/{uuid}` nests the details under `profile`. */
export const profileEnvelopeSchema = profileExtrasSchema
  .extend({ profile: profileDetailsSchema })
  .transform(({ profile, ...rest }): Profile => ({ ...rest, ...profile }));

export const watcherSchema = z.object({
  user: userSchema,
  count: z.number().default(0),
  last_view: maybeString,
  is_search: maybeBoolean,
});

export const deleterSchema = z.object({
  user: userSchema,
  created_at: maybeString,
});

export const groupContactSchema = z.object({
  id: z.number(),
  user: userSchema.nullish(),
  in_contact_list: maybeBoolean,
  created_at: maybeString,
  modified_at: maybeString,
});

export const groupSchema = z.object({
  name: z.string(),
  count: z.number().default(0),
  last_contact_at: maybeString,
  contacts: z.array(groupContactSchema).default([]),
  contact_ids: z.array(z.number()).default([]),
});

export const blockedNumberSchema = z.object({
  phone_number: z.number(),
  block_contact: z.boolean(),
  me_full_block: z.boolean(),
});

export const settingsSchema = z.object({
  birthday_notification_enabled: maybeBoolean,
  comments_enabled: maybeBoolean,
  comments_notification_enabled: maybeBoolean,
  contact_suspended: maybeBoolean,
  distance_notification_enabled: maybeBoolean,
  language: maybeString,
  last_backup_at: maybeString,
  last_restore_at: maybeString,
  location_enabled: maybeBoolean,
  mutual_contacts_available: maybeBoolean,
  names_notification_enabled: maybeBoolean,
  notifications_enabled: maybeBoolean,
  spammers_count: maybeNumber,
  system_notification_enabled: maybeBoolean,
  who_deleted_enabled: maybeBoolean,
  who_deleted_notification_enabled: maybeBoolean,
  who_watched_enabled: maybeBoolean,
  who_watched_notification_enabled: maybeBoolean,
});

export const notificationSchema = z.object({
  id: z.number(),
  created_at: maybeString,
  modified_at: maybeString,
  is_read: z.boolean().default(false),
  sender: maybeString,
  status: maybeString,
  delivery_method: maybeString,
  distribution_date: maybeString,
  message_subject: maybeString,
  message_category: maybeString,
  message_body: maybeString,
  message_lang: maybeString,
  category: maybeString,
  context: z
    .object({
      name: maybeString,
      uuid: maybeString,
      new_name: maybeString,
      phone_number: maybeNumber,
      notification_id: maybeNumber,
      profile_picture: maybeString,
      tag: maybeString,
    })
    .nullish(),
});

export const notificationPageSchema = z.object({
  count: z.number(),
  next: maybeString,
  previous: maybeString,
  results: z.array(notificationSchema),
});

export const callSchema = z.object({
  name: z.string(),
  phone_number: z.number(),
  type: callTypeSchema,
  called_at: z.string(),
  duration: z.number(),
  tag: maybeString,
});

export const uploadContactSchema = z.object({
  name: z.string(),
  phone_number: z.number(),
  date_of_birth: maybeString,
  country_code: maybeString,
});

export const contactsSyncResultSchema = z.object({
  total: z.number().default(0),
  added: z.number().default(0),
  updated: z.number().default(0),
  removed: z.number().default(0),
  failed: z.number().default(0),
  same: z.number().default(0),
  result: z.array(uploadContactSchema.passthrough()).default([]),
  failed_contacts: z.array(z.unknown()).default([]),
});

export const callLogSyncResultSchema = z.object({
  added_list: z.array(callSchema).default([]),
  removed_list: z.array(callSchema).default([]),
});

export const friendshipSchema = z.object({
  calls_duration: maybeNumber,
  he_called: maybeNumber,
  he_named: maybeString,
  i_called: maybeNumber,
  i_named: maybeString,
  is_premium: maybeBoolean,
  mutual_friends_count: maybeNumber,
  my_comment: maybeString,
  his_comment: maybeString,
});

export const sharedLocationSchema = z.object({
  user: userSchema.nullish(),
  distance: maybeNumber,
  location_latitude: maybeNumber,
  location_longitude: maybeNumber,
  location_name: maybeString,
  created_at: maybeString,
});

export const hiddenNameSchema = z.object({
  contact_id: z.number(),
  name: z.string().nullish(),
  created_at: z.string().nullish(),
  hidden_at: z.string().nullish(),
  user: userSchema.nullish(),
});

export const sharedWithMeSchema = z.object({
  shared_location_user_uuids: z.array(z.string()).default([]),
  shared_location_users: z.array(sharedLocationSchema).default([]),
});

export const successSchema = z.object({ success: z.boolean() });

export const countSchema = z.object({ count: z.number() });

export const tokenPairSchema = z.object({
  access: z.string().min(1),
  refresh: z.string().min(1),
  pwd_token: z.string().nullish(),
});

export const refreshedTokenSchema = z.object({
  access: z.string().min(1),
  refresh: z.string().min(1).nullish(),
});

export const challengeSchema = z.object({
  request_id: z.union([z.string().min(1), z.number()]).transform(String),
});

export type User = z.infer<typeof userSchema>;
export type Contact = z.infer<typeof contactSchema>;
export type SocialPost = z.infer<typeof socialPostSchema>;
export type SocialNetwork = z.infer<typeof socialNetworkSchema>;
export type Social = z.infer<typeof socialSchema>;
export type MutualContact = z.infer<typeof mutualContactSchema>;
export type Comment = z.infer<typeof commentSchema>;
export type ProfileDetails = z.infer<typeof profileDetailsSchema>;
export type Profile = z.infer<typeof profileSchema>;
export type Watcher = z.infer<typeof watcherSchema>;
export type Deleter = z.infer<typeof deleterSchema>;
export type Group = z.infer<typeof groupSchema>;
export type BlockedNumber = z.infer<typeof blockedNumberSchema>;
export type Settings = z.infer<typeof settingsSchema>;
export type Notification = z.infer<typeof notificationSchema>;
export type NotificationPage = z.infer<typeof notificationPageSchema>;
export type Call = z.infer<typeof callSchema>;
export type CallType = z.infer<typeof callTypeSchema>;
export type UploadContact = z.infer<typeof uploadContactSchema>;
export type ContactsSyncResult = z.infer<typeof contactsSyncResultSchema>;
export type CallLogSyncResult = z.infer<typeof callLogSyncResultSchema>;
export type Friendship = z.infer<typeof friendshipSchema>;
export type SharedLocation = z.infer<typeof sharedLocationSchema>;
export type HiddenName = z.infer<typeof hiddenNameSchema>;
export type SharedWithMe = z.infer<typeof sharedWithMeSchema>;

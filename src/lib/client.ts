import { z } from "zod";
import { resolveConfig } from "./config.js";
import { ProfileCredentialsManager } from "./credentials.js";
import { ApiError, AuthError, ValidationError } from "./errors.js";
import {
  blockedNumberSchema,
  callLogSyncResultSchema,
  commentSchema,
  contactSchema,
  contactsSyncResultSchema,
  countSchema,
  deleterSchema,
  friendshipSchema,
  groupSchema,
  hiddenNameSchema,
  notificationPageSchema,
  profileEnvelopeSchema,
  profileSchema,
  settingsSchema,
  sharedWithMeSchema,
  socialSchema,
  successSchema,
  userSchema,
  watcherSchema,
  type BlockedNumber,
  type CallLogSyncResult,
  type Comment,
  type Contact,
  type ContactsSyncResult,
  type Deleter,
  type Friendship,
  type Group,
  type HiddenName,
  type NotificationPage,
  type Profile,
  type Settings,
  type SharedWithMe,
  type Social,
  type SocialNetworkName,
  type User,
  type Watcher,
} from "./models.js";
import { parsePhoneNumber, type PhoneNumber } from "./phone.js";
import { Session, type SessionOptions } from "./session.js";
import { loadCredentials } from "./store.js";
import type { ChallengeMethod, TokenPair } from "./types.js";
import {
  diffApplied,
  validateCalls,
  validateContacts,
  validateProfileUpdate,
  validateSettingsChange,
  type CallInput,
  type ContactInput,
  type ProfileUpdate,
  type SettingsChange,
} from "./validation.js";

type PhoneInput = string | number | PhoneNumber;
type UuidInput = string | Pick<User, "uuid">;

export interface UpdateResult<T> {
  success: boolean;
  /** Fields the server did not store as sent. */
  failed: string[];
  value: T;
}

export interface SocialLinks {
  twitter?: string;
  spotify?: string;
  instagram?: string;
  facebook?: string;
  tiktok?: string;
  pinterest?: string;
  linkedin?: string;
}

const TOKEN_SOCIALS = ["twitter", "spotify", "instagram", "facebook", "tiktok"] as const;
const URL_SOCIALS = ["pinterest", "linkedin"] as const;

const requestedSchema = z.object({ requested: z.boolean() });
const hiddenSchema = z.object({ is_hidden: z.boolean() });
const anyObjectSchema = z.record(z.unknown());
const commentStatusReplySchema = z
  .union([z.string(), z.object({ status: z.string() })])
  .transform((value) => (typeof value === "string" ? value : value.status));

function toUuid(value: UuidInput): string {
  const uuid = typeof value === "string" ? value.trim() : value.uuid;
  if (!uuid) {
    throw new ValidationError("A profile uuid is required.");
  }
  return uuid;
}

function toContactIds(ids: number | string | Array<number | string>): number[] {
  const list = Array.isArray(ids) ? ids : [ids];
  const parsed = list.map((id) => Number(id));
  if (parsed.length === 0 || parsed.some((id) => !Number.isSafeInteger(id) || id <= 0)) {
    throw new ValidationError("Contact ids must be positive integers.");
  }
  return parsed;
}

function toUuidList(uuids: string | string[]): string[] {
  const list = (Array.isArray(uuids) ? uuids : [uuids]).map((uuid) => uuid.trim()).filter(Boolean);
  if (list.length === 0) {
    throw new ValidationError("At least one uuid is required.");
  }
  return list;
}

function byCountDesc<T extends { count: number }>(items: T[]): T[] {
  return [...items].sort((a, b) => b.count - a.count);
}

/** Age in years, one decimal, from a `YYYY-MM-DD` birthday. */
export function ageOn(dateOfBirth: string | null | undefined, today: Date = new Date()): number {
  if (!dateOfBirth) return 0;
  const birth = new Date(`${dateOfBirth}T00:00:00Z`);
  if (Number.isNaN(birth.getTime())) return 0;
  const days = (today.getTime() - birth.getTime()) / 86_400_000;
  return Math.round((days / 365.2425) * 10) / 10;
}

/**
 * Typed access to the caller-ID API. Every method is one vendor endpoint
 * sent through the client's `Session`.
 */
export class MeClient {
  readonly session: Session;

  constructor(session: Session | SessionOptions = {}) {
    this.session = session instanceof Session ? session : new Session(session);
  }

  // --- authentication -----------------------------------------------------

  authenticate(phoneNumber: PhoneInput, method: ChallengeMethod = "sms"): Promise<string> {
    return this.session.authenticate(phoneNumber, method);
  }

  verify(challengeId: string, code: string | number): Promise<TokenPair> {
    return this.session.verify(challengeId, code);
  }

  logout(): Promise<void> {
    return this.session.logout();
  }

  // --- account ------------------------------------------------------------

  /** Resolves to `null` when the vendor knows nothing about the number. */
  async phoneSearch(phoneNumber: PhoneInput): Promise<Contact | null> {
    const phone = parsePhoneNumber(phoneNumber);
    try {
      const result = await this.session.request("get", "/main/contacts/search/", {
        query: { phone_number: phone.digits },
        schema: z.object({ contact: contactSchema }),
      });
      return result.contact;
    } catch (error) {
      // Only the vendor's own "Not found." means no result; other 404s propagate.
      if (error instanceof ApiError && error.status === 404 && error.detail === "Not found.") {
        return null;
      }
      throw error;
    }
  }

  getProfile(uuid: UuidInput): Promise<Profile> {
    return this.session.request("get", `/main/users/profile/${encodeURIComponent(toUuid(uuid))}`, {
      schema: profileEnvelopeSchema,
    });
  }

  getMyProfile(): Promise<Profile> {
    return this.session.request("get", "/main/users/profile/me/", { schema: profileSchema });
  }

  /** Uuid of the account behind `phoneNumber`, or of the logged-in account. */
  async getUuid(phoneNumber?: PhoneInput): Promise<string | null> {
    if (phoneNumber === undefined) {
      return (await this.getMyProfile()).uuid;
    }
    const contact = await this.phoneSearch(phoneNumber);
    return contact?.user?.uuid ?? null;
  }

  async updateProfile(update: ProfileUpdate): Promise<UpdateResult<Profile>> {
    const body = validateProfileUpdate(update);
    const profile = await this.session.request("patch", "/main/users/profile/", {
      body,
      schema: profileSchema,
    });
    // The server rewrites picture urls to its CDN.
    const failed = diffApplied(body, profile, ["profile_picture"]);
    return { success: failed.length === 0, failed, value: profile };
  }

  /** Deletes the account and its data, then forgets the session. */
  async deleteAccount(): Promise<boolean> {
    const result = await this.session.request("delete", "/main/settings/remove-user/", {
      schema: anyObjectSchema,
    });
    if (Object.keys(result).length > 0) return false;
    await this.session.logout();
    return true;
  }

  /** Suspends the account until the next login, then forgets the session. */
  async suspendAccount(): Promise<boolean> {
    const result = await this.session.request("put", "/main/settings/suspend-user/", {
      schema: z.object({ contact_suspended: z.boolean() }),
    });
    if (!result.contact_suspended) return false;
    await this.session.logout();
    return true;
  }

  addContacts(contacts: ContactInput[]): Promise<ContactsSyncResult> {
    return this.syncContacts({ add: validateContacts(contacts), remove: [] });
  }

  removeContacts(contacts: ContactInput[]): Promise<ContactsSyncResult> {
    return this.syncContacts({ add: [], remove: validateContacts(contacts) });
  }

  private syncContacts(change: { add: unknown[]; remove: unknown[] }): Promise<ContactsSyncResult> {
    return this.session.request("post", "/main/contacts/sync/", {
      body: { add: change.add, is_first: false, remove: change.remove },
      schema: contactsSyncResultSchema,
    });
  }

  addCallsToLog(calls: CallInput[]): Promise<CallLogSyncResult> {
    return this.session.request("post", "/main/call-log/change-sync/", {
      body: { add: validateCalls(calls), remove: [] },
      schema: callLogSyncResultSchema,
    });
  }

  removeCallsFromLog(calls: CallInput[]): Promise<CallLogSyncResult> {
    return this.session.request("post", "/main/call-log/change-sync/", {
      body: { add: [], remove: validateCalls(calls) },
      schema: callLogSyncResultSchema,
    });
  }

  /**
   * `blockContact` blocks calls from the number, `meFullBlock` hides your
   * profile from it.
   */
  async blockProfile(
    phoneNumber: PhoneInput,
    options: { blockContact?: boolean; meFullBlock?: boolean } = {},
  ): Promise<boolean> {
    const result = await this.session.request("post", "/main/users/profile/block/", {
      body: {
        block_contact: options.blockContact ?? true,
        me_full_block: options.meFullBlock ?? true,
        phone_number: parsePhoneNumber(phoneNumber).value,
      },
      schema: successSchema,
    });
    return result.success;
  }

  async unblockProfile(
    phoneNumber: PhoneInput,
    options: { unblockContact?: boolean; meFullUnblock?: boolean } = {},
  ): Promise<boolean> {
    const result = await this.session.request("post", "/main/users/profile/block/", {
      body: {
        block_contact: !(options.unblockContact ?? true),
        me_full_block: !(options.meFullUnblock ?? true),
        phone_number: parsePhoneNumber(phoneNumber).value,
      },
      schema: successSchema,
    });
    return result.success;
  }

  blockNumbers(numbers: PhoneInput | PhoneInput[]): Promise<BlockedNumber[]> {
    const list = Array.isArray(numbers) ? numbers : [numbers];
    return this.session.request("post", "/main/users/profile/bulk-block/", {
      body: { phone_numbers: list.map((number) => parsePhoneNumber(number).value) },
      schema: z.array(blockedNumberSchema),
    });
  }

  async unblockNumbers(numbers: PhoneInput | PhoneInput[]): Promise<boolean> {
    const list = Array.isArray(numbers) ? numbers : [numbers];
    const result = await this.session.request("post", "/main/users/profile/bulk-unblock/", {
      body: { phone_numbers: list.map((number) => parsePhoneNumber(number).value) },
      schema: successSchema,
    });
    return result.success;
  }

  getBlockedNumbers(): Promise<BlockedNumber[]> {
    return this.session.request("get", "/main/settings/blocked-phone-numbers/", {
      schema: z.array(blockedNumberSchema),
    });
  }

  async updateLocation(latitude: number, longitude: number): Promise<boolean> {
    if (Math.abs(latitude) > 90 || Math.abs(longitude) > 180) {
      throw new ValidationError("Latitude must be within ±90 and longitude within ±180.");
    }
    const result = await this.session.request("post", "/main/location/update/", {
      body: { location_latitude: latitude, location_longitude: longitude },
      schema: successSchema,
    });
    return result.success;
  }

  // --- social -------------------------------------------------------------

  friendship(phoneNumber: PhoneInput): Promise<Friendship> {
    return this.session.request("get", "/main/contacts/friendship/", {
      query: { phone_number: parsePhoneNumber(phoneNumber).digits },
      schema: friendshipSchema,
    });
  }

  async reportSpam(countryCode: string, spamName: string, phoneNumber: PhoneInput): Promise<boolean> {
    const result = await this.session.request("post", "/main/names/suggestion/report/", {
      body: {
        country_code: countryCode.toUpperCase().slice(0, 2),
        is_spam: true,
        is_from_v: false,
        name: spamName,
        phone_number: parsePhoneNumber(phoneNumber).value,
      },
      schema: successSchema,
    });
    return result.success;
  }

  whoDeleted(): Promise<Deleter[]> {
    return this.session.request("get", "/main/users/profile/who-deleted/", {
      schema: z.array(deleterSchema),
    });
  }

  /** Profile watchers, most frequent first. */
  async whoWatched(): Promise<Watcher[]> {
    const watchers = await this.session.request("get", "/main/users/profile/who-watched/", {
      schema: z.array(watcherSchema),
    });
    return byCountDesc(watchers);
  }

  /** Comments on the profile of `uuid`, or on your own profile. */
  async getComments(uuid?: UuidInput): Promise<Comment[]> {
    const target = uuid === undefined ? (await this.getMyProfile()).uuid : toUuid(uuid);
    const result = await this.session.request(
      "get",
      `/main/comments/list/${encodeURIComponent(target)}`,
      { schema: z.object({ comments: z.array(commentSchema) }) },
    );
    return result.comments.map((comment) => ({ ...comment, profile_uuid: target }));
  }

  getComment(commentId: number | string): Promise<Comment> {
    return this.session.request("get", `/main/comments/retrieve/${commentId}`, {
      schema: commentSchema,
    });
  }

  /** Approves a comment someone left on your profile. */
  async approveComment(commentId: number | string): Promise<boolean> {
    const status = await this.session.request("post", `/main/comments/approve/${commentId}/`, {
      schema: commentStatusReplySchema,
    });
    return status === "approved";
  }

  /** Ignores and hides a comment someone left on your profile. */
  async deleteComment(commentId: number | string): Promise<boolean> {
    const status = await this.session.request("delete", `/main/comments/approve/${commentId}/`, {
      schema: commentStatusReplySchema,
    });
    return status === "ignored";
  }

  async likeComment(commentId: number | string): Promise<boolean> {
    const result = await this.session.request("post", `/main/comments/like/${commentId}/`, {
      schema: successSchema,
    });
    return result.success;
  }

  async unlikeComment(commentId: number | string): Promise<boolean> {
    const result = await this.session.request("delete", `/main/comments/like/${commentId}/`, {
      schema: successSchema,
    });
    return result.success;
  }

  /**
   * Publishes (or replaces) your comment on another profile. It stays
   * `waiting` until the profile owner approves it.
   */
  async publishComment(uuid: UuidInput, message: string): Promise<Comment> {
    const text = message.trim();
    if (!text) {
      throw new ValidationError("Comment message is empty.");
    }
    const target = toUuid(uuid);
    const comment = await this.session.request(
      "post",
      `/main/comments/add/${encodeURIComponent(target)}/`,
      { body: { message: text }, schema: commentSchema },
    );
    return { ...comment, profile_uuid: comment.profile_uuid ?? target };
  }

  /** The names other people saved you under, biggest group first. */
  async getGroups(): Promise<Group[]> {
    const result = await this.session.request("get", "/main/names/groups/", {
      schema: z.object({ groups: z.array(groupSchema) }),
    });
    return byCountDesc(result.groups);
  }

  /** Users from the name groups that are in your contact book. */
  async getSavedContacts(): Promise<User[]> {
    return this.groupUsers(true);
  }

  async getUnsavedContacts(): Promise<User[]> {
    return this.groupUsers(false);
  }

  private async groupUsers(inContactList: boolean): Promise<User[]> {
    const groups = await this.getGroups();
    const users: User[] = [];
    for (const group of groups) {
      for (const contact of group.contacts) {
        if (contact.user && Boolean(contact.in_contact_list) === inContactList) {
          users.push(contact.user);
        }
      }
    }
    return users;
  }

  async getDeletedNames(): Promise<HiddenName[]> {
    const result = await this.session.request("get", "/main/settings/hidden-names/", {
      schema: z.object({ names: z.array(hiddenNameSchema).default([]) }),
    });
    return result.names;
  }

  async deleteName(contactIds: number | string | Array<number | string>): Promise<boolean> {
    const result = await this.session.request("post", "/main/contacts/hide/", {
      body: { contact_ids: toContactIds(contactIds) },
      schema: successSchema,
    });
    return result.success;
  }

  async restoreName(contactIds: number | string | Array<number | string>): Promise<boolean> {
    const result = await this.session.request("post", "/main/settings/hidden-names/", {
      body: { contact_ids: toContactIds(contactIds) },
      schema: successSchema,
    });
    return result.success;
  }

  /** Suggests a new name to everyone in the group; `null` asks to drop it. */
  async askGroupRename(
    contactIds: number | string | Array<number | string>,
    newName: string | null = null,
  ): Promise<boolean> {
    const result = await this.session.request("post", "/main/names/suggestion/", {
      body: { contact_ids: toContactIds(contactIds), name: newName },
      schema: successSchema,
    });
    return result.success;
  }

  async getSocials(uuid?: UuidInput): Promise<Social> {
    if (uuid !== undefined) {
      return (await this.getProfile(uuid)).social ?? {};
    }
    return this.session.request("post", "/main/social/update/", { schema: socialSchema });
  }

  /**
   * Links social networks. Token networks take the OAuth code of the
   * vendor's app, url networks a profile url on the network's domain.
   */
  async addSocial(links: SocialLinks): Promise<{ success: boolean; failed: SocialNetworkName[] }> {
    const tokens = TOKEN_SOCIALS.filter((name) => links[name]);
    const urls = URL_SOCIALS.filter((name) => links[name]);
    if (tokens.length + urls.length === 0) {
      throw new ValidationError("Provide at least one social network to add.");
    }
    for (const name of urls) {
      const url = links[name] ?? "";
      if (!new RegExp(`^https?://[^\\s]*${name}[^\\s]*$`, "i").test(url)) {
        throw new ValidationError(`Provide a valid link to the ${name} profile.`);
      }
    }

    const failed: SocialNetworkName[] = [];
    for (const name of tokens) {
      const result = await this.session.request("post", "/main/social/save-auth-token/", {
        body: { social_name: name, code_first: links[name] },
        schema: successSchema,
      });
      if (!result.success) failed.push(name);
    }
    for (const name of urls) {
      const result = await this.session.request("post", "/main/social/update-url/", {
        body: { social_name: name, profile_id: links[name] },
        schema: socialSchema,
      });
      if (result[name]?.profile_id !== links[name]) failed.push(name);
    }
    return { success: failed.length === 0, failed };
  }

  async removeSocial(names: SocialNetworkName[]): Promise<{ success: boolean; failed: SocialNetworkName[] }> {
    const unique = [...new Set(names)];
    if (unique.length === 0) {
      throw new ValidationError("Provide at least one social network to remove.");
    }
    const failed: SocialNetworkName[] = [];
    for (const name of unique) {
      const result = await this.session.request("post", "/main/social/delete/", {
        body: { social_name: name },
        schema: successSchema,
      });
      if (!result.success) failed.push(name);
    }
    return { success: failed.length === 0, failed };
  }

  /**
   * Shows (`true`) or hides (`false`) linked networks. Networks already in
   * the requested state are left alone; unlinked ones fail.
   */
  async switchSocialStatus(
    changes: Partial<Record<SocialNetworkName, boolean>>,
  ): Promise<{ success: boolean; failed: SocialNetworkName[] }> {
    const entries = Object.entries(changes).filter(
      (entry): entry is [SocialNetworkName, boolean] => typeof entry[1] === "boolean",
    );
    if (entries.length === 0) {
      throw new ValidationError("Provide at least one social network to switch.");
    }

    const current = await this.getSocials();
    const failed: SocialNetworkName[] = [];
    for (const [name, show] of entries) {
      const network = current[name];
      if (!network?.is_active) {
        failed.push(name);
        continue;
      }
      if (network.is_hidden !== show) continue;
      const result = await this.session.request("post", "/main/social/hide/", {
        body: { social_name: name },
        schema: hiddenSchema,
      });
      if (result.is_hidden === show) failed.push(name);
    }
    return { success: failed.length === 0, failed };
  }

  async numbersCount(): Promise<number> {
    const result = await this.session.request("get", "/main/contacts/count/", {
      schema: countSchema,
    });
    return result.count;
  }

  suggestTurnOnComments(uuid: UuidInput): Promise<boolean> {
    return this.suggest("comments", uuid);
  }

  suggestTurnOnMutual(uuid: UuidInput): Promise<boolean> {
    return this.suggest("mutual", uuid);
  }

  suggestTurnOnLocation(uuid: UuidInput): Promise<boolean> {
    return this.suggest("location", uuid);
  }

  private async suggest(feature: "comments" | "mutual" | "location", uuid: UuidInput): Promise<boolean> {
    const result = await this.session.request(
      "post",
      `/main/users/profile/suggest-turn-on-${feature}/`,
      { body: { uuid: toUuid(uuid) }, schema: requestedSchema },
    );
    return result.requested;
  }

  /** How many users suggested the number as spam; 0 when unknown. */
  async isSpammer(phoneNumber: PhoneInput): Promise<number> {
    const contact = await this.phoneSearch(phoneNumber);
    return contact?.suggested_as_spam ?? 0;
  }

  async getAge(uuid?: UuidInput, today: Date = new Date()): Promise<number> {
    const profile = uuid === undefined ? await this.getMyProfile() : await this.getProfile(uuid);
    return ageOn(profile.date_of_birth, today);
  }

  async shareLocation(uuid: UuidInput): Promise<boolean> {
    const result = await this.session.request(
      "post",
      `/main/users/profile/share-location/${encodeURIComponent(toUuid(uuid))}/`,
      { schema: successSchema },
    );
    return result.success;
  }

  /** Stops receiving the locations `uuids` share with you. */
  async stopSharingLocation(uuids: string | string[]): Promise<boolean> {
    const result = await this.session.request(
      "post",
      "/main/users/profile/share-location/stop-for-me/",
      { body: { uuids: toUuidList(uuids) }, schema: successSchema },
    );
    return result.success;
  }

  /** Stops sharing your location with `uuids`. */
  async stopSharedLocation(uuids: string | string[]): Promise<boolean> {
    const result = await this.session.request("post", "/main/users/profile/share-location/stop/", {
      body: { uuids: toUuidList(uuids) },
      schema: successSchema,
    });
    return result.success;
  }

  locationsSharedByMe(): Promise<User[]> {
    return this.session.request("get", "/main/users/profile/share-location/", {
      schema: z.array(userSchema),
    });
  }

  locationsSharedWithMe(): Promise<SharedWithMe> {
    return this.session.request("get", "/main/users/profile/share-location/for-me/", {
      schema: sharedWithMeSchema,
    });
  }

  // --- settings & notifications --------------------------------------------

  getSettings(): Promise<Settings> {
    return this.session.request("get", "/main/settings/", { schema: settingsSchema });
  }

  async changeSettings(change: SettingsChange): Promise<UpdateResult<Settings>> {
    const body = validateSettingsChange(change);
    const settings = await this.session.request("patch", "/main/settings/", {
      body,
      schema: settingsSchema,
    });
    const failed = diffApplied(body, settings);
    return { success: failed.length === 0, failed, value: settings };
  }

  async unreadNotificationsCount(): Promise<number> {
    const result = await this.session.request("get", "/notification/notification/count/", {
      schema: countSchema,
    });
    return result.count;
  }

  getNotifications(page = 1, pageSize = 20): Promise<NotificationPage> {
    if (!Number.isInteger(page) || page < 1 || !Number.isInteger(pageSize) || pageSize < 1) {
      throw new ValidationError("page and pageSize must be positive integers.");
    }
    return this.session.request("get", "/notification/notification/items/", {
      query: { page_number: page, page_size: pageSize },
      schema: notificationPageSchema,
    });
  }

  async readNotification(notificationId: number | string): Promise<boolean> {
    const result = await this.session.request("post", "/notification/notification/read/", {
      body: { notification_id: Number(notificationId) },
      schema: successSchema,
    });
    return result.success;
  }
}

/**
 * Builds a client from the environment; explicit options win. Tokens in
 * `MECALLER_ACCESS_TOKEN`/`MECALLER_REFRESH_TOKEN` are used when no
 * credentials are passed.
 */
export function createClient(options: SessionOptions = {}): MeClient {
  const config = resolveConfig();
  const envCredentials =
    config.accessToken && config.refreshToken
      ? { access: config.accessToken, refresh: config.refreshToken }
      : null;
  return new MeClient({
    baseUrl: config.baseUrl,
    timeoutMs: config.timeoutMs,
    ...options,
    credentials: options.credentials ?? envCredentials,
  });
}

export async function loginWithStoredCredentials(
  profileName: string,
  options: SessionOptions = {},
): Promise<MeClient> {
  const stored = await loadCredentials(profileName);
  if (!stored) {
    throw new AuthError(`Profile "${profileName}" has no credentials. Run: auth login <phone>`);
  }

  return createClient({
    ...options,
    phoneNumber: stored.phoneNumber,
    credentials: { access: stored.access, refresh: stored.refresh, pwdToken: stored.pwdToken },
    credentialsManager: new ProfileCredentialsManager(profileName),
  });
}

/** Saves a pre-provisioned token pair into a profile and returns a client for it. */
export async function loginWithTokens(
  profileName: string,
  phoneNumber: PhoneInput,
  tokens: TokenPair,
  options: SessionOptions = {},
): Promise<MeClient> {
  const phone = parsePhoneNumber(phoneNumber);
  const manager = new ProfileCredentialsManager(profileName);
  const client = createClient({
    ...options,
    phoneNumber: phone,
    credentials: tokens,
    credentialsManager: manager,
  });
  await manager.set(phone.digits, tokens);
  return client;
}

/** A client whose verified tokens are saved into `profileName`. */
export function createProfileClient(profileName: string, options: SessionOptions = {}): MeClient {
  return createClient({
    ...options,
    credentialsManager: new ProfileCredentialsManager(profileName),
  });
}

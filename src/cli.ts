#!/usr/bin/env node
import { createRequire } from "node:module";
import fs from "node:fs/promises";
import path from "node:path";
import readline from "node:readline/promises";
import util from "node:util";
import { Command } from "commander";
import { z } from "zod";

const require = createRequire(import.meta.url);
const { version: PKG_VERSION } = z
  .object({ version: z.string() })
  .parse(require("../package.json"));
import {
  APP_HOME,
  PROFILES_FILE,
  addProfile,
  clearCredentials,
  ensureProfile,
  getCredentialsPath,
  listProfiles,
  loadCredentials,
  removeProfile,
  resolveProfileName,
  setDefaultProfile,
  setProfileLabel,
} from "./lib/store.js";
import {
  createProfileClient,
  loginWithStoredCredentials,
  loginWithTokens,
  type MeClient,
  type SocialLinks,
} from "./lib/client.js";
import { ValidationError } from "./lib/errors.js";
import { SOCIAL_NETWORKS, type SocialNetworkName } from "./lib/models.js";
import type { ProfileUpdate, SettingsChange } from "./lib/validation.js";

const program = new Command();

const PROFILE_FIELDS = [
  "first_name",
  "last_name",
  "email",
  "gender",
  "slogan",
  "profile_picture",
  "date_of_birth",
  "location_name",
  "carrier",
  "country_code",
] as const;

const BOOLEAN_SETTINGS = [
  "mutual_contacts_available",
  "who_watched_enabled",
  "who_deleted_enabled",
  "comments_enabled",
  "location_enabled",
  "who_deleted_notification_enabled",
  "who_watched_notification_enabled",
  "distance_notification_enabled",
  "system_notification_enabled",
  "birthday_notification_enabled",
  "comments_notification_enabled",
  "names_notification_enabled",
  "notifications_enabled",
] as const;

const phoneField = z.union([z.string(), z.number()]).nullish();

const contactsFileSchema = z.array(
  z.object({
    name: z.string().nullish(),
    phone_number: phoneField,
    date_of_birth: z.string().nullish(),
    country_code: z.string().nullish(),
  }),
);

const callsFileSchema = z.array(
  z.object({
    name: z.string().nullish(),
    phone_number: phoneField,
    type: z.string().nullish(),
    called_at: z.string().nullish(),
    duration: z.number().nullish(),
    tag: z.string().nullish(),
  }),
);

const tokenFileSchema = z.object({
  access: z.string().min(1),
  refresh: z.string().min(1),
  pwd_token: z.string().nullish(),
});

function wrapAction<T extends unknown[]>(
  handler: (...args: T) => Promise<void>,
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await handler(...args);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Error: ${message}`);
      process.exitCode = 1;
    }
  };
}

function output(value: unknown, asJson = false): void {
  if (asJson) {
    console.log(JSON.stringify(value, null, 2));
    return;
  }

  if (Array.isArray(value)) {
    if (value.length === 0) {
      console.log("(empty)");
      return;
    }

    const head: unknown = value[0];
    if (head && typeof head === "object" && !Array.isArray(head)) {
      console.table(value);
      return;
    }
  }

  if (value && typeof value === "object") {
    console.log(util.inspect(value, { colors: false, depth: 6 }));
    return;
  }

  console.log(String(value));
}

function collectValues(value: string, previous: string[]): string[] {
  previous.push(value);
  return previous;
}

function parseNumberArg(value: string, label: string): number {
  const numeric = Number(value);
  if (!Number.isFinite(numeric)) {
    throw new ValidationError(`${label} must be a number.`);
  }
  return numeric;
}

function parsePositiveInt(value: string, label: string): number {
  const numeric = parseNumberArg(value, label);
  if (!Number.isInteger(numeric) || numeric < 1) {
    throw new ValidationError(`${label} must be a positive integer.`);
  }
  return numeric;
}

function parseSwitch(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (["on", "true", "yes", "1"].includes(normalized)) return true;
  if (["off", "false", "no", "0"].includes(normalized)) return false;
  throw new ValidationError(`Expected on/off, got "${value}".`);
}

function parseSocialNames(values: string[]): SocialNetworkName[] {
  return values.map((value) => {
    const name = SOCIAL_NETWORKS.find((item) => item === value.trim().toLowerCase());
    if (!name) {
      throw new ValidationError(
        `Unknown social network "${value}". Use one of: ${SOCIAL_NETWORKS.join(", ")}.`,
      );
    }
    return name;
  });
}

async function readJsonArg(file: string): Promise<unknown> {
  const resolved = path.resolve(file);
  const raw = await fs.readFile(resolved, "utf8");
  try {
    return JSON.parse(raw);
  } catch {
    throw new ValidationError(`Invalid JSON in ${resolved}`);
  }
}

async function parseFile<T>(file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  const parsed = schema.safeParse(await readJsonArg(file));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(
      `Unexpected content in ${file}: ${issue ? `${issue.path.join(".") || "(root)"} ${issue.message}` : "invalid shape"}`,
    );
  }
  return parsed.data;
}

async function promptCode(): Promise<string> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    return (await rl.question("Verification code: ")).trim();
  } finally {
    rl.close();
  }
}

async function currentProfile(_command?: Command): Promise<string> {
  const opts = program.opts<{ profile?: string }>();
  return resolveProfileName(opts.profile);
}

async function requireClient(command?: Command): Promise<{ profile: string; client: MeClient }> {
  const profile = await currentProfile(command);
  const client = await loginWithStoredCredentials(profile);
  return { profile, client };
}

function displayName(profile: { first_name?: string | null; last_name?: string | null }): string {
  return [profile.first_name, profile.last_name].filter(Boolean).join(" ");
}

program
  .name("mecaller")
  .description("Command-line client for the Me caller-ID API")
  .version(PKG_VERSION)
  .option("-p, --profile <name>", "Profile name")
  .showHelpAfterError();

const account = program.command("account").description("Multi-account profile management");

account
  .command("list")
  .alias("ls")
  .alias("l")
  .option("-j, --json", "JSON output")
  .description("List all account profiles")
  .action(
    wrapAction(async (opts: { json?: boolean }) => {
      const db = await listProfiles();
      const active = await resolveProfileName();

      const rows = await Promise.all(
        Object.entries(db.profiles).map(async ([name, meta]) => ({
          name,
          label: meta.label ?? "",
          phone: meta.phoneNumber ?? "",
          default: name === db.defaultProfile,
          active: name === active,
          loggedIn: Boolean(await loadCredentials(name)),
          updatedAt: meta.updatedAt,
        })),
      );

      output(rows, opts.json);
    }),
  );

account
  .command("current")
  .alias("whoami")
  .description("Show current active profile")
  .action(
    wrapAction(async (_opts: unknown, command: Command) => {
      console.log(await currentProfile(command));
    }),
  );

account
  .command("switch <name>")
  .alias("use")
  .description("Set default profile")
  .action(
    wrapAction(async (name: string) => {
      await setDefaultProfile(name);
      console.log(`Default profile set to: ${name}`);
    }),
  );

account
  .command("add [name]")
  .alias("new")
  .description("Create a new profile")
  .action(
    wrapAction(async (name = "default") => {
      await addProfile(name);
      console.log(`Profile created: ${name}`);
      console.log(`Next step: mecaller --profile ${name} auth login <phone>`);
    }),
  );

account
  .command("label <name> <label>")
  .description("Set label for profile")
  .action(
    wrapAction(async (name: string, label: string) => {
      await setProfileLabel(name, label);
      console.log(`Updated label for ${name}`);
    }),
  );

account
  .command("remove <name>")
  .alias("rm")
  .description("Remove profile and its saved credentials")
  .action(
    wrapAction(async (name: string) => {
      await removeProfile(name);
      console.log(`Removed profile: ${name}`);
    }),
  );

const auth = program.command("auth").description("Phone verification and saved tokens");

auth
  .command("login <phone>")
  .option("--call", "Receive the code by phone call instead of SMS")
  .option("--code <code>", "Verification code, skips the prompt")
  .description("Request a verification code and exchange it for tokens")
  .action(
    wrapAction(async (phone: string, opts: { call?: boolean; code?: string }, command: Command) => {
      const profile = await currentProfile(command);
      await ensureProfile(profile);

      const client = createProfileClient(profile);
      const challengeId = await client.authenticate(phone, opts.call ? "call" : "sms");
      const code = opts.code ?? (await promptCode());
      await client.verify(challengeId, code);

      const me = await client.getMyProfile();
      console.log(`Logged in profile ${profile} as ${displayName(me) || me.uuid} (${me.uuid})`);
    }),
  );

auth
  .command("request <phone>")
  .option("--call", "Receive the code by phone call instead of SMS")
  .option("-j, --json", "JSON output")
  .description("Request a verification code; finish with auth verify")
  .action(
    wrapAction(async (phone: string, opts: { call?: boolean; json?: boolean }, command: Command) => {
      const profile = await currentProfile(command);
      const client = createProfileClient(profile);
      const challengeId = await client.authenticate(phone, opts.call ? "call" : "sms");
      if (opts.json) {
        output({ profile, challengeId }, true);
        return;
      }
      console.log(`Challenge: ${challengeId}`);
      console.log(`Next step: mecaller auth verify ${phone} ${challengeId} <code>`);
    }),
  );

auth
  .command("verify <phone> <challengeId> <code>")
  .description("Exchange a verification code for tokens")
  .action(
    wrapAction(async (phone: string, challengeId: string, code: string, _opts: unknown, command: Command) => {
      const profile = await currentProfile(command);
      await ensureProfile(profile);
      const client = createProfileClient(profile);
      client.session.resumeChallenge(challengeId, phone);
      await client.verify(challengeId, code);
      console.log(`Verified. Tokens saved to profile ${profile}`);
    }),
  );

auth
  .command("token <phone> [file]")
  .option("--access <token>", "Access token")
  .option("--refresh <token>", "Refresh token")
  .description("Save an existing token pair (flags or JSON file) into the profile")
  .action(
    wrapAction(
      async (
        phone: string,
        file: string | undefined,
        opts: { access?: string; refresh?: string },
        command: Command,
      ) => {
        const profile = await currentProfile(command);
        const tokens = file
          ? await parseFile(file, tokenFileSchema)
          : tokenFileSchema.parse({ access: opts.access, refresh: opts.refresh });
        await loginWithTokens(profile, phone, {
          access: tokens.access,
          refresh: tokens.refresh,
          pwdToken: tokens.pwd_token ?? undefined,
        });
        console.log(`Saved tokens for ${phone} to profile ${profile}`);
      },
    ),
  );

auth
  .command("refresh")
  .description("Trade the refresh token for a new access token")
  .action(
    wrapAction(async (_opts: unknown, command: Command) => {
      const { profile, client } = await requireClient(command);
      await client.session.refresh();
      console.log(`Access token refreshed for profile ${profile}`);
    }),
  );

auth
  .command("logout")
  .description("Remove saved credentials from active profile")
  .action(
    wrapAction(async (_opts: unknown, command: Command) => {
      const profile = await currentProfile(command);
      await clearCredentials(profile);
      console.log(`Logged out profile ${profile}`);
    }),
  );

auth
  .command("status")
  .option("-j, --json", "JSON output")
  .description("Show login status")
  .action(
    wrapAction(async (opts: { json?: boolean }, command: Command) => {
      const profile = await currentProfile(command);
      const credentials = await loadCredentials(profile);
      if (!credentials) {
        console.log(`Profile ${profile}: not logged in`);
        return;
      }

      const { client } = await requireClient(command);
      const me = await client.getMyProfile();
      output(
        {
          profile,
          loggedIn: true,
          phoneNumber: credentials.phoneNumber,
          uuid: me.uuid,
          name: displayName(me),
          appHome: APP_HOME,
          profilesFile: PROFILES_FILE,
          credentialsPath: getCredentialsPath(profile),
          updatedAt: credentials.updatedAt,
        },
        opts.json,
      );
    }),
  );

program
  .command("search <phone>")
  .alias("find")
  .option("-j, --json", "JSON output")
  .description("Look up who a phone number belongs to")
  .action(
    wrapAction(async (phone: string, opts: { json?: boolean }, command: Command) => {
      const { client } = await requireClient(command);
      const contact = await client.phoneSearch(phone);
      if (!contact) {
        console.log(`No results for ${phone}`);
        return;
      }
      if (opts.json) {
        output(contact, true);
        return;
      }
      output({
        name: contact.name,
        phone: contact.phone_number,
        uuid: contact.user?.uuid ?? null,
        spamReports: contact.suggested_as_spam,
        userType: contact.user_type ?? null,
      });
    }),
  );

const profileCmd = program.command("profile").description("Profiles and account actions");

profileCmd
  .command("me")
  .option("-j, --json", "JSON output")
  .description("Show your own profile")
  .action(
    wrapAction(async (opts: { json?: boolean }, command: Command) => {
      const { client } = await requireClient(command);
      output(await client.getMyProfile(), opts.json);
    }),
  );

profileCmd
  .command("get <uuid>")
  .option("-j, --json", "JSON output")
  .description("Show another user's profile")
  .action(
    wrapAction(async (uuid: string, opts: { json?: boolean }, command: Command) => {
      const { client } = await requireClient(command);
      output(await client.getProfile(uuid), opts.json);
    }),
  );

profileCmd
  .command("uuid [phone]")
  .description("Print the uuid of a phone number, or your own")
  .action(
    wrapAction(async (phone: string | undefined, _opts: unknown, command: Command) => {
      const { client } = await requireClient(command);
      const uuid = await client.getUuid(phone);
      console.log(uuid ?? "(not found)");
    }),
  );

profileCmd
  .command("update")
  .option("--first-name <value>", "First name")
  .option("--last-name <value>", "Last name")
  .option("--email <value>", "Email address")
  .option("--gender <value>", "M or F")
  .option("--slogan <value>", "Profile slogan")
  .option("--picture <url>", "Profile picture url")
  .option("--birthday <date>", "Date of birth (YYYY-MM-DD)")
  .option("--location-name <value>", "Location name")
  .option("--carrier <value>", "Carrier name")
  .option("--country-code <code>", "Two-letter country code")
  .option("--clear <field>", "Clear a field (repeatable)", collectValues, [])
  .option("-j, --json", "JSON output")
  .description("Update your own profile")
  .action(
    wrapAction(
      async (
        opts: {
          firstName?: string;
          lastName?: string;
          email?: string;
          gender?: string;
          slogan?: string;
          picture?: string;
          birthday?: string;
          locationName?: string;
          carrier?: string;
          countryCode?: string;
          clear: string[];
          json?: boolean;
        },
        command: Command,
      ) => {
        const update: ProfileUpdate = {
          first_name: opts.firstName,
          last_name: opts.lastName,
          email: opts.email,
          gender: opts.gender,
          slogan: opts.slogan,
          profile_picture: opts.picture,
          date_of_birth: opts.birthday,
          location_name: opts.locationName,
          carrier: opts.carrier,
          country_code: opts.countryCode,
        };
        for (const value of opts.clear) {
          const field = PROFILE_FIELDS.find((item) => item === value.trim());
          if (!field) {
            throw new ValidationError(
              `Cannot clear "${value}". Use one of: ${PROFILE_FIELDS.join(", ")}.`,
            );
          }
          update[field] = null;
        }

        const { client } = await requireClient(command);
        const result = await client.updateProfile(update);
        if (opts.json) {
          output(result, true);
          return;
        }
        console.log(
          result.success ? "Profile updated" : `Not applied: ${result.failed.join(", ")}`,
        );
      },
    ),
  );

profileCmd
  .command("age [uuid]")
  .description("Age in years from the profile's birthday")
  .action(
    wrapAction(async (uuid: string | undefined, _opts: unknown, command: Command) => {
      const { client } = await requireClient(command);
      console.log(await client.getAge(uuid));
    }),
  );

profileCmd
  .command("friendship <phone>")
  .option("-j, --json", "JSON output")
  .description("Call and naming stats between you and a number")
  .action(
    wrapAction(async (phone: string, opts: { json?: boolean }, command: Command) => {
      const { client } = await requireClient(command);
      output(await client.friendship(phone), opts.json);
    }),
  );

profileCmd
  .command("watchers")
  .option("-j, --json", "JSON output")
  .description("Who viewed your profile, most frequent first")
  .action(
    wrapAction(async (opts: { json?: boolean }, command: Command) => {
      const { client } = await requireClient(command);
      const watchers = await client.whoWatched();
      if (opts.json) {
        output(watchers, true);
        return;
      }
      output(
        watchers.map((item) => ({
          uuid: item.user.uuid,
          name: displayName(item.user),
          count: item.count,
          lastView: item.last_view ?? "",
        })),
      );
    }),
  );

profileCmd
  .command("deleters")
  .option("-j, --json", "JSON output")
  .description("Who deleted you from their contacts")
  .action(
    wrapAction(async (opts: { json?: boolean }, command: Command) => {
      const { client } = await requireClient(command);
      const deleters = await client.whoDeleted();
      if (opts.json) {
        output(deleters, true);
        return;
      }
      output(
        deleters.map((item) => ({
          uuid: item.user.uuid,
          name: displayName(item.user),
          deletedAt: item.created_at ?? "",
        })),
      );
    }),
  );

profileCmd
  .command("spam <phone>")
  .description("How many users reported a number as spam")
  .action(
    wrapAction(async (phone: string, _opts: unknown, command: Command) => {
      const { client } = await requireClient(command);
      console.log(await client.isSpammer(phone));
    }),
  );

profileCmd
  .command("report-spam <countryCode> <name> <phone>")
  .description("Report a number as spam under a name")
  .action(
    wrapAction(async (countryCode: string, name: string, phone: string, _opts: unknown, command: Command) => {
      const { client } = await requireClient(command);
      console.log((await client.reportSpam(countryCode, name, phone)) ? "Reported" : "Not reported");
    }),
  );

profileCmd
  .command("suggest <feature> <uuid>")
  .description("Ask a user to turn on comments, mutual or location")
  .action(
    wrapAction(async (feature: string, uuid: string, _opts: unknown, command: Command) => {
      const { client } = await requireClient(command);
      let requested: boolean;
      switch (feature) {
        case "comments":
          requested = await client.suggestTurnOnComments(uuid);
          break;
        case "mutual":
          requested = await client.suggestTurnOnMutual(uuid);
          break;
        case "location":
          requested = await client.suggestTurnOnLocation(uuid);
          break;
        default:
          throw new ValidationError("Feature must be comments, mutual or location.");
      }
      console.log(requested ? "Suggestion sent" : "Suggestion not sent");
    }),
  );

profileCmd
  .command("location <latitude> <longitude>")
  .description("Update your location")
  .action(
    wrapAction(async (latitude: string, longitude: string, _opts: unknown, command: Command) => {
      const { client } = await requireClient(command);
      const updated = await client.updateLocation(
        parseNumberArg(latitude, "latitude"),
        parseNumberArg(longitude, "longitude"),
      );
      console.log(updated ? "Location updated" : "Location not updated");
    }),
  );

profileCmd
  .command("suspend")
  .option("--yes", "Confirm")
  .description("Suspend your account until the next login")
  .action(
    wrapAction(async (opts: { yes?: boolean }, command: Command) => {
      if (!opts.yes) throw new ValidationError("Pass --yes to suspend the account.");
      const { profile, client } = await requireClient(command);
      const suspended = await client.suspendAccount();
      if (suspended) await clearCredentials(profile);
      console.log(suspended ? "Account suspended" : "Account not suspended");
    }),
  );

profileCmd
  .command("delete-account")
  .option("--yes", "Confirm")
  .description("Delete your account and all its data")
  .action(
    wrapAction(async (opts: { yes?: boolean }, command: Command) => {
      if (!opts.yes) throw new ValidationError("Pass --yes to delete the account.");
      const { profile, client } = await requireClient(command);
      const deleted = await client.deleteAccount();
      if (deleted) await clearCredentials(profile);
      console.log(deleted ? "Account deleted" : "Account not deleted");
    }),
  );

const comments = program.command("comments").alias("comment").description("Profile comments");

comments
  .command("list [uuid]")
  .alias("ls")
  .option("-j, --json", "JSON output")
  .description("Comments on a profile, or on yours")
  .action(
    wrapAction(async (uuid: string | undefined, opts: { json?: boolean }, command: Command) => {
      const { client } = await requireClient(command);
      const items = await client.getComments(uuid);
      if (opts.json) {
        output(items, true);
        return;
      }
      output(
        items.map((item) => ({
          id: item.id,
          author: item.author ? displayName(item.author) : "",
          status: item.status ?? "",
          likes: item.like_count,
          message: item.message,
        })),
      );
    }),
  );

comments
  .command("get <commentId>")
  .option("-j, --json", "JSON output")
  .description("Show a comment")
  .action(
    wrapAction(async (commentId: string, opts: { json?: boolean }, command: Command) => {
      const { client } = await requireClient(command);
      output(await client.getComment(parsePositiveInt(commentId, "commentId")), opts.json);
    }),
  );

comments
  .command("publish <uuid> <message>")
  .alias("add")
  .option("-j, --json", "JSON output")
  .description("Publish a comment on a profile")
  .action(
    wrapAction(async (uuid: string, message: string, opts: { json?: boolean }, command: Command) => {
      const { client } = await requireClient(command);
      const comment = await client.publishComment(uuid, message);
      if (opts.json) {
        output(comment, true);
        return;
      }
      console.log(`Comment ${comment.id} is ${comment.status ?? "waiting"}`);
    }),
  );

for (const [name, description, run] of [
  ["approve", "Approve a comment on your profile", (c: MeClient, id: number) => c.approveComment(id)],
  ["delete", "Ignore a comment on your profile", (c: MeClient, id: number) => c.deleteComment(id)],
  ["like", "Like a comment", (c: MeClient, id: number) => c.likeComment(id)],
  ["unlike", "Remove your like from a comment", (c: MeClient, id: number) => c.unlikeComment(id)],
] as const) {
  comments
    .command(`${name} <commentId>`)
    .description(description)
    .action(
      wrapAction(async (commentId: string, _opts: unknown, command: Command) => {
        const { client } = await requireClient(command);
        const done = await run(client, parsePositiveInt(commentId, "commentId"));
        console.log(done ? `${name}: ok` : `${name}: rejected`);
      }),
    );
}

const social = program.command("social").description("Linked social networks");

social
  .command("list [uuid]")
  .alias("ls")
  .option("-j, --json", "JSON output")
  .description("Linked networks of a profile, or yours")
  .action(
    wrapAction(async (uuid: string | undefined, opts: { json?: boolean }, command: Command) => {
      const { client } = await requireClient(command);
      const socials = await client.getSocials(uuid);
      if (opts.json) {
        output(socials, true);
        return;
      }
      output(
        Object.entries(socials).map(([name, network]) => ({
          name,
          active: network?.is_active ?? false,
          hidden: network?.is_hidden ?? true,
          profile: network?.profile_id ?? "",
          posts: network?.posts.length ?? 0,
        })),
      );
    }),
  );

social
  .command("add")
  .option("--twitter <code>", "Twitter auth code")
  .option("--spotify <code>", "Spotify auth code")
  .option("--instagram <code>", "Instagram auth code")
  .option("--facebook <code>", "Facebook auth code")
  .option("--tiktok <code>", "TikTok auth code")
  .option("--pinterest <url>", "Pinterest profile url")
  .option("--linkedin <url>", "LinkedIn profile url")
  .description("Link social networks")
  .action(
    wrapAction(async (opts: SocialLinks, command: Command) => {
      const { client } = await requireClient(command);
      const result = await client.addSocial(opts);
      console.log(result.success ? "Linked" : `Not linked: ${result.failed.join(", ")}`);
    }),
  );

social
  .command("remove <networks...>")
  .alias("rm")
  .description("Unlink social networks")
  .action(
    wrapAction(async (networks: string[], _opts: unknown, command: Command) => {
      const { client } = await requireClient(command);
      const result = await client.removeSocial(parseSocialNames(networks));
      console.log(result.success ? "Removed" : `Not removed: ${result.failed.join(", ")}`);
    }),
  );

for (const [name, show] of [
  ["show", true],
  ["hide", false],
] as const) {
  social
    .command(`${name} <networks...>`)
    .description(`${show ? "Show" : "Hide"} linked networks on your profile`)
    .action(
      wrapAction(async (networks: string[], _opts: unknown, command: Command) => {
        const { client } = await requireClient(command);
        const changes: Partial<Record<SocialNetworkName, boolean>> = {};
        for (const network of parseSocialNames(networks)) changes[network] = show;
        const result = await client.switchSocialStatus(changes);
        console.log(result.success ? "Updated" : `Not updated: ${result.failed.join(", ")}`);
      }),
    );
}

const groups = program.command("groups").description("Names other people saved you under");

groups
  .command("list")
  .alias("ls")
  .option("-j, --json", "JSON output")
  .description("Name groups, biggest first")
  .action(
    wrapAction(async (opts: { json?: boolean }, command: Command) => {
      const { client } = await requireClient(command);
      const items = await client.getGroups();
      if (opts.json) {
        output(items, true);
        return;
      }
      output(
        items.map((item) => ({
          name: item.name,
          count: item.count,
          contactIds: item.contact_ids.join(","),
        })),
      );
    }),
  );

for (const [name, saved] of [
  ["saved", true],
  ["unsaved", false],
] as const) {
  groups
    .command(name)
    .option("-j, --json", "JSON output")
    .description(`Users from the groups that are ${saved ? "" : "not "}in your contacts`)
    .action(
      wrapAction(async (opts: { json?: boolean }, command: Command) => {
        const { client } = await requireClient(command);
        const users = saved ? await client.getSavedContacts() : await client.getUnsavedContacts();
        output(
          opts.json ? users : users.map((user) => ({ uuid: user.uuid, name: displayName(user) })),
          opts.json,
        );
      }),
    );
}

groups
  .command("rename <contactIds...>")
  .option("--name <name>", "Suggested name; omit to ask for removal")
  .description("Suggest a new name for a group")
  .action(
    wrapAction(async (contactIds: string[], opts: { name?: string }, command: Command) => {
      const { client } = await requireClient(command);
      const asked = await client.askGroupRename(contactIds, opts.name ?? null);
      console.log(asked ? "Rename requested" : "Rename not requested");
    }),
  );

groups
  .command("hidden")
  .option("-j, --json", "JSON output")
  .description("Names you hid")
  .action(
    wrapAction(async (opts: { json?: boolean }, command: Command) => {
      const { client } = await requireClient(command);
      output(await client.getDeletedNames(), opts.json);
    }),
  );

groups
  .command("hide <contactIds...>")
  .description("Hide names from your profile")
  .action(
    wrapAction(async (contactIds: string[], _opts: unknown, command: Command) => {
      const { client } = await requireClient(command);
      console.log((await client.deleteName(contactIds)) ? "Hidden" : "Not hidden");
    }),
  );

groups
  .command("restore <contactIds...>")
  .description("Restore hidden names")
  .action(
    wrapAction(async (contactIds: string[], _opts: unknown, command: Command) => {
      const { client } = await requireClient(command);
      console.log((await client.restoreName(contactIds)) ? "Restored" : "Not restored");
    }),
  );

const contacts = program.command("contacts").description("Contact book upload");

contacts
  .command("add <file>")
  .option("-j, --json", "JSON output")
  .description("Upload contacts from a JSON array of {name, phone_number}")
  .action(
    wrapAction(async (file: string, opts: { json?: boolean }, command: Command) => {
      const items = await parseFile(file, contactsFileSchema);
      const { client } = await requireClient(command);
      const result = await client.addContacts(items);
      output(opts.json ? result : { added: result.added, updated: result.updated, failed: result.failed }, opts.json);
    }),
  );

contacts
  .command("remove <file>")
  .alias("rm")
  .option("-j, --json", "JSON output")
  .description("Remove uploaded contacts listed in a JSON file")
  .action(
    wrapAction(async (file: string, opts: { json?: boolean }, command: Command) => {
      const items = await parseFile(file, contactsFileSchema);
      const { client } = await requireClient(command);
      const result = await client.removeContacts(items);
      output(opts.json ? result : { removed: result.removed, failed: result.failed }, opts.json);
    }),
  );

contacts
  .command("count")
  .description("How many numbers the vendor holds")
  .action(
    wrapAction(async (_opts: unknown, command: Command) => {
      const { client } = await requireClient(command);
      console.log(await client.numbersCount());
    }),
  );

const calls = program.command("calls").description("Call history upload");

calls
  .command("add <file>")
  .option("-j, --json", "JSON output")
  .description("Upload calls from a JSON array of {phone_number, type}")
  .action(
    wrapAction(async (file: string, opts: { json?: boolean }, command: Command) => {
      const items = await parseFile(file, callsFileSchema);
      const { client } = await requireClient(command);
      output((await client.addCallsToLog(items)).added_list, opts.json);
    }),
  );

calls
  .command("remove <file>")
  .alias("rm")
  .option("-j, --json", "JSON output")
  .description("Remove calls listed in a JSON file")
  .action(
    wrapAction(async (file: string, opts: { json?: boolean }, command: Command) => {
      const items = await parseFile(file, callsFileSchema);
      const { client } = await requireClient(command);
      output((await client.removeCallsFromLog(items)).removed_list, opts.json);
    }),
  );

const block = program.command("block").description("Blocking");

block
  .command("profile <phone>")
  .option("--no-calls", "Do not block calls")
  .option("--no-hide", "Keep your profile visible to the number")
  .description("Block a number")
  .action(
    wrapAction(async (phone: string, opts: { calls: boolean; hide: boolean }, command: Command) => {
      const { client } = await requireClient(command);
      const done = await client.blockProfile(phone, {
        blockContact: opts.calls,
        meFullBlock: opts.hide,
      });
      console.log(done ? `Blocked ${phone}` : `Could not block ${phone}`);
    }),
  );

block
  .command("unprofile <phone>")
  .option("--keep-calls", "Keep calls blocked")
  .option("--keep-hidden", "Keep your profile hidden from the number")
  .description("Unblock a number")
  .action(
    wrapAction(
      async (phone: string, opts: { keepCalls?: boolean; keepHidden?: boolean }, command: Command) => {
        const { client } = await requireClient(command);
        const done = await client.unblockProfile(phone, {
          unblockContact: !opts.keepCalls,
          meFullUnblock: !opts.keepHidden,
        });
        console.log(done ? `Unblocked ${phone}` : `Could not unblock ${phone}`);
      },
    ),
  );

block
  .command("numbers <phones...>")
  .option("-j, --json", "JSON output")
  .description("Block several numbers")
  .action(
    wrapAction(async (phones: string[], opts: { json?: boolean }, command: Command) => {
      const { client } = await requireClient(command);
      output(await client.blockNumbers(phones), opts.json);
    }),
  );

block
  .command("unnumbers <phones...>")
  .description("Unblock several numbers")
  .action(
    wrapAction(async (phones: string[], _opts: unknown, command: Command) => {
      const { client } = await requireClient(command);
      console.log((await client.unblockNumbers(phones)) ? "Unblocked" : "Not unblocked");
    }),
  );

block
  .command("list")
  .alias("ls")
  .option("-j, --json", "JSON output")
  .description("Blocked numbers")
  .action(
    wrapAction(async (opts: { json?: boolean }, command: Command) => {
      const { client } = await requireClient(command);
      output(await client.getBlockedNumbers(), opts.json);
    }),
  );

const location = program.command("location").description("Location sharing");

location
  .command("share <uuid>")
  .description("Share your location with a user")
  .action(
    wrapAction(async (uuid: string, _opts: unknown, command: Command) => {
      const { client } = await requireClient(command);
      console.log((await client.shareLocation(uuid)) ? "Shared" : "Not shared");
    }),
  );

location
  .command("stop <uuids...>")
  .description("Stop sharing your location with users")
  .action(
    wrapAction(async (uuids: string[], _opts: unknown, command: Command) => {
      const { client } = await requireClient(command);
      console.log((await client.stopSharedLocation(uuids)) ? "Stopped" : "Not stopped");
    }),
  );

location
  .command("ignore <uuids...>")
  .description("Stop receiving locations users share with you")
  .action(
    wrapAction(async (uuids: string[], _opts: unknown, command: Command) => {
      const { client } = await requireClient(command);
      console.log((await client.stopSharingLocation(uuids)) ? "Stopped" : "Not stopped");
    }),
  );

location
  .command("by-me")
  .option("-j, --json", "JSON output")
  .description("Users you share your location with")
  .action(
    wrapAction(async (opts: { json?: boolean }, command: Command) => {
      const { client } = await requireClient(command);
      output(await client.locationsSharedByMe(), opts.json);
    }),
  );

location
  .command("with-me")
  .option("-j, --json", "JSON output")
  .description("Users sharing their location with you")
  .action(
    wrapAction(async (opts: { json?: boolean }, command: Command) => {
      const { client } = await requireClient(command);
      output(await client.locationsSharedWithMe(), opts.json);
    }),
  );

const settings = program.command("settings").description("Account settings");

settings
  .command("get")
  .option("-j, --json", "JSON output")
  .description("Show settings")
  .action(
    wrapAction(async (opts: { json?: boolean }, command: Command) => {
      const { client } = await requireClient(command);
      output(await client.getSettings(), opts.json);
    }),
  );

settings
  .command("set <name> <value>")
  .description(`Change a setting: language, or ${BOOLEAN_SETTINGS.join(", ")} (on/off)`)
  .action(
    wrapAction(async (name: string, value: string, _opts: unknown, command: Command) => {
      const change: SettingsChange = {};
      const key = BOOLEAN_SETTINGS.find((item) => item === name);
      if (key) {
        change[key] = parseSwitch(value);
      } else if (name === "language") {
        change.language = value.trim();
      } else {
        throw new ValidationError(`Unknown setting "${name}".`);
      }

      const { client } = await requireClient(command);
      const result = await client.changeSettings(change);
      console.log(result.success ? `${name} updated` : `${name} not applied`);
    }),
  );

const notifications = program
  .command("notifications")
  .alias("notif")
  .description("Notifications");

notifications
  .command("count")
  .description("Unread notifications")
  .action(
    wrapAction(async (_opts: unknown, command: Command) => {
      const { client } = await requireClient(command);
      console.log(await client.unreadNotificationsCount());
    }),
  );

notifications
  .command("list")
  .alias("ls")
  .option("--page <n>", "Page number", "1")
  .option("--page-size <n>", "Page size", "20")
  .option("-j, --json", "JSON output")
  .description("List notifications")
  .action(
    wrapAction(async (opts: { page: string; pageSize: string; json?: boolean }, command: Command) => {
      const { client } = await requireClient(command);
      const page = await client.getNotifications(
        parsePositiveInt(opts.page, "page"),
        parsePositiveInt(opts.pageSize, "page-size"),
      );
      if (opts.json) {
        output(page, true);
        return;
      }
      output(
        page.results.map((item) => ({
          id: item.id,
          category: item.category ?? "",
          read: item.is_read,
          subject: item.message_subject ?? "",
          createdAt: item.created_at ?? "",
        })),
      );
    }),
  );

notifications
  .command("read <notificationId>")
  .description("Mark a notification as read")
  .action(
    wrapAction(async (notificationId: string, _opts: unknown, command: Command) => {
      const { client } = await requireClient(command);
      const done = await client.readNotification(parsePositiveInt(notificationId, "notificationId"));
      console.log(done ? "Marked as read" : "Not marked");
    }),
  );

await program.parseAsync(process.argv);

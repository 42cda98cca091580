import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { ValidationError } from "./errors.js";
import type { ProfilesDb, StoredCredentials } from "./types.js";

const PROFILE_NAME_RE = /^[A-Za-z0-9_-]+$/;

export const APP_HOME =
  process.env.MECALLER_HOME && process.env.MECALLER_HOME.trim().length > 0
    ? process.env.MECALLER_HOME
    : path.join(os.homedir(), ".mecaller");

export const PROFILES_FILE = path.join(APP_HOME, "profiles.json");

const DEFAULT_PROFILE = "default";

const profilesDbSchema = z.object({
  defaultProfile: z.string().min(1),
  profiles: z.record(
    z.object({
      label: z.string().optional(),
      phoneNumber: z.string().optional(),
      createdAt: z.string(),
      updatedAt: z.string(),
    }),
  ),
});

const storedCredentialsSchema = z.object({
  phoneNumber: z.string(),
  access: z.string().min(1),
  refresh: z.string().min(1),
  pwdToken: z.string().optional(),
  updatedAt: z.string(),
});

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

function nowIso(): string {
  return new Date().toISOString();
}

export function assertProfileName(name: string): void {
  if (!PROFILE_NAME_RE.test(name)) {
    throw new ValidationError(
      "Invalid profile name. Use only letters, numbers, dashes, and underscores.",
    );
  }
}

export function getProfileDir(name: string): string {
  return path.join(APP_HOME, "profiles", name);
}

export function getCredentialsPath(name: string): string {
  return path.join(getProfileDir(name), "credentials.json");
}

async function readJsonFile(filePath: string): Promise<unknown> {
  if (!(await fileExists(filePath))) return null;
  const raw = await fs.readFile(filePath, "utf8");
  try {
    return JSON.parse(raw);
  } catch {
    throw new ValidationError(`Corrupted JSON file: ${filePath}`);
  }
}

async function writeJsonFile(filePath: string, value: unknown): Promise<void> {
  await ensureDir(path.dirname(filePath));
  // Owner-only: credentials.json holds live tokens.
  await fs.writeFile(filePath, `${JSON.stringify(value, null, 2)}\n`, {
    encoding: "utf8",
    mode: 0o600,
  });
}

export async function ensureProfilesDb(): Promise<ProfilesDb> {
  await ensureDir(APP_HOME);

  const current = profilesDbSchema.safeParse(await readJsonFile(PROFILES_FILE));
  if (current.success) {
    return current.data;
  }

  const seed: ProfilesDb = {
    defaultProfile: DEFAULT_PROFILE,
    profiles: {
      [DEFAULT_PROFILE]: {
        createdAt: nowIso(),
        updatedAt: nowIso(),
      },
    },
  };

  await writeJsonFile(PROFILES_FILE, seed);
  await ensureDir(getProfileDir(DEFAULT_PROFILE));
  return seed;
}

async function saveProfilesDb(db: ProfilesDb): Promise<void> {
  await writeJsonFile(PROFILES_FILE, db);
}

export async function listProfiles(): Promise<ProfilesDb> {
  return ensureProfilesDb();
}

export async function ensureProfile(name: string): Promise<void> {
  assertProfileName(name);

  const db = await ensureProfilesDb();
  if (!db.profiles[name]) {
    db.profiles[name] = {
      createdAt: nowIso(),
      updatedAt: nowIso(),
    };
    await saveProfilesDb(db);
  }
  await ensureDir(getProfileDir(name));
}

export async function addProfile(name: string): Promise<void> {
  assertProfileName(name);

  const db = await ensureProfilesDb();
  if (db.profiles[name]) {
    throw new ValidationError(`Profile "${name}" already exists.`);
  }

  db.profiles[name] = {
    createdAt: nowIso(),
    updatedAt: nowIso(),
  };
  await saveProfilesDb(db);
  await ensureDir(getProfileDir(name));
}

export async function setDefaultProfile(name: string): Promise<void> {
  const db = await ensureProfilesDb();
  const meta = db.profiles[name];
  if (!meta) {
    throw new ValidationError(`Profile "${name}" does not exist.`);
  }
  db.defaultProfile = name;
  meta.updatedAt = nowIso();
  await saveProfilesDb(db);
}

export async function setProfileLabel(name: string, label: string): Promise<void> {
  const db = await ensureProfilesDb();
  const meta = db.profiles[name];
  if (!meta) {
    throw new ValidationError(`Profile "${name}" does not exist.`);
  }

  meta.label = label;
  meta.updatedAt = nowIso();
  await saveProfilesDb(db);
}

export async function removeProfile(name: string): Promise<void> {
  const db = await ensureProfilesDb();
  if (!db.profiles[name]) {
    throw new ValidationError(`Profile "${name}" does not exist.`);
  }

  delete db.profiles[name];

  const profileNames = Object.keys(db.profiles);
  if (profileNames.length === 0) {
    db.profiles[DEFAULT_PROFILE] = {
      createdAt: nowIso(),
      updatedAt: nowIso(),
    };
    db.defaultProfile = DEFAULT_PROFILE;
    await ensureDir(getProfileDir(DEFAULT_PROFILE));
  } else if (!db.profiles[db.defaultProfile]) {
    db.defaultProfile = profileNames[0] ?? DEFAULT_PROFILE;
  }

  await saveProfilesDb(db);
  await fs.rm(getProfileDir(name), { recursive: true, force: true });
}

export async function resolveProfileName(flagProfile?: string): Promise<string> {
  const db = await ensureProfilesDb();

  const picked =
    (flagProfile && flagProfile.trim()) ||
    (process.env.MECALLER_PROFILE && process.env.MECALLER_PROFILE.trim()) ||
    db.defaultProfile ||
    DEFAULT_PROFILE;

  if (!db.profiles[picked]) {
    if (picked === DEFAULT_PROFILE) {
      await ensureProfile(DEFAULT_PROFILE);
      return DEFAULT_PROFILE;
    }
    throw new ValidationError(
      `Profile "${picked}" does not exist. Create it with: account add ${picked}`,
    );
  }

  return picked;
}

export async function loadCredentials(
  profileName: string,
): Promise<StoredCredentials | null> {
  const raw = await readJsonFile(getCredentialsPath(profileName));
  if (raw === null) return null;
  const parsed = storedCredentialsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(
      `Credentials for profile "${profileName}" are unreadable. Run: auth logout, then log in again.`,
    );
  }
  return parsed.data;
}

export async function saveCredentials(
  profileName: string,
  credentials: Omit<StoredCredentials, "updatedAt">,
): Promise<void> {
  await ensureProfile(profileName);
  const stored: StoredCredentials = { ...credentials, updatedAt: nowIso() };
  await writeJsonFile(getCredentialsPath(profileName), stored);

  const db = await ensureProfilesDb();
  const meta = db.profiles[profileName];
  if (meta && meta.phoneNumber !== credentials.phoneNumber) {
    meta.phoneNumber = credentials.phoneNumber;
    meta.updatedAt = nowIso();
    await saveProfilesDb(db);
  }
}

export async function clearCredentials(profileName: string): Promise<void> {
  await fs.rm(getCredentialsPath(profileName), { force: true });
}

import { ValidationError } from "./errors.js";
import { callTypeSchema, type Call, type Settings, type UploadContact } from "./models.js";
import { parsePhoneNumber } from "./phone.js";

const DATE_RE = /^\d{4}-(0\d|1[0-2])-([0-2]\d|3[01])$/;
const EMAIL_RE = /^[^\s@<>()[\],;:"]+@[^\s@<>()[\],;:"]+\.[^\s@<>()[\],;:"]{2,}$/;
const NUMERIC_ID_RE = /^\d+$/;

export const DEFAULT_CALL_DURATION = 123;
export const DEFAULT_CALLED_AT = "2022-04-18T05:59:07Z";

export interface ContactInput {
  name?: string | null;
  phone_number?: string | number | null;
  date_of_birth?: string | null;
  country_code?: string | null;
}

export interface CallInput {
  name?: string | null;
  phone_number?: string | number | null;
  type?: string | null;
  called_at?: string | null;
  duration?: number | null;
  tag?: string | null;
}

/**
 * Keeps the contacts that carry both a name and a valid phone number.
 * Throws when nothing usable is left.
 */
export function validateContacts(contacts: ContactInput[]): UploadContact[] {
  const valid: UploadContact[] = [];
  for (const contact of contacts) {
    const name = contact.name?.trim();
    if (!name || contact.phone_number === undefined || contact.phone_number === null) continue;
    let phone: number;
    try {
      phone = parsePhoneNumber(contact.phone_number).value;
    } catch {
      continue;
    }
    valid.push({
      name,
      phone_number: phone,
      date_of_birth: contact.date_of_birth ?? null,
      country_code: contact.country_code ? contact.country_code.toUpperCase().slice(0, 2) : null,
    });
  }

  if (valid.length === 0) {
    throw new ValidationError(
      "No valid contacts found. Each contact needs a name and an international phone number.",
    );
  }
  return valid;
}

/** Fills the fields the call-log endpoint insists on. */
export function validateCalls(calls: CallInput[]): Call[] {
  const valid: Call[] = [];
  for (const call of calls) {
    if (call.phone_number === undefined || call.phone_number === null) {
      throw new ValidationError("Every call needs a phone number.");
    }
    const phone = parsePhoneNumber(call.phone_number).value;
    const type = callTypeSchema.safeParse(call.type);
    if (!type.success) {
      throw new ValidationError(
        `Unknown call type "${String(call.type)}". Use one of: ${callTypeSchema.options.join(", ")}.`,
      );
    }
    valid.push({
      name: call.name?.trim() || String(phone),
      phone_number: phone,
      type: type.data,
      called_at: call.called_at ?? DEFAULT_CALLED_AT,
      duration: call.duration ?? DEFAULT_CALL_DURATION,
      tag: call.tag ?? null,
    });
  }

  if (valid.length === 0) {
    throw new ValidationError("No calls to sync.");
  }
  return valid;
}

export type ProfileUpdate = {
  first_name?: string | null;
  last_name?: string | null;
  email?: string | null;
  gender?: string | null;
  slogan?: string | null;
  profile_picture?: string | null;
  date_of_birth?: string | null;
  location_name?: string | null;
  carrier?: string | null;
  device_type?: "android" | "ios" | null;
  login_type?: "email" | "apple" | null;
  facebook_url?: string | null;
  google_url?: string | null;
  country_code?: string | null;
};

/**
 * Checks an update and returns the body to PATCH. `undefined` fields are
 * left alone; `null` clears the field on the server.
 */
export function validateProfileUpdate(update: ProfileUpdate): Record<string, string | null> {
  const body: Record<string, string | null> = {};

  for (const [key, value] of Object.entries(update)) {
    if (value === undefined) continue;
    if (value !== null && typeof value !== "string") {
      throw new ValidationError(`${key} must be a string or null.`);
    }

    switch (key) {
      case "gender": {
        const gender = value?.toUpperCase() ?? null;
        if (gender !== null && gender !== "M" && gender !== "F") {
          throw new ValidationError("Gender must be 'M', 'F' or null.");
        }
        body[key] = gender;
        break;
      }
      case "date_of_birth":
        if (value !== null && !DATE_RE.test(value)) {
          throw new ValidationError("Birthday must be in YYYY-MM-DD format.");
        }
        body[key] = value;
        break;
      case "email":
        if (value !== null && !EMAIL_RE.test(value)) {
          throw new ValidationError("Email must be in user@domain.com format.");
        }
        body[key] = value;
        break;
      case "facebook_url":
      case "google_url":
        if (value !== null && !NUMERIC_ID_RE.test(value)) {
          throw new ValidationError(`${key} must be numeric.`);
        }
        body[key] = value;
        break;
      case "device_type":
        if (value !== null && value !== "android" && value !== "ios") {
          throw new ValidationError("device_type must be 'android', 'ios' or null.");
        }
        body[key] = value;
        break;
      case "login_type":
        if (value !== null && value !== "email" && value !== "apple") {
          throw new ValidationError("login_type must be 'email', 'apple' or null.");
        }
        body[key] = value;
        break;
      case "country_code":
        body[key] = value === null ? null : value.toUpperCase().slice(0, 2);
        break;
      default:
        body[key] = value;
    }
  }

  if (Object.keys(body).length === 0) {
    throw new ValidationError("Nothing to update.");
  }
  return body;
}

export type SettingsChange = Partial<
  Pick<
    Settings,
    | "mutual_contacts_available"
    | "who_watched_enabled"
    | "who_deleted_enabled"
    | "comments_enabled"
    | "location_enabled"
    | "language"
    | "who_deleted_notification_enabled"
    | "who_watched_notification_enabled"
    | "distance_notification_enabled"
    | "system_notification_enabled"
    | "birthday_notification_enabled"
    | "comments_notification_enabled"
    | "names_notification_enabled"
    | "notifications_enabled"
  >
>;

export function validateSettingsChange(change: SettingsChange): Record<string, string | boolean> {
  const body: Record<string, string | boolean> = {};
  for (const [key, value] of Object.entries(change)) {
    if (value === undefined || value === null) continue;
    body[key] = value;
  }
  if (Object.keys(body).length === 0) {
    throw new ValidationError("No settings to change.");
  }
  return body;
}

/** Returns the keys whose value in `result` differs from what was sent. */
export function diffApplied(
  sent: Record<string, unknown>,
  result: Record<string, unknown>,
  ignore: string[] = [],
): string[] {
  return Object.keys(sent).filter(
    (key) => !ignore.includes(key) && result[key] !== sent[key],
  );
}

import { ValidationError } from "./errors.js";

const SEPARATORS_RE = /[\s\-().]/g;
const DIGITS_RE = /^[1-9]\d{6,14}$/;

export interface PhoneNumber {
  /** International format without the leading `+`, e.g. `972501234567`. */
  readonly digits: string;
  /** Same number as the vendor's JSON carries it. */
  readonly value: number;
}

export function parsePhoneNumber(input: string | number | PhoneNumber): PhoneNumber {
  if (typeof input === "object") {
    return input;
  }

  let raw: string;
  if (typeof input === "number") {
    if (!Number.isSafeInteger(input) || input <= 0) {
      throw new ValidationError(`Invalid phone number: ${input}`);
    }
    raw = String(input);
  } else {
    raw = input.trim().replace(SEPARATORS_RE, "");
    if (raw.startsWith("+")) raw = raw.slice(1);
    else if (raw.startsWith("00")) raw = raw.slice(2);
  }

  if (!DIGITS_RE.test(raw)) {
    throw new ValidationError(
      `Invalid phone number "${String(input)}". Use international format, e.g. +972501234567.`,
    );
  }

  return Object.freeze({ digits: raw, value: Number(raw) });
}

export function isPhoneNumber(input: string | number): boolean {
  try {
    parsePhoneNumber(input);
    return true;
  } catch {
    return false;
  }
}

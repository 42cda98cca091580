import { z } from "zod";

export class MeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

/** Challenge, verification, token and refresh failures. */
export class AuthError extends MeError {
  readonly status?: number;
  readonly detail?: string;

  constructor(message: string, options: { status?: number; detail?: string } = {}) {
    super(message);
    this.status = options.status;
    this.detail = options.detail;
  }
}

export interface ApiErrorOptions {
  status: number;
  code?: string;
  detail?: string;
  body?: unknown;
}

export class ApiError extends MeError {
  readonly status: number;
  readonly code?: string;
  readonly detail?: string;
  readonly body?: unknown;

  constructor(message: string, options: ApiErrorOptions) {
    super(message);
    this.status = options.status;
    this.code = options.code;
    this.detail = options.detail;
    this.body = options.body;
  }
}

/** Caller input rejected before any request is sent. */
export class ValidationError extends MeError {}

const recordSchema = z.record(z.unknown());

function pickString(record: Record<string, unknown>, keys: string[]): string | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === "string" && value.trim()) {
      return value.trim();
    }
    if (Array.isArray(value) && typeof value[0] === "string") {
      return value[0];
    }
  }
  return undefined;
}

/** Pulls the vendor's code and human-readable detail out of an error body. */
export function describeErrorBody(body: unknown): { code?: string; detail?: string } {
  if (typeof body === "string") {
    const trimmed = body.trim();
    return trimmed ? { detail: trimmed.slice(0, 200) } : {};
  }
  const parsed = recordSchema.safeParse(body);
  if (!parsed.success) {
    return {};
  }
  const record = parsed.data;
  return {
    code: pickString(record, ["code", "error_code"]),
    detail: pickString(record, ["detail", "message", "msg", "error"]),
  };
}

export function apiErrorFromResponse(status: number, body: unknown): ApiError {
  const { code, detail } = describeErrorBody(body);
  const message = detail
    ? `Request failed with status ${status}: ${detail}`
    : `Request failed with status ${status}`;
  return new ApiError(message, { status, code, detail, body });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

import { z } from "zod";
import { ValidationError } from "./errors.js";

export const DEFAULT_BASE_URL = "https://app.mobile.me.app";
export const DEFAULT_TIMEOUT_MS = 15_000;

const envSchema = z.object({
  MECALLER_PROFILE: z.string().trim().min(1).optional(),
  MECALLER_BASE_URL: z.string().trim().url().optional(),
  MECALLER_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  MECALLER_ACCESS_TOKEN: z.string().trim().min(1).optional(),
  MECALLER_REFRESH_TOKEN: z.string().trim().min(1).optional(),
});

export interface MeConfig {
  profile?: string;
  baseUrl: string;
  timeoutMs: number;
  accessToken?: string;
  refreshToken?: string;
}

function blankToUndefined(env: NodeJS.ProcessEnv): Record<string, string | undefined> {
  const picked: Record<string, string | undefined> = {};
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key];
    picked[key] = value && value.trim().length > 0 ? value : undefined;
  }
  return picked;
}

export function resolveConfig(env: NodeJS.ProcessEnv = process.env): MeConfig {
  const parsed = envSchema.safeParse(blankToUndefined(env));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(
      `Invalid environment: ${issue?.path.join(".") ?? "?"} ${issue?.message ?? ""}`.trim(),
    );
  }

  const values = parsed.data;
  return {
    profile: values.MECALLER_PROFILE,
    baseUrl: (values.MECALLER_BASE_URL ?? DEFAULT_BASE_URL).replace(/\/+$/, ""),
    timeoutMs: values.MECALLER_TIMEOUT_MS ?? DEFAULT_TIMEOUT_MS,
    accessToken: values.MECALLER_ACCESS_TOKEN,
    refreshToken: values.MECALLER_REFRESH_TOKEN,
  };
}

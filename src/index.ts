export {
  MeClient,
  ageOn,
  createClient,
  createProfileClient,
  loginWithStoredCredentials,
  loginWithTokens,
  type SocialLinks,
  type UpdateResult,
} from "./lib/client.js";
export { DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS, resolveConfig, type MeConfig } from "./lib/config.js";
export {
  MemoryCredentialsManager,
  ProfileCredentialsManager,
  type CredentialsManager,
} from "./lib/credentials.js";
export { ApiError, AuthError, MeError, ValidationError } from "./lib/errors.js";
export { createLogger, silentLogger, type Logger } from "./lib/logger.js";
export * from "./lib/models.js";
export { isPhoneNumber, parsePhoneNumber, type PhoneNumber } from "./lib/phone.js";
export {
  ACTIVATE_PATH,
  ASK_PATH,
  REFRESH_PATH,
  Session,
  type Query,
  type RequestOptions,
  type SessionOptions,
} from "./lib/session.js";
export type { ChallengeMethod, HttpMethod, TokenPair } from "./lib/types.js";
export {
  validateCalls,
  validateContacts,
  validateProfileUpdate,
  validateSettingsChange,
  type CallInput,
  type ContactInput,
  type ProfileUpdate,
  type SettingsChange,
} from "./lib/validation.js";

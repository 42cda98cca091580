import axios, {
  type AxiosAdapter,
  type AxiosInstance,
  type AxiosResponse,
  type CreateAxiosDefaults,
} from "axios";
import type { z } from "zod";
import { DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS } from "./config.js";
import type { CredentialsManager } from "./credentials.js";
import {
  ApiError,
  AuthError,
  apiErrorFromResponse,
  describeErrorBody,
  errorMessage,
} from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { challengeSchema, refreshedTokenSchema, tokenPairSchema } from "./models.js";
import { parsePhoneNumber, type PhoneNumber } from "./phone.js";
import type { ChallengeMethod, HttpMethod, TokenPair } from "./types.js";

export const ASK_PATH = "/auth/authorization/ask/";
export const ACTIVATE_PATH = "/auth/authorization/activate/";
export const REFRESH_PATH = "/auth/authorization/refresh/";

const CODE_RE = /^\d{4,8}$/;
const USER_AGENT = "okhttp/4.9.1";

export interface SessionOptions {
  baseUrl?: string;
  timeoutMs?: number;
  /** Number the credential belongs to; the key used with `credentialsManager`. */
  phoneNumber?: string | number | PhoneNumber;
  /** Pre-provisioned tokens; skips the verification challenge. */
  credentials?: TokenPair | null;
  credentialsManager?: CredentialsManager;
  adapter?: AxiosAdapter;
  logger?: Logger;
  userAgent?: string;
}

export type Query = Record<string, string | number | boolean | undefined>;

export interface RequestOptions<T> {
  query?: Query;
  body?: unknown;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

function decodeBody(response: AxiosResponse<unknown>): unknown {
  const raw = response.data;
  if (raw === undefined || raw === null) return {};
  if (typeof raw !== "string") return raw;
  if (raw.trim() === "") return {};
  try {
    return JSON.parse(raw);
  } catch {
    throw new ApiError(`Malformed JSON in response (status ${response.status})`, {
      status: response.status,
      code: "malformed_json",
      body: raw.slice(0, 200),
    });
  }
}

// Error bodies are often HTML from a proxy; fall back to the raw text.
function decodeErrorBody(response: AxiosResponse<unknown>): unknown {
  try {
    return decodeBody(response);
  } catch {
    return response.data;
  }
}

/**
 * Owns the token pair of one account and sends every request the client
 * makes. An expired access token is detected by a 401 and refreshed once.
 */
export class Session {
  private readonly http: AxiosInstance;
  private readonly logger: Logger;
  private readonly credentialsManager?: CredentialsManager;
  private readonly challenges = new Map<string, PhoneNumber>();
  private credential: TokenPair | null;
  private phone: PhoneNumber | null;
  private refreshing: Promise<TokenPair> | null = null;

  constructor(options: SessionOptions = {}) {
    this.logger = options.logger ?? createLogger("session");
    this.credentialsManager = options.credentialsManager;
    this.credential = options.credentials ? { ...options.credentials } : null;
    this.phone =
      options.phoneNumber !== undefined ? parsePhoneNumber(options.phoneNumber) : null;

    const defaults: CreateAxiosDefaults = {
      baseURL: (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, ""),
      timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      headers: {
        Accept: "application/json",
        "Content-Type": "application/json",
        "User-Agent": options.userAgent ?? USER_AGENT,
      },
      responseType: "text",
      // Status handling and JSON decoding happen here, not in axios.
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
    };
    if (options.adapter) {
      defaults.adapter = options.adapter;
    }
    this.http = axios.create(defaults);

    this.http.interceptors.request.use((config) => {
      this.logger.debug(`${(config.method ?? "get").toUpperCase()} ${config.url ?? ""}`);
      return config;
    });
    this.http.interceptors.response.use((response) => {
      this.logger.debug(`${response.status} ${response.config.url ?? ""}`);
      return response;
    });
  }

  get phoneNumber(): PhoneNumber | null {
    return this.phone;
  }

  get isAuthenticated(): boolean {
    return this.credential !== null;
  }

  /** A copy of the current token pair. */
  getCredential(): TokenPair | null {
    return this.credential ? { ...this.credential } : null;
  }

  useCredential(tokens: TokenPair, phoneNumber?: string | number | PhoneNumber): void {
    if (!tokens.access || !tokens.refresh) {
      throw new AuthError("Both access and refresh tokens are required.");
    }
    this.credential = { ...tokens };
    if (phoneNumber !== undefined) {
      this.phone = parsePhoneNumber(phoneNumber);
    }
  }

  /** Loads the token pair saved for `phoneNumber`; false when none is stored. */
  async restore(): Promise<boolean> {
    if (!this.phone || !this.credentialsManager) return false;
    const stored = await this.credentialsManager.get(this.phone.digits);
    if (!stored) return false;
    this.credential = { ...stored };
    return true;
  }

  /**
   * Asks the vendor to send a verification code to `phoneNumber`.
   * Resolves with the challenge id that `verify` expects.
   */
  async authenticate(
    phoneNumber: string | number | PhoneNumber,
    method: ChallengeMethod = "sms",
  ): Promise<string> {
    let phone: PhoneNumber;
    try {
      phone = parsePhoneNumber(phoneNumber);
    } catch (error) {
      throw new AuthError(errorMessage(error));
    }

    const response = await this.send("post", ASK_PATH, {
      body: { phone_number: phone.value, contact_type: method },
    });
    const body = this.decodeAuthBody(response, "Verification request");
    if (!isSuccess(response.status)) {
      throw this.authRejection("Verification request rejected", response.status, body);
    }

    const parsed = challengeSchema.safeParse(body);
    if (!parsed.success) {
      throw new AuthError("Verification request returned no challenge id.", {
        status: response.status,
      });
    }

    this.challenges.set(parsed.data.request_id, phone);
    this.logger.debug(`challenge ${parsed.data.request_id} sent by ${method}`);
    return parsed.data.request_id;
  }

  /**
   * Re-registers a challenge issued to `phoneNumber` by an earlier
   * `authenticate`, e.g. one started by another process.
   */
  resumeChallenge(challengeId: string, phoneNumber: string | number | PhoneNumber): void {
    let phone: PhoneNumber;
    try {
      phone = parsePhoneNumber(phoneNumber);
    } catch (error) {
      throw new AuthError(errorMessage(error));
    }
    if (!challengeId.trim()) {
      throw new AuthError("Challenge id is required.");
    }
    this.challenges.set(challengeId.trim(), phone);
  }

  /** Exchanges the code of a pending challenge for a token pair. */
  async verify(challengeId: string, code: string | number): Promise<TokenPair> {
    const phone = this.challenges.get(challengeId);
    if (!phone) {
      throw new AuthError(`Unknown challenge "${challengeId}". Call authenticate() first.`);
    }

    const normalized = String(code).trim();
    if (!CODE_RE.test(normalized)) {
      throw new AuthError("Verification code must be 4 to 8 digits.");
    }

    const response = await this.send("post", ACTIVATE_PATH, {
      body: {
        phone_number: phone.value,
        activation_code: normalized,
        request_id: challengeId,
      },
    });
    const body = this.decodeAuthBody(response, "Verification");
    if (!isSuccess(response.status)) {
      throw this.authRejection("Verification failed", response.status, body);
    }

    const parsed = tokenPairSchema.safeParse(body);
    if (!parsed.success) {
      throw new AuthError("Verification did not return a token pair.", {
        status: response.status,
      });
    }

    const tokens: TokenPair = { access: parsed.data.access, refresh: parsed.data.refresh };
    if (parsed.data.pwd_token) tokens.pwdToken = parsed.data.pwd_token;

    this.challenges.delete(challengeId);
    this.credential = { ...tokens };
    this.phone = phone;
    await this.credentialsManager?.set(phone.digits, tokens);
    return { ...tokens };
  }

  /**
   * Trades the refresh token for a new access token. Concurrent callers
   * share one in-flight exchange.
   */
  async refresh(): Promise<TokenPair> {
    if (!this.refreshing) {
      this.refreshing = this.exchangeRefreshToken().finally(() => {
        this.refreshing = null;
      });
    }
    return this.refreshing;
  }

  async logout(): Promise<void> {
    const phone = this.phone;
    this.credential = null;
    this.challenges.clear();
    if (phone && this.credentialsManager) {
      await this.credentialsManager.delete(phone.digits);
    }
  }

  /**
   * Sends an authorized request and decodes its JSON body with `schema`.
   * A 401 triggers one refresh and one retry; whatever the retry answers
   * is final.
   */
  async request<T>(method: HttpMethod, path: string, options: RequestOptions<T>): Promise<T> {
    let token = this.requireCredential().access;
    let response = await this.send(method, path, options, token);

    if (response.status === 401) {
      this.logger.debug(`401 on ${path}, refreshing access token`);
      token = await this.tokenAfterUnauthorized(token);
      response = await this.send(method, path, options, token);
    }

    if (!isSuccess(response.status)) {
      throw apiErrorFromResponse(response.status, decodeErrorBody(response));
    }

    const parsed = options.schema.safeParse(decodeBody(response));
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ApiError(
        `Unexpected response from ${path}: ${issue ? `${issue.path.join(".") || "(root)"} ${issue.message}` : "invalid shape"}`,
        { status: response.status, code: "unexpected_response" },
      );
    }
    return parsed.data;
  }

  private requireCredential(): TokenPair {
    if (!this.credential) {
      throw new AuthError("Not authenticated. Verify a phone number or provide tokens first.");
    }
    return this.credential;
  }

  private async tokenAfterUnauthorized(usedToken: string): Promise<string> {
    const current = this.requireCredential();
    // Another request already swapped the token while this one was in flight.
    if (current.access !== usedToken) {
      return current.access;
    }
    const refreshed = await this.refresh();
    return refreshed.access;
  }

  private async exchangeRefreshToken(): Promise<TokenPair> {
    const credential = this.requireCredential();
    const response = await this.send("post", REFRESH_PATH, {
      body: { refresh: credential.refresh },
    });
    const body = this.decodeAuthBody(response, "Token refresh");
    if (!isSuccess(response.status)) {
      throw this.authRejection("Token refresh failed", response.status, body);
    }

    const parsed = refreshedTokenSchema.safeParse(body);
    if (!parsed.success) {
      throw new AuthError("Token refresh did not return an access token.", {
        status: response.status,
      });
    }

    credential.access = parsed.data.access;
    if (parsed.data.refresh) credential.refresh = parsed.data.refresh;
    this.logger.debug("access token refreshed");

    if (this.phone && this.credentialsManager) {
      await this.credentialsManager.update(
        this.phone.digits,
        credential.access,
        parsed.data.refresh ?? undefined,
      );
    }
    return { ...credential };
  }

  private decodeAuthBody(response: AxiosResponse<unknown>, what: string): unknown {
    if (!isSuccess(response.status)) {
      return decodeErrorBody(response);
    }
    try {
      return decodeBody(response);
    } catch {
      throw new AuthError(`${what} returned malformed JSON.`, { status: response.status });
    }
  }

  private authRejection(prefix: string, status: number, body: unknown): AuthError {
    const { detail } = describeErrorBody(body);
    return new AuthError(detail ? `${prefix}: ${detail}` : `${prefix} (status ${status})`, {
      status,
      detail,
    });
  }

  private async send(
    method: HttpMethod,
    path: string,
    options: { query?: Query; body?: unknown },
    token?: string,
  ): Promise<AxiosResponse<unknown>> {
    try {
      return await this.http.request<unknown>({
        method,
        url: path,
        params: options.query,
        data: options.body,
        headers: token ? { Authorization: `Bearer ${token}` } : undefined,
      });
    } catch (error) {
      const code = axios.isAxiosError(error) ? error.code : undefined;
      throw new ApiError(`Request to ${path} failed: ${errorMessage(error)}`, {
        status: 0,
        code: code ?? "network_error",
      });
    }
  }
}

import { clearCredentials, loadCredentials, saveCredentials } from "./store.js";
import type { TokenPair } from "./types.js";

/**
 * Where a session keeps its token pair between runs, keyed by the phone
 * number (international digits) the tokens were issued for.
 */
export interface CredentialsManager {
  get(phoneNumber: string): Promise<TokenPair | null>;
  set(phoneNumber: string, tokens: TokenPair): Promise<void>;
  update(phoneNumber: string, accessToken: string, refreshToken?: string): Promise<void>;
  delete(phoneNumber: string): Promise<void>;
}

export class MemoryCredentialsManager implements CredentialsManager {
  private readonly entries = new Map<string, TokenPair>();

  async get(phoneNumber: string): Promise<TokenPair | null> {
    const entry = this.entries.get(phoneNumber);
    return entry ? { ...entry } : null;
  }

  async set(phoneNumber: string, tokens: TokenPair): Promise<void> {
    this.entries.set(phoneNumber, { ...tokens });
  }

  async update(phoneNumber: string, accessToken: string, refreshToken?: string): Promise<void> {
    const entry = this.entries.get(phoneNumber);
    if (!entry) return;
    entry.access = accessToken;
    if (refreshToken) entry.refresh = refreshToken;
  }

  async delete(phoneNumber: string): Promise<void> {
    this.entries.delete(phoneNumber);
  }
}

/** Persists into the `credentials.json` of one local profile. */
export class ProfileCredentialsManager implements CredentialsManager {
  constructor(readonly profileName: string) {}

  async get(phoneNumber: string): Promise<TokenPair | null> {
    const stored = await loadCredentials(this.profileName);
    if (!stored || stored.phoneNumber !== phoneNumber) return null;
    return { access: stored.access, refresh: stored.refresh, pwdToken: stored.pwdToken };
  }

  async set(phoneNumber: string, tokens: TokenPair): Promise<void> {
    await saveCredentials(this.profileName, { phoneNumber, ...tokens });
  }

  async update(phoneNumber: string, accessToken: string, refreshToken?: string): Promise<void> {
    const stored = await loadCredentials(this.profileName);
    if (!stored || stored.phoneNumber !== phoneNumber) return;
    await saveCredentials(this.profileName, {
      phoneNumber,
      access: accessToken,
      refresh: refreshToken ?? stored.refresh,
      pwdToken: stored.pwdToken,
    });
  }

  async delete(phoneNumber: string): Promise<void> {
    const stored = await loadCredentials(this.profileName);
    if (stored && stored.phoneNumber !== phoneNumber) return;
    await clearCredentials(this.profileName);
  }
}

export interface ProfileMeta {
  label?: string;
  phoneNumber?: string;
  createdAt: string;
  updatedAt: string;
}

export interface ProfilesDb {
  defaultProfile: string;
  profiles: Record<string, ProfileMeta>;
}

export interface TokenPair {
  access: string;
  refresh: string;
  pwdToken?: string;
}

export interface StoredCredentials extends TokenPair {
  phoneNumber: string;
  updatedAt: string;
}

export type HttpMethod = "get" | "post" | "put" | "patch" | "delete";

export type ChallengeMethod = "sms" | "call";

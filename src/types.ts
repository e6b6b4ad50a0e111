export type RepoCoordinates = {
  domain: string;
  account: string;
  region: string;
};

export type ExecutionMode = "ci" | "local";

export type CachedTokenRecord =
  | { kind: "valid"; timestamp: Date; token: string }
  | { kind: "invalidated" }
  | { kind: "absent" };

export type CredentialOptions = {
  repoUrl?: string;
  localProfile?: string;
  cacheExpireHours?: number;
};

export type Credential = {
  username: string;
  password: string;
};

export type RepositoryAlias = {
  alias: string;
  repoUrl: string;
  profile?: string;
  cacheExpireHours?: number;
  default?: boolean;
};

export type ConfigFile = {
  repositories: Record<string, RepositoryAlias>;
};

export type CacheStatus = {
  status: "fresh" | "expired" | "invalidated" | "missing";
  cachedAt?: Date;
  expiresAt?: Date;
};

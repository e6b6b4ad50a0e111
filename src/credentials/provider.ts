import { type CommandRunner, SpawnCommandRunner } from "../aws/command-runner.js";
import { LoginSessionChecker } from "../aws/session.js";
import { TokenFetcher } from "../aws/token-fetcher.js";
import { DEFAULT_CACHE_EXPIRE_HOURS } from "../config/env.js";
import { assertProfileName } from "../config/paths.js";
import { MissingConfigurationError } from "../errors.js";
import { parseRepoUrl } from "../registry/repo-url.js";
import { TokenCacheStore } from "../security/token-cache.js";
import type {
  Credential,
  CredentialOptions,
  ExecutionMode,
} from "../types.js";
import { info } from "../utils/log.js";

export const CREDENTIAL_USERNAME = "aws";

const HOUR_MS = 60 * 60 * 1000;

export type CredentialDependencies = {
  mode: ExecutionMode;
  runner?: CommandRunner;
  cache?: TokenCacheStore;
  now?: () => Date;
};

export type CredentialProvider = {
  readonly username: string;
  password(): Promise<string>;
};

function requireRepoUrl(options: CredentialOptions) {
  if (!options.repoUrl) {
    throw new MissingConfigurationError(
      "repoUrl is not provided. Pass --repo-url, set CODEARTIFACT_REPO_URL, or save an alias with `codeartifact-sso add`."
    );
  }
  return options.repoUrl;
}

function requireProfile(options: CredentialOptions) {
  if (!options.localProfile) {
    throw new MissingConfigurationError(
      "localProfile is not provided. Pass --profile or set CODEARTIFACT_PROFILE (or AWS_PROFILE)."
    );
  }
  return assertProfileName(options.localProfile);
}

export function resolveExpiryMs(cacheExpireHours?: number) {
  const hours = cacheExpireHours ?? DEFAULT_CACHE_EXPIRE_HOURS;
  if (!Number.isInteger(hours) || hours <= 0) {
    throw new MissingConfigurationError(
      `cacheExpireHours must be a positive integer, got '${String(cacheExpireHours)}'.`
    );
  }
  return hours * HOUR_MS;
}

/**
 * Resolves the CodeArtifact token for one repository.
 *
 * CI runs always fetch a fresh token and never read or write the on-disk
 * cache. Local runs check the SSO session first (which may invalidate the
 * cache), then serve the cached token or fetch and cache a new one.
 */
export async function resolveToken(
  options: CredentialOptions,
  deps: CredentialDependencies
): Promise<string> {
  const coordinates = parseRepoUrl(requireRepoUrl(options));
  const runner = deps.runner ?? new SpawnCommandRunner();
  const fetcher = new TokenFetcher(runner);

  if (deps.mode === "ci") {
    info("Running in CI, fetching a fresh token ...");
    return fetcher.fetch(coordinates);
  }

  const profile = requireProfile(options);
  const expiryMs = resolveExpiryMs(options.cacheExpireHours);
  const cache = deps.cache ?? new TokenCacheStore();
  const checker = new LoginSessionChecker(runner, cache);

  await checker.ensureLoggedIn(profile);

  const now = deps.now?.() ?? new Date();
  const cached = await cache.read(profile, expiryMs, now);
  if (cached !== null) {
    info("Cached SSO token is available, will use it");
    return cached;
  }

  info("Retrieving new SSO token ...");
  const token = await fetcher.fetch(coordinates, profile);
  await cache.append(profile, now, token);
  return token;
}

/**
 * A credential whose password is resolved on first use and memoized, so a
 * build that reads it several times logs in and fetches at most once.
 */
export function createCredentialProvider(
  options: CredentialOptions,
  deps: CredentialDependencies
): CredentialProvider {
  let pending: Promise<string> | null = null;
  return {
    username: CREDENTIAL_USERNAME,
    password() {
      if (!pending) {
        pending = resolveToken(options, deps);
      }
      return pending;
    },
  };
}

export async function resolveCredential(
  options: CredentialOptions,
  deps: CredentialDependencies
): Promise<Credential> {
  const provider = createCredentialProvider(options, deps);
  return { username: provider.username, password: await provider.password() };
}

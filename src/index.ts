export {
  type CommandResult,
  type CommandRunner,
  type RunOptions,
  SpawnCommandRunner,
} from "./aws/command-runner.js";
export { LoginSessionChecker, type SessionState } from "./aws/session.js";
export { TokenFetcher } from "./aws/token-fetcher.js";
export {
  DEFAULT_CACHE_EXPIRE_HOURS,
  resolveExecutionMode,
} from "./config/env.js";
export { resolveCredentialOptions } from "./config/resolve.js";
export {
  CREDENTIAL_USERNAME,
  type CredentialDependencies,
  type CredentialProvider,
  createCredentialProvider,
  resolveCredential,
  resolveToken,
} from "./credentials/provider.js";
export * from "./errors.js";
export { applyNpmrc, writeNpmrc } from "./npm/npmrc.js";
export { parseRepoUrl, registryAuthKey } from "./registry/repo-url.js";
export { TokenCacheStore } from "./security/token-cache.js";
export type * from "./types.js";

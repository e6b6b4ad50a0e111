import { MissingConfigurationError } from "../errors.js";
import type { CredentialOptions, RepositoryAlias } from "../types.js";
import { envDefaults, parseExpireHours } from "./env.js";
import { getDefaultRepository, getRepository } from "./store.js";

export type CredentialFlags = {
  repoUrl?: string;
  profile?: string;
  expireHours?: string;
};

/**
 * Merges one layer of settings over the next: CLI flags, then the saved
 * alias, then the environment.
 */
export function mergeCredentialOptions(
  flags: CredentialFlags,
  repository: RepositoryAlias | null,
  env: NodeJS.ProcessEnv = process.env
): CredentialOptions {
  const fromEnv = envDefaults(env);
  return {
    repoUrl: flags.repoUrl ?? repository?.repoUrl ?? fromEnv.repoUrl,
    localProfile:
      flags.profile ?? repository?.profile ?? fromEnv.localProfile,
    cacheExpireHours:
      parseExpireHours(flags.expireHours) ??
      repository?.cacheExpireHours ??
      fromEnv.cacheExpireHours,
  };
}

export async function resolveRepository(alias?: string) {
  if (alias) {
    const repository = await getRepository(alias);
    if (!repository) {
      throw new MissingConfigurationError(
        `No repository alias "${alias}". Run \`codeartifact-sso list\` to see saved aliases.`
      );
    }
    return repository;
  }
  return getDefaultRepository();
}

export async function resolveCredentialOptions(
  alias: string | undefined,
  flags: CredentialFlags,
  env: NodeJS.ProcessEnv = process.env
) {
  // An explicit --repo-url opts out of the default alias.
  const repository =
    alias || !flags.repoUrl ? await resolveRepository(alias) : null;
  return mergeCredentialOptions(flags, repository, env);
}

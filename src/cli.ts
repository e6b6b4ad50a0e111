#!/usr/bin/env node
import path from "node:path";
import { confirm } from "@inquirer/prompts";
import { Command } from "commander";
import { parseExpireHours, resolveExecutionMode } from "./config/env.js";
import {
  type CredentialFlags,
  resolveCredentialOptions,
} from "./config/resolve.js";
import {
  getRepository,
  listRepositories,
  loadConfig,
  removeRepository,
  setRepository,
} from "./config/store.js";
import {
  createCredentialProvider,
  resolveExpiryMs,
} from "./credentials/provider.js";
import { MissingConfigurationError } from "./errors.js";
import { writeNpmrc } from "./npm/npmrc.js";
import { parseRepoUrl } from "./registry/repo-url.js";
import { TokenCacheStore } from "./security/token-cache.js";
import type { RepositoryAlias } from "./types.js";
import { formatCacheStatus, formatRepositories } from "./utils/format.js";
import { configureLogging, error, info, warn } from "./utils/log.js";
import { PACKAGE_VERSION } from "./version.js";

type CredentialCommandOptions = CredentialFlags & { file?: string; scope?: string };

function withCredentialOptions(command: Command) {
  return command
    .option("--repo-url <url>", "CodeArtifact repository URL")
    .option("--profile <profile>", "AWS profile used for SSO login")
    .option("--expire-hours <hours>", "Hours a cached token stays valid");
}

async function resolvePassword(
  alias: string | undefined,
  flags: CredentialFlags
) {
  const options = await resolveCredentialOptions(alias, flags);
  const provider = createCredentialProvider(options, {
    mode: resolveExecutionMode(),
  });
  return {
    repoUrl: options.repoUrl,
    username: provider.username,
    password: await provider.password(),
  };
}

async function handleToken(alias: string | undefined, flags: CredentialFlags) {
  const { password } = await resolvePassword(alias, flags);
  process.stdout.write(`${password}\n`);
}

async function handleCredentials(
  alias: string | undefined,
  flags: CredentialFlags
) {
  const { username, password } = await resolvePassword(alias, flags);
  process.stdout.write(`${JSON.stringify({ username, password })}\n`);
}

async function handleNpmrc(
  alias: string | undefined,
  options: CredentialCommandOptions
) {
  const { repoUrl, password } = await resolvePassword(alias, options);
  if (!repoUrl) {
    throw new MissingConfigurationError("repoUrl is not provided");
  }
  const filePath = path.resolve(options.file ?? ".npmrc");
  await writeNpmrc(filePath, {
    repoUrl,
    token: password,
    scope: options.scope,
  });
}

async function handleAdd(
  alias: string,
  options: CredentialFlags & { default?: boolean }
) {
  if (!options.repoUrl) {
    throw new MissingConfigurationError("--repo-url is required");
  }
  parseRepoUrl(options.repoUrl);
  const cacheExpireHours = parseExpireHours(options.expireHours);
  if (cacheExpireHours !== undefined) {
    resolveExpiryMs(cacheExpireHours);
  }

  const config = await loadConfig();
  if (config.repositories[alias]) {
    const overwrite = await confirm({
      message: `Repository alias "${alias}" already exists. Overwrite?`,
      default: false,
    });
    if (!overwrite) {
      info("Add cancelled.");
      return;
    }
  }

  const repository: RepositoryAlias = {
    alias,
    repoUrl: options.repoUrl,
    profile: options.profile,
    cacheExpireHours,
    default:
      options.default ?? Object.keys(config.repositories).length === 0,
  };
  await setRepository(repository);
  info(`Repository "${alias}" saved for ${repository.repoUrl}.`);
}

async function handleList() {
  const repositories = await listRepositories();
  const cache = new TokenCacheStore();
  const statusMap = new Map<string, string>();
  for (const repository of repositories) {
    if (!repository.profile) {
      statusMap.set(repository.alias, "no profile");
      continue;
    }
    const status = await cache.status(
      repository.profile,
      resolveExpiryMs(repository.cacheExpireHours)
    );
    statusMap.set(repository.alias, formatCacheStatus(status));
  }
  info(formatRepositories(repositories, statusMap));
}

async function handleRemove(alias: string) {
  const repository = await getRepository(alias);
  if (!repository) {
    warn(`No repository found for alias "${alias}".`);
    return;
  }
  const confirmed = await confirm({
    message: `Remove repository "${alias}"?`,
    default: false,
  });
  if (!confirmed) {
    info("Remove cancelled.");
    return;
  }
  await removeRepository(alias);
  info(`Removed repository "${alias}".`);
}

async function resolveCacheProfile(
  alias: string | undefined,
  flags: CredentialFlags
) {
  const options = await resolveCredentialOptions(alias, flags);
  if (!options.localProfile) {
    throw new MissingConfigurationError(
      "localProfile is not provided. Pass --profile or set CODEARTIFACT_PROFILE (or AWS_PROFILE)."
    );
  }
  return { profile: options.localProfile, options };
}

async function main() {
  configureLogging({ target: "stderr" });
  const program = new Command();
  program
    .name("codeartifact-sso")
    .description("AWS CodeArtifact credentials from cached SSO tokens")
    .version(PACKAGE_VERSION)
    .option("--verbose", "Log the commands being run")
    .option("--quiet", "Only log warnings, errors and login prompts")
    .hook("preAction", () => {
      const opts = program.opts<{ verbose?: boolean; quiet?: boolean }>();
      configureLogging({ verbose: opts.verbose, quiet: opts.quiet });
    });

  withCredentialOptions(
    program
      .command("token")
      .argument("[alias]", "Saved repository alias")
      .description("Print the CodeArtifact token")
  ).action(async (alias: string | undefined, options: CredentialFlags) => {
    await handleToken(alias, options);
  });

  withCredentialOptions(
    program
      .command("credentials")
      .argument("[alias]", "Saved repository alias")
      .description("Print username and password as JSON")
  ).action(async (alias: string | undefined, options: CredentialFlags) => {
    await handleCredentials(alias, options);
  });

  withCredentialOptions(
    program
      .command("npmrc")
      .argument("[alias]", "Saved repository alias")
      .option("--file <path>", "The .npmrc file to update", ".npmrc")
      .option("--scope <scope>", "Only route this package scope to the registry")
      .description("Write the registry and its token into an .npmrc")
  ).action(
    async (alias: string | undefined, options: CredentialCommandOptions) => {
      await handleNpmrc(alias, options);
    }
  );

  withCredentialOptions(
    program
      .command("add")
      .argument("<alias>", "Repository alias to save")
      .option("--default", "Use this repository when no alias is given")
      .description("Save a repository alias")
  ).action(
    async (alias: string, options: CredentialFlags & { default?: boolean }) => {
      await handleAdd(alias, options);
    }
  );

  program
    .command("list")
    .description("List saved repositories and their cached tokens")
    .action(handleList);

  program
    .command("remove")
    .argument("<alias>", "Repository alias to remove")
    .description("Remove a saved repository alias")
    .action(async (alias: string) => {
      await handleRemove(alias);
    });

  const cacheCommand = program
    .command("cache")
    .description("Inspect or reset the token cache of a profile");

  withCredentialOptions(
    cacheCommand.command("status").argument("[alias]", "Saved repository alias")
  ).action(async (alias: string | undefined, flags: CredentialFlags) => {
    const { profile, options } = await resolveCacheProfile(alias, flags);
    const status = await new TokenCacheStore().status(
      profile,
      resolveExpiryMs(options.cacheExpireHours)
    );
    info(`${profile}: ${formatCacheStatus(status)}`);
  });

  withCredentialOptions(
    cacheCommand
      .command("invalidate")
      .argument("[alias]", "Saved repository alias")
  ).action(async (alias: string | undefined, flags: CredentialFlags) => {
    const { profile } = await resolveCacheProfile(alias, flags);
    await new TokenCacheStore().invalidate(profile);
  });

  withCredentialOptions(
    cacheCommand.command("clear").argument("[alias]", "Saved repository alias")
  ).action(async (alias: string | undefined, flags: CredentialFlags) => {
    const { profile } = await resolveCacheProfile(alias, flags);
    await new TokenCacheStore().clear(profile);
    info(`Cleared token cache for '${profile}'.`);
  });

  if (process.argv.length <= 2) {
    program.outputHelp();
    return;
  }

  await program.parseAsync(process.argv);
}

main().catch((err: unknown) => {
  error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});

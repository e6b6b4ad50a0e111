import { z } from "zod";
import { ConfigFileError } from "../errors.js";
import type { ConfigFile, RepositoryAlias } from "../types.js";
import { atomicWrite, ensureDir, readTextIfExists } from "../utils/fs.js";
import { configDir, configFilePath } from "./paths.js";

const repositoryAliasSchema = z.object({
  alias: z.string().min(1),
  repoUrl: z.string().url(),
  profile: z.string().min(1).optional(),
  cacheExpireHours: z.number().int().positive().optional(),
  default: z.boolean().optional(),
});

const configFileSchema = z.object({
  repositories: z.record(repositoryAliasSchema).default({}),
});

const emptyConfig: ConfigFile = { repositories: {} };

export async function loadConfig(): Promise<ConfigFile> {
  const filePath = configFilePath();
  const raw = await readTextIfExists(filePath);
  if (raw === null) {
    return { repositories: { ...emptyConfig.repositories } };
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigFileError(filePath, String(err));
  }
  const parsed = configFileSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new ConfigFileError(filePath, `${where}${issue.message}`);
  }
  return parsed.data;
}

export async function saveConfig(config: ConfigFile) {
  await ensureDir(configDir());
  await atomicWrite(configFilePath(), JSON.stringify(config, null, 2));
}

export async function setRepository(repository: RepositoryAlias) {
  const config = await loadConfig();
  if (repository.default) {
    for (const existing of Object.values(config.repositories)) {
      existing.default = false;
    }
  }
  config.repositories[repository.alias] = repository;
  await saveConfig(config);
}

export async function removeRepository(alias: string) {
  const config = await loadConfig();
  if (config.repositories[alias]) {
    delete config.repositories[alias];
    await saveConfig(config);
  }
}

export async function getRepository(alias: string) {
  const config = await loadConfig();
  return config.repositories[alias] ?? null;
}

export async function getDefaultRepository() {
  const repositories = await listRepositories();
  return repositories.find((repository) => repository.default) ?? null;
}

export async function listRepositories() {
  const config = await loadConfig();
  return Object.values(config.repositories);
}

import type { ExecutionMode } from "../types.js";

export const DEFAULT_CACHE_EXPIRE_HOURS = 6;

export function resolveExecutionMode(
  env: NodeJS.ProcessEnv = process.env
): ExecutionMode {
  return env.CIRCLECI === "true" ? "ci" : "local";
}

export function parseExpireHours(value: string | undefined) {
  if (value === undefined || value.trim() === "") {
    return;
  }
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    return Number.NaN;
  }
  return Number(trimmed);
}

export function envDefaults(env: NodeJS.ProcessEnv = process.env) {
  return {
    repoUrl: env.CODEARTIFACT_REPO_URL || undefined,
    localProfile: env.CODEARTIFACT_PROFILE || env.AWS_PROFILE || undefined,
    cacheExpireHours: parseExpireHours(env.CODEARTIFACT_CACHE_EXPIRE_HOURS),
  };
}

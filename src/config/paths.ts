import os from "node:os";
import path from "node:path";
import { MissingConfigurationError } from "../errors.js";

export function configDir() {
  return (
    process.env.CODEARTIFACT_SSO_HOME ??
    path.join(os.homedir(), ".codeartifact-sso")
  );
}

export function configFilePath() {
  return path.join(configDir(), "config.json");
}

export function tokenCacheDir() {
  return (
    process.env.CODEARTIFACT_SSO_CACHE_DIR ??
    path.join(os.homedir(), ".cache", "awsCodeArtifact")
  );
}

/** Profile names become a directory under the cache root. */
export function assertProfileName(profile: string) {
  if (
    profile.trim() === "" ||
    profile === "." ||
    profile === ".." ||
    /[/\\]/.test(profile)
  ) {
    throw new MissingConfigurationError(
      `Invalid AWS profile name '${profile}'.`
    );
  }
  return profile;
}

export function tokenCacheFilePath(profile: string, rootDir = tokenCacheDir()) {
  return path.join(rootDir, assertProfileName(profile), "ssoToken.records");
}

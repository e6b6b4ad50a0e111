import path from "node:path";
import { registryAuthKey } from "../registry/repo-url.js";
import {
  atomicWrite,
  backupFile,
  ensureDir,
  readTextIfExists,
} from "../utils/fs.js";
import { info } from "../utils/log.js";

export type NpmrcTarget = {
  repoUrl: string;
  token: string;
  scope?: string;
};

function lineKey(line: string) {
  const separator = line.indexOf("=");
  if (separator === -1) {
    return null;
  }
  return line.slice(0, separator).trim();
}

function registryKey(scope?: string) {
  if (!scope) {
    return "registry";
  }
  const normalized = scope.startsWith("@") ? scope : `@${scope}`;
  return `${normalized}:registry`;
}

/**
 * Returns the .npmrc contents with the registry and its auth token set.
 * Earlier lines for the same keys are dropped; everything else is kept in
 * order.
 */
export function applyNpmrc(contents: string, target: NpmrcTarget) {
  const registry = registryKey(target.scope);
  const authKey = `${registryAuthKey(target.repoUrl)}:_authToken`;
  const kept = contents
    .split(/\r?\n/)
    .filter((line) => {
      const key = lineKey(line);
      return key !== registry && key !== authKey;
    });
  while (kept.length > 0 && kept[kept.length - 1].trim() === "") {
    kept.pop();
  }
  kept.push(`${registry}=${target.repoUrl}`, `${authKey}=${target.token}`);
  return `${kept.join("\n")}\n`;
}

export function currentRegistry(contents: string, scope?: string) {
  const registry = registryKey(scope);
  for (const line of contents.split(/\r?\n/)) {
    if (lineKey(line) === registry) {
      return line.slice(line.indexOf("=") + 1).trim();
    }
  }
  return null;
}

export async function writeNpmrc(filePath: string, target: NpmrcTarget) {
  const existing = await readTextIfExists(filePath);
  if (existing !== null) {
    const previous = currentRegistry(existing, target.scope);
    if (previous && previous !== target.repoUrl) {
      const backupPath = await backupFile(filePath);
      info(`Registry changed from ${previous}; backup written to ${backupPath}`);
    }
  }
  await ensureDir(path.dirname(filePath));
  await atomicWrite(filePath, applyNpmrc(existing ?? "", target));
  info(`Updated ${filePath} for ${target.repoUrl}`);
}

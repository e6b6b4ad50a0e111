import { InvalidRepoUrlError } from "../errors.js";
import type { RepoCoordinates } from "../types.js";
import { debug } from "../utils/log.js";

// https://<domain>-<account>.d.codeartifact.<region>.amazonaws.com/<format>/<repository>/
const REPO_URL_RE =
  /^https:\/\/([a-zA-Z0-9-]+)-(\d+)\.d\.codeartifact\.([a-z0-9-]+)\.amazonaws\.com.*$/;

/**
 * Splits a CodeArtifact repository URL into its registry coordinates.
 *
 * For `https://aa-bb-cc-12345.d.codeartifact.us-west-2.amazonaws.com/maven/xyz/`
 * the domain is `aa-bb-cc`, the account `12345` and the region `us-west-2`.
 */
export function parseRepoUrl(repoUrl: string): RepoCoordinates {
  const match = REPO_URL_RE.exec(repoUrl);
  if (!match) {
    throw new InvalidRepoUrlError(repoUrl);
  }
  const [, domain, account, region] = match;
  debug(
    `Parsed repoUrl: domain = '${domain}', account = '${account}', region = '${region}'`
  );
  return { domain, account, region };
}

/**
 * npm keys registry credentials by the URL without its scheme, e.g.
 * `//aa-12345.d.codeartifact.us-west-2.amazonaws.com/npm/xyz/`.
 */
export function registryAuthKey(repoUrl: string) {
  parseRepoUrl(repoUrl);
  const withSlash = repoUrl.endsWith("/") ? repoUrl : `${repoUrl}/`;
  return withSlash.replace(/^https:/, "");
}

import type { RepoCoordinates } from "../types.js";

export const AWS_CLI = "aws";

export function callerIdentityCommand(profile: string) {
  return [AWS_CLI, "sts", "get-caller-identity", "--profile", profile];
}

export function ssoLoginCommand(profile: string) {
  return [AWS_CLI, "sso", "login", "--profile", profile];
}

export function authorizationTokenCommand(
  coordinates: RepoCoordinates,
  profile?: string
) {
  const argv = [
    AWS_CLI,
    "codeartifact",
    "get-authorization-token",
    "--domain",
    coordinates.domain,
    "--domain-owner",
    coordinates.account,
    "--query",
    "authorizationToken",
    "--output",
    "text",
    "--region",
    coordinates.region,
  ];
  if (profile) {
    argv.push("--profile", profile);
  }
  return argv;
}

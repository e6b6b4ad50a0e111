export type CodeArtifactSsoErrorCode =
  | "invalid_repo_url"
  | "cache_parse"
  | "login_failed"
  | "token_fetch_failed"
  | "missing_configuration"
  | "config_file";

export class CodeArtifactSsoError extends Error {
  readonly code: CodeArtifactSsoErrorCode;

  constructor(code: CodeArtifactSsoErrorCode, message: string) {
    super(message);
    this.name = "CodeArtifactSsoError";
    this.code = code;
  }
}

export class InvalidRepoUrlError extends CodeArtifactSsoError {
  readonly repoUrl: string;

  constructor(repoUrl: string) {
    super(
      "invalid_repo_url",
      `Failed parsing repoUrl '${repoUrl}'. Expected https://<domain>-<account>.d.codeartifact.<region>.amazonaws.com/...`
    );
    this.name = "InvalidRepoUrlError";
    this.repoUrl = repoUrl;
  }
}

/**
 * Raised for an unreadable cache record. The cache layer absorbs it and
 * reports a miss; it never reaches the caller.
 */
export class CacheParseError extends CodeArtifactSsoError {
  constructor(message: string) {
    super("cache_parse", message);
    this.name = "CacheParseError";
  }
}

export class LoginFailedError extends CodeArtifactSsoError {
  readonly profile: string;
  readonly exitCode: number;

  constructor(profile: string, exitCode: number, stderr: string) {
    const detail = stderr ? `: ${stderr}` : "";
    super(
      "login_failed",
      `Failed refreshing AWS SSO login for profile '${profile}' (exit code ${exitCode})${detail}`
    );
    this.name = "LoginFailedError";
    this.profile = profile;
    this.exitCode = exitCode;
  }
}

export class TokenFetchFailedError extends CodeArtifactSsoError {
  readonly exitCode: number;
  readonly stderr: string;

  constructor(exitCode: number, stderr: string) {
    const detail = stderr || "no output on stderr";
    super(
      "token_fetch_failed",
      `Failed fetching AWS CodeArtifact token (exit code ${exitCode}): ${detail}`
    );
    this.name = "TokenFetchFailedError";
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export class MissingConfigurationError extends CodeArtifactSsoError {
  constructor(message: string) {
    super("missing_configuration", message);
    this.name = "MissingConfigurationError";
  }
}

export class ConfigFileError extends CodeArtifactSsoError {
  readonly filePath: string;

  constructor(filePath: string, message: string) {
    super("config_file", `Invalid config file ${filePath}: ${message}`);
    this.name = "ConfigFileError";
    this.filePath = filePath;
  }
}

export function isCodeArtifactSsoError(
  err: unknown
): err is CodeArtifactSsoError {
  return err instanceof CodeArtifactSsoError;
}

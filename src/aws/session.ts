import { LoginFailedError } from "../errors.js";
import type { TokenCacheStore } from "../security/token-cache.js";
import { info, notice, warn } from "../utils/log.js";
import { callerIdentityCommand, ssoLoginCommand } from "./commands.js";
import type { CommandRunner } from "./command-runner.js";

export type SessionState = "valid" | "refreshed";

/**
 * Makes sure the profile has a live SSO session before a cached token is
 * trusted. A re-login invalidates the profile's token cache, since tokens
 * minted under the old session are not reused.
 */
export class LoginSessionChecker {
  private readonly runner: CommandRunner;
  private readonly cache: TokenCacheStore;

  constructor(runner: CommandRunner, cache: TokenCacheStore) {
    this.runner = runner;
    this.cache = cache;
  }

  async ensureLoggedIn(profile: string): Promise<SessionState> {
    info(`Checking SSO login status for profile '${profile}' ...`);
    const probe = await this.runner.run(callerIdentityCommand(profile));
    if (probe.exitCode === 0) {
      info(`Already logged in with profile '${profile}'`);
      return "valid";
    }

    warn(`SSO login for profile '${profile}' expired, will refresh ...`);
    notice("Opening SSO authorization page in your default browser ...");
    const login = await this.runner.run(ssoLoginCommand(profile), {
      interactive: true,
    });
    if (login.exitCode !== 0) {
      throw new LoginFailedError(profile, login.exitCode, login.stderr.trim());
    }
    notice(`Refreshed AWS SSO login for profile '${profile}'`);

    await this.cache.invalidate(profile);
    return "refreshed";
  }
}

import { TokenFetchFailedError } from "../errors.js";
import type { RepoCoordinates } from "../types.js";
import { info } from "../utils/log.js";
import { authorizationTokenCommand } from "./commands.js";
import type { CommandRunner } from "./command-runner.js";

export class TokenFetcher {
  private readonly runner: CommandRunner;

  constructor(runner: CommandRunner) {
    this.runner = runner;
  }

  async fetch(coordinates: RepoCoordinates, profile?: string) {
    info(
      profile
        ? `Fetching CodeArtifact token with profile '${profile}' ...`
        : "Fetching CodeArtifact token without profile ..."
    );
    const result = await this.runner.run(
      authorizationTokenCommand(coordinates, profile)
    );
    if (result.exitCode !== 0) {
      throw new TokenFetchFailedError(result.exitCode, result.stderr.trim());
    }
    const token = result.stdout.trim();
    if (!token) {
      throw new TokenFetchFailedError(
        result.exitCode,
        "aws returned an empty authorization token"
      );
    }
    info("Fetched CodeArtifact token");
    return token;
  }
}

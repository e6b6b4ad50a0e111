import { describe, expect, test } from "vitest";
import { TokenFetcher } from "../src/aws/token-fetcher.js";
import { TokenFetchFailedError } from "../src/errors.js";
import { FakeRunner } from "./fixtures/fake-runner.js";

const coordinates = {
  domain: "mycompany",
  account: "123456789012",
  region: "us-west-2",
};

const baseArgv = [
  "aws",
  "codeartifact",
  "get-authorization-token",
  "--domain",
  "mycompany",
  "--domain-owner",
  "123456789012",
  "--query",
  "authorizationToken",
  "--output",
  "text",
  "--region",
  "us-west-2",
];

describe("TokenFetcher", () => {
  test("scopes the command to the profile and trims the token", async () => {
    const runner = new FakeRunner().on("codeartifact get-authorization-token", {
      stdout: "  eyTOKEN\n",
    });

    const token = await new TokenFetcher(runner).fetch(
      coordinates,
      "mycompany-dev"
    );

    expect(token).toBe("eyTOKEN");
    expect(runner.calls[0].argv).toEqual([
      ...baseArgv,
      "--profile",
      "mycompany-dev",
    ]);
    expect(runner.calls[0].options).toBeUndefined();
  });

  test("omits --profile without a profile", async () => {
    const runner = new FakeRunner().on("codeartifact get-authorization-token", {
      stdout: "eyTOKEN\n",
    });

    await new TokenFetcher(runner).fetch(coordinates);

    expect(runner.calls[0].argv).toEqual(baseArgv);
  });

  test("surfaces a failing command with its stderr", async () => {
    const runner = new FakeRunner().on("codeartifact get-authorization-token", {
      exitCode: 254,
      stderr: "An error occurred (AccessDeniedException)\n",
    });

    const failure = new TokenFetcher(runner).fetch(coordinates, "mycompany-dev");

    await expect(failure).rejects.toMatchObject({
      name: "TokenFetchFailedError",
      exitCode: 254,
      stderr: "An error occurred (AccessDeniedException)",
    });
  });

  test("never returns an empty token", async () => {
    const runner = new FakeRunner().on("codeartifact get-authorization-token", {
      stdout: "\n",
    });

    await expect(
      new TokenFetcher(runner).fetch(coordinates)
    ).rejects.toBeInstanceOf(TokenFetchFailedError);
  });
});

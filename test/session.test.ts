import { promises as fs } from "node:fs";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { LoginSessionChecker } from "../src/aws/session.js";
import { LoginFailedError } from "../src/errors.js";
import { TokenCacheStore } from "../src/security/token-cache.js";
import { FakeRunner } from "./fixtures/fake-runner.js";
import { makeTempDir, removeTempDir } from "./fixtures/temp-dir.js";

const PROFILE = "mycompany-dev";
const cachedAt = new Date(2024, 0, 15, 10, 30, 0);

let rootDir: string;
let cache: TokenCacheStore;

beforeEach(async () => {
  rootDir = await makeTempDir();
  cache = new TokenCacheStore({ rootDir });
});

afterEach(async () => {
  await removeTempDir(rootDir);
});

describe("LoginSessionChecker", () => {
  test("leaves a live session and its cache alone", async () => {
    const runner = new FakeRunner().on("sts get-caller-identity", {
      exitCode: 0,
    });
    await cache.append(PROFILE, cachedAt, "eyTOKEN");

    const state = await new LoginSessionChecker(runner, cache).ensureLoggedIn(
      PROFILE
    );

    expect(state).toBe("valid");
    expect(runner.calls.map((call) => call.argv)).toEqual([
      ["aws", "sts", "get-caller-identity", "--profile", PROFILE],
    ]);
    expect(await cache.read(PROFILE, 60_000, cachedAt)).toBe("eyTOKEN");
  });

  test("logs in interactively and invalidates the cache when the session expired", async () => {
    const runner = new FakeRunner()
      .on("sts get-caller-identity", { exitCode: 255 })
      .on("sso login", { exitCode: 0 });
    await cache.append(PROFILE, cachedAt, "eyTOKEN");

    const state = await new LoginSessionChecker(runner, cache).ensureLoggedIn(
      PROFILE
    );

    expect(state).toBe("refreshed");
    const login = runner.callsTo("sso login");
    expect(login).toHaveLength(1);
    expect(login[0].argv).toEqual([
      "aws",
      "sso",
      "login",
      "--profile",
      PROFILE,
    ]);
    expect(login[0].options).toEqual({ interactive: true });
    expect(await cache.read(PROFILE, 60_000, cachedAt)).toBeNull();
  });

  test("fails when the login command fails and keeps the cache untouched", async () => {
    const runner = new FakeRunner()
      .on("sts get-caller-identity", { exitCode: 255 })
      .on("sso login", { exitCode: 1, stderr: "browser closed\n" });
    await cache.append(PROFILE, cachedAt, "eyTOKEN");

    const checker = new LoginSessionChecker(runner, cache);
    const failure = checker.ensureLoggedIn(PROFILE);

    await expect(failure).rejects.toBeInstanceOf(LoginFailedError);
    await expect(failure).rejects.toThrow(
      "Failed refreshing AWS SSO login for profile 'mycompany-dev' (exit code 1): browser closed"
    );
    const contents = await fs.readFile(cache.filePath(PROFILE), "utf8");
    expect(contents).toBe("\n20240115-103000 eyTOKEN");
  });
});

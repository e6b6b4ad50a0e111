import { describe, expect, test } from "vitest";
import { formatCacheStatus, formatRepositories } from "../src/utils/format.js";

describe("formatCacheStatus", () => {
  test("shows when a fresh token expires", () => {
    expect(
      formatCacheStatus({
        status: "fresh",
        cachedAt: new Date(2024, 0, 15, 10, 30, 0),
        expiresAt: new Date(2024, 0, 15, 16, 30, 0),
      })
    ).toBe("fresh until 2024-01-15 16:30");
  });

  test("labels the other states", () => {
    expect(formatCacheStatus({ status: "expired" })).toBe("expired");
    expect(formatCacheStatus({ status: "invalidated" })).toBe("invalidated");
    expect(formatCacheStatus({ status: "missing" })).toBe("none");
  });
});

describe("formatRepositories", () => {
  test("explains an empty list", () => {
    expect(formatRepositories([], new Map())).toBe("No repositories configured.");
  });

  test("aligns columns and marks the default", () => {
    const table = formatRepositories(
      [
        { alias: "dev", repoUrl: "https://a", profile: "p1", default: true },
        { alias: "npm", repoUrl: "https://bb" },
      ],
      new Map([
        ["dev", "expired"],
        ["npm", "no profile"],
      ])
    );
    expect(table.split("\n")).toEqual([
      "Alias  Repository  Profile  Token",
      "-----  ----------  -------  ----------",
      "dev *  https://a   p1       expired",
      "npm    https://bb           no profile",
    ]);
  });
});

import { format } from "date-fns";
import type { CacheStatus, RepositoryAlias } from "../types.js";

export function formatCacheStatus(status: CacheStatus): string {
  switch (status.status) {
    case "fresh":
      return status.expiresAt
        ? `fresh until ${format(status.expiresAt, "yyyy-MM-dd HH:mm")}`
        : "fresh";
    case "expired":
      return "expired";
    case "invalidated":
      return "invalidated";
    case "missing":
      return "none";
    default:
      return "unknown";
  }
}

export function formatRepositories(
  repositories: RepositoryAlias[],
  statusMap: Map<string, string>
) {
  if (repositories.length === 0) {
    return "No repositories configured.";
  }
  const headers = ["Alias", "Repository", "Profile", "Token"];
  const rows = repositories.map((repository) => [
    repository.default ? `${repository.alias} *` : repository.alias,
    repository.repoUrl,
    repository.profile ?? "",
    statusMap.get(repository.alias) ?? "unknown",
  ]);
  const widths = headers.map((header, index) =>
    Math.max(header.length, ...rows.map((row) => row[index].length))
  );
  const formatRow = (row: string[]) =>
    row
      .map((cell, index) => cell.padEnd(widths[index]))
      .join("  ")
      .trimEnd();
  return [
    formatRow(headers),
    formatRow(widths.map((w) => "-".repeat(w))),
    ...rows.map(formatRow),
  ].join("\n");
}

import { promises as fs } from "node:fs";
import { addMilliseconds, format, isAfter, isValid, parse } from "date-fns";
import PQueue from "p-queue";
import { tokenCacheDir, tokenCacheFilePath } from "../config/paths.js";
import { CacheParseError } from "../errors.js";
import type { CachedTokenRecord, CacheStatus } from "../types.js";
import { appendLine, atomicWrite, readTextIfExists } from "../utils/fs.js";
import { debug, info, warn } from "../utils/log.js";

export const TIMESTAMP_PATTERN = "yyyyMMdd-HHmmss";
export const DEFAULT_MAX_RECORDS = 20;

const TIMESTAMP_RE = /^\d{8}-\d{6}$/;

const cacheWriteQueue = new PQueue({ concurrency: 1 });

export function formatTimestamp(date: Date) {
  return format(date, TIMESTAMP_PATTERN);
}

export function parseTimestamp(value: string) {
  if (!TIMESTAMP_RE.test(value)) {
    throw new CacheParseError(`Malformed cache timestamp '${value}'`);
  }
  const parsed = parse(value, TIMESTAMP_PATTERN, new Date(0));
  if (!isValid(parsed)) {
    throw new CacheParseError(`Invalid cache timestamp '${value}'`);
  }
  return parsed;
}

/**
 * Decodes the authoritative (last) line of a cache file. A blank last line
 * is the invalidation marker written after a fresh SSO login.
 */
export function decodeLastRecord(contents: string): CachedTokenRecord {
  if (contents.length === 0) {
    return { kind: "absent" };
  }
  const lines = contents.split("\n");
  const lastLine = lines[lines.length - 1].trim();
  if (lastLine.length === 0) {
    return { kind: "invalidated" };
  }
  const separator = lastLine.indexOf(" ");
  if (separator === -1) {
    throw new CacheParseError("Cache record has no token field");
  }
  const timestamp = parseTimestamp(lastLine.slice(0, separator));
  const token = lastLine.slice(separator + 1).trim();
  if (!token) {
    throw new CacheParseError("Cache record has an empty token field");
  }
  return { kind: "valid", timestamp, token };
}

export function encodeRecord(timestamp: Date, token: string) {
  return `\n${formatTimestamp(timestamp)} ${token}`;
}

export const INVALIDATION_MARKER = "\n\n";

async function inspectFile(filePath: string): Promise<CachedTokenRecord> {
  const contents = await readTextIfExists(filePath);
  if (contents === null) {
    return { kind: "absent" };
  }
  return decodeLastRecord(contents);
}

export type TokenCacheOptions = {
  rootDir?: string;
  maxRecords?: number;
};

/**
 * Append-only, line-oriented token cache with one file per profile. Only the
 * last line of a file is read; earlier lines are history.
 */
export class TokenCacheStore {
  private readonly rootDir: string;
  private readonly maxRecords: number;

  constructor(options?: TokenCacheOptions) {
    this.rootDir = options?.rootDir ?? tokenCacheDir();
    this.maxRecords = options?.maxRecords ?? DEFAULT_MAX_RECORDS;
  }

  filePath(profile: string) {
    return tokenCacheFilePath(profile, this.rootDir);
  }

  async inspect(profile: string): Promise<CachedTokenRecord> {
    return inspectFile(this.filePath(profile));
  }

  async read(profile: string, expiryMs: number, now: Date = new Date()) {
    const filePath = this.filePath(profile);
    let record: CachedTokenRecord;
    try {
      record = await inspectFile(filePath);
    } catch (err) {
      warn(`Failed to parse cached SSO token for '${profile}': ${String(err)}`);
      return null;
    }
    if (record.kind === "absent") {
      info(`Local SSO token cache for '${profile}' does not exist or is empty`);
      return null;
    }
    if (record.kind === "invalidated") {
      info(`Local SSO token cache for '${profile}' was invalidated by a login`);
      return null;
    }
    if (isAfter(now, addMilliseconds(record.timestamp, expiryMs))) {
      info(
        `Local SSO token cache for '${profile}' expired, timestamp = ${formatTimestamp(record.timestamp)}`
      );
      return null;
    }
    return record.token;
  }

  async status(
    profile: string,
    expiryMs: number,
    now: Date = new Date()
  ): Promise<CacheStatus> {
    const filePath = this.filePath(profile);
    let record: CachedTokenRecord;
    try {
      record = await inspectFile(filePath);
    } catch (err) {
      debug(`Unreadable cache for '${profile}': ${String(err)}`);
      return { status: "missing" };
    }
    if (record.kind === "absent") {
      return { status: "missing" };
    }
    if (record.kind === "invalidated") {
      return { status: "invalidated" };
    }
    const expiresAt = addMilliseconds(record.timestamp, expiryMs);
    return {
      status: isAfter(now, expiresAt) ? "expired" : "fresh",
      cachedAt: record.timestamp,
      expiresAt,
    };
  }

  /**
   * Appends a record. A failed write is logged and dropped; the next read
   * sees an older record or a miss.
   */
  async append(profile: string, timestamp: Date, token: string) {
    const filePath = this.filePath(profile);
    info(`Caching SSO token with timestamp ${formatTimestamp(timestamp)}`);
    try {
      await cacheWriteQueue.add(async () => {
        await appendLine(filePath, encodeRecord(timestamp, token));
        await this.compact(filePath);
      });
    } catch (err) {
      warn(`Failed to cache SSO token for '${profile}': ${String(err)}`);
    }
  }

  async invalidate(profile: string) {
    const filePath = this.filePath(profile);
    info(`Invalidating token cache for '${profile}'`);
    try {
      await cacheWriteQueue.add(() => appendLine(filePath, INVALIDATION_MARKER));
    } catch (err) {
      warn(`Failed to invalidate token cache for '${profile}': ${String(err)}`);
    }
  }

  async clear(profile: string) {
    const filePath = this.filePath(profile);
    await cacheWriteQueue.add(() => fs.rm(filePath, { force: true }));
  }

  private async compact(filePath: string) {
    const contents = await readTextIfExists(filePath);
    if (contents === null) {
      return;
    }
    const lines = contents.split("\n");
    const lastLine = lines[lines.length - 1];
    if (lines.length <= this.maxRecords || lastLine.trim().length === 0) {
      return;
    }
    debug(`Compacting ${lines.length} cache lines in ${filePath}`);
    await atomicWrite(filePath, `\n${lastLine}`);
  }
}

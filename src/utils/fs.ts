import crypto from "node:crypto";
import { promises as fs } from "node:fs";
import path from "node:path";

export async function ensureDir(dir: string) {
  await fs.mkdir(dir, { recursive: true });
}

export async function atomicWrite(filePath: string, contents: string) {
  const dir = path.dirname(filePath);
  const tempPath = path.join(
    dir,
    `.tmp-${process.pid}-${crypto.randomBytes(4).toString("hex")}`
  );
  try {
    await fs.writeFile(tempPath, contents, { encoding: "utf8", mode: 0o600 });
    await fs.rename(tempPath, filePath);
  } catch (err) {
    await fs.rm(tempPath, { force: true });
    throw err;
  }
}

export async function backupFile(filePath: string) {
  const timestamp = new Date().toISOString().replace(/[:.]/g, "-");
  const backupPath = `${filePath}.${timestamp}.bak`;
  await fs.copyFile(filePath, backupPath);
  return backupPath;
}

export async function readTextIfExists(filePath: string) {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      return null;
    }
    throw err;
  }
}

export async function appendLine(filePath: string, contents: string) {
  await ensureDir(path.dirname(filePath));
  const handle = await fs.open(filePath, "a", 0o600);
  try {
    await handle.write(contents);
  } finally {
    await handle.close();
  }
}

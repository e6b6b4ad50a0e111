import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

export async function makeTempDir(prefix = "codeartifact-sso-") {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeTempDir(dir: string) {
  await fs.rm(dir, { recursive: true, force: true });
}

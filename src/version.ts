import { readFileSync } from "node:fs";
import { z } from "zod";

const packageJsonSchema = z.object({
  name: z.string().optional(),
  version: z.string().optional(),
});

const packageJsonUrl = new URL("../package.json", import.meta.url);
const packageJson = packageJsonSchema.parse(
  JSON.parse(readFileSync(packageJsonUrl, "utf-8"))
);

export const PACKAGE_NAME = packageJson.name ?? "codeartifact-sso-auth";
export const PACKAGE_VERSION = packageJson.version ?? "0.0.0";

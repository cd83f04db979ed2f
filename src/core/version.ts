/**
 * Version information for the CLI, read from package.json at runtime.
 */

import { readFile } from "node:fs/promises";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";

const moduleDir = dirname(fileURLToPath(import.meta.url));

let cachedVersion: string | null = null;

async function tryReadPackageJson(path: string): Promise<string | null> {
  try {
    const content = await readFile(path, "utf-8");
    const pkg: unknown = JSON.parse(content);
    if (
      typeof pkg === "object" &&
      pkg !== null &&
      "version" in pkg &&
      typeof pkg.version === "string"
    ) {
      return pkg.version;
    }
    return null;
  } catch {
    return null;
  }
}

/**
 * Get the current version from package.json.
 * Result is cached for subsequent calls.
 *
 * Compiled code lives in dist/core/, sources in src/core/; both sit two
 * levels below the package root.
 */
export async function getVersion(): Promise<string> {
  if (cachedVersion) {
    return cachedVersion;
  }

  const version = await tryReadPackageJson(
    join(moduleDir, "..", "..", "package.json")
  );
  if (version) {
    cachedVersion = version;
    return version;
  }

  return "unknown";
}

/**
 * Configuration loading.
 */

import { readFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { parse } from "yaml";
import type { ZodIssue } from "zod";
import { ConfigError } from "../core/errors.js";
import { debug } from "../core/logger.js";
import type { CategoryConfig } from "../core/types.js";
import { configSchema } from "./schema.js";

const moduleDir = dirname(fileURLToPath(import.meta.url));

/**
 * Path of the configuration bundled with the package.
 * Both src/config/ and dist/config/ sit two levels below the package root.
 */
export const DEFAULT_CONFIG_PATH = join(moduleDir, "..", "..", "config", "default.yaml");

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${path}: ${issue.message}`;
}

/**
 * Validate configuration text. JSON is accepted as YAML.
 */
export function parseConfig(content: string, path = "<config>"): CategoryConfig[] {
  let document: unknown;
  try {
    document = parse(content);
  } catch (error) {
    throw new ConfigError(path, [error instanceof Error ? error.message : String(error)]);
  }

  // An empty file configures nothing
  if (document === null || document === undefined) {
    return [];
  }

  const result = configSchema.safeParse(document);
  if (!result.success) {
    throw new ConfigError(path, result.error.issues.map(formatIssue));
  }

  const categories: CategoryConfig[] = result.data;
  return categories;
}

/**
 * Load the configuration file, or the bundled default when no path is
 * given.
 */
export async function loadConfig(path?: string): Promise<CategoryConfig[]> {
  const configPath = path ?? DEFAULT_CONFIG_PATH;

  let content: string;
  try {
    content = await readFile(configPath, "utf-8");
  } catch (error) {
    throw new ConfigError(configPath, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  const categories = parseConfig(content, configPath);
  debug(`Loaded ${categories.length} categories from ${configPath}`);
  return categories;
}

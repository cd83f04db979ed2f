/**
 * config command implementation: print the validated configuration.
 */

import { DEFAULT_CONFIG_PATH, loadConfig } from "../../config/loader.js";
import type { CategoryConfig } from "../../core/types.js";

export interface ConfigOptions {
  configFile?: string;
  /** Print only the category names */
  names?: boolean;
}

/**
 * Render the configuration as JSON, after defaults are applied.
 */
export function renderConfigJson(config: readonly CategoryConfig[], names = false): string {
  if (names) {
    return JSON.stringify(config.map((entry) => entry.name), null, 2);
  }
  return JSON.stringify(config, null, 2);
}

/**
 * Execute the config command.
 */
export async function executeConfig(options: ConfigOptions): Promise<string> {
  const config = await loadConfig(options.configFile ?? DEFAULT_CONFIG_PATH);
  return renderConfigJson(config, options.names);
}

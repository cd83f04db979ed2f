/**
 * Diagnostics for the CLI.
 *
 * Everything goes to stderr; stdout carries only JSON Lines rows and
 * printed configuration.
 */

import { formatLocation, type SourceLocation } from "./errors.js";

export interface LoggerOptions {
  /** Hide summaries and warnings */
  quiet?: boolean;
  /** Show debug messages; ignored with quiet */
  debug?: boolean;
}

let quiet = false;
let verbose = false;
let warnings = 0;

export function configureLogger(options: LoggerOptions): void {
  quiet = options.quiet ?? false;
  verbose = !quiet && (options.debug ?? false);
}

/**
 * Back to defaults and a zero warning count (for testing).
 */
export function resetLogger(): void {
  configureLogger({});
  warnings = 0;
}

/**
 * Number of data warnings raised so far, shown or not.
 */
export function warningCount(): number {
  return warnings;
}

/**
 * Run summaries. Hidden by --quiet.
 */
export function info(message: string): void {
  if (!quiet) {
    console.error(message);
  }
}

/**
 * A problem with the data that does not stop the run, tagged with the
 * input position when it is known.
 */
export function warn(message: string, location?: SourceLocation): void {
  warnings++;
  if (!quiet) {
    console.error(`warning: ${message}${formatLocation(location)}`);
  }
}

export function debug(message: string): void {
  if (verbose) {
    console.error(`[DEBUG] ${message}`);
  }
}

/**
 * Fatal errors. Never suppressed.
 */
export function error(message: string): void {
  console.error(message);
}

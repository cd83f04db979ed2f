#!/usr/bin/env node
/**
 * remint CLI entry point.
 */

import { Command, InvalidArgumentError } from "commander";
import { executeConfig } from "./commands/config/index.js";
import { executeConvert, isOutputFormat, OUTPUT_FORMATS } from "./commands/convert/index.js";
import { executeScan } from "./commands/scan/index.js";
import { parseEncoding } from "./commands/shared.js";
import { parseCategoryList } from "./core/category-filter.js";
import { RemintError } from "./core/errors.js";
import { configureLogger, error as logError } from "./core/logger.js";
import type { OutputFormat } from "./core/types.js";
import { getVersion } from "./core/version.js";

function parseFormat(value: string): OutputFormat {
  if (!isOutputFormat(value)) {
    throw new InvalidArgumentError(`Expected one of: ${OUTPUT_FORMATS.join(", ")}`);
  }
  return value;
}

function parseEncodingOption(value: string): BufferEncoding {
  try {
    return parseEncoding(value);
  } catch (error) {
    throw new InvalidArgumentError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Handle errors and exit with appropriate code.
 */
function handleError(error: unknown): never {
  if (error instanceof RemintError) {
    logError(`Error: ${error.message}`);
    process.exit(error.exitCode);
  }

  if (error instanceof Error) {
    logError(`Unexpected error: ${error.message}`);
    if (process.env.DEBUG) {
      logError(error.stack ?? "");
    }
  } else {
    logError("An unexpected error occurred");
  }

  process.exit(1);
}

async function main(): Promise<void> {
  const program = new Command();

  program
    .name("remint")
    .description(
      "Convert periodic fixed-width monitoring dumps into per-category spreadsheets and CSV files"
    )
    .version(await getVersion())
    .option("-q, --quiet", "Suppress the run summary and warnings", false)
    .option("--debug", "Print diagnostic messages", false)
    .hook("preAction", (command) => {
      const globals = command.opts<{ quiet: boolean; debug: boolean }>();
      configureLogger({ quiet: globals.quiet, debug: globals.debug });
    });

  // convert command
  program
    .command("convert", { isDefault: true })
    .description("Convert dump files (plain or gzip) into xlsx, csv or jsonl output")
    .argument("<files...>", "Dump files, processed in the given order")
    .option("-o, --output <prefix>", "Output file prefix")
    .option("-b, --begin <time>", "Only rows at or after this time (YYYY-MM-DD HH:MM:SS)")
    .option("-e, --end <time>", "Only rows at or before this time (YYYY-MM-DD HH:MM:SS)")
    .option("-c, --category <list>", "Comma-separated categories or globs to output", parseCategoryList)
    .option("-f, --file <config>", "Configuration file (YAML or JSON)")
    .option("-T, --format <format>", `Output format (${OUTPUT_FORMATS.join("|")})`, parseFormat, "xlsx")
    .option("-E, --encoding <encoding>", "Input text encoding", parseEncodingOption, "utf8")
    .action(async (files: string[], options) => {
      try {
        await executeConvert({
          files,
          output: options.output,
          begin: options.begin,
          end: options.end,
          categories: options.category,
          configFile: options.file,
          format: options.format,
          encoding: options.encoding,
        });
      } catch (error) {
        handleError(error);
      }
    });

  // scan command
  program
    .command("scan")
    .description("List the tables found in dump files without writing output")
    .argument("<files...>", "Dump files, processed in the given order")
    .option("-b, --begin <time>", "Only count rows at or after this time")
    .option("-e, --end <time>", "Only count rows at or before this time")
    .option("-c, --category <list>", "Comma-separated categories or globs to count", parseCategoryList)
    .option("-E, --encoding <encoding>", "Input text encoding", parseEncodingOption, "utf8")
    .action(async (files: string[], options) => {
      try {
        await executeScan({
          files,
          begin: options.begin,
          end: options.end,
          categories: options.category,
          encoding: options.encoding,
        });
      } catch (error) {
        handleError(error);
      }
    });

  // config command
  program
    .command("config")
    .description("Print the validated configuration as JSON")
    .option("-f, --file <config>", "Configuration file (YAML or JSON)")
    .option("--names", "Print only the configured category names", false)
    .action(async (options) => {
      try {
        console.log(await executeConfig({ configFile: options.file, names: options.names }));
      } catch (error) {
        handleError(error);
      }
    });

  await program.parseAsync();
}

main().catch(handleError);

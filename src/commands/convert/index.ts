/**
 * convert command implementation.
 */

import { loadConfig } from "../../config/loader.js";
import { LineAssembler } from "../../core/assembler.js";
import { createCategoryFilter } from "../../core/category-filter.js";
import { RemintError } from "../../core/errors.js";
import { info, warningCount } from "../../core/logger.js";
import { createTimeWindow } from "../../core/time-filter.js";
import type {
  AssemblerStats,
  CategoryConfig,
  OutputFormat,
  OutputSink,
} from "../../core/types.js";
import { CsvSink } from "../../render/csv.js";
import { JsonLinesSink } from "../../render/jsonl.js";
import { renderRunSummary } from "../../render/terminal.js";
import { WorkbookSink } from "../../render/workbook.js";
import { feedFiles } from "../shared.js";

// ============================================================================
// Types
// ============================================================================

export interface ConvertOptions {
  files: string[];
  output?: string;
  begin?: string;
  end?: string;
  categories?: string[];
  configFile?: string;
  format: OutputFormat;
  encoding?: BufferEncoding;
}

export interface ConvertResult {
  stats: AssemblerStats;
  outputs: string[];
}

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["xlsx", "csv", "jsonl"];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

// ============================================================================
// Sinks
// ============================================================================

interface SinkHandle {
  sink: OutputSink;
  outputs: () => string[];
}

function createSink(
  format: OutputFormat,
  output: string | undefined,
  config: readonly CategoryConfig[]
): SinkHandle {
  if (format === "jsonl") {
    return { sink: new JsonLinesSink(), outputs: () => [] };
  }

  if (!output) {
    throw new RemintError(
      "Missing output file prefix.\nUse -o, --output <prefix>.",
      2
    );
  }

  if (format === "csv") {
    const sink = new CsvSink(output);
    return { sink, outputs: () => sink.files() };
  }

  const path = output.endsWith(".xlsx") ? output : `${output}.xlsx`;
  const reportCategories = config.filter((entry) => entry.pivot).map((entry) => entry.name);
  return { sink: new WorkbookSink(path, { reportCategories }), outputs: () => [path] };
}

// ============================================================================
// Command Handler
// ============================================================================

/**
 * Execute the convert command.
 */
export async function executeConvert(options: ConvertOptions): Promise<ConvertResult> {
  if (options.files.length === 0) {
    throw new RemintError("Missing input file.", 2);
  }

  const warningsBefore = warningCount();
  const config = await loadConfig(options.configFile);
  const timeWindow = createTimeWindow({ begin: options.begin, end: options.end });
  const { sink, outputs } = createSink(options.format, options.output, config);

  const assembler = new LineAssembler({
    sink,
    config,
    categoryFilter: createCategoryFilter(options.categories),
    timeWindow,
  });

  await feedFiles(assembler, options.files, options.encoding);
  await assembler.close();

  const result = { stats: assembler.stats(), outputs: outputs() };
  info(
    renderRunSummary({
      stats: result.stats,
      config,
      outputs: result.outputs,
      warnings: warningCount() - warningsBefore,
    })
  );
  return result;
}

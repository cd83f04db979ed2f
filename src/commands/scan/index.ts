/**
 * scan command implementation: list the tables found in dump files
 * without writing any output.
 */

import { LineAssembler } from "../../core/assembler.js";
import { createCategoryFilter } from "../../core/category-filter.js";
import { RemintError } from "../../core/errors.js";
import { info, warningCount } from "../../core/logger.js";
import { createTimeWindow } from "../../core/time-filter.js";
import type { AssemblerStats } from "../../core/types.js";
import { MemorySink } from "../../render/memory.js";
import { renderRunSummary } from "../../render/terminal.js";
import { feedFiles } from "../shared.js";

export interface ScanOptions {
  files: string[];
  begin?: string;
  end?: string;
  categories?: string[];
  encoding?: BufferEncoding;
}

export interface ScanResult {
  stats: AssemblerStats;
  headers: Map<string, string[]>;
}

/**
 * Execute the scan command.
 */
export async function executeScan(options: ScanOptions): Promise<ScanResult> {
  if (options.files.length === 0) {
    throw new RemintError("Missing input file.", 2);
  }

  const warningsBefore = warningCount();
  const sink = new MemorySink({ retainRows: false });
  const assembler = new LineAssembler({
    sink,
    categoryFilter: createCategoryFilter(options.categories),
    timeWindow: createTimeWindow({ begin: options.begin, end: options.end }),
  });

  await feedFiles(assembler, options.files, options.encoding);
  await assembler.close();

  const headers = new Map<string, string[]>();
  for (const category of sink.categories()) {
    headers.set(
      category,
      (sink.header(category) ?? []).map((field) => field ?? "")
    );
  }

  const stats = assembler.stats();
  info(
    renderRunSummary({ stats, config: [], headers, warnings: warningCount() - warningsBefore })
  );
  return { stats, headers };
}

/**
 * remint library exports.
 *
 * This module exports the core types and functions for programmatic use.
 */

// Core
export * from "./core/types.js";
export * from "./core/errors.js";
export { configureLogger, warningCount, type LoggerOptions } from "./core/logger.js";
export { LineAssembler, CATEGORY_INDEX, TIMESTAMP_INDEX, type AssemblerOptions } from "./core/assembler.js";
export { deriveLayout, isSeparatorLine, sliceLine, sliceWithLayout } from "./core/layout.js";
export { HeaderRegistry, diffColumnName } from "./core/header-registry.js";
export { DiffEngine, parseLenientInt, type ColumnIndexFn } from "./core/diff-engine.js";
export {
  TimeFilter,
  createTimeWindow,
  parseTimestamp,
  DEFAULT_TIME_WINDOW,
  type TimeWindow,
} from "./core/time-filter.js";
export { createCategoryFilter, parseCategoryList, type CategoryFilter } from "./core/category-filter.js";

// Configuration
export { loadConfig, parseConfig, DEFAULT_CONFIG_PATH } from "./config/loader.js";

// Input
export { readLines, isGzipFile } from "./input/reader.js";

// Sinks
export { CsvSink, formatCsvLine } from "./render/csv.js";
export { WorkbookSink, type WorkbookSinkOptions } from "./render/workbook.js";
export { JsonLinesSink, type JsonLinesRecord } from "./render/jsonl.js";
export { MemorySink } from "./render/memory.js";
export { buildPivot, type PivotSummary } from "./render/pivot.js";

// Commands
export { executeConvert, type ConvertOptions } from "./commands/convert/index.js";
export { executeScan, type ScanOptions } from "./commands/scan/index.js";

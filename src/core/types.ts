/**
 * Core types for remint.
 */

// ============================================================================
// Rows and Layouts
// ============================================================================

/**
 * One output cell. `null` marks a difference that has no previous sample.
 */
export type Cell = string | null;

export type Row = Cell[];

/**
 * One fixed-width column: character offset and width.
 */
export interface Span {
  start: number;
  width: number;
}

/**
 * Column layout derived from a separator line.
 */
export interface FieldLayout {
  spans: Span[];
  /** Total characters covered, gaps included */
  width: number;
}

export type LayoutResult =
  | { kind: "layout"; layout: FieldLayout }
  | { kind: "not-separator" };

// ============================================================================
// Configuration
// ============================================================================

/**
 * Columns to difference between consecutive samples.
 */
export interface DiffSpec {
  /** Columns that identify one counter instance */
  id: string[];
  /** Columns whose delta is emitted as diff_<name> */
  value: string[];
}

export interface ItemFilter {
  field: string;
  items: string[];
}

export interface TopFilter {
  type: "top" | "bottom";
  count: number;
}

/**
 * Report settings for a category. The assembler forwards these untouched;
 * only reporting sinks read them.
 */
export interface ReportSpec {
  rowField: string;
  columnFields: string[];
  dataFields: string[];
  pageField?: string;
  currentPage?: string;
  visible: ItemFilter[];
  invisible: ItemFilter[];
  topFilter?: TopFilter;
}

export interface CategoryConfig {
  name: string;
  diff?: DiffSpec;
  pivot?: ReportSpec;
}

// ============================================================================
// Output
// ============================================================================

/**
 * Destination for assembled rows.
 *
 * The first row put for a category is its header. `applyReport` is an
 * optional capability; sinks without it are never asked for reports.
 */
export interface OutputSink {
  putRow(category: string, fields: readonly Cell[]): void;
  applyReport?(category: string, spec: ReportSpec): Promise<void> | void;
  finish(): Promise<void>;
}

/**
 * Output formats selectable from the CLI.
 */
export type OutputFormat = "xlsx" | "csv" | "jsonl";

// ============================================================================
// Statistics
// ============================================================================

export interface CategoryStats {
  category: string;
  columns: number;
  rows: number;
  /** False when the category filter hides this category */
  included: boolean;
}

export interface AssemblerStats {
  lines: number;
  separators: number;
  rowsEmitted: number;
  rowsOutsideWindow: number;
  categories: CategoryStats[];
}

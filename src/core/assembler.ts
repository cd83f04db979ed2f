/**
 * Streaming table assembler.
 *
 * Consumes a dump one line at a time and turns every fixed-width table
 * block into rows for the sink. A block is recognised by a triple of
 * lines: header, separator, first data row. The first column of that
 * data row names the block's category.
 *
 * State Machine:
 *   NO_LAYOUT ──separator──► HAVE_LAYOUT(category)
 *   HAVE_LAYOUT ──separator──► HAVE_LAYOUT(new category)
 *
 * In HAVE_LAYOUT, the newest line of the window is sliced with the
 * current layout and emitted when its category matches the active one
 * and its timestamp lies inside the time window.
 */

import { createCategoryFilter, type CategoryFilter } from "./category-filter.js";
import { DiffEngine } from "./diff-engine.js";
import { AssemblerClosedError, type SourceLocation } from "./errors.js";
import { HeaderRegistry } from "./header-registry.js";
import { deriveLayout, sliceLine } from "./layout.js";
import { debug, warn } from "./logger.js";
import { DEFAULT_TIME_WINDOW, TimeFilter, type TimeWindow } from "./time-filter.js";
import type {
  AssemblerStats,
  CategoryConfig,
  FieldLayout,
  OutputSink,
  Row,
} from "./types.js";

/** Position of the category name (CNAME) in every row */
export const CATEGORY_INDEX = 0;
/** Position of the sample timestamp (PTIME) in every row */
export const TIMESTAMP_INDEX = 1;

type AssemblerState =
  | { kind: "no-layout" }
  | { kind: "have-layout"; layout: FieldLayout; category: string };

export interface AssemblerOptions {
  sink: OutputSink;
  /** Per-category diff and report settings */
  config?: readonly CategoryConfig[];
  /** Restricts which categories reach the sink */
  categoryFilter?: CategoryFilter;
  timeWindow?: TimeWindow;
}

export class LineAssembler {
  private readonly sink: OutputSink;
  private readonly config: readonly CategoryConfig[];
  private readonly configByName: Map<string, CategoryConfig>;
  private readonly categoryFilter: CategoryFilter;
  private readonly timeFilter: TimeFilter;

  private readonly headers = new HeaderRegistry();
  private readonly diffs = new DiffEngine();

  private window: [string, string, string] = ["", "", ""];
  private state: AssemblerState = { kind: "no-layout" };
  private closed = false;

  private source = "<input>";
  private lineNumber = 0;

  private totalLines = 0;
  private separators = 0;
  private rowsEmitted = 0;
  private rowsOutsideWindow = 0;
  private readonly rowsByCategory = new Map<string, number>();
  private readonly headersEmitted = new Set<string>();
  private readonly headersChanged = new Set<string>();

  constructor(options: AssemblerOptions) {
    this.sink = options.sink;
    this.config = options.config ?? [];
    this.configByName = new Map(this.config.map((entry) => [entry.name, entry]));
    this.categoryFilter = options.categoryFilter ?? createCategoryFilter();
    this.timeFilter = new TimeFilter(options.timeWindow ?? DEFAULT_TIME_WINDOW);
  }

  /**
   * Mark the start of a new input source. Errors raised afterwards
   * carry this name and the line number inside it.
   * The sliding window carries over from the previous source.
   */
  beginSource(name: string): void {
    this.source = name;
    this.lineNumber = 0;
  }

  /**
   * Feed one line, without its terminator.
   */
  push(line: string): void {
    if (this.closed) {
      throw new AssemblerClosedError();
    }

    this.lineNumber++;
    this.totalLines++;
    this.window = [this.window[1], this.window[2], line];
    const [previous, middle, newest] = this.window;

    const detected = deriveLayout(middle);
    if (detected.kind === "layout") {
      this.enterLayout(detected.layout, previous, newest);
    }

    if (this.state.kind === "no-layout") {
      return;
    }

    const { layout, category } = this.state;
    const row: Row = sliceLine(newest, layout);

    // Lines from another block (stale layout, headers, separators) are dropped
    if (row[CATEGORY_INDEX] !== category) {
      return;
    }

    if (!this.timeFilter.accepts(row[TIMESTAMP_INDEX] ?? "", this.location())) {
      this.rowsOutsideWindow++;
      return;
    }

    const diffSpec = this.configByName.get(category)?.diff;
    if (diffSpec) {
      row.push(
        ...this.diffs.diff(
          category,
          row,
          (field) => this.headers.columnIndex(category, field),
          diffSpec
        )
      );
    }

    if (this.categoryFilter(category)) {
      this.sink.putRow(category, row);
      this.rowsEmitted++;
      this.rowsByCategory.set(category, (this.rowsByCategory.get(category) ?? 0) + 1);
    }
  }

  /**
   * Apply configured reports and finish the sink. Call once, after the
   * last line of the last source.
   */
  async close(): Promise<void> {
    if (this.closed) {
      throw new AssemblerClosedError();
    }
    this.closed = true;

    for (const entry of this.config) {
      if (!entry.pivot || !this.headersEmitted.has(entry.name)) {
        continue;
      }
      if (this.sink.applyReport) {
        debug(`Building report for ${entry.name}`);
        await this.sink.applyReport(entry.name, entry.pivot);
      }
    }

    await this.sink.finish();
  }

  stats(): AssemblerStats {
    return {
      lines: this.totalLines,
      separators: this.separators,
      rowsEmitted: this.rowsEmitted,
      rowsOutsideWindow: this.rowsOutsideWindow,
      categories: this.headers.categories().map((category) => ({
        category,
        columns: this.headers.header(category)?.length ?? 0,
        rows: this.rowsByCategory.get(category) ?? 0,
        included: this.categoryFilter(category),
      })),
    };
  }

  private enterLayout(layout: FieldLayout, headerLine: string, dataLine: string): void {
    const category = sliceLine(dataLine, layout)[CATEGORY_INDEX] ?? "";
    const headerFields = sliceLine(headerLine, layout);
    const diffValues = this.configByName.get(category)?.diff?.value ?? [];

    this.separators++;
    this.state = { kind: "have-layout", layout, category };

    if (!this.headers.recordIfNew(category, headerFields, diffValues)) {
      this.checkHeader(category, headerFields, diffValues.length);
      return;
    }

    debug(`New category ${category} at ${this.source}:${this.lineNumber - 1}`);
    if (this.categoryFilter(category)) {
      this.sink.putRow(category, [...(this.headers.header(category) ?? [])]);
      this.headersEmitted.add(category);
    }
  }

  /**
   * Warn once per category when a later block prints a different header.
   */
  private checkHeader(category: string, headerFields: readonly string[], diffCount: number): void {
    const recorded = this.headers.header(category) ?? [];
    const same =
      recorded.length === headerFields.length + diffCount &&
      headerFields.every((field, i) => recorded[i] === field);
    if (same || this.headersChanged.has(category)) {
      return;
    }
    this.headersChanged.add(category);
    warn(
      `header of ${category} differs from its first block; columns keep the first names`,
      this.location()
    );
  }

  private location(): SourceLocation {
    return { source: this.source, line: this.lineNumber };
  }
}

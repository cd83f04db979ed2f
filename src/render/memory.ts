/**
 * In-memory output, for library callers and tests.
 */

import type { Cell, OutputSink, ReportSpec } from "../core/types.js";

export interface MemorySinkOptions {
  /** Keep only the header and a row count per category */
  retainRows?: boolean;
}

interface MemoryTable {
  header: Cell[];
  rows: Cell[][];
  count: number;
}

export class MemorySink implements OutputSink {
  private readonly tables = new Map<string, MemoryTable>();
  private readonly retainRows: boolean;
  readonly reports: { category: string; spec: ReportSpec }[] = [];
  finished = false;

  constructor(options: MemorySinkOptions = {}) {
    this.retainRows = options.retainRows ?? true;
  }

  putRow(category: string, fields: readonly Cell[]): void {
    const table = this.tables.get(category);
    if (!table) {
      this.tables.set(category, { header: [...fields], rows: [], count: 0 });
      return;
    }
    table.count++;
    if (this.retainRows) {
      table.rows.push([...fields]);
    }
  }

  applyReport(category: string, spec: ReportSpec): void {
    this.reports.push({ category, spec });
  }

  async finish(): Promise<void> {
    this.finished = true;
  }

  categories(): string[] {
    return [...this.tables.keys()];
  }

  header(category: string): Cell[] | undefined {
    return this.tables.get(category)?.header;
  }

  /**
   * Data rows of a category, header excluded.
   */
  rows(category: string): Cell[][] {
    return this.tables.get(category)?.rows ?? [];
  }

  rowCount(category: string): number {
    return this.tables.get(category)?.count ?? 0;
  }
}

/**
 * Spreadsheet output: one .xlsx workbook, one sheet per category and a
 * pivot summary sheet per configured report.
 */

import ExcelJS from "exceljs";
import type { CellValue, Worksheet } from "exceljs";
import { debug, warn } from "../core/logger.js";
import type { Cell, OutputSink, ReportSpec } from "../core/types.js";
import { buildPivot, GRAND_TOTAL, type PivotSummary } from "./pivot.js";

/** Rows collected before they are added to a sheet */
export const BUFFER_ROWS = 1024;
export const MAX_SHEET_NAME_LENGTH = 31;
export const MAX_CELL_TEXT_LENGTH = 254;
export const MAX_SHEET_ROWS = 1_048_576;
export const FONT_SIZE = 8;
export const COLUMN_WIDTH = 12;

const INVALID_SHEET_CHARS = /[\\/*?:[\]]/g;
const PLAIN_NUMBER = /^-?\d+(\.\d+)?$/;
/** Longer digit strings would lose precision as numbers */
const MAX_NUMBER_DIGITS = 15;

/**
 * Convert a cell to the value stored in the sheet: numbers for numeric
 * text, truncated text otherwise.
 */
export function toSheetValue(cell: Cell): CellValue {
  if (cell === null) {
    return null;
  }
  if (PLAIN_NUMBER.test(cell) && cell.replace(/[-.]/g, "").length <= MAX_NUMBER_DIGITS) {
    return Number(cell);
  }
  return cell.length > MAX_CELL_TEXT_LENGTH ? cell.slice(0, MAX_CELL_TEXT_LENGTH) : cell;
}

/**
 * Sheet name allowed by spreadsheet applications.
 */
export function sanitizeSheetName(name: string): string {
  const cleaned = name.replace(INVALID_SHEET_CHARS, "_").slice(0, MAX_SHEET_NAME_LENGTH);
  return cleaned.length > 0 ? cleaned : "_";
}

export interface WorkbookSinkOptions {
  /**
   * Categories whose rows are kept in memory for a pivot summary.
   * Without it every category's rows are kept.
   */
  reportCategories?: Iterable<string>;
}

class SheetWriter {
  private buffer: Cell[][] = [];
  private readonly written: Cell[][] = [];
  private count = 0;
  private omitted = false;

  constructor(
    readonly sheet: Worksheet,
    readonly retainRows: boolean
  ) {}

  put(fields: readonly Cell[]): void {
    if (this.count >= MAX_SHEET_ROWS) {
      if (!this.omitted) {
        warn(
          `sheet ${this.sheet.name} is full at ${MAX_SHEET_ROWS} rows; ` +
            `dropping rows from "${fields.join(", ")}" on`
        );
        this.omitted = true;
      }
      return;
    }

    this.buffer.push([...fields]);
    this.count++;
    if (this.buffer.length >= BUFFER_ROWS) {
      this.flush();
    }
  }

  flush(): void {
    if (this.buffer.length === 0) {
      return;
    }
    const added = this.sheet.addRows(this.buffer.map((row) => row.map(toSheetValue)));
    for (const row of added) {
      row.font = { size: FONT_SIZE };
    }
    if (this.retainRows) {
      this.written.push(...this.buffer);
    }
    this.buffer = [];
  }

  /**
   * Everything put so far, header first, when rows are retained.
   */
  rows(): readonly Cell[][] {
    this.flush();
    return this.written;
  }
}

export class WorkbookSink implements OutputSink {
  private readonly workbook = new ExcelJS.Workbook();
  private readonly sheets = new Map<string, SheetWriter>();
  private readonly sheetNames = new Set<string>();
  private readonly reportCategories: ReadonlySet<string> | undefined;

  constructor(
    readonly path: string,
    options: WorkbookSinkOptions = {}
  ) {
    this.workbook.created = new Date();
    this.reportCategories =
      options.reportCategories === undefined ? undefined : new Set(options.reportCategories);
  }

  putRow(category: string, fields: readonly Cell[]): void {
    let writer = this.sheets.get(category);
    if (!writer) {
      const retain = this.reportCategories?.has(category) ?? true;
      writer = new SheetWriter(this.addSheet(category), retain);
      this.sheets.set(category, writer);
    }
    writer.put(fields);
  }

  /**
   * Add a pivot summary sheet for a category.
   */
  applyReport(category: string, spec: ReportSpec): void {
    const writer = this.sheets.get(category);
    if (!writer) {
      debug(`No rows for ${category}; report skipped`);
      return;
    }
    if (!writer.retainRows) {
      warn(`rows of ${category} were not kept for a report; pivot sheet skipped`);
      return;
    }

    const [header = [], ...data] = writer.rows();
    const summary = buildPivot(
      category,
      header.map((field) => field ?? ""),
      data,
      spec
    );
    this.writePivot(this.addSheet(`Pivot${category}`.replace(/ /g, "")), summary);
  }

  async finish(): Promise<void> {
    for (const writer of this.sheets.values()) {
      writer.flush();
    }
    if (this.workbook.worksheets.length === 0) {
      warn("no rows were emitted; writing an empty workbook");
      this.addSheet("empty");
    }
    await this.workbook.xlsx.writeFile(this.path);
  }

  private addSheet(name: string): Worksheet {
    const base = sanitizeSheetName(name);
    let candidate = base;
    for (let n = 2; this.sheetNames.has(candidate.toLowerCase()); n++) {
      const suffix = `~${n}`;
      candidate = base.slice(0, MAX_SHEET_NAME_LENGTH - suffix.length) + suffix;
    }
    this.sheetNames.add(candidate.toLowerCase());

    return this.workbook.addWorksheet(candidate, {
      properties: { defaultColWidth: COLUMN_WIDTH },
    });
  }

  private writePivot(sheet: Worksheet, summary: PivotSummary): void {
    const lines: CellValue[][] = [];
    if (summary.pageField !== undefined) {
      lines.push([summary.pageField, summary.currentPage ?? null]);
    }
    lines.push([]);
    lines.push([summary.rowField, ...summary.columns]);
    for (const row of summary.rows) {
      lines.push([row.key, ...row.cells]);
    }
    lines.push([GRAND_TOTAL, ...summary.totals]);

    for (const row of sheet.addRows(lines)) {
      row.font = { size: FONT_SIZE };
    }
  }
}

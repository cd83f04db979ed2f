/**
 * Pivot summaries of category rows.
 *
 * Sums data fields by row field and column fields, the way a spreadsheet
 * pivot table with "Sum" aggregation lays them out.
 */

import { UnknownColumnError } from "../core/errors.js";
import type { Cell, ItemFilter, ReportSpec } from "../core/types.js";

export const ALL_PAGES = "(All)";
export const BLANK_ITEM = "(blank)";
export const GRAND_TOTAL = "Grand Total";

const NUMERIC = /^\s*[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?\s*$/;

export interface PivotSummary {
  rowField: string;
  pageField?: string;
  currentPage?: string;
  /** Column labels, after the row label column */
  columns: string[];
  rows: { key: string; cells: (number | null)[] }[];
  /** Grand total row, aligned with columns */
  totals: (number | null)[];
}

/**
 * Numeric value of a cell, or null for text and empty cells.
 */
export function numericValue(cell: Cell | undefined): number | null {
  if (cell === null || cell === undefined || !NUMERIC.test(cell)) {
    return null;
  }
  return Number(cell);
}

function itemOf(cell: Cell | undefined): string {
  return cell === null || cell === undefined || cell === "" ? BLANK_ITEM : cell;
}

function addTo(map: Map<string, number>, key: string, value: number): void {
  map.set(key, (map.get(key) ?? 0) + value);
}

class SumTable {
  private readonly sums = new Map<string, Map<string, number>>();

  add(rowKey: string, columnKey: string, value: number): void {
    let row = this.sums.get(rowKey);
    if (!row) {
      row = new Map();
      this.sums.set(rowKey, row);
    }
    addTo(row, columnKey, value);
  }

  get(rowKey: string, columnKey: string): number | null {
    return this.sums.get(rowKey)?.get(columnKey) ?? null;
  }
}

function sumOrNull(values: (number | null)[]): number | null {
  const present = values.filter((value): value is number => value !== null);
  return present.length === 0 ? null : present.reduce((a, b) => a + b, 0);
}

/**
 * Build a pivot summary from a category's header and data rows.
 * Fields missing from the header throw UnknownColumnError.
 */
export function buildPivot(
  category: string,
  header: readonly string[],
  rows: readonly (readonly Cell[])[],
  spec: ReportSpec
): PivotSummary {
  const indexOf = (field: string): number => {
    const index = header.indexOf(field);
    if (index < 0) {
      throw new UnknownColumnError(category, field);
    }
    return index;
  };

  const rowIndex = indexOf(spec.rowField);
  const columnIndexes = spec.columnFields.map(indexOf);
  const dataIndexes = spec.dataFields.map(indexOf);
  const pageIndex = spec.pageField === undefined ? undefined : indexOf(spec.pageField);

  const compileFilter = (filter: ItemFilter) => ({
    index: indexOf(filter.field),
    items: new Set(filter.items),
  });
  const visible = spec.visible.map(compileFilter);
  const invisible = spec.invisible.map(compileFilter);

  const selected = rows.filter((row) => {
    if (
      pageIndex !== undefined &&
      spec.currentPage !== undefined &&
      spec.currentPage !== ALL_PAGES &&
      itemOf(row[pageIndex]) !== spec.currentPage
    ) {
      return false;
    }
    if (invisible.some(({ index, items }) => items.has(itemOf(row[index])))) {
      return false;
    }
    return visible.every(({ index, items }) => items.has(itemOf(row[index])));
  });

  const rowKeys: string[] = [];
  const columnKeys: string[] = [];
  const seenRows = new Set<string>();
  const seenColumns = new Set<string>();
  const tables = spec.dataFields.map(() => new SumTable());
  const firstFieldTotals = new Map<string, number>();

  for (const row of selected) {
    const rowKey = itemOf(row[rowIndex]);
    const columnKey = columnIndexes.map((index) => itemOf(row[index])).join(" / ");

    if (!seenRows.has(rowKey)) {
      seenRows.add(rowKey);
      rowKeys.push(rowKey);
    }
    if (!seenColumns.has(columnKey)) {
      seenColumns.add(columnKey);
      columnKeys.push(columnKey);
    }

    dataIndexes.forEach((index, dataPosition) => {
      const value = numericValue(row[index]);
      if (value === null) {
        return;
      }
      tables[dataPosition]?.add(rowKey, columnKey, value);
      if (dataPosition === 0) {
        addTo(firstFieldTotals, columnKey, value);
      }
    });
  }

  let keptColumns = columnKeys;
  if (spec.topFilter && columnIndexes.length > 0) {
    const direction = spec.topFilter.type === "top" ? -1 : 1;
    const ranked = [...columnKeys].sort(
      (a, b) => direction * ((firstFieldTotals.get(a) ?? 0) - (firstFieldTotals.get(b) ?? 0))
    );
    const kept = new Set(ranked.slice(0, spec.topFilter.count));
    keptColumns = columnKeys.filter((key) => kept.has(key));
  }

  const hasColumns = columnIndexes.length > 0;
  const multipleData = spec.dataFields.length > 1;
  const columns: string[] = [];
  for (const dataField of spec.dataFields) {
    if (!hasColumns) {
      columns.push(`Sum / ${dataField}`);
      continue;
    }
    for (const key of keptColumns) {
      columns.push(multipleData ? `${key} - Sum / ${dataField}` : key);
    }
  }
  if (hasColumns) {
    for (const dataField of spec.dataFields) {
      columns.push(multipleData ? `Total Sum / ${dataField}` : GRAND_TOTAL);
    }
  }

  const cellsFor = (rowKey: string): (number | null)[] => {
    const values: (number | null)[] = [];
    const rowTotals: (number | null)[] = [];
    tables.forEach((table) => {
      if (!hasColumns) {
        values.push(table.get(rowKey, ""));
        return;
      }
      const group = keptColumns.map((key) => table.get(rowKey, key));
      values.push(...group);
      rowTotals.push(sumOrNull(group));
    });
    return [...values, ...rowTotals];
  };

  const bodyRows = rowKeys.map((key) => ({ key, cells: cellsFor(key) }));
  const totals = columns.map((_, position) =>
    sumOrNull(bodyRows.map((row) => row.cells[position] ?? null))
  );

  return {
    rowField: spec.rowField,
    pageField: spec.pageField,
    currentPage: spec.pageField === undefined ? undefined : spec.currentPage ?? ALL_PAGES,
    columns,
    rows: bodyRows,
    totals,
  };
}

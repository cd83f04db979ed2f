/**
 * Running differences for counter columns.
 */

import type { Cell, DiffSpec } from "./types.js";

const LEADING_INTEGER = /^\s*([+-]?\d+)/;

/**
 * Read the leading integer of a value.
 * Text without leading digits counts as zero.
 */
export function parseLenientInt(value: string | null | undefined): bigint {
  const match = LEADING_INTEGER.exec(value ?? "");
  return match ? BigInt(match[1]) : 0n;
}

export type ColumnIndexFn = (field: string) => number;

/**
 * Keeps the previous sample of every counter instance and computes deltas.
 *
 * A counter instance is identified by category, value column and the
 * values of the identity columns.
 */
export class DiffEngine {
  private readonly previous = new Map<string, string>();

  /**
   * Compute the deltas for a row, one cell per value column in declared
   * order. The first sample of an instance yields null.
   */
  diff(
    category: string,
    row: readonly Cell[],
    columnIndex: ColumnIndexFn,
    spec: DiffSpec
  ): Cell[] {
    const identity = spec.id.map((column) => row[columnIndex(column)] ?? "");

    return spec.value.map((column) => {
      const key = JSON.stringify([category, column, ...identity]);
      const current = row[columnIndex(column)] ?? "";
      const last = this.previous.get(key);

      this.previous.set(key, current);

      if (last === undefined) {
        return null;
      }
      return (parseLenientInt(current) - parseLenientInt(last)).toString();
    });
  }

  /**
   * Number of counter instances tracked.
   */
  get size(): number {
    return this.previous.size;
  }
}

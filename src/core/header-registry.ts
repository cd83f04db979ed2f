/**
 * Per-category header bookkeeping.
 */

import { UnknownColumnError } from "./errors.js";

interface HeaderEntry {
  fields: string[];
  indexes: Map<string, number>;
}

/**
 * Name of the synthetic column holding the delta of a value column.
 */
export function diffColumnName(valueName: string): string {
  return `diff_${valueName}`;
}

/**
 * Remembers the header of every category seen in a run.
 * The first header recorded for a category is kept for the whole run.
 */
export class HeaderRegistry {
  private readonly entries = new Map<string, HeaderEntry>();

  /**
   * Record the header of a category if it is new.
   * Returns true when the header was recorded and should be emitted.
   */
  recordIfNew(
    category: string,
    headerFields: readonly string[],
    diffValueNames: readonly string[] = []
  ): boolean {
    if (this.entries.has(category)) {
      return false;
    }

    const fields = [...headerFields, ...diffValueNames.map(diffColumnName)];
    const indexes = new Map<string, number>();
    fields.forEach((field, index) => {
      // Duplicate names resolve to their first position
      if (!indexes.has(field)) {
        indexes.set(field, index);
      }
    });

    this.entries.set(category, { fields, indexes });
    return true;
  }

  has(category: string): boolean {
    return this.entries.has(category);
  }

  header(category: string): readonly string[] | undefined {
    return this.entries.get(category)?.fields;
  }

  /**
   * Resolve a field name to its position in the category's header.
   */
  columnIndex(category: string, field: string): number {
    const index = this.entries.get(category)?.indexes.get(field);
    if (index === undefined) {
      throw new UnknownColumnError(category, field);
    }
    return index;
  }

  /**
   * Registered categories in first-seen order.
   */
  categories(): string[] {
    return [...this.entries.keys()];
  }
}

/**
 * CSV output: one file per category.
 */

import { createWriteStream, type WriteStream } from "node:fs";
import { once } from "node:events";
import type { Cell, OutputSink } from "../core/types.js";

const NEEDS_QUOTING = /[",\r\n]/;

/**
 * Format one CSV field. Null becomes an empty field and an empty string
 * a quoted one, so the two stay apart.
 */
export function formatCsvField(value: Cell): string {
  if (value === null) {
    return "";
  }
  if (value === "" || NEEDS_QUOTING.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatCsvLine(fields: readonly Cell[]): string {
  return fields.map(formatCsvField).join(",") + "\n";
}

/**
 * File name for a category. Path separators in the name are replaced.
 */
export function csvFileName(prefix: string, category: string): string {
  return `${prefix}_${category.replace(/[\\/]/g, "_")}.csv`;
}

export class CsvSink implements OutputSink {
  private readonly streams = new Map<string, WriteStream>();
  private failure: Error | undefined;

  constructor(private readonly prefix: string) {}

  putRow(category: string, fields: readonly Cell[]): void {
    let stream = this.streams.get(category);
    if (!stream) {
      stream = createWriteStream(csvFileName(this.prefix, category), { encoding: "utf8" });
      stream.on("error", (error) => {
        this.failure ??= error;
      });
      this.streams.set(category, stream);
    }
    stream.write(formatCsvLine(fields));
  }

  /**
   * Paths of the files written so far, in category order.
   */
  files(): string[] {
    return [...this.streams.keys()].map((category) => csvFileName(this.prefix, category));
  }

  async finish(): Promise<void> {
    await Promise.all(
      [...this.streams.values()].map(async (stream) => {
        if (stream.destroyed) {
          return;
        }
        stream.end();
        await once(stream, "close");
      })
    );

    if (this.failure) {
      throw this.failure;
    }
  }
}

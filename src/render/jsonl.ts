/**
 * JSON Lines output: one object per row on a stream.
 */

import { once } from "node:events";
import type { Writable } from "node:stream";
import type { Cell, OutputSink } from "../core/types.js";

export interface JsonLinesRecord {
  category: string;
  fields: Cell[];
  /** Present on the first row of each category */
  header?: true;
}

export class JsonLinesSink implements OutputSink {
  private readonly seen = new Set<string>();

  constructor(private readonly output: Writable = process.stdout) {}

  putRow(category: string, fields: readonly Cell[]): void {
    const record: JsonLinesRecord = { category, fields: [...fields] };
    if (!this.seen.has(category)) {
      this.seen.add(category);
      record.header = true;
    }
    this.output.write(JSON.stringify(record) + "\n");
  }

  async finish(): Promise<void> {
    // stdout is never ended; wait for pending writes to drain instead
    if (this.output.writableNeedDrain) {
      await once(this.output, "drain");
    }
  }
}

/**
 * Tests for the streaming table assembler.
 */

import { afterEach, describe, expect, it, vi } from "vitest";
import { LineAssembler } from "../src/core/assembler.js";
import { createCategoryFilter } from "../src/core/category-filter.js";
import { AssemblerClosedError, TimeParseError, UnknownColumnError } from "../src/core/errors.js";
import { resetLogger, warningCount } from "../src/core/logger.js";
import { createTimeWindow } from "../src/core/time-filter.js";
import type { CategoryConfig, ReportSpec } from "../src/core/types.js";
import { MemorySink } from "../src/render/memory.js";
import {
  PlainSink,
  SIMPLE_HEADER,
  SIMPLE_WIDTHS,
  fixedLine,
  tableBlock,
} from "./fixtures/index.js";

const SGA_WIDTHS = [7, 10, 11, 11, 5];
const SGA_HEADER = ["CNAME", "PTIME", "POOL", "NAME", "BYTES"];

const report: ReportSpec = {
  rowField: "PTIME",
  columnFields: [],
  dataFields: ["VAL"],
  visible: [],
  invisible: [],
};

function feed(assembler: LineAssembler, lines: string[]): void {
  for (const line of lines) {
    assembler.push(line);
  }
}

describe("LineAssembler", () => {
  describe("end-to-end", () => {
    it("should emit the header with diff columns, then diffed rows", async () => {
      const sink = new MemorySink();
      const assembler = new LineAssembler({
        sink,
        config: [{ name: "FOO", diff: { id: [], value: ["VAL"] } }],
      });

      feed(
        assembler,
        tableBlock(SIMPLE_WIDTHS, SIMPLE_HEADER, [
          ["FOO", "1000000000", "5"],
          ["FOO", "1000000010", "7"],
        ])
      );
      await assembler.close();

      expect(sink.categories()).toEqual(["FOO"]);
      expect(sink.header("FOO")).toEqual(["CNAME", "PTIME", "VAL", "diff_VAL"]);
      expect(sink.rows("FOO")).toEqual([
        ["FOO", "1000000000", "5", null],
        ["FOO", "1000000010", "7", "2"],
      ]);
      expect(sink.finished).toBe(true);
    });

    it("should emit rows without diff columns when none are configured", () => {
      const sink = new PlainSink();
      const assembler = new LineAssembler({ sink });

      feed(assembler, tableBlock(SIMPLE_WIDTHS, SIMPLE_HEADER, [["FOO", "1000000000", "5"]]));

      expect(sink.rows).toEqual([
        ["FOO", ["CNAME", "PTIME", "VAL"]],
        ["FOO", ["FOO", "1000000000", "5"]],
      ]);
    });
  });

  it("should emit nothing before the first separator", () => {
    const sink = new PlainSink();
    const assembler = new LineAssembler({ sink });

    feed(assembler, ["FOO 1000000000 5", "some banner text", ""]);

    expect(sink.rows).toEqual([]);
    expect(assembler.stats().separators).toBe(0);
  });

  it("should emit the header once across repeated samples", () => {
    const sink = new MemorySink();
    const assembler = new LineAssembler({
      sink,
      config: [{ name: "FOO", diff: { id: [], value: ["VAL"] } }],
    });

    feed(assembler, [
      ...tableBlock(SIMPLE_WIDTHS, SIMPLE_HEADER, [["FOO", "1000000000", "5"]]),
      "",
      ...tableBlock(SIMPLE_WIDTHS, SIMPLE_HEADER, [["FOO", "1000000010", "9"]]),
      "",
      ...tableBlock(SIMPLE_WIDTHS, SIMPLE_HEADER, [["FOO", "1000000020", "12"]]),
    ]);

    expect(sink.header("FOO")).toEqual(["CNAME", "PTIME", "VAL", "diff_VAL"]);
    expect(sink.rows("FOO")).toEqual([
      ["FOO", "1000000000", "5", null],
      ["FOO", "1000000010", "9", "4"],
      ["FOO", "1000000020", "12", "3"],
    ]);
    expect(assembler.stats().separators).toBe(3);
  });

  it("should difference counters per identity across samples", () => {
    const sink = new MemorySink();
    const assembler = new LineAssembler({
      sink,
      config: [{ name: "SGASTAT", diff: { id: ["POOL", "NAME"], value: ["BYTES"] } }],
    });

    feed(assembler, [
      ...tableBlock(SGA_WIDTHS, SGA_HEADER, [
        ["SGASTAT", "1000000000", "shared pool", "free memory", "100"],
        ["SGASTAT", "1000000000", "shared pool", "sql area", "50"],
      ]),
      ...tableBlock(SGA_WIDTHS, SGA_HEADER, [
        ["SGASTAT", "1000000060", "shared pool", "free memory", "90"],
        ["SGASTAT", "1000000060", "shared pool", "sql area", "80"],
      ]),
    ]);

    expect(sink.rows("SGASTAT").map((row) => row[5])).toEqual([null, null, "-10", "30"]);
  });

  it("should drop stray rows of another category inside a block", () => {
    const sink = new MemorySink();
    const assembler = new LineAssembler({ sink });

    feed(assembler, [
      ...tableBlock(SIMPLE_WIDTHS, SIMPLE_HEADER, [["BAR", "1000000000", "1"]]),
      fixedLine(SIMPLE_WIDTHS, ["FOO", "garbage", "2"]),
      fixedLine(SIMPLE_WIDTHS, ["BAR", "1000000010", "3"]),
    ]);

    expect(sink.categories()).toEqual(["BAR"]);
    expect(sink.rows("BAR")).toEqual([
      ["BAR", "1000000000", "1"],
      ["BAR", "1000000010", "3"],
    ]);
  });

  it("should switch categories at each new header triple", () => {
    const sink = new MemorySink();
    const assembler = new LineAssembler({ sink });

    feed(assembler, [
      ...tableBlock(SIMPLE_WIDTHS, SIMPLE_HEADER, [["FOO", "1000000000", "1"]]),
      ...tableBlock(SIMPLE_WIDTHS, SIMPLE_HEADER, [["BAR", "1000000000", "2"]]),
      ...tableBlock(SIMPLE_WIDTHS, SIMPLE_HEADER, [["FOO", "1000000010", "3"]]),
    ]);

    expect(sink.categories()).toEqual(["FOO", "BAR"]);
    expect(sink.rows("FOO")).toEqual([
      ["FOO", "1000000000", "1"],
      ["FOO", "1000000010", "3"],
    ]);
    expect(sink.rows("BAR")).toEqual([["BAR", "1000000000", "2"]]);
  });

  it("should only emit rows inside the time window", () => {
    const sink = new MemorySink();
    const assembler = new LineAssembler({
      sink,
      config: [{ name: "FOO", diff: { id: [], value: ["VAL"] } }],
      timeWindow: createTimeWindow({ begin: "1000000010", end: "1000000020" }),
    });

    feed(
      assembler,
      tableBlock(SIMPLE_WIDTHS, SIMPLE_HEADER, [
        ["FOO", "1000000000", "1"],
        ["FOO", "1000000010", "4"],
        ["FOO", "1000000020", "9"],
        ["FOO", "1000000021", "20"],
      ])
    );

    expect(sink.rows("FOO")).toEqual([
      ["FOO", "1000000010", "4", null],
      ["FOO", "1000000020", "9", "5"],
    ]);
    expect(assembler.stats().rowsOutsideWindow).toBe(2);
  });

  it("should fail on an unparseable timestamp with its location", () => {
    const assembler = new LineAssembler({ sink: new MemorySink() });
    assembler.beginSource("dbstat.log");

    const lines = tableBlock(SIMPLE_WIDTHS, SIMPLE_HEADER, [["FOO", "garbage", "1"]]);
    assembler.push(lines[0] ?? "");
    assembler.push(lines[1] ?? "");

    expect(() => assembler.push(lines[2] ?? "")).toThrow(TimeParseError);
  });

  it("should report the source and line of a bad timestamp", () => {
    const assembler = new LineAssembler({ sink: new MemorySink() });
    assembler.beginSource("dbstat.log");

    expect(() =>
      feed(assembler, tableBlock(SIMPLE_WIDTHS, SIMPLE_HEADER, [["FOO", "garbage", "1"]]))
    ).toThrow('Cannot parse timestamp "garbage" (dbstat.log:3)');
  });

  it("should fail when a diff column is missing from the header", () => {
    const assembler = new LineAssembler({
      sink: new MemorySink(),
      config: [{ name: "FOO", diff: { id: ["NOPE"], value: ["VAL"] } }],
    });

    expect(() =>
      feed(assembler, tableBlock(SIMPLE_WIDTHS, SIMPLE_HEADER, [["FOO", "1000000000", "1"]]))
    ).toThrow(UnknownColumnError);
  });

  describe("category filter", () => {
    it("should emit only selected categories", async () => {
      const sink = new MemorySink();
      const assembler = new LineAssembler({
        sink,
        categoryFilter: createCategoryFilter(["FOO"]),
      });

      feed(assembler, [
        ...tableBlock(SIMPLE_WIDTHS, SIMPLE_HEADER, [["FOO", "1000000000", "1"]]),
        ...tableBlock(SIMPLE_WIDTHS, SIMPLE_HEADER, [["BAR", "1000000000", "2"]]),
      ]);
      await assembler.close();

      expect(sink.categories()).toEqual(["FOO"]);
      expect(assembler.stats().categories).toEqual([
        { category: "FOO", columns: 3, rows: 1, included: true },
        { category: "BAR", columns: 3, rows: 0, included: false },
      ]);
    });

    it("should register filtered categories with their diff columns", () => {
      const sink = new MemorySink();
      const config: CategoryConfig[] = [{ name: "FOO", diff: { id: [], value: ["VAL"] } }];
      const assembler = new LineAssembler({
        sink,
        config,
        categoryFilter: createCategoryFilter(["BAR"]),
      });

      feed(assembler, [
        ...tableBlock(SIMPLE_WIDTHS, SIMPLE_HEADER, [["FOO", "1000000000", "1"]]),
        ...tableBlock(SIMPLE_WIDTHS, SIMPLE_HEADER, [["FOO", "1000000010", "5"]]),
      ]);

      expect(sink.categories()).toEqual([]);
      expect(assembler.stats().categories).toEqual([
        { category: "FOO", columns: 4, rows: 0, included: false },
      ]);
    });
  });

  describe("close", () => {
    it("should apply reports for configured categories that produced output", async () => {
      const sink = new MemorySink();
      const assembler = new LineAssembler({
        sink,
        config: [
          { name: "BAR", pivot: report },
          { name: "FOO", pivot: report },
          { name: "MISSING", pivot: report },
        ],
      });

      feed(assembler, [
        ...tableBlock(SIMPLE_WIDTHS, SIMPLE_HEADER, [["FOO", "1000000000", "1"]]),
        ...tableBlock(SIMPLE_WIDTHS, SIMPLE_HEADER, [["BAR", "1000000000", "2"]]),
      ]);
      await assembler.close();

      expect(sink.reports).toEqual([
        { category: "BAR", spec: report },
        { category: "FOO", spec: report },
      ]);
    });

    it("should skip reports for filtered categories", async () => {
      const sink = new MemorySink();
      const assembler = new LineAssembler({
        sink,
        config: [{ name: "FOO", pivot: report }],
        categoryFilter: createCategoryFilter(["BAR"]),
      });

      feed(assembler, tableBlock(SIMPLE_WIDTHS, SIMPLE_HEADER, [["FOO", "1000000000", "1"]]));
      await assembler.close();

      expect(sink.reports).toEqual([]);
    });

    it("should finish sinks without reporting support", async () => {
      const sink = new PlainSink();
      const assembler = new LineAssembler({ sink, config: [{ name: "FOO", pivot: report }] });

      feed(assembler, tableBlock(SIMPLE_WIDTHS, SIMPLE_HEADER, [["FOO", "1000000000", "1"]]));
      await assembler.close();

      expect(sink.finishCalls).toBe(1);
    });

    it("should refuse lines and a second close after closing", async () => {
      const assembler = new LineAssembler({ sink: new PlainSink() });
      await assembler.close();

      expect(() => assembler.push("x")).toThrow(AssemblerClosedError);
      await expect(assembler.close()).rejects.toThrow(AssemblerClosedError);
    });
  });

  describe("header changes", () => {
    afterEach(() => {
      vi.restoreAllMocks();
      resetLogger();
    });

    it("should warn once when a later block prints a different header", () => {
      const stderr: string[] = [];
      vi.spyOn(console, "error").mockImplementation((...args: unknown[]) => {
        stderr.push(args.join(" "));
      });
      const sink = new MemorySink();
      const assembler = new LineAssembler({ sink });
      assembler.beginSource("dbstat.log");

      const renamed = ["CNAME", "PTIME", "NUM"];
      feed(assembler, [
        ...tableBlock(SIMPLE_WIDTHS, SIMPLE_HEADER, [["FOO", "1000000000", "1"]]),
        ...tableBlock(SIMPLE_WIDTHS, renamed, [["FOO", "1000000010", "2"]]),
        ...tableBlock(SIMPLE_WIDTHS, renamed, [["FOO", "1000000020", "3"]]),
      ]);

      expect(stderr).toEqual([
        "warning: header of FOO differs from its first block; columns keep the first names (dbstat.log:6)",
      ]);
      expect(sink.header("FOO")).toEqual(["CNAME", "PTIME", "VAL"]);
      expect(sink.rows("FOO")).toHaveLength(3);
    });

    it("should not warn when the header repeats unchanged", () => {
      resetLogger();
      const assembler = new LineAssembler({
        sink: new MemorySink(),
        config: [{ name: "FOO", diff: { id: [], value: ["VAL"] } }],
      });

      feed(assembler, [
        ...tableBlock(SIMPLE_WIDTHS, SIMPLE_HEADER, [["FOO", "1000000000", "1"]]),
        ...tableBlock(SIMPLE_WIDTHS, SIMPLE_HEADER, [["FOO", "1000000010", "2"]]),
      ]);

      expect(warningCount()).toBe(0);
    });
  });

  it("should carry the window across sources", () => {
    const sink = new MemorySink();
    const assembler = new LineAssembler({ sink });
    const lines = tableBlock(SIMPLE_WIDTHS, SIMPLE_HEADER, [
      ["FOO", "1000000000", "1"],
      ["FOO", "1000000010", "2"],
    ]);

    assembler.beginSource("part1.log");
    feed(assembler, lines.slice(0, 2));
    assembler.beginSource("part2.log");
    feed(assembler, lines.slice(2));

    expect(sink.rows("FOO")).toHaveLength(2);
    expect(assembler.stats().lines).toBe(4);
  });
});

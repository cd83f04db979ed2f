/**
 * Fixed-width column layouts derived from separator lines.
 *
 * A separator is the dashed line monitoring tools print under a column
 * header:
 *
 *   CNAME PTIME      VAL
 *   ----- ---------- ---
 *
 * Each run of dashes is one column; columns are separated by one space.
 */

import { LayoutError } from "./errors.js";
import type { FieldLayout, LayoutResult, Span } from "./types.js";

const SEPARATOR_PATTERN = /^[- ]+$/;

/**
 * Check whether a line is a separator line.
 */
export function isSeparatorLine(line: string): boolean {
  return SEPARATOR_PATTERN.test(line) && line.includes("-");
}

/**
 * Derive a column layout from a candidate separator line.
 *
 * Consecutive spaces produce zero-width columns; trailing spaces are
 * ignored.
 */
export function deriveLayout(line: string): LayoutResult {
  if (!isSeparatorLine(line)) {
    return { kind: "not-separator" };
  }

  const tokens = line.split(" ");
  while (tokens.length > 0 && tokens[tokens.length - 1] === "") {
    tokens.pop();
  }

  const spans: Span[] = [];
  let offset = 0;
  for (const token of tokens) {
    spans.push({ start: offset, width: token.length });
    offset += token.length + 1;
  }

  return {
    kind: "layout",
    layout: { spans, width: Math.max(0, offset - 1) },
  };
}

/**
 * Cut a line into trimmed field values.
 * Short lines are padded with spaces; text past the layout is ignored.
 */
export function sliceLine(line: string, layout: FieldLayout): string[] {
  const padded =
    line.length < layout.width ? line.padEnd(layout.width, " ") : line;

  return layout.spans.map((span) =>
    padded.slice(span.start, span.start + span.width).trim()
  );
}

/**
 * Slice a line with a layout that may not exist yet.
 */
export function sliceWithLayout(
  line: string,
  layout: FieldLayout | undefined
): string[] {
  if (!layout) {
    throw new LayoutError();
  }
  return sliceLine(line, layout);
}

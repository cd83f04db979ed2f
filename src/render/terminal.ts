/**
 * Terminal run summary with colors and tables.
 */

import chalk from "chalk";
import boxen from "boxen";
import Table from "cli-table3";
import type { AssemblerStats, CategoryConfig } from "../core/types.js";

/**
 * Color scheme for terminal output.
 */
const colors = {
  header: chalk.magenta.bold,
  label: chalk.gray,
  value: chalk.white,
  muted: chalk.dim,
  accent: chalk.blue,
  warning: chalk.yellow,
  success: chalk.green,
  category: chalk.cyan,
};

const TABLE_CHARS = {
  top: "─",
  "top-mid": "┬",
  "top-left": "┌",
  "top-right": "┐",
  bottom: "─",
  "bottom-mid": "┴",
  "bottom-left": "└",
  "bottom-right": "┘",
  left: "│",
  "left-mid": "├",
  mid: "─",
  "mid-mid": "┼",
  right: "│",
  "right-mid": "┤",
  middle: "│",
};

export interface SummaryContext {
  stats: AssemblerStats;
  config: readonly CategoryConfig[];
  /** Files written by the sink */
  outputs?: string[];
  /** Show column headers instead of diff/report flags */
  headers?: Map<string, readonly string[]>;
  /** Data warnings raised during the run */
  warnings?: number;
}

function renderTotals(context: SummaryContext): string {
  const { stats } = context;
  const lines = [
    `${colors.label("Lines read:")} ${colors.value(String(stats.lines))}`,
    `${colors.label("Tables found:")} ${colors.value(String(stats.separators))}`,
    `${colors.label("Categories:")} ${colors.value(String(stats.categories.length))}`,
    `${colors.label("Rows written:")} ${colors.success(String(stats.rowsEmitted))}`,
  ];
  if (stats.rowsOutsideWindow > 0) {
    lines.push(
      `${colors.label("Outside time window:")} ${colors.warning(String(stats.rowsOutsideWindow))}`
    );
  }
  if (context.warnings !== undefined && context.warnings > 0) {
    lines.push(`${colors.label("Warnings:")} ${colors.warning(String(context.warnings))}`);
  }
  for (const output of context.outputs ?? []) {
    lines.push(`${colors.label("Output:")} ${colors.accent(output)}`);
  }

  return boxen(lines.join("\n"), {
    padding: { left: 1, right: 1, top: 0, bottom: 0 },
    borderStyle: "round",
    borderColor: "gray",
  });
}

function renderCategories(context: SummaryContext): string {
  const { stats, config, headers } = context;
  if (stats.categories.length === 0) {
    return colors.muted("No tables found.");
  }

  const byName = new Map(config.map((entry) => [entry.name, entry]));
  const table = new Table({
    head: headers
      ? [colors.label("Category"), colors.label("Rows"), colors.label("Columns")]
      : [
          colors.label("Category"),
          colors.label("Rows"),
          colors.label("Columns"),
          colors.label("Diff"),
          colors.label("Report"),
        ],
    style: {
      head: [],
      border: ["dim"],
    },
    chars: TABLE_CHARS,
  });

  for (const entry of stats.categories) {
    const name = entry.included ? colors.category(entry.category) : colors.muted(entry.category);
    if (headers) {
      table.push([name, String(entry.rows), (headers.get(entry.category) ?? []).join(", ")]);
      continue;
    }
    const settings = byName.get(entry.category);
    table.push([
      name,
      entry.included ? String(entry.rows) : colors.muted("filtered"),
      String(entry.columns),
      settings?.diff ? settings.diff.value.join(", ") : "-",
      settings?.pivot ? "yes" : "-",
    ]);
  }

  return table.toString();
}

/**
 * Render the run summary printed to stderr after a conversion or scan.
 */
export function renderRunSummary(context: SummaryContext): string {
  return `\n${colors.header("remint")}\n${renderTotals(context)}\n${renderCategories(context)}\n`;
}

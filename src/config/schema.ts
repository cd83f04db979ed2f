/**
 * Configuration file schema.
 *
 * The file is a list of category records. Only categories that need
 * differencing or a report have to be listed.
 */

import { z } from "zod";
import { warn } from "../core/logger.js";
import type { ReportSpec } from "../core/types.js";

/** YAML reads `1` or `2048` as numbers; column names and pages are text */
const text = z
  .union([z.string(), z.number()])
  .transform((value) => String(value));

const nonEmptyText = text.refine((value) => value.length > 0, {
  message: "must not be empty",
});

const oneOrMany = z
  .union([nonEmptyText, z.array(nonEmptyText).min(1)])
  .transform((value) => (Array.isArray(value) ? value : [value]));

const itemFilterSchema = z.object({
  field: nonEmptyText,
  items: z.array(text).min(1),
});

const topFilterSchema = z.object({
  type: z.enum(["top", "bottom"]).default("top"),
  count: z.number().int().positive(),
});

export const diffSchema = z.object({
  id: z.array(nonEmptyText).default([]),
  value: z.array(nonEmptyText).min(1),
});

export const reportSchema = z
  .object({
    rowField: nonEmptyText,
    columnField: oneOrMany.optional(),
    dataField: oneOrMany,
    pageField: nonEmptyText.optional(),
    currentPage: text.optional(),
    /** Accepted from older files; charts are not rendered */
    chartType: z.string().optional(),
    visible: z.array(itemFilterSchema).default([]),
    invisible: z.array(itemFilterSchema).default([]),
    topFilter: topFilterSchema.optional(),
  })
  .transform(({ columnField, dataField, chartType, ...rest }): ReportSpec => {
    if (chartType !== undefined) {
      warn(`pivot chartType "${chartType}" is ignored; charts are not rendered`);
    }
    return {
      ...rest,
      columnFields: columnField ?? [],
      dataFields: dataField,
    };
  });

export const categorySchema = z.object({
  name: nonEmptyText,
  diff: diffSchema.optional(),
  pivot: reportSchema.optional(),
});

export const configSchema = z
  .array(categorySchema)
  .superRefine((categories, ctx) => {
    const seen = new Set<string>();
    categories.forEach((category, index) => {
      if (seen.has(category.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, "name"],
          message: `duplicate category ${category.name}`,
        });
      }
      seen.add(category.name);
    });
  });


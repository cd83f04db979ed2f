/**
 * Output filter on category names.
 */

import picomatch from "picomatch";

export type CategoryFilter = (category: string) => boolean;

/**
 * Build a category filter from names or glob patterns.
 * Without patterns every category passes.
 */
export function createCategoryFilter(patterns?: readonly string[]): CategoryFilter {
  const cleaned = (patterns ?? [])
    .map((pattern) => pattern.trim())
    .filter((pattern) => pattern.length > 0);

  if (cleaned.length === 0) {
    return () => true;
  }

  const names = new Set(cleaned);
  const matchers = cleaned.map((pattern) => picomatch(pattern, { dot: true }));
  return (category) =>
    names.has(category) || matchers.some((matcher) => matcher(category));
}

/**
 * Split a comma-separated category list from the command line.
 */
export function parseCategoryList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Formatters for the coverage-urls command.
 *
 * Text output is one URL per line so it can be fed to `xargs` or a
 * download loop; JSON output is for tools that parse the result.
 */

import type { CoverageOutputFormat } from "../types/config.js";

export type CoverageFormatter = (urls: readonly string[]) => string;

export function formatCoverageText(urls: readonly string[]): string {
  return urls.join("\n");
}

/**
 * Pretty-printed `{ "count": n, "urls": [...] }`.
 */
export function formatCoverageJson(urls: readonly string[]): string {
  return JSON.stringify({ count: urls.length, urls }, null, 2);
}

export function selectCoverageFormatter(format: CoverageOutputFormat): CoverageFormatter {
  switch (format) {
    case "json":
      return formatCoverageJson;
    case "text":
      return formatCoverageText;
  }
}

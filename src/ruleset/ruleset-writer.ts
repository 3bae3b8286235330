/**
 * Rule-set writer.
 *
 * Serializes analyzer rule ids into the rule-set XML the managed code
 * analyzers read. The layout is fixed: header, one <Rule> element per id
 * in input order, footer. Output depends on the input sequence only.
 */

import { ValidationError } from "../types/errors.js";

const HEADER: readonly string[] = [
  `<?xml version="1.0" encoding="utf-8"?>`,
  `<RuleSet Name="SonarQube" Description="Rule set generated by SonarQube" ToolsVersion="12.0">`,
  `  <Rules AnalyzerId="Microsoft.Analyzers.ManagedCodeAnalysis" RuleNamespace="Microsoft.Rules.Managed">`,
];

const FOOTER: readonly string[] = [
  `  </Rules>`,
  `</RuleSet>`,
];

function escapeAttribute(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

/**
 * Returns every id that occurs more than once, each listed once,
 * in the order its first occurrence appears.
 */
export function findDuplicateIds(ids: readonly string[]): readonly string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const id of ids) {
    if (seen.has(id)) {
      duplicates.add(id);
    } else {
      seen.add(id);
    }
  }
  // `seen` is in first-occurrence order; `duplicates` is not.
  return [...seen].filter((id) => duplicates.has(id));
}

/**
 * Render the rule-set document for the given ids.
 *
 * @throws ValidationError when an id appears more than once.
 */
export function emitRuleSet(ids: readonly string[]): string {
  const duplicates = findDuplicateIds(ids);
  if (duplicates.length > 0) {
    throw new ValidationError(
      `The following CheckId should not appear multiple times: ${duplicates.join(", ")}`,
    );
  }

  const lines = [
    ...HEADER,
    ...ids.map((id) => `    <Rule Id="${escapeAttribute(id)}" Action="Warning" />`),
    ...FOOTER,
  ];
  return lines.map((line) => `${line}\n`).join("");
}

export type WriteFn = (path: string, content: string) => Promise<void>;

/**
 * Emit the rule set and hand it to `writeFn`. Nothing is written when
 * validation fails.
 */
export async function writeRuleSet(
  filePath: string,
  ids: readonly string[],
  writeFn: WriteFn,
): Promise<void> {
  const content = emitRuleSet(ids);
  await writeFn(filePath, content);
}

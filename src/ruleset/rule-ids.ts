/**
 * Reads a rule id list: one id per line, `#` starts a comment line,
 * blank lines are skipped. Repeated ids are kept so the writer can
 * report them.
 */
export function parseRuleIds(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}

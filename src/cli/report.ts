import { getRule, listRules } from "../linter/rules.js";
import type { FileResults, LintSummary, Violation } from "../linter/types.js";

export interface ReportOptions {
  readonly listFiles?: boolean;
  readonly ruleTotals?: boolean;
  readonly verbose?: boolean;
  readonly showDisabled?: boolean;
}

export function formatViolation(filePath: string, violation: Violation, verbose = false): string {
  const { message } = getRule(violation.ruleId);
  const status = violation.disabled ? " (disabled)" : "";
  const contextLines = violation.context.split("\n");
  const shown = verbose ? contextLines : contextLines.slice(-1);
  const header = `${filePath}:${violation.line}: ${violation.ruleId}${status}  ${message}\n`;
  return header + shown.map((text) => `    ${text}\n`).join("");
}

export function formatFileResults(file: FileResults, options: ReportOptions = {}): string {
  const shown = file.violations.filter((violation) => options.showDisabled || !violation.disabled);
  if (options.listFiles) {
    return shown.some((violation) => !violation.disabled) ? `${file.filePath}\n` : "";
  }
  return shown.map((violation) => formatViolation(file.filePath, violation, options.verbose)).join("");
}

/** Per-rule totals, in catalog order, followed by the run total. */
export function formatSummary(summary: LintSummary, options: ReportOptions = {}): string {
  let out = "";
  if (options.ruleTotals) {
    out += "\n";
    for (const rule of listRules()) {
      const count = summary.byRule[rule.id] ?? 0;
      if (count > 0) out += `${rule.id}: ${count} violations\n`;
    }
  }
  const disabled = options.showDisabled ? ` (${summary.disabledCount} disabled)` : "";
  out += `\n${summary.enabledCount} violations total${disabled}\n`;
  return out;
}

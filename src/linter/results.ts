import type { RuleId } from "./rules.js";
import type { SourceLines } from "./source-lines.js";
import type { FileResults, LintSummary, Violation } from "./types.js";

export interface ViolationLocation {
  readonly line: number;
  readonly startLine?: number;
  readonly column?: number;
}

export function createViolation(
  lines: SourceLines,
  ruleId: RuleId,
  location: ViolationLocation,
): Violation {
  const startLine = Math.min(location.startLine ?? location.line, location.line);
  return {
    ruleId,
    line: location.line,
    startLine,
    ...(location.column !== undefined ? { column: location.column } : {}),
    disabled: false,
    context: lines.context(startLine, location.line),
  };
}

export type ViolationSortKey = readonly [line: number, ruleId: string, column: number];

export function violationSortKey(violation: Violation): ViolationSortKey {
  return [violation.line, violation.ruleId, violation.column ?? 0];
}

export function compareViolations(a: Violation, b: Violation): number {
  const [lineA, ruleA, columnA] = violationSortKey(a);
  const [lineB, ruleB, columnB] = violationSortKey(b);
  if (lineA !== lineB) return lineA - lineB;
  if (ruleA !== ruleB) return ruleA < ruleB ? -1 : 1;
  return columnA - columnB;
}

export function sortViolations(violations: readonly Violation[]): Violation[] {
  return [...violations].sort(compareViolations);
}

export function summarize(results: readonly FileResults[]): LintSummary {
  let enabledCount = 0;
  let disabledCount = 0;
  const byRule: Partial<Record<RuleId, number>> = {};
  const byFile: Record<string, Violation[]> = {};

  for (const file of results) {
    for (const violation of file.violations) {
      if (violation.disabled) {
        disabledCount++;
        continue;
      }
      enabledCount++;
      byRule[violation.ruleId] = (byRule[violation.ruleId] ?? 0) + 1;
      (byFile[file.filePath] ??= []).push(violation);
    }
  }

  return { filesScanned: results.length, enabledCount, disabledCount, byRule, byFile };
}

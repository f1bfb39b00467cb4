import type { Violation } from "./types.js";

// At most five whitespace-delimited tokens may precede the marker.
const PRAGMA_PATTERN = /^\s*(?:\S+\s+){0,5}xss-lint:\s*disable=([\w,-]+)/;

export interface DisablePragma {
  readonly line: number;
  readonly ruleIds: string[];
}

export function findDisablePragmas(source: string): DisablePragma[] {
  const pragmas: DisablePragma[] = [];
  const lines = source.split("\n");
  for (let i = 0; i < lines.length; i++) {
    const match = PRAGMA_PATTERN.exec(lines[i]);
    if (!match) continue;
    const ruleIds = match[1].split(",").filter((id) => id.length > 0);
    pragmas.push({ line: i + 1, ruleIds });
  }
  return pragmas;
}

/**
 * Marks violations suppressed by `xss-lint: disable=` pragmas. Each pragma is
 * consumed by the first violation of its rule on the same or a later line; a
 * later pragma for the same rule replaces an unconsumed earlier one.
 *
 * Returns new violations in the input order.
 */
export function applyDisablePragmas(source: string, violations: readonly Violation[]): Violation[] {
  const pragmas = findDisablePragmas(source);
  const pending = new Map<string, number>();
  const disabled = new Set<number>();

  const order = violations
    .map((violation, index) => ({ violation, index }))
    .sort((a, b) => a.violation.line - b.violation.line || a.index - b.index);

  let nextPragma = 0;
  for (const { violation, index } of order) {
    while (nextPragma < pragmas.length && pragmas[nextPragma].line <= violation.line) {
      for (const ruleId of pragmas[nextPragma].ruleIds) {
        pending.set(ruleId, pragmas[nextPragma].line);
      }
      nextPragma++;
    }
    const pragmaLine = pending.get(violation.ruleId);
    if (pragmaLine !== undefined && pragmaLine <= violation.line) {
      disabled.add(index);
      pending.delete(violation.ruleId);
    }
  }

  return violations.map((violation, index) => ({ ...violation, disabled: disabled.has(index) }));
}

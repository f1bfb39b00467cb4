import { applyDisablePragmas } from "../pragma.js";
import { createViolation } from "../results.js";
import { SourceLines } from "../source-lines.js";
import type { Violation } from "../types.js";

// `<%= %>` interpolates raw; `<%- %>` escapes and is never reported.
const UNESCAPED_TAG = /<%=([\s\S]*?)%>/g;

const SELF_ESCAPING_CALL = /^(?:HtmlUtils\.ensureHtml|_\.escape)\(/;

export function findUnescapedTags(source: string, lines: SourceLines): Violation[] {
  const violations: Violation[] = [];
  for (const match of source.matchAll(UNESCAPED_TAG)) {
    const expression = match[1].trim();
    if (SELF_ESCAPING_CALL.test(expression)) continue;
    const index = match.index ?? 0;
    violations.push(
      createViolation(lines, "underscore-not-escaped", {
        line: lines.lineAt(index),
        column: lines.columnAt(index),
      }),
    );
  }
  return violations;
}

export function scanUnderscore(source: string): Violation[] {
  const lines = new SourceLines(source);
  return applyDisablePragmas(source, findUnescapedTags(source, lines));
}

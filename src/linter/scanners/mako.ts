import { applyDisablePragmas } from "../pragma.js";
import { createViolation } from "../results.js";
import { SourceLines } from "../source-lines.js";
import type { Violation } from "../types.js";

export interface MakoExpression {
  /** Offset of the `$` in `${`. */
  readonly index: number;
  /** Offset just past the closing `}`. */
  readonly end: number;
  readonly expression: string;
  readonly filters: string[];
}

const PAGE_TAG = /<%page\b[\s\S]*?\/?>/g;
const DEFAULT_FILTER = /\bexpression_filter\s*=\s*(["'])h\1/;
const DOC_BLOCK = /<%doc>[\s\S]*?<\/%doc>/g;
const COMMENT_LINE = /^[ \t]*##.*$/gm;
const SELF_ESCAPING_CALL = /^(?:HTML|Text)\(/;

/** Offset ranges whose contents are never rendered. */
export function findIgnoredRanges(source: string): Array<readonly [number, number]> {
  const ranges: Array<readonly [number, number]> = [];
  for (const pattern of [DOC_BLOCK, COMMENT_LINE]) {
    for (const match of source.matchAll(pattern)) {
      const start = match.index ?? 0;
      ranges.push([start, start + match[0].length]);
    }
  }
  return ranges;
}

/**
 * Index of the `}` closing an expression body that starts at `start`, or -1.
 * Nested braces and quoted strings are skipped.
 */
export function findExpressionEnd(source: string, start: number): number {
  let depth = 0;
  let quote: string | null = null;
  for (let i = start; i < source.length; i++) {
    const ch = source[i];
    if (quote !== null) {
      if (ch === "\\") i++;
      else if (ch === quote) quote = null;
      continue;
    }
    if (ch === "'" || ch === '"') quote = ch;
    else if (ch === "{") depth++;
    else if (ch === "}") {
      if (depth === 0) return i;
      depth--;
    }
  }
  return -1;
}

/** Splits `expr | h, trim` at the last `|` outside brackets and quotes. */
export function splitFilters(body: string): { expression: string; filters: string[] } {
  let depth = 0;
  let quote: string | null = null;
  let pipe = -1;
  for (let i = 0; i < body.length; i++) {
    const ch = body[i];
    if (quote !== null) {
      if (ch === "\\") i++;
      else if (ch === quote) quote = null;
      continue;
    }
    if (ch === "'" || ch === '"') quote = ch;
    else if (ch === "(" || ch === "[" || ch === "{") depth++;
    else if (ch === ")" || ch === "]" || ch === "}") depth--;
    else if (ch === "|" && depth === 0) pipe = i;
  }
  if (pipe === -1) return { expression: body.trim(), filters: [] };
  return {
    expression: body.slice(0, pipe).trim(),
    filters: body
      .slice(pipe + 1)
      .split(",")
      .map((filter) => filter.trim())
      .filter((filter) => filter.length > 0),
  };
}

export function scanMako(source: string): Violation[] {
  const lines = new SourceLines(source);
  const violations: Violation[] = [];
  const ignored = findIgnoredRanges(source);
  const isIgnored = (index: number): boolean => ignored.some(([start, end]) => index >= start && index < end);

  const pageTags = [...source.matchAll(PAGE_TAG)].filter((match) => !isIgnored(match.index ?? 0));
  const hasDefault = pageTags.some((match) => DEFAULT_FILTER.test(match[0]));
  for (const extra of pageTags.slice(1)) {
    const index = extra.index ?? 0;
    violations.push(
      createViolation(lines, "mako-multiple-page-tags", { line: lines.lineAt(index), column: lines.columnAt(index) }),
    );
  }

  const expressions: MakoExpression[] = [];
  let cursor = source.indexOf("${");
  while (cursor !== -1) {
    if (isIgnored(cursor)) {
      cursor = source.indexOf("${", cursor + 2);
      continue;
    }
    const close = findExpressionEnd(source, cursor + 2);
    if (close === -1) {
      violations.push(
        createViolation(lines, "mako-unparseable-expression", {
          line: lines.lineAt(cursor),
          column: lines.columnAt(cursor),
        }),
      );
      break;
    }
    expressions.push({ index: cursor, end: close + 1, ...splitFilters(source.slice(cursor + 2, close)) });
    cursor = source.indexOf("${", close + 1);
  }

  if (!hasDefault && expressions.length > 0) {
    violations.push(createViolation(lines, "mako-missing-default", { line: 1 }));
  }

  for (const { index, expression, filters } of expressions) {
    const location = { line: lines.lineAt(index), column: lines.columnAt(index) };
    if (filters.includes("n") && !SELF_ESCAPING_CALL.test(expression)) {
      violations.push(createViolation(lines, "mako-invalid-html-filter", location));
    }
    if (filters.includes("h") && hasDefault) {
      violations.push(createViolation(lines, "mako-unwanted-html-filter", location));
    }
  }

  return applyDisablePragmas(source, violations);
}

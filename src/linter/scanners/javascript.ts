import { applyDisablePragmas } from "../pragma.js";
import type { RuleId } from "../rules.js";
import { createViolation } from "../results.js";
import { SourceLines } from "../source-lines.js";
import type { Violation } from "../types.js";

export interface CallSite {
  /** Identifier directly before the `.` of a qualified call, if any. */
  readonly receiver: string | null;
  readonly qualified: boolean;
  /** Trimmed argument text, or null when the closing paren cannot be found. */
  readonly argument: string | null;
}

export interface CallFamily {
  readonly ruleId: RuleId;
  readonly methods: readonly string[];
  /** Also match calls that are not preceded by a `.`. */
  readonly matchBare?: boolean;
  /** Receivers that are helper namespaces rather than jQuery objects. */
  readonly skipReceivers?: readonly string[];
  readonly isSafe: (call: CallSite) => boolean;
}

const DOM_REFERENCE_NAMES = new Set(["el", "$el", "parentNode"]);
const SAFE_INTERPOLATE_NAMESPACES = new Set(["StringUtils", "HtmlUtils"]);
const HELPER_NAMESPACES = ["HtmlUtils"];

const IDENTIFIER_CHAIN =
  /^[_$a-zA-Z][\w$]*(?:\s*\(\s*\)|\s*\.\s*[_$a-zA-Z][\w$]*)*$/;
const TRAILING_IDENTIFIER = /([_$a-zA-Z][\w$]*)$/;
const PLAIN_STRING_LITERAL = /^(["'])(?:\\.|(?!\1)[^\\\n])*\1$/;
const HTML_UTILS_CALL =
  /^(?:edx\.)?HtmlUtils\.(?:ensureHtml|HTML|joinHtml|interpolateHtml|template)\([\s\S]*\)\.toString\(\)$/;

export function isDomReferenceName(name: string): boolean {
  return name.startsWith("$") || name.endsWith("El") || DOM_REFERENCE_NAMES.has(name);
}

/** `$foo`, `fooEl`, `view.render().el`, `this.$el`, ... */
export function isDomReference(expression: string): boolean {
  if (!IDENTIFIER_CHAIN.test(expression)) return false;
  const last = TRAILING_IDENTIFIER.exec(expression);
  return last !== null && isDomReferenceName(last[1]);
}

export function isHtmlUtilsCall(expression: string): boolean {
  return HTML_UTILS_CALL.test(expression);
}

/**
 * Returns the index of the `)` that balances an already-open paren, scanning
 * from `start`. Quotes are honored; -1 when the call is never closed.
 */
export function findClosingParen(text: string, start: number): number {
  let depth = 1;
  let quote: string | null = null;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (quote !== null) {
      if (ch === "\\") i++;
      else if (ch === quote) quote = null;
      else if (ch === "\n" && quote !== "`") return -1;
      continue;
    }
    if (ch === "'" || ch === '"' || ch === "`") quote = ch;
    else if (ch === "(") depth++;
    else if (ch === ")" && --depth === 0) return i;
  }
  return -1;
}

function isJQueryConstruction(argument: string): boolean {
  const open = /^\$\s*\(/.exec(argument);
  if (!open) return false;
  return findClosingParen(argument, open[0].length) === argument.length - 1;
}

/**
 * Arguments that jQuery will not parse as markup: element references,
 * `$()` constructions, HtmlUtils output, and plain text literals.
 */
export function isSafeInsertionArgument(argument: string): boolean {
  if (isDomReference(argument)) return true;
  if (PLAIN_STRING_LITERAL.test(argument)) return !argument.includes("<");
  return isJQueryConstruction(argument) || isHtmlUtilsCall(argument);
}

export function isSafeHtmlArgument(argument: string): boolean {
  return argument === "" || argument === "''" || argument === '""' || isHtmlUtilsCall(argument);
}

export const CALL_FAMILIES: readonly CallFamily[] = [
  {
    ruleId: "javascript-jquery-append",
    methods: ["append"],
    skipReceivers: HELPER_NAMESPACES,
    isSafe: ({ argument }) => argument !== null && isSafeInsertionArgument(argument),
  },
  {
    ruleId: "javascript-jquery-prepend",
    methods: ["prepend"],
    skipReceivers: HELPER_NAMESPACES,
    isSafe: ({ argument }) => argument !== null && isSafeInsertionArgument(argument),
  },
  {
    ruleId: "javascript-jquery-insertion",
    methods: ["unwrap", "wrap", "wrapAll", "wrapInner", "after", "before", "replaceAll", "replaceWith"],
    skipReceivers: HELPER_NAMESPACES,
    isSafe: ({ argument }) => argument !== null && isSafeInsertionArgument(argument),
  },
  {
    ruleId: "javascript-jquery-insert-into-target",
    methods: ["appendTo", "prependTo", "insertAfter", "insertBefore"],
    isSafe: ({ receiver }) => receiver !== null && isDomReferenceName(receiver),
  },
  {
    ruleId: "javascript-jquery-html",
    methods: ["html"],
    skipReceivers: HELPER_NAMESPACES,
    isSafe: ({ argument }) => argument !== null && isSafeHtmlArgument(argument),
  },
  {
    ruleId: "javascript-interpolate",
    methods: ["interpolate"],
    matchBare: true,
    isSafe: ({ receiver }) => receiver !== null && SAFE_INTERPOLATE_NAMESPACES.has(receiver),
  },
  {
    ruleId: "javascript-escape",
    methods: ["escape"],
    isSafe: ({ receiver }) => receiver === "_",
  },
];

function skipWhitespaceBack(source: string, index: number): number {
  let k = index;
  while (k >= 0 && /\s/.test(source[k])) k--;
  return k;
}

/** The call at `nameIndex`; a chain may put the receiver and the `.` on earlier lines. */
function readCallSite(source: string, nameIndex: number, openParenEnd: number): CallSite {
  const dot = skipWhitespaceBack(source, nameIndex - 1);
  const qualified = dot >= 0 && source[dot] === ".";
  let receiver: string | null = null;
  if (qualified) {
    const end = skipWhitespaceBack(source, dot - 1) + 1;
    let start = end;
    while (start > 0 && /[\w$]/.test(source[start - 1])) start--;
    receiver = /[_$a-zA-Z][\w$]*$/.exec(source.slice(start, end))?.[0] ?? null;
  }
  const close = findClosingParen(source, openParenEnd);
  return {
    receiver,
    qualified,
    argument: close === -1 ? null : source.slice(openParenEnd, close).trim(),
  };
}

export function checkCallFamily(source: string, lines: SourceLines, family: CallFamily): Violation[] {
  const violations: Violation[] = [];
  const trigger = new RegExp(`(?<![\\w$])(?:${family.methods.join("|")})\\(`, "g");
  for (const match of source.matchAll(trigger)) {
    const index = match.index ?? 0;
    const call = readCallSite(source, index, index + match[0].length);
    if (!call.qualified && !family.matchBare) continue;
    if (call.receiver !== null && family.skipReceivers?.includes(call.receiver)) continue;
    if (family.isSafe(call)) continue;
    violations.push(
      createViolation(lines, family.ruleId, { line: lines.lineAt(index), column: lines.columnAt(index) }),
    );
  }
  return violations;
}

function quotedMarkup(quote: string): string {
  const body = `(?:[^${quote}\\\\\\n]|\\\\.)*`;
  return `${quote}(?:\\s*<${body}|${body}>\\s*)${quote}`;
}

const MARKUP_STRING = `(?:${quotedMarkup("'")}|${quotedMarkup('"')})`;
const CONCAT_WITH_MARKUP = new RegExp(`\\+\\s*${MARKUP_STRING}|${MARKUP_STRING}\\s*\\+`, "g");

/** One violation per line on which a markup literal is concatenated. */
export function checkConcatWithMarkup(source: string, lines: SourceLines): Violation[] {
  const violations: Violation[] = [];
  let lastLine = 0;
  for (const match of source.matchAll(CONCAT_WITH_MARKUP)) {
    const index = match.index ?? 0;
    const line = lines.lineAt(index);
    if (line === lastLine) continue;
    lastLine = line;
    violations.push(createViolation(lines, "javascript-concat-html", { line, column: lines.columnAt(index) }));
  }
  return violations;
}

function isCommentedOut(lines: SourceLines, line: number): boolean {
  return lines.lineText(line).trim().startsWith("//");
}

export function scanJavaScript(source: string): Violation[] {
  const lines = new SourceLines(source);
  const violations = [
    ...CALL_FAMILIES.flatMap((family) => checkCallFamily(source, lines, family)),
    ...checkConcatWithMarkup(source, lines),
  ].filter((violation) => !isCommentedOut(lines, violation.line));
  return applyDisablePragmas(source, violations);
}

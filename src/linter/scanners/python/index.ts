import { applyDisablePragmas } from "../../pragma.js";
import type { RuleId } from "../../rules.js";
import { createViolation } from "../../results.js";
import { SourceLines } from "../../source-lines.js";
import type { Violation } from "../../types.js";
import { PythonSyntaxError, tokenize, type Token } from "./tokenizer.js";
import { buildTree, firstToken, forEachSequence, type Group, type Node } from "./tree.js";

const WRAPPERS = new Set(["HTML", "Text"]);
const KEYWORDS = new Set([
  "and", "as", "assert", "async", "await", "break", "class", "continue", "def", "del", "elif", "else",
  "except", "finally", "for", "from", "global", "if", "import", "in", "is", "lambda", "nonlocal", "not",
  "or", "pass", "raise", "return", "try", "while", "with", "yield",
]);
// Binary operators that bind tighter than `+`.
const TIGHT_OPERATORS = new Set(["*", "/", "//", "%", "@", "**"]);

// `<` starting a tag name or closing tag; `(?P<name>` regex groups are not markup.
const MARKUP = /(?<!\(\?P)<\/?[A-Za-z]/;
const CUSTOM_ESCAPE = /<.*&lt;|&lt;.*</;
const DEPRECATED_DISPLAY_NAME = "display_name_with_default_escaped";

// Rules that do not apply inside `__repr__`, whose output is assumed not to be HTML.
const REPR_EXEMPT: ReadonlySet<RuleId> = new Set<RuleId>([
  "python-wrap-html",
  "python-requires-html-or-text",
  "python-close-before-format",
  "python-interpolate-html",
  "python-concat-html",
]);

export function hasMarkup(text: string): boolean {
  return MARKUP.test(text);
}

interface FormatCall {
  /** First node of the receiver expression. */
  readonly start: number;
  /** Index of the argument group. */
  readonly end: number;
  readonly receiver: readonly Node[];
}

function isOp(node: Node | undefined, text: string): boolean {
  return node !== undefined && node.kind === "op" && node.text === text;
}

function isCallGroup(node: Node | undefined): node is Group {
  return node !== undefined && node.kind === "group" && node.open.text === "(";
}

function isOperand(node: Node | undefined): boolean {
  if (node === undefined) return false;
  if (node.kind === "name") return !KEYWORDS.has(node.text);
  return node.kind === "string" || node.kind === "number" || node.kind === "group";
}

/** `HTML(...)` or `Text(...)` starting at `index`, not an attribute such as `foo.HTML(...)`. */
function isWrapperCallAt(sequence: readonly Node[], index: number): boolean {
  const node = sequence[index];
  return (
    node.kind === "name" &&
    WRAPPERS.has(node.text) &&
    !isOp(sequence[index - 1], ".") &&
    isCallGroup(sequence[index + 1])
  );
}

/** Index of the first node of the primary expression (atom plus trailers) that ends at `end`. */
function primaryStart(sequence: readonly Node[], end: number): number {
  let k = end;
  for (;;) {
    const node = sequence[k];
    if (node.kind === "group") {
      if (node.open.text !== "{" && isOperand(sequence[k - 1])) {
        k--;
        continue;
      }
      return k;
    }
    if (node.kind === "name") {
      if (k >= 2 && isOp(sequence[k - 1], ".")) {
        k -= 2;
        continue;
      }
      return k;
    }
    if (node.kind === "string") {
      while (k > 0 && sequence[k - 1].kind === "string") k--;
    }
    return k;
  }
}

function findFormatCalls(sequence: readonly Node[]): FormatCall[] {
  const calls: FormatCall[] = [];
  for (let f = 2; f < sequence.length - 1; f++) {
    const node = sequence[f];
    if (node.kind !== "name" || node.text !== "format") continue;
    if (!isOp(sequence[f - 1], ".") || !isCallGroup(sequence[f + 1])) continue;
    const start = primaryStart(sequence, f - 2);
    calls.push({ start, end: f + 1, receiver: sequence.slice(start, f - 1) });
  }
  return calls;
}

function containsWrapperCall(nodes: readonly Node[]): boolean {
  for (let k = 0; k < nodes.length; k++) {
    const node = nodes[k];
    if (isWrapperCallAt(nodes, k)) return true;
    if (node.kind === "group" && containsWrapperCall(node.children)) return true;
  }
  return false;
}

function containsFormatAttribute(nodes: readonly Node[]): boolean {
  for (let k = 0; k < nodes.length; k++) {
    const node = nodes[k];
    if (node.kind === "name" && node.text === "format" && isOp(nodes[k - 1], ".")) return true;
    if (node.kind === "group" && containsFormatAttribute(node.children)) return true;
  }
  return false;
}

function isWrapperReceiver(receiver: readonly Node[]): boolean {
  return receiver.length === 2 && isWrapperCallAt(receiver, 0);
}

/** Literals outside any `HTML()`/`Text()` call that contain markup. */
function collectUnwrappedMarkup(nodes: readonly Node[], found: Token[]): void {
  for (let k = 0; k < nodes.length; k++) {
    const node = nodes[k];
    if (isWrapperCallAt(nodes, k)) {
      k++;
      continue;
    }
    if (node.kind === "string" && hasMarkup(node.value)) found.push(node);
    else if (node.kind === "group") collectUnwrappedMarkup(node.children, found);
  }
}

class PythonChecker {
  readonly violations: Violation[] = [];

  constructor(private readonly lines: SourceLines) {}

  private report(ruleId: RuleId, token: Token, line = token.line): void {
    this.violations.push(
      createViolation(this.lines, ruleId, {
        line,
        startLine: token.line,
        column: this.lines.columnAt(token.index),
      }),
    );
  }

  private reportLiteral(ruleId: RuleId, literal: Token): void {
    const offset = literal.text.search(MARKUP);
    const line = offset === -1 ? literal.line : this.lines.lineAt(literal.index + offset);
    this.report(ruleId, literal, line);
  }

  /** `.format()` interpolating HTML()/Text() must be called on HTML()/Text(). */
  checkFormatReceivers(sequence: readonly Node[]): void {
    for (const call of findFormatCalls(sequence)) {
      if (isWrapperReceiver(call.receiver)) continue;
      if (!containsWrapperCall(sequence.slice(call.start, call.end + 1))) continue;
      this.report("python-requires-html-or-text", firstToken(call.receiver[0]));
    }
  }

  /** HTML()/Text() must be closed before format() is called. */
  checkCloseBeforeFormat(sequence: readonly Node[]): void {
    for (let k = 0; k < sequence.length; k++) {
      const callee = sequence[k];
      const args = sequence[k + 1];
      if (callee.kind !== "name" || !isWrapperCallAt(sequence, k) || !isCallGroup(args)) continue;
      if (containsFormatAttribute(args.children)) this.report("python-close-before-format", callee);
    }
  }

  /** Markup literals in outermost format() calls must be wrapped in HTML(). */
  checkOuterFormats(sequence: readonly Node[]): void {
    const calls = findFormatCalls(sequence);
    const outer = calls.filter(
      (call) => !calls.some((other) => other !== call && other.start <= call.start && call.end <= other.end),
    );
    for (const call of outer) {
      const literals: Token[] = [];
      collectUnwrappedMarkup(sequence.slice(call.start, call.end + 1), literals);
      for (const literal of literals) this.reportLiteral("python-wrap-html", literal);
    }
    sequence.forEach((node, k) => {
      if (node.kind !== "group") return;
      if (outer.some((call) => call.start <= k && k <= call.end)) return;
      this.checkOuterFormats(node.children);
    });
  }

  /** `'<b>%s</b>' % value` */
  checkInterpolation(sequence: readonly Node[]): void {
    for (let k = 1; k < sequence.length; k++) {
      if (!isOp(sequence[k], "%") || sequence[k - 1].kind !== "string") continue;
      let start = k - 1;
      while (start > 0 && sequence[start - 1].kind === "string") start--;
      const before = sequence[start - 1];
      if (before !== undefined && before.kind === "op" && TIGHT_OPERATORS.has(before.text)) continue;
      const literal = this.firstMarkupLiteral(sequence.slice(start, k));
      if (literal) this.reportLiteral("python-interpolate-html", literal);
    }
  }

  /** Literal operands of `+` that contain markup, once per literal. */
  checkConcatenation(sequence: readonly Node[]): void {
    for (let k = 0; k < sequence.length; k++) {
      if (sequence[k].kind !== "string") continue;
      const runStart = k;
      while (k + 1 < sequence.length && sequence[k + 1].kind === "string") k++;
      const before = sequence[runStart - 1];
      const after = sequence[k + 1];
      const literal = this.firstMarkupLiteral(sequence.slice(runStart, k + 1));
      if (!literal) continue;

      const afterBindsTighter =
        after !== undefined &&
        ((after.kind === "op" && (TIGHT_OPERATORS.has(after.text) || after.text === ".")) ||
          (after.kind === "group" && after.open.text !== "{"));
      const rightOperand = isOp(before, "+") && isOperand(sequence[runStart - 2]) && !afterBindsTighter;

      const beforeBindsTighter =
        before !== undefined && before.kind === "op" && (TIGHT_OPERATORS.has(before.text) || before.text === "-");
      const leftOperand = isOp(after, "+") && !beforeBindsTighter;

      if (rightOperand || leftOperand) this.reportLiteral("python-concat-html", literal);
    }
  }

  checkDeprecatedDisplayName(sequence: readonly Node[]): void {
    sequence.forEach((node, k) => {
      if (node.kind === "name" && node.text === DEPRECATED_DISPLAY_NAME && isOp(sequence[k - 1], ".")) {
        this.report("python-deprecated-display-name", node);
      }
    });
  }

  checkCustomEscape(): void {
    for (let line = 1; line <= this.lines.lineCount; line++) {
      const text = this.lines.lineText(line);
      if (text.trim().startsWith("#")) continue;
      const match = CUSTOM_ESCAPE.exec(text);
      if (!match) continue;
      this.violations.push(
        createViolation(this.lines, "python-custom-escape", { line, column: match.index + 1 }),
      );
    }
  }

  private firstMarkupLiteral(nodes: readonly Node[]): Token | undefined {
    for (const node of nodes) {
      if (node.kind === "string" && hasMarkup(node.value)) return node;
    }
    return undefined;
  }
}

/** Line ranges covered by `def __repr__` bodies. */
export function findReprRanges(tokens: readonly Token[]): Array<readonly [number, number]> {
  const ranges: Array<readonly [number, number]> = [];
  for (let k = 0; k + 1 < tokens.length; k++) {
    if (tokens[k].text !== "def" || tokens[k + 1].text !== "__repr__") continue;
    let statement = k;
    while (statement > 0 && tokens[statement].column < 0) statement--;
    const indent = tokens[statement].column;
    let endLine = Number.POSITIVE_INFINITY;
    for (let j = k + 2; j < tokens.length; j++) {
      const token = tokens[j];
      if (token.column >= 0 && token.column <= indent) {
        endLine = tokens[j - 1].endLine;
        break;
      }
    }
    ranges.push([tokens[k].line, endLine]);
  }
  return ranges;
}

export function findPythonViolations(source: string, lines: SourceLines): Violation[] {
  let tokens: Token[];
  let tree: Node[];
  try {
    tokens = tokenize(source);
    tree = buildTree(tokens);
  } catch (err) {
    if (!(err instanceof PythonSyntaxError)) throw err;
    return [createViolation(lines, "python-parse-error", { line: err.line })];
  }

  const checker = new PythonChecker(lines);
  forEachSequence(tree, (sequence) => {
    checker.checkFormatReceivers(sequence);
    checker.checkCloseBeforeFormat(sequence);
    checker.checkInterpolation(sequence);
    checker.checkConcatenation(sequence);
    checker.checkDeprecatedDisplayName(sequence);
  });
  checker.checkOuterFormats(tree);
  checker.checkCustomEscape();

  const reprRanges = findReprRanges(tokens);
  return checker.violations.filter(
    (violation) =>
      !REPR_EXEMPT.has(violation.ruleId) ||
      !reprRanges.some(([first, last]) => violation.startLine >= first && violation.startLine <= last),
  );
}

export function scanPython(source: string): Violation[] {
  const lines = new SourceLines(source);
  return applyDisablePragmas(source, findPythonViolations(source, lines));
}

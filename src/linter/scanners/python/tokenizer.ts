export type TokenKind = "name" | "number" | "string" | "op" | "open" | "close" | "newline";

export interface Token {
  readonly kind: TokenKind;
  /** Source text of the token, including string prefix and quotes. */
  readonly text: string;
  /** For strings: the body between the quotes, escapes decoded unless raw. */
  readonly value: string;
  readonly index: number;
  readonly line: number;
  readonly endLine: number;
  /** Column of the first character of the token's line (0-based), for logical line starts. */
  readonly column: number;
  readonly raw: boolean;
}

export class PythonSyntaxError extends Error {
  constructor(
    message: string,
    readonly line: number,
  ) {
    super(message);
    this.name = "PythonSyntaxError";
  }
}

/** Lexer states while inside a string literal. */
type QuoteState = "single" | "double" | "triple-single" | "triple-double";

const QUOTE_DELIMITERS: Record<QuoteState, string> = {
  single: "'",
  double: '"',
  "triple-single": "'''",
  "triple-double": '"""',
};

const STRING_PREFIX = /^(?:[rRbBuUfF]|[rR][bBfF]|[bBfF][rR])$/;
const IDENTIFIER_START = /[\p{L}_]/u;
const IDENTIFIER_PART = /[\p{L}\p{N}_]/u;
const OPERATORS = [
  "**=", "//=", ">>=", "<<=", "...",
  "**", "//", "==", "!=", "<=", ">=", "->", "+=", "-=", "*=", "/=", "%=", "&=", "|=", "^=", "@=", ":=", "<<", ">>",
];
const PAIRS: Record<string, string> = { ")": "(", "]": "[", "}": "{" };

const SIMPLE_ESCAPES: Record<string, string> = {
  "\\": "\\",
  "'": "'",
  '"': '"',
  n: "\n",
  t: "\t",
  r: "\r",
  "\n": "",
};

interface OpenBracket {
  readonly char: string;
  readonly line: number;
}

/**
 * Splits Python source into tokens. Comments and line continuations are
 * dropped, and NEWLINE tokens mark the end of logical lines outside brackets.
 * Unbalanced brackets and unterminated strings raise PythonSyntaxError.
 */
export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  const brackets: OpenBracket[] = [];
  let i = 0;
  let line = 1;
  let lineStart = 0;
  let atLogicalLineStart = true;

  const push = (
    kind: TokenKind,
    start: number,
    end: number,
    startLine: number,
    value = "",
    raw = false,
    tokenLineStart = lineStart,
  ): void => {
    tokens.push({
      kind,
      text: source.slice(start, end),
      value,
      index: start,
      line: startLine,
      endLine: line,
      column: atLogicalLineStart ? start - tokenLineStart : -1,
      raw,
    });
    atLogicalLineStart = false;
  };

  const readString = (start: number, prefix: string): void => {
    const raw = /[rR]/.test(prefix);
    let j = start + prefix.length;
    const state: QuoteState = source.startsWith("'''", j)
      ? "triple-single"
      : source.startsWith('"""', j)
        ? "triple-double"
        : source[j] === "'"
          ? "single"
          : "double";
    const delimiter = QUOTE_DELIMITERS[state];
    const triple = delimiter.length === 3;
    const startLine = line;
    const startLineStart = lineStart;
    let value = "";
    j += delimiter.length;

    for (;;) {
      if (j >= source.length) {
        throw new PythonSyntaxError(
          triple ? "unterminated triple-quoted string literal" : "unterminated string literal",
          startLine,
        );
      }
      const ch = source[j];
      if (ch === "\\" && j + 1 < source.length) {
        const next = source.startsWith("\r\n", j + 1) ? "\r\n" : source[j + 1];
        if (next === "\n" || next === "\r\n") {
          line++;
          lineStart = j + 1 + next.length;
        }
        value += raw ? ch + next : next === "\r\n" ? "" : (SIMPLE_ESCAPES[next] ?? ch + next);
        j += 1 + next.length;
        continue;
      }
      if (source.startsWith(delimiter, j)) {
        j += delimiter.length;
        break;
      }
      if (ch === "\n") {
        if (!triple) throw new PythonSyntaxError("unterminated string literal", startLine);
        line++;
        lineStart = j + 1;
      }
      value += ch;
      j++;
    }

    push("string", start, j, startLine, value, raw, startLineStart);
    i = j;
  };

  while (i < source.length) {
    const ch = source[i];

    if (ch === "\n") {
      if (brackets.length === 0 && !atLogicalLineStart) {
        push("newline", i, i + 1, line);
        atLogicalLineStart = true;
      }
      line++;
      i++;
      lineStart = i;
      continue;
    }
    if (ch === " " || ch === "\t" || ch === "\r" || ch === "\f") {
      i++;
      continue;
    }
    if (ch === "#") {
      while (i < source.length && source[i] !== "\n") i++;
      continue;
    }
    if (ch === "\\" && (source[i + 1] === "\n" || source.startsWith("\r\n", i + 1))) {
      i += source[i + 1] === "\n" ? 2 : 3;
      line++;
      lineStart = i;
      continue;
    }
    if (ch === "'" || ch === '"') {
      readString(i, "");
      continue;
    }
    if (IDENTIFIER_START.test(ch)) {
      let j = i + 1;
      while (j < source.length && IDENTIFIER_PART.test(source[j])) j++;
      const word = source.slice(i, j);
      if (STRING_PREFIX.test(word) && (source[j] === "'" || source[j] === '"')) {
        readString(i, word);
        continue;
      }
      push("name", i, j, line);
      i = j;
      continue;
    }
    if (/\d/.test(ch) || (ch === "." && /\d/.test(source[i + 1] ?? ""))) {
      let j = i + 1;
      while (j < source.length && /[\w.]/.test(source[j])) j++;
      push("number", i, j, line);
      i = j;
      continue;
    }
    if (ch === "(" || ch === "[" || ch === "{") {
      brackets.push({ char: ch, line });
      push("open", i, i + 1, line);
      i++;
      continue;
    }
    if (ch === ")" || ch === "]" || ch === "}") {
      const open = brackets.pop();
      if (!open) throw new PythonSyntaxError(`unmatched '${ch}'`, line);
      if (open.char !== PAIRS[ch]) {
        throw new PythonSyntaxError(`closing '${ch}' does not match opening '${open.char}'`, line);
      }
      push("close", i, i + 1, line);
      i++;
      continue;
    }

    const op = OPERATORS.find((candidate) => source.startsWith(candidate, i)) ?? ch;
    push("op", i, i + op.length, line);
    i += op.length;
  }

  const unclosed = brackets.pop();
  if (unclosed) throw new PythonSyntaxError(`'${unclosed.char}' was never closed`, unclosed.line);
  if (!atLogicalLineStart) push("newline", source.length, source.length, line);
  return tokens;
}

import type { RuleId } from "./rules.js";

export type Dialect = "underscore" | "mako" | "javascript" | "python";

export const DIALECTS: readonly Dialect[] = ["underscore", "mako", "javascript", "python"];

export interface Rule {
  readonly id: RuleId;
  readonly dialect: Dialect;
  readonly message: string;
}

export interface Violation {
  readonly ruleId: RuleId;
  /** Line of the offending token (1-based). */
  readonly line: number;
  /** Line where the enclosing literal or call began; equals `line` for single-line matches. */
  readonly startLine: number;
  readonly column?: number;
  readonly disabled: boolean;
  /** Source text of lines `startLine..line`. */
  readonly context: string;
}

export interface FileResults {
  readonly filePath: string;
  readonly dialect: Dialect;
  readonly violations: readonly Violation[];
}

export interface ReadFailure {
  readonly filePath: string;
  readonly error: string;
}

export interface LintRun {
  readonly results: FileResults[];
  readonly failures: ReadFailure[];
}

export interface LintSummary {
  readonly filesScanned: number;
  readonly enabledCount: number;
  readonly disabledCount: number;
  readonly byRule: Partial<Record<RuleId, number>>;
  readonly byFile: Record<string, Violation[]>;
}

/** A dialect scanner: pure function of the file text. */
export type Scanner = (source: string) => Violation[];

import type { Dialect } from "../linter/types.js";

export interface XssLintConfig {
  /** Directory paths (relative, `/`-separated) that are never walked. */
  readonly skipDirs: readonly string[];
  readonly extensions: ExtensionsConfig;
  readonly logging: LoggingConfig;
}

export type ExtensionsConfig = Readonly<Record<Dialect, readonly string[]>>;

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface LoggingConfig {
  readonly level: LogLevel;
  readonly file?: string;
  readonly json?: boolean;
}

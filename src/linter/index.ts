export { XssLinter, SCANNERS, type XssLinterOptions } from "./linter.js";
export { getRule, isRuleId, listRules, type RuleId } from "./rules.js";
export { applyDisablePragmas, findDisablePragmas, type DisablePragma } from "./pragma.js";
export { compareViolations, sortViolations, summarize, violationSortKey } from "./results.js";
export { scanJavaScript } from "./scanners/javascript.js";
export { scanMako } from "./scanners/mako.js";
export { scanPython } from "./scanners/python/index.js";
export { scanUnderscore } from "./scanners/underscore.js";
export { PythonSyntaxError } from "./scanners/python/tokenizer.js";
export { DIALECTS } from "./types.js";
export type { Dialect, FileResults, LintRun, LintSummary, ReadFailure, Rule, Scanner, Violation } from "./types.js";

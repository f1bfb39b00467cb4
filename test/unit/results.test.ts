import { describe, it, expect } from "vitest";
import { compareViolations, createViolation, sortViolations, summarize, violationSortKey } from "../../src/linter/results.js";
import { SourceLines } from "../../src/linter/source-lines.js";
import type { Violation } from "../../src/linter/types.js";

function violation(overrides: Partial<Violation> & Pick<Violation, "ruleId" | "line">): Violation {
  return { startLine: overrides.line, disabled: false, context: "", ...overrides };
}

describe("SourceLines", () => {
  const lines = new SourceLines("first\nsecond\r\n\nlast");

  it("maps offsets to 1-based lines and columns", () => {
    expect(lines.lineCount).toBe(4);
    expect(lines.lineAt(0)).toBe(1);
    expect(lines.lineAt(6)).toBe(2);
    expect(lines.columnAt(8)).toBe(3);
    expect(lines.lineAt(15)).toBe(4);
  });

  it("returns line text without line endings", () => {
    expect(lines.lineText(2)).toBe("second");
    expect(lines.lineText(3)).toBe("");
    expect(lines.context(1, 2)).toBe("first\nsecond");
  });
});

describe("createViolation", () => {
  const lines = new SourceLines("a = '''\n<b>\n'''");

  it("defaults startLine to line", () => {
    const v = createViolation(lines, "python-wrap-html", { line: 2 });
    expect(v.startLine).toBe(2);
    expect(v.context).toBe("<b>");
    expect(v.disabled).toBe(false);
    expect(v).not.toHaveProperty("column");
  });

  it("captures the context of a multi-line match", () => {
    const v = createViolation(lines, "python-wrap-html", { line: 2, startLine: 1, column: 5 });
    expect(v.startLine).toBe(1);
    expect(v.column).toBe(5);
    expect(v.context).toBe("a = '''\n<b>");
  });

  it("never places startLine after line", () => {
    const v = createViolation(lines, "python-wrap-html", { line: 1, startLine: 3 });
    expect(v.startLine).toBe(1);
  });
});

describe("sortViolations", () => {
  const a = violation({ ruleId: "python-wrap-html", line: 3 });
  const b = violation({ ruleId: "python-concat-html", line: 3, column: 9 });
  const c = violation({ ruleId: "python-concat-html", line: 3, column: 2 });
  const d = violation({ ruleId: "python-wrap-html", line: 1 });

  it("orders by line, then rule id, then column", () => {
    expect(sortViolations([a, b, c, d])).toEqual([d, c, b, a]);
  });

  it("is independent of input order and idempotent", () => {
    const once = sortViolations([b, d, a, c]);
    expect(sortViolations([...once].reverse())).toEqual(once);
    expect(sortViolations(once)).toEqual(once);
  });

  it("treats a missing column as 0", () => {
    const noColumn = violation({ ruleId: "python-concat-html", line: 3 });
    expect(violationSortKey(noColumn)).toEqual([3, "python-concat-html", 0]);
    expect(compareViolations(noColumn, c)).toBeLessThan(0);
  });

  it("does not modify its input", () => {
    const input = [a, d];
    sortViolations(input);
    expect(input).toEqual([a, d]);
  });
});

describe("summarize", () => {
  it("counts enabled violations by rule and file", () => {
    const summary = summarize([
      {
        filePath: "a.py",
        dialect: "python",
        violations: [
          violation({ ruleId: "python-concat-html", line: 1 }),
          violation({ ruleId: "python-concat-html", line: 1 }),
          violation({ ruleId: "python-wrap-html", line: 2, disabled: true }),
        ],
      },
      { filePath: "b.js", dialect: "javascript", violations: [] },
    ]);

    expect(summary.filesScanned).toBe(2);
    expect(summary.enabledCount).toBe(2);
    expect(summary.disabledCount).toBe(1);
    expect(summary.byRule).toEqual({ "python-concat-html": 2 });
    expect(Object.keys(summary.byFile)).toEqual(["a.py"]);
    expect(summary.byFile["a.py"]).toHaveLength(2);
  });
});

import { describe, it, expect } from "vitest";
import { applyDisablePragmas, findDisablePragmas } from "../../src/linter/pragma.js";
import type { Violation } from "../../src/linter/types.js";

function at(line: number, ruleId: Violation["ruleId"] = "underscore-not-escaped"): Violation {
  return { ruleId, line, startLine: line, disabled: false, context: "" };
}

describe("findDisablePragmas", () => {
  it("reads a comma separated rule list", () => {
    expect(findDisablePragmas("// xss-lint: disable=a-rule,b-rule\nx")).toEqual([
      { line: 1, ruleIds: ["a-rule", "b-rule"] },
    ]);
  });

  it("allows any whitespace after the colon", () => {
    expect(findDisablePragmas("<% // xss-lint:   disable=underscore-not-escaped   %>")).toEqual([
      { line: 1, ruleIds: ["underscore-not-escaped"] },
    ]);
  });

  it("honors a marker preceded by five tokens", () => {
    expect(findDisablePragmas(" 1 2 3 4 5 xss-lint: disable=some-rule")).toHaveLength(1);
  });

  it("ignores a marker preceded by six tokens", () => {
    expect(findDisablePragmas(" 1 2 3 4 5 6 xss-lint: disable=some-rule")).toEqual([]);
  });
});

describe("applyDisablePragmas", () => {
  it("disables the next matching violation", () => {
    const source = "<% // xss-lint: disable=underscore-not-escaped %>\n<%= message %>";
    expect(applyDisablePragmas(source, [at(2)]).map((v) => v.disabled)).toEqual([true]);
  });

  it("ignores pragmas for other rules", () => {
    const source = "<% // xss-lint: disable=another-rule %>\n<%= message %>";
    expect(applyDisablePragmas(source, [at(2)]).map((v) => v.disabled)).toEqual([false]);
  });

  it("honors one rule out of a list", () => {
    const source = "<% // xss-lint: disable=another-rule,underscore-not-escaped %>\n<%= message %>";
    expect(applyDisablePragmas(source, [at(2)]).map((v) => v.disabled)).toEqual([true]);
  });

  it("is consumed by exactly one violation", () => {
    const source = "<% // xss-lint: disable=underscore-not-escaped %>\n<%= message %>\n<%= message %>";
    expect(applyDisablePragmas(source, [at(2), at(3)]).map((v) => v.disabled)).toEqual([true, false]);
  });

  it("applies to a violation earlier on the pragma's own line", () => {
    const source = "<%= message %><% // xss-lint: disable=underscore-not-escaped %>\n<%= message %>";
    expect(applyDisablePragmas(source, [at(1), at(2)]).map((v) => v.disabled)).toEqual([true, false]);
  });

  it("never applies backwards to an earlier line", () => {
    const source = "<%= message %>\n<% // xss-lint: disable=underscore-not-escaped %>";
    expect(applyDisablePragmas(source, [at(1)]).map((v) => v.disabled)).toEqual([false]);
  });

  it("only counts pragmas within the token limit", () => {
    const source = [
      " 1 2 3 4 5 xss-lint: disable=underscore-not-escaped %>",
      "<%= message %>",
      " 1 2 3 4 5 6 xss-lint: disable=underscore-not-escaped %>",
      "<%= message %>",
    ].join("\n");
    expect(applyDisablePragmas(source, [at(2), at(4)]).map((v) => v.disabled)).toEqual([true, false]);
  });

  it("lets a later pragma replace an unconsumed one", () => {
    const source = "# xss-lint: disable=python-wrap-html\n# xss-lint: disable=python-wrap-html\nx\ny";
    expect(applyDisablePragmas(source, [at(3, "python-wrap-html"), at(4, "python-wrap-html")]).map((v) => v.disabled))
      .toEqual([true, false]);
  });

  it("processes violations by line but keeps their order", () => {
    const source = "x\n// xss-lint: disable=javascript-escape\ny";
    const result = applyDisablePragmas(source, [at(3, "javascript-escape"), at(1, "javascript-escape")]);
    expect(result.map((v) => [v.line, v.disabled])).toEqual([
      [3, true],
      [1, false],
    ]);
  });

  it("returns new objects", () => {
    const input = [at(1)];
    const result = applyDisablePragmas("// xss-lint: disable=underscore-not-escaped", input);
    expect(result[0].disabled).toBe(true);
    expect(input[0].disabled).toBe(false);
  });
});

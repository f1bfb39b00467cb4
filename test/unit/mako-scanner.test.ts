import { describe, it, expect } from "vitest";
import { findExpressionEnd, scanMako, splitFilters } from "../../src/linter/scanners/mako.js";

const PAGE = '<%page expression_filter="h"/>';

function found(template: string): Array<[string, number]> {
  return scanMako(template).map((v) => [v.ruleId, v.line]);
}

describe("mako expression parsing", () => {
  it("splits filters at the last top-level pipe", () => {
    expect(splitFilters(" x | h, trim ")).toEqual({ expression: "x", filters: ["h", "trim"] });
    expect(splitFilters(" f(a | b) ")).toEqual({ expression: "f(a | b)", filters: [] });
    expect(splitFilters(' "a|b" ')).toEqual({ expression: '"a|b"', filters: [] });
  });

  it("skips nested braces and strings when closing an expression", () => {
    const source = "${ {'a': '}'}['a'] }";
    expect(findExpressionEnd(source, 2)).toBe(source.length - 1);
    expect(findExpressionEnd("${ open", 2)).toBe(-1);
  });
});

describe("scanMako", () => {
  it("accepts escaped expressions under the page default", () => {
    expect(found(`${PAGE}\n<p>\${name}</p>`)).toEqual([]);
  });

  it("requires the page default when the template has expressions", () => {
    expect(found("<p>${name}</p>")).toEqual([["mako-missing-default", 1]]);
    expect(found("<p>static</p>")).toEqual([]);
  });

  it("reports an explicit h filter under the page default", () => {
    expect(found(`${PAGE}\n\${name | h}`)).toEqual([["mako-unwanted-html-filter", 2]]);
  });

  it("only allows the n filter on HTML() and Text()", () => {
    expect(found(`${PAGE}\n\${x | n}`)).toEqual([["mako-invalid-html-filter", 2]]);
    expect(found(`${PAGE}\n\${HTML(x) | n}`)).toEqual([]);
    expect(found(`${PAGE}\n\${Text(_("a")) | n, unicode}`)).toEqual([]);
  });

  it("reports every page tag after the first", () => {
    expect(found(`${PAGE}\n<%page args="x"/>\n<%page args="y"/>`)).toEqual([
      ["mako-multiple-page-tags", 2],
      ["mako-multiple-page-tags", 3],
    ]);
  });

  it("stops at an expression that is never closed", () => {
    expect(found(`${PAGE}\n\${a}\n\${b\n\${c | n}`)).toEqual([["mako-unparseable-expression", 3]]);
  });

  it("ignores comment lines and doc blocks", () => {
    expect(found("## ${x | n}\n<%doc>\n${y}\n</%doc>")).toEqual([]);
  });

  it("handles braces inside expressions", () => {
    expect(found(`${PAGE}\n\${ {'a': 1}['a'] | h }`)).toEqual([["mako-unwanted-html-filter", 2]]);
  });

  it("applies disable pragmas", () => {
    const template = `${PAGE}\n## xss-lint: disable=mako-invalid-html-filter\n\${x | n}\n\${y | n}`;
    expect(scanMako(template).map((v) => [v.line, v.disabled])).toEqual([
      [3, true],
      [4, false],
    ]);
  });
});

import type { Dialect, Rule } from "./types.js";

const RULE_DEFINITIONS = {
  "underscore-not-escaped": {
    dialect: "underscore",
    message: "Expressions should be escaped using <%- expression %>.",
  },
  "mako-missing-default": {
    dialect: "mako",
    message: 'Missing default <%page expression_filter="h"/>.',
  },
  "mako-multiple-page-tags": {
    dialect: "mako",
    message: "A Mako template can only have one <%page> tag.",
  },
  "mako-unparseable-expression": {
    dialect: "mako",
    message: "The expression could not be parsed; no closing } was found.",
  },
  "mako-unwanted-html-filter": {
    dialect: "mako",
    message: "Remove the explicit h filter; the page default already escapes.",
  },
  "mako-invalid-html-filter": {
    dialect: "mako",
    message: "The n filter disables escaping; only use it with HTML() or Text().",
  },
  "javascript-concat-html": {
    dialect: "javascript",
    message: "Use HtmlUtils functions rather than concatenating strings with HTML.",
  },
  "javascript-jquery-append": {
    dialect: "javascript",
    message: "Use HtmlUtils.append() or .append(HtmlUtils.xxx().toString()).",
  },
  "javascript-jquery-prepend": {
    dialect: "javascript",
    message: "Use HtmlUtils.prepend() or .prepend(HtmlUtils.xxx().toString()).",
  },
  "javascript-jquery-insertion": {
    dialect: "javascript",
    message: "Use JQuery insertion functions with an element or HtmlUtils.xxx().toString().",
  },
  "javascript-jquery-insert-into-target": {
    dialect: "javascript",
    message: "Call insertion targets (appendTo, prependTo, ...) on an element, not on a string.",
  },
  "javascript-jquery-html": {
    dialect: "javascript",
    message: "Use HtmlUtils.setHtml(), .html(HtmlUtils.xxx().toString()), or JQuery's text() function.",
  },
  "javascript-interpolate": {
    dialect: "javascript",
    message: "Use StringUtils.interpolate() or HtmlUtils.interpolateHtml() as appropriate.",
  },
  "javascript-escape": {
    dialect: "javascript",
    message: "Avoid calls to escape(), especially in Backbone. Use templates, HtmlUtils, or JQuery's text() function.",
  },
  "python-parse-error": {
    dialect: "python",
    message: "Error parsing Python code; the file could not be checked for other violations.",
  },
  "python-custom-escape": {
    dialect: "python",
    message: "Escape HTML with the sanctioned escape helper instead of replacing '<' with '&lt;' by hand.",
  },
  "python-deprecated-display-name": {
    dialect: "python",
    message: "Replace display_name_with_default_escaped with display_name_with_default and escape where it is rendered.",
  },
  "python-requires-html-or-text": {
    dialect: "python",
    message: "You must start with Text() or HTML() if you use HTML() or Text() during interpolation.",
  },
  "python-close-before-format": {
    dialect: "python",
    message: "You must close any call to Text() or HTML() before calling format().",
  },
  "python-wrap-html": {
    dialect: "python",
    message: "String containing HTML should be wrapped with call to HTML().",
  },
  "python-interpolate-html": {
    dialect: "python",
    message: "Use HTML(), Text(), and format() rather than % to interpolate HTML.",
  },
  "python-concat-html": {
    dialect: "python",
    message: "Use HTML(), Text(), and format() rather than + to concatenate HTML.",
  },
} as const satisfies Record<string, { dialect: Dialect; message: string }>;

export type RuleId = keyof typeof RULE_DEFINITIONS;

const RULES: ReadonlyMap<RuleId, Rule> = new Map<RuleId, Rule>(
  Object.entries(RULE_DEFINITIONS).flatMap(([id, definition]) =>
    isRuleId(id) ? [[id, Object.freeze({ id, ...definition })] as const] : [],
  ),
);

export function isRuleId(value: string): value is RuleId {
  return Object.prototype.hasOwnProperty.call(RULE_DEFINITIONS, value);
}

export function getRule(id: RuleId): Rule {
  const rule = RULES.get(id);
  if (!rule) throw new Error(`Unknown rule: ${id}`);
  return rule;
}

export function listRules(dialect?: Dialect): Rule[] {
  const rules = [...RULES.values()];
  return dialect ? rules.filter((r) => r.dialect === dialect) : rules;
}

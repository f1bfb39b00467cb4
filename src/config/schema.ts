import { z } from "zod";
import type { XssLintConfig } from "./types.js";

export const DEFAULT_SKIP_DIRS = [
  "node_modules",
  ".git",
  ".pycharm_helpers",
  "test_root/staticfiles",
  "common/static/xmodule/modules",
  "common/static/bundles",
  "perf_tests",
  "build",
  "dist",
];

const extensionList = (defaults: string[]) =>
  z.array(z.string().regex(/^\.[\w.-]+$/, "extensions start with a dot")).default(defaults);

const extensionsSchema = z.object({
  underscore: extensionList([".underscore"]),
  mako: extensionList([".mako", ".html"]),
  javascript: extensionList([".js"]),
  python: extensionList([".py"]),
});

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

export const xssLintConfigSchema = z.object({
  skipDirs: z.array(z.string().min(1)).default(DEFAULT_SKIP_DIRS),
  extensions: extensionsSchema.default({}),
  logging: loggingSchema.default({}),
});

export function parseConfig(raw: unknown): XssLintConfig {
  return xssLintConfigSchema.parse(raw);
}

export const DEFAULT_CONFIG_FILE = "xss-lint.config.json";

export function getConfigPath(): string {
  return process.env["XSS_LINT_CONFIG_PATH"] ?? DEFAULT_CONFIG_FILE;
}

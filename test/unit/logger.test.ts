import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { createLogger } from "../../src/logging/logger.js";

describe("createLogger", () => {
  let tempDir: string | undefined;

  afterEach(() => {
    if (tempDir) rmSync(tempDir, { recursive: true, force: true });
    tempDir = undefined;
  });

  it("creates a logger with default level", () => {
    const logger = createLogger({ level: "info", json: true });
    expect(logger.level).toBe("info");
  });

  it("creates a logger with custom level", () => {
    const logger = createLogger({ level: "debug", json: true });
    expect(logger.level).toBe("debug");
  });

  it("can be silenced", () => {
    const logger = createLogger({ level: "silent", json: true });
    expect(logger.level).toBe("silent");
    expect(logger.isLevelEnabled("error")).toBe(false);
  });

  it("creates a child logger", () => {
    const logger = createLogger({ level: "warn", json: true });
    const child = logger.child({ file: "a.py" });
    expect(child.level).toBe("warn");
  });

  it("writes to a file destination", () => {
    tempDir = mkdtempSync(join(tmpdir(), "xss-lint-log-test-"));
    const logger = createLogger({ level: "info", file: join(tempDir, "lint.log") });
    expect(logger.level).toBe("info");
  });
});

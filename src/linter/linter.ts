import { readdir, readFile, stat } from "node:fs/promises";
import { extname, join, relative, sep } from "node:path";
import type { ExtensionsConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import { sortViolations, summarize } from "./results.js";
import { scanJavaScript } from "./scanners/javascript.js";
import { scanMako } from "./scanners/mako.js";
import { scanPython } from "./scanners/python/index.js";
import { scanUnderscore } from "./scanners/underscore.js";
import { DIALECTS, type Dialect, type FileResults, type LintRun, type LintSummary, type ReadFailure, type Scanner } from "./types.js";

export const SCANNERS: Readonly<Record<Dialect, readonly Scanner[]>> = {
  underscore: [scanUnderscore],
  mako: [scanMako],
  // Script files embed Underscore templates as well.
  javascript: [scanJavaScript, scanUnderscore],
  python: [scanPython],
};

export interface XssLinterOptions {
  readonly skipDirs: readonly string[];
  readonly extensions: ExtensionsConfig;
  readonly logger?: Logger;
}

const byLowerCaseName = (a: string, b: string): number => {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  return left < right ? -1 : left > right ? 1 : 0;
};

export class XssLinter {
  private readonly skipDirs: readonly string[];
  private readonly dialectByExtension = new Map<string, Dialect>();
  private readonly logger: Logger | undefined;

  constructor(options: XssLinterOptions) {
    this.skipDirs = options.skipDirs.map((dir) => dir.replace(/\/+$/, ""));
    this.logger = options.logger;
    for (const dialect of DIALECTS) {
      for (const extension of options.extensions[dialect]) {
        this.dialectByExtension.set(extension.toLowerCase(), dialect);
      }
    }
  }

  /** Dialect for a path, by extension; null when the file is not linted. */
  classify(filePath: string): Dialect | null {
    return this.dialectByExtension.get(extname(filePath).toLowerCase()) ?? null;
  }

  lintSource(source: string, dialect: Dialect, filePath: string): FileResults {
    const violations = SCANNERS[dialect].flatMap((scan) => scan(source));
    return { filePath, dialect, violations: sortViolations(violations) };
  }

  buildSummary(run: LintRun): LintSummary {
    return summarize(run.results);
  }

  async lintPath(target: string): Promise<LintRun> {
    const info = await stat(target).catch(() => null);
    if (!info) {
      throw new Error(`Path [${target}] is not a valid file or directory.`);
    }

    const files = info.isDirectory() ? await this.discoverFiles(target, target) : [target];
    const results: FileResults[] = [];
    const failures: ReadFailure[] = [];

    for (const file of files) {
      const dialect = this.classify(file);
      if (!dialect) continue;
      let source: string;
      try {
        source = await readFile(file, "utf-8");
      } catch (err) {
        const error = err instanceof Error ? err.message : String(err);
        this.logger?.warn({ file, err: error }, "Could not read file");
        failures.push({ filePath: file, error });
        continue;
      }
      const fileResults = this.lintSource(source, dialect, file);
      this.logger?.debug({ file, dialect, violations: fileResults.violations.length }, "Linted file");
      results.push(fileResults);
    }

    return { results, failures };
  }

  isSkipDir(root: string, dir: string): boolean {
    const path = relative(root, dir).split(sep).join("/");
    return this.skipDirs.some((skip) => path === skip || path.endsWith(`/${skip}`));
  }

  private async discoverFiles(root: string, dir: string, collected: string[] = []): Promise<string[]> {
    const entries = await readdir(dir, { withFileTypes: true });
    const files = entries.filter((entry) => !entry.isDirectory()).map((entry) => entry.name);
    const dirs = entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name);

    for (const name of files.sort(byLowerCaseName)) {
      collected.push(join(dir, name));
    }
    for (const name of dirs.sort(byLowerCaseName)) {
      const full = join(dir, name);
      if (this.isSkipDir(root, full)) {
        this.logger?.debug({ dir: full }, "Skipping directory");
        continue;
      }
      await this.discoverFiles(root, full, collected);
    }
    return collected;
  }
}

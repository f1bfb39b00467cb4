import { Command, Option } from "clipanion";
import { loadConfig } from "../../config/loader.js";
import type { XssLintConfig } from "../../config/types.js";
import { XssLinter } from "../../linter/linter.js";
import type { LintRun } from "../../linter/types.js";
import { createLogger } from "../../logging/logger.js";
import { formatFileResults, formatSummary } from "../report.js";

export class LintCommand extends Command {
  static override paths = [["lint"], Command.Default];

  static override usage = Command.Usage({
    description: "Check templates and scripts for XSS risks",
    details: `
      Lints a single file, or walks a directory and lints every file whose
      extension belongs to a supported dialect. Exits with 0 only when no
      enabled violation was found.

      Violations can be disabled with a \`xss-lint: disable=<rule-id>\`
      comment on the offending line or a line before it.
    `,
    examples: [
      ["Lint the current directory", "xss-lint"],
      ["Lint one template", "xss-lint lint templates/course.underscore"],
      ["Only list files with violations", "xss-lint --list-files src"],
    ],
  });

  target = Option.String({ name: "path", required: false });

  listFiles = Option.Boolean("--list-files", false, {
    description: "Only display the filenames that contain violations",
  });

  ruleTotals = Option.Boolean("--rule-totals", false, {
    description: "Display the totals for each rule",
  });

  verbose = Option.Boolean("--verbose", false, {
    description: "Print every line of a multi-line violation",
  });

  showDisabled = Option.Boolean("--show-disabled", false, {
    description: "Also print violations disabled by a pragma",
  });

  configPath = Option.String("--config", {
    description: "Path to the configuration file",
  });

  async execute(): Promise<number> {
    let config: XssLintConfig;
    try {
      config = loadConfig(this.configPath);
    } catch (err) {
      this.context.stdout.write(
        `Failed to load config: ${err instanceof Error ? err.message : String(err)}\n`,
      );
      return 2;
    }

    const logger = createLogger(config.logging);
    const linter = new XssLinter({ ...config, logger });
    const options = {
      listFiles: this.listFiles,
      ruleTotals: this.ruleTotals,
      verbose: this.verbose,
      showDisabled: this.showDisabled,
    };

    let run: LintRun;
    try {
      run = await linter.lintPath(this.target ?? ".");
    } catch (err) {
      this.context.stdout.write(`${err instanceof Error ? err.message : String(err)}\n`);
      return 2;
    }

    for (const file of run.results) {
      this.context.stdout.write(formatFileResults(file, options));
    }
    for (const failure of run.failures) {
      this.context.stdout.write(`Could not read ${failure.filePath}: ${failure.error}\n`);
    }

    const summary = linter.buildSummary(run);
    this.context.stdout.write(formatSummary(summary, options));
    logger.debug({ files: summary.filesScanned, violations: summary.enabledCount }, "Lint finished");

    return summary.enabledCount === 0 ? 0 : 1;
  }
}

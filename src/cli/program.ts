import { Builtins, Cli } from "clipanion";
import { ConfigShowCommand, ConfigValidateCommand } from "./commands/config-cmd.js";
import { LintCommand } from "./commands/lint.js";
import { RulesCommand } from "./commands/rules.js";

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "XSS Lint",
    binaryName: "xss-lint",
    binaryVersion: "0.3.0",
  });

  cli.register(LintCommand);
  cli.register(RulesCommand);

  // Config commands
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  cli.register(Builtins.HelpCommand);
  cli.register(Builtins.VersionCommand);

  return cli;
}

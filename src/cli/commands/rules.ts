import { Command, Option } from "clipanion";
import { listRules } from "../../linter/rules.js";
import { DIALECTS, type Dialect } from "../../linter/types.js";

function isDialect(value: string): value is Dialect {
  return DIALECTS.some((dialect) => dialect === value);
}

export class RulesCommand extends Command {
  static override paths = [["rules"]];

  static override usage = Command.Usage({
    description: "List the rules that can be reported",
    examples: [
      ["List all rules", "xss-lint rules"],
      ["List the template rules for Mako", "xss-lint rules --dialect mako"],
    ],
  });

  dialect = Option.String("--dialect", {
    description: `Only list rules of one dialect (${DIALECTS.join(", ")})`,
  });

  async execute(): Promise<number> {
    if (this.dialect !== undefined && !isDialect(this.dialect)) {
      this.context.stdout.write(`Unknown dialect: ${this.dialect}\n`);
      return 1;
    }

    const rules = listRules(this.dialect);
    const width = Math.max(...rules.map((rule) => rule.id.length));
    for (const rule of rules) {
      this.context.stdout.write(`${rule.id.padEnd(width)}  ${rule.message}\n`);
    }
    return 0;
  }
}

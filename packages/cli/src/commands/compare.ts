import { Command } from "commander";
import chalk from "chalk";
import { openWorkspace } from "../store.js";
import { formatComparison } from "../formatter.js";
import { createOutput, exitWithError } from "../output.js";

interface CompareOptions {
  cwd: string;
  json: boolean;
}

export const compareCommand = new Command("compare")
  .description("Compare stored audits side by side")
  .argument("<urls...>", "Audited page URLs, in column order")
  .option("--cwd <path>", "Project directory", process.cwd())
  .option("--json", "Output the comparison as JSON", false)
  .action(async (urls: string[], opts: CompareOptions) => {
    const out = createOutput(opts.json);

    try {
      const { audits } = await openWorkspace(opts.cwd);
      const comparison = await audits.compare(urls);

      if (comparison.labels.length === 0) {
        throw new Error(`No audits stored for ${urls.join(", ")}`);
      }

      out.json(comparison);
      out.log(formatComparison(comparison));
      for (const url of comparison.missing) {
        out.log(chalk.yellow(`  ! No audit stored for ${url}`));
      }
      if (comparison.missing.length > 0) out.log("");
    } catch (err) {
      exitWithError(err, opts.json);
    }
  });

import { Command } from "commander";
import chalk from "chalk";
import { openWorkspace } from "../store.js";
import { createOutput, exitWithError } from "../output.js";

interface RemoveOptions {
  cwd: string;
  json: boolean;
}

export const removeCommand = new Command("remove")
  .description("Delete a stored audit")
  .argument("<url>", "Audited page URL")
  .option("--cwd <path>", "Project directory", process.cwd())
  .option("--json", "Output the result as JSON", false)
  .action(async (url: string, opts: RemoveOptions) => {
    const out = createOutput(opts.json);

    try {
      const { audits } = await openWorkspace(opts.cwd);
      if (!(await audits.remove(url))) {
        throw new Error(`No audit stored for ${url}`);
      }

      out.json({ removed: url });
      out.log(`  ${chalk.green("✓")} Removed ${url}`);
    } catch (err) {
      exitWithError(err, opts.json);
    }
  });

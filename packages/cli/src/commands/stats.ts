import { Command } from "commander";
import { openWorkspace } from "../store.js";
import { formatStats } from "../formatter.js";
import { createOutput, exitWithError } from "../output.js";

interface StatsOptions {
  cwd: string;
  json: boolean;
}

export const statsCommand = new Command("stats")
  .description("Show dashboard numbers for all stored audits")
  .option("--cwd <path>", "Project directory", process.cwd())
  .option("--json", "Output stats as JSON", false)
  .action(async (opts: StatsOptions) => {
    const out = createOutput(opts.json);

    try {
      const { audits } = await openWorkspace(opts.cwd);
      const stats = await audits.stats();

      out.json(stats);
      out.log(formatStats(stats));
    } catch (err) {
      exitWithError(err, opts.json);
    }
  });

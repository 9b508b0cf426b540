import { Command, Option } from "commander";
import chalk from "chalk";
import { SCORE_BANDS, type ScoreBand } from "pagehealth";
import { openWorkspace } from "../store.js";
import { auditToJSON, formatAuditList } from "../formatter.js";
import { createOutput, exitWithError } from "../output.js";

interface ListOptions {
  cwd: string;
  json: boolean;
  search?: string;
  band?: ScoreBand;
}

export const listCommand = new Command("list")
  .description("List stored audits, most recently updated first")
  .option("--cwd <path>", "Project directory", process.cwd())
  .option("--search <text>", "Only audits whose URL, title or keyword contains the text")
  .addOption(new Option("--band <band>", "Only audits in a score band").choices([...SCORE_BANDS]))
  .option("--json", "Output audits as JSON", false)
  .action(async (opts: ListOptions) => {
    const out = createOutput(opts.json);

    try {
      const { audits } = await openWorkspace(opts.cwd);
      const found = await audits.list({ search: opts.search, band: opts.band });

      out.json(found.map(auditToJSON));
      out.log("", chalk.bold(`  ${found.length} audit${found.length === 1 ? "" : "s"}`), "", formatAuditList(found), "");
    } catch (err) {
      exitWithError(err, opts.json);
    }
  });

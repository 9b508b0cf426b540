import { Command } from "commander";
import { openWorkspace } from "../store.js";
import { auditToJSON, formatAuditDetail } from "../formatter.js";
import { createOutput, exitWithError } from "../output.js";

interface ShowOptions {
  cwd: string;
  json: boolean;
}

export const showCommand = new Command("show")
  .description("Show a stored audit with its recommendations and group breakdown")
  .argument("<url>", "Audited page URL")
  .option("--cwd <path>", "Project directory", process.cwd())
  .option("--json", "Output the audit as JSON", false)
  .action(async (url: string, opts: ShowOptions) => {
    const out = createOutput(opts.json);

    try {
      const { audits } = await openWorkspace(opts.cwd);
      const audit = await audits.get(url);
      if (!audit) {
        throw new Error(`No audit stored for ${url}`);
      }

      out.json(auditToJSON(audit));
      out.log(formatAuditDetail(audit));
    } catch (err) {
      exitWithError(err, opts.json);
    }
  });

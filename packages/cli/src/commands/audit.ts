import { resolve } from "node:path";
import { Command } from "commander";
import chalk from "chalk";
import ora from "ora";
import { MAX_BULK_AUDITS, type StoredAudit } from "pagehealth";
import { openWorkspace } from "../store.js";
import { readRecordsFile } from "../records-file.js";
import {
  computeSummary,
  formatAuditResult,
  formatRejectedRecord,
  formatSummary,
  formatJSON,
  type RejectedRecord,
} from "../formatter.js";
import { createOutput, exitWithError } from "../output.js";

interface AuditOptions {
  cwd: string;
  json: boolean;
  ci: boolean;
  minScore?: string;
}

export const auditCommand = new Command("audit")
  .description("Score audit records from a JSON file and save them to the store")
  .argument("<file>", "JSON file holding one record or an array of records")
  .option("--cwd <path>", "Project directory", process.cwd())
  .option("--json", "Output results as JSON", false)
  .option("--ci", "CI/CD mode: exit 1 on any critical error", false)
  .option("--min-score <score>", "Minimum average score to pass (0-100)")
  .action(async (file: string, opts: AuditOptions) => {
    const jsonOutput = opts.json;
    const out = createOutput(jsonOutput);

    try {
      const { config, audits } = await openWorkspace(opts.cwd);

      // --min-score flag overrides config
      const minScore = opts.minScore !== undefined ? parseMinScore(opts.minScore) : config.minScore ?? null;

      const spinner = jsonOutput ? null : ora(`Reading ${file}...`).start();
      const inputs = await readRecordsFile(resolve(opts.cwd, file)).catch((err: unknown) => {
        spinner?.fail(`Could not read ${file}`);
        throw err;
      });
      spinner?.succeed(`Loaded ${inputs.length} record${inputs.length === 1 ? "" : "s"}`);

      out.log("");

      const saved: StoredAudit[] = [];
      const rejected: RejectedRecord[] = [];

      for (let start = 0; start < inputs.length; start += MAX_BULK_AUDITS) {
        const outcomes = await audits.saveMany(inputs.slice(start, start + MAX_BULK_AUDITS));
        for (const outcome of outcomes) {
          if (outcome.ok) {
            saved.push(outcome.audit);
            out.log(formatAuditResult(outcome.audit));
          } else {
            const entry = { url: outcome.url, issues: outcome.error.issues };
            rejected.push(entry);
            out.log(formatRejectedRecord(entry));
          }
        }
      }

      const summary = computeSummary(saved, rejected);

      if (jsonOutput) {
        console.log(formatJSON(summary));
      } else {
        console.log(formatSummary(summary));
      }

      const belowMinimum = minScore !== null && summary.averageScore < minScore;
      if (belowMinimum) {
        out.log(chalk.red(`  Score ${summary.averageScore} is below minimum ${minScore}.`), "");
      }

      if (rejected.length > 0 || belowMinimum || (opts.ci && summary.failedAudits > 0)) {
        process.exitCode = 1;
      }
    } catch (err) {
      exitWithError(err, jsonOutput);
    }
  });

function parseMinScore(value: string): number {
  const score = Number(value);
  if (!Number.isInteger(score) || score < 0 || score > 100) {
    throw new Error(`--min-score must be an integer from 0 to 100 (got "${value}")`);
  }
  return score;
}

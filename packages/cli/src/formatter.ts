import chalk from "chalk";
import {
  RULE_GROUPS,
  scoreToGrade,
  type AuditComparison,
  type AuditStats,
  type Finding,
  type Grade,
  type RecordIssue,
  type RuleGroup,
  type StoredAudit,
} from "pagehealth";

export interface RejectedRecord {
  url: string;
  issues: RecordIssue[];
}

export interface AuditSummary {
  audits: StoredAudit[];
  rejected: RejectedRecord[];
  averageScore: number;
  grade: Grade;
  /** Findings from critical-severity rules */
  criticalErrors: number;
  /** Findings from optional-severity rules */
  optionalErrors: number;
  /** Audits with at least one critical finding */
  failedAudits: number;
}

const GROUP_LABELS: Record<RuleGroup, string> = {
  content: "Content",
  meta: "Meta",
  technical: "Technical",
  media: "Media",
  vitals: "Vitals",
  eeat: "E-E-A-T",
};

/** Format a single saved audit for terminal output */
export function formatAuditResult(audit: StoredAudit): string {
  const { record, result } = audit;
  const lines: string[] = [];

  const scoreColor = getScoreColor(result.healthPercentage);
  const icon = result.hasCriticalErrors ? chalk.red("x") : chalk.green("✓");

  lines.push(`  ${icon} ${chalk.bold(record.url)}  ${scoreColor(`${result.healthPercentage}/100`)}`);

  for (const finding of result.findings) {
    lines.push(`    ${findingIcon(finding)} ${finding.message}`);
  }

  return lines.join("\n");
}

/** Format a record the repository refused to save */
export function formatRejectedRecord(rejected: RejectedRecord): string {
  const lines = [`  ${chalk.red("x")} ${chalk.bold(rejected.url)}  ${chalk.red("invalid record")}`];
  for (const issue of rejected.issues) {
    lines.push(`    ${chalk.red("-")} ${issue.path ? `${issue.path}: ` : ""}${issue.message}`);
  }
  return lines.join("\n");
}

/** Format the summary printed after `audit` */
export function formatSummary(summary: AuditSummary): string {
  const lines: string[] = [];
  const { audits, rejected, averageScore, criticalErrors, optionalErrors } = summary;

  lines.push("");
  lines.push(chalk.dim("  ─────────────────────────────────────"));
  lines.push("");

  const scoreColor = getScoreColor(averageScore);
  lines.push(`  Score: ${scoreColor(chalk.bold(`${averageScore}/100`))} (${summary.grade})`);

  const passed = audits.length - summary.failedAudits;
  const pagesColor = passed === audits.length ? chalk.green : chalk.yellow;
  lines.push(`  Pages: ${pagesColor(`${passed}/${audits.length}`)} without critical errors`);

  if (rejected.length > 0) {
    lines.push(chalk.red(`  ${rejected.length} record${plural(rejected.length)} rejected by validation.`));
  }

  lines.push("");
  if (criticalErrors > 0) {
    lines.push(chalk.red(`  ${criticalErrors} critical issue${plural(criticalErrors)}. Fix these first.`));
  }
  if (optionalErrors > 0) {
    lines.push(chalk.yellow(`  ${optionalErrors} optional issue${plural(optionalErrors)}.`));
  }
  if (criticalErrors === 0 && optionalErrors === 0 && audits.length > 0) {
    lines.push(chalk.green("  All pages pass."));
  }

  lines.push("");
  return lines.join("\n");
}

/** Format one stored audit in full: findings by severity, then the group breakdown */
export function formatAuditDetail(audit: StoredAudit): string {
  const { record, result } = audit;
  const lines: string[] = [];
  const scoreColor = getScoreColor(result.healthPercentage);

  lines.push("");
  lines.push(`  ${chalk.bold(record.url)}`);
  if (record.title) lines.push(chalk.dim(`  ${record.title}`));
  lines.push("");
  lines.push(`  Score: ${scoreColor(chalk.bold(`${result.healthPercentage}/100`))} (${result.grade})`);
  lines.push(chalk.dim(`  Audited ${formatDate(audit.createdAt)}, updated ${formatDate(audit.updatedAt)}`));

  const critical = result.findings.filter((f) => f.severity === "critical");
  const optional = result.findings.filter((f) => f.severity !== "critical");

  if (critical.length > 0) {
    lines.push("");
    lines.push(chalk.red(`  Critical (${critical.length}):`));
    for (const finding of critical) {
      lines.push(`    ${chalk.red("x")} ${finding.message}`);
    }
  }

  if (optional.length > 0) {
    lines.push("");
    lines.push(chalk.yellow(`  Recommendations (${optional.length}):`));
    for (const finding of optional) {
      lines.push(`    ${chalk.yellow("!")} ${finding.message}  ${chalk.dim(`-${finding.deduction}`)}`);
    }
  }

  if (result.findings.length === 0) {
    lines.push("");
    lines.push(chalk.green("  No issues found."));
  }

  lines.push("");
  lines.push(chalk.bold("  Breakdown:"));
  for (const group of RULE_GROUPS) {
    const { weight, score } = result.breakdown[group];
    const color = score === weight ? chalk.green : chalk.yellow;
    lines.push(`    ${GROUP_LABELS[group].padEnd(10)} ${color(`${score}/${weight}`)}`);
  }

  lines.push("");
  return lines.join("\n");
}

/** Format stored audits as one line each */
export function formatAuditList(audits: readonly StoredAudit[]): string {
  if (audits.length === 0) {
    return chalk.dim("  No audits stored yet. Run `pagehealth audit <file>` first.");
  }

  return audits
    .map((audit) => {
      const score = audit.result.healthPercentage;
      const scoreText = getScoreColor(score)(String(score).padStart(3));
      const flag = audit.result.hasCriticalErrors ? chalk.red(" !") : "  ";
      return `  ${scoreText} ${audit.result.grade}${flag} ${audit.record.url}  ${chalk.dim(formatDate(audit.updatedAt))}`;
    })
    .join("\n");
}

/** Format dashboard numbers */
export function formatStats(stats: AuditStats): string {
  const lines: string[] = [];

  lines.push("");
  lines.push(`  Audits:          ${chalk.bold(String(stats.total))}`);
  lines.push(`  Average score:   ${getScoreColor(stats.averageScore)(chalk.bold(String(stats.averageScore)))}`);
  lines.push(`  Good (80+):      ${chalk.green(String(stats.good))}`);
  lines.push(`  Critical (<30):  ${chalk.red(String(stats.critical))}`);
  lines.push(`  Critical errors: ${stats.withCriticalErrors > 0 ? chalk.red(String(stats.withCriticalErrors)) : "0"}`);
  lines.push("");

  return lines.join("\n");
}

/** Format side-by-side scores, one column per audit */
export function formatComparison(comparison: AuditComparison): string {
  const lines: string[] = [];
  const width = 9;

  lines.push("");
  comparison.labels.forEach((label, index) => {
    lines.push(`  ${chalk.bold(`#${index + 1}`)} ${label}`);
  });
  lines.push("");

  const header = comparison.labels.map((_, index) => `#${index + 1}`.padStart(width)).join("");
  lines.push(chalk.dim(`  ${"".padEnd(10)}${header}`));

  const scores = comparison.scores.map((score) => getScoreColor(score)(String(score).padStart(width))).join("");
  lines.push(`  ${chalk.bold("Score".padEnd(10))}${scores}`);

  for (const group of RULE_GROUPS) {
    const cells = comparison.groups[group]
      .map((pct) => getScoreColor(pct)(`${pct}%`.padStart(width)))
      .join("");
    lines.push(`  ${GROUP_LABELS[group].padEnd(10)}${cells}`);
  }

  lines.push("");
  return lines.join("\n");
}

/** JSON-friendly form of a stored audit */
export function auditToJSON(audit: StoredAudit) {
  return {
    url: audit.record.url,
    healthPercentage: audit.result.healthPercentage,
    grade: audit.result.grade,
    hasCriticalErrors: audit.result.hasCriticalErrors,
    recommendations: audit.result.recommendations,
    findings: audit.result.findings,
    breakdown: audit.result.breakdown,
    metrics: audit.result.metrics,
    record: { ...audit.record, schemaTypes: [...audit.record.schemaTypes] },
    createdAt: audit.createdAt.toISOString(),
    updatedAt: audit.updatedAt.toISOString(),
  };
}

/** Format `audit` results for --json output */
export function formatJSON(summary: AuditSummary): string {
  return JSON.stringify(
    {
      score: summary.averageScore,
      grade: summary.grade,
      totalPages: summary.audits.length,
      criticalErrors: summary.criticalErrors,
      optionalErrors: summary.optionalErrors,
      audits: summary.audits.map((audit) => ({
        url: audit.record.url,
        score: audit.result.healthPercentage,
        grade: audit.result.grade,
        hasCriticalErrors: audit.result.hasCriticalErrors,
        recommendations: audit.result.recommendations,
      })),
      rejected: summary.rejected,
    },
    null,
    2,
  );
}

/** Compute summary from saved audits and rejected records */
export function computeSummary(audits: StoredAudit[], rejected: RejectedRecord[] = []): AuditSummary {
  const averageScore =
    audits.length > 0
      ? Math.round(audits.reduce((sum, a) => sum + a.result.healthPercentage, 0) / audits.length)
      : 0;

  let criticalErrors = 0;
  let optionalErrors = 0;
  for (const audit of audits) {
    for (const finding of audit.result.findings) {
      if (finding.severity === "critical") criticalErrors++;
      else optionalErrors++;
    }
  }

  return {
    audits,
    rejected,
    averageScore,
    grade: scoreToGrade(averageScore),
    criticalErrors,
    optionalErrors,
    failedAudits: audits.filter((a) => a.result.hasCriticalErrors).length,
  };
}

/** Color a score value based on its range */
function getScoreColor(score: number): (text: string) => string {
  if (score >= 90) return chalk.green;
  if (score >= 70) return chalk.yellow;
  return chalk.red;
}

function findingIcon(finding: Finding): string {
  return finding.severity === "critical" ? chalk.red("x") : chalk.yellow("!");
}

function formatDate(date: Date): string {
  return date.toISOString().slice(0, 16).replace("T", " ");
}

function plural(count: number): string {
  return count === 1 ? "" : "s";
}

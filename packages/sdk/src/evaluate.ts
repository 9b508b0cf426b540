import type {
  EvaluateOptions,
  EvaluationResult,
  Finding,
  Grade,
  GroupBreakdown,
  RecordMetrics,
  RuleContext,
  RuleGroup,
  SEORecord,
} from "./types.js";
import { allRules } from "./rules/index.js";
import { MAX_PARAGRAPH_LENGTH, WORDS_PER_KEYWORD, keywordDensityPercent } from "./rules/content.js";

/** Check groups in evaluation order */
export const RULE_GROUPS: readonly RuleGroup[] = ["content", "meta", "technical", "media", "vitals", "eeat"];

/**
 * Score an audit record, returning a health percentage from 0-100 and
 * prioritized recommendations.
 *
 * Every rule that fires takes an integer deduction (at most its weight) off
 * a baseline of 100 and contributes one recommendation. Recommendations are
 * ordered critical first, then by deduction, then by rule order.
 *
 * @example
 * ```ts
 * import { defineRecord, evaluate } from 'pagehealth'
 *
 * const result = evaluate(defineRecord({ url: 'http://example.com', mobileFriendly: true }))
 *
 * result.hasCriticalErrors  // true (no HTTPS, no H1)
 * result.recommendations[0] // "Page is not served over HTTPS. ..."
 * ```
 */
export function evaluate(record: SEORecord, options?: EvaluateOptions): EvaluationResult {
  const metrics = computeMetrics(record);
  const context: RuleContext = { now: options?.now ?? new Date(), metrics };
  const disabled = new Set(options?.disabledRules ?? []);

  const breakdown = emptyBreakdown();
  const findings: Finding[] = [];

  for (const rule of allRules) {
    breakdown[rule.group].weight += rule.weight;

    // Disabled rules keep full credit
    if (disabled.has(rule.id)) continue;

    const result = rule.check(record, context);
    if (result.status === "pass") continue;

    const deduction = Math.min(rule.weight, Math.max(0, Math.round(result.deduction)));
    breakdown[rule.group].deduction += deduction;
    findings.push({
      ruleId: rule.id,
      group: rule.group,
      severity: result.severity ?? rule.severity ?? "optional",
      deduction,
      message: result.message,
    });
  }

  // Array.prototype.sort is stable: equal findings keep rule order
  findings.sort(
    (a, b) => severityRank(a) - severityRank(b) || b.deduction - a.deduction,
  );

  for (const group of RULE_GROUPS) {
    breakdown[group].score = breakdown[group].weight - breakdown[group].deduction;
  }

  const totalDeduction = findings.reduce((sum, f) => sum + f.deduction, 0);
  const healthPercentage = Math.min(100, Math.max(0, 100 - totalDeduction));

  return {
    healthPercentage,
    grade: scoreToGrade(healthPercentage),
    recommendations: findings.map((f) => f.message),
    hasCriticalErrors: findings.some((f) => f.severity === "critical"),
    findings,
    breakdown,
    metrics,
  };
}

/** Derive lengths, keyword density and paragraph statistics from a record */
export function computeMetrics(record: SEORecord): RecordMetrics {
  const keyword = record.keyword?.toLowerCase() ?? null;
  const paragraphs = record.paragraphs;

  const keywordDensity = round2(keywordDensityPercent(record));

  const recommendedKeywordCount =
    keyword && record.wordCount > 0 ? Math.max(1, Math.round(record.wordCount / WORDS_PER_KEYWORD)) : 0;

  const keywordParagraphCount = keyword
    ? paragraphs.filter((p) => p.text.toLowerCase().includes(keyword)).length
    : 0;

  return {
    titleLength: record.title?.length ?? 0,
    metaDescriptionLength: record.metaDescription?.length ?? 0,
    keywordDensity,
    recommendedKeywordCount,
    longParagraphCount: paragraphs.filter((p) => p.length > MAX_PARAGRAPH_LENGTH).length,
    keywordParagraphCount,
    keywordParagraphCoverage: paragraphs.length > 0 ? round2(keywordParagraphCount / paragraphs.length) : 0,
  };
}

/** Convert numeric score to letter grade */
export function scoreToGrade(score: number): Grade {
  if (score >= 90) return "A";
  if (score >= 80) return "B";
  if (score >= 70) return "C";
  if (score >= 60) return "D";
  return "F";
}

function severityRank(finding: Finding): number {
  return finding.severity === "critical" ? 0 : 1;
}

function emptyBreakdown(): Record<RuleGroup, GroupBreakdown> {
  const empty = (): GroupBreakdown => ({ weight: 0, deduction: 0, score: 0 });
  return {
    content: empty(),
    meta: empty(),
    technical: empty(),
    media: empty(),
    vitals: empty(),
    eeat: empty(),
  };
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

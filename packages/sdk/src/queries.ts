import type { RuleGroup } from "./types.js";
import type { StoredAudit } from "./storage.js";
import { RULE_GROUPS } from "./evaluate.js";

export type ScoreBand = "excellent" | "good" | "average" | "poor";

export const SCORE_BANDS: readonly ScoreBand[] = ["excellent", "good", "average", "poor"];

export interface AuditQuery {
  /** Case-insensitive match against URL, title or keyword */
  search?: string;
  band?: ScoreBand;
}

export interface AuditStats {
  total: number;
  /** Rounded to one decimal */
  averageScore: number;
  /** Audits scoring under 30 */
  critical: number;
  /** Audits scoring 80 or more */
  good: number;
  withCriticalErrors: number;
}

export interface AuditComparison {
  labels: string[];
  scores: number[];
  /** Per group, the share of the group's weight kept (0-100), one entry per audit */
  groups: Record<RuleGroup, number[]>;
}

/** excellent >= 90, good 70-89, average 50-69, poor < 50 */
export function scoreBand(score: number): ScoreBand {
  if (score >= 90) return "excellent";
  if (score >= 70) return "good";
  if (score >= 50) return "average";
  return "poor";
}

/** Filter stored audits, most recently updated first */
export function filterAudits(audits: readonly StoredAudit[], query: AuditQuery = {}): StoredAudit[] {
  const needle = query.search?.trim().toLowerCase();

  return audits
    .filter((audit) => {
      if (query.band && scoreBand(audit.result.healthPercentage) !== query.band) {
        return false;
      }
      if (!needle) return true;
      const { url, title, keyword } = audit.record;
      return [url, title, keyword].some((field) => field?.toLowerCase().includes(needle));
    })
    .sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime());
}

/** Dashboard numbers over a set of audits */
export function computeStats(audits: readonly StoredAudit[]): AuditStats {
  const total = audits.length;
  const scores = audits.map((a) => a.result.healthPercentage);
  const averageScore = total > 0 ? Math.round((scores.reduce((sum, s) => sum + s, 0) / total) * 10) / 10 : 0;

  return {
    total,
    averageScore,
    critical: scores.filter((s) => s < 30).length,
    good: scores.filter((s) => s >= 80).length,
    withCriticalErrors: audits.filter((a) => a.result.hasCriticalErrors).length,
  };
}

/** Side-by-side scores, in the order the audits are given */
export function compareAudits(audits: readonly StoredAudit[]): AuditComparison {
  const groups: Record<RuleGroup, number[]> = {
    content: [],
    meta: [],
    technical: [],
    media: [],
    vitals: [],
    eeat: [],
  };

  for (const audit of audits) {
    for (const group of RULE_GROUPS) {
      const { weight, score } = audit.result.breakdown[group];
      groups[group].push(weight > 0 ? Math.round((score / weight) * 100) : 100);
    }
  }

  return {
    labels: audits.map((a) => a.record.url),
    scores: audits.map((a) => a.result.healthPercentage),
    groups,
  };
}

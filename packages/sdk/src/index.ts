// ============================================================================
// pagehealth: SEO health scoring for audited pages
// ============================================================================
//
// Usage:
//   import { defineRecord, evaluate, AuditRepository } from 'pagehealth'
//
// ============================================================================

// Core functions
export { defineRecord, parseRecord, normalizeUrl, RECORD_DEFAULTS } from "./record.js";
export type { RecordDefaults } from "./record.js";
export { evaluate, computeMetrics, scoreToGrade, RULE_GROUPS } from "./evaluate.js";

// Types
export type {
  Paragraph,
  SEORecordInput,
  SEORecord,
  RuleGroup,
  RuleSeverity,
  Grade,
  Finding,
  GroupBreakdown,
  RecordMetrics,
  EvaluationResult,
  EvaluateOptions,
  RuleCheckResult,
  RuleContext,
  RuleDefinition,
} from "./types.js";

// Errors
export { RecordValidationError, AuditStoreError } from "./errors.js";
export type { RecordIssue } from "./errors.js";

// Storage boundary
export { AuditRepository, MAX_BULK_AUDITS } from "./repository.js";
export type { AuditRepositoryOptions, BulkSaveOutcome } from "./repository.js";
export { MemoryAuditStorage, FileAuditStorage, STORE_FILE } from "./storage.js";
export type { AuditStorage, StoredAudit } from "./storage.js";

// Queries
export { filterAudits, computeStats, compareAudits, scoreBand, SCORE_BANDS } from "./queries.js";
export type { ScoreBand, AuditQuery, AuditStats, AuditComparison } from "./queries.js";

// Rules (exposed for inspection and custom tooling)
export { allRules } from "./rules/index.js";
export { SUPPORTED_SCHEMA_TYPES } from "./rules/structured-data.js";
export { VITALS_THRESHOLDS } from "./rules/vitals.js";
export { STALE_AFTER_DAYS } from "./rules/eeat.js";

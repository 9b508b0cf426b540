import type { SEORecordInput } from "./types.js";
import type { AuditStorage, StoredAudit } from "./storage.js";
import type { AuditComparison, AuditQuery, AuditStats } from "./queries.js";
import { parseRecord, normalizeUrl } from "./record.js";
import { evaluate } from "./evaluate.js";
import { RecordValidationError } from "./errors.js";
import { filterAudits, computeStats, compareAudits } from "./queries.js";

/** Maximum records accepted by a single saveMany() call */
export const MAX_BULK_AUDITS = 10;

export interface AuditRepositoryOptions {
  /** Clock used for timestamps and the content freshness check */
  now?: () => Date;
  /** Rule IDs to skip in every evaluation */
  disabledRules?: string[];
}

export type BulkSaveOutcome =
  | { url: string; ok: true; audit: StoredAudit }
  | { url: string; ok: false; error: RecordValidationError };

/**
 * Storage boundary for audits: every write goes through
 * validate (parseRecord) -> evaluate -> persist, so the stored score and
 * recommendations always match the stored record.
 *
 * @example
 * ```ts
 * import { AuditRepository, MemoryAuditStorage } from 'pagehealth'
 *
 * const audits = new AuditRepository(new MemoryAuditStorage())
 * const saved = await audits.save({ url: 'https://example.com', wordCount: 900 })
 * saved.result.healthPercentage // 66
 * ```
 */
export class AuditRepository {
  private readonly now: () => Date;
  private readonly disabledRules: string[];

  constructor(
    private readonly storage: AuditStorage,
    options: AuditRepositoryOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
    this.disabledRules = options.disabledRules ?? [];
  }

  /**
   * Validate, evaluate and persist one record. Re-saving a URL replaces its
   * audit and keeps the original creation time.
   *
   * @throws RecordValidationError before anything is written
   */
  async save(input: SEORecordInput | Record<string, unknown>): Promise<StoredAudit> {
    const record = parseRecord(input);
    const now = this.now();
    const result = evaluate(record, { now, disabledRules: this.disabledRules });

    const existing = await this.storage.get(record.url);
    const audit: StoredAudit = {
      record,
      result,
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    };

    await this.storage.put(audit);
    return audit;
  }

  /**
   * Save several records one after another. Invalid records are reported,
   * not thrown; storage failures still reject.
   */
  async saveMany(inputs: ReadonlyArray<SEORecordInput | Record<string, unknown>>): Promise<BulkSaveOutcome[]> {
    if (inputs.length > MAX_BULK_AUDITS) {
      throw new RangeError(`At most ${MAX_BULK_AUDITS} records can be saved at once (got ${inputs.length})`);
    }

    const outcomes: BulkSaveOutcome[] = [];
    for (const input of inputs) {
      const url = typeof input.url === "string" ? input.url : "(missing url)";
      try {
        outcomes.push({ url, ok: true, audit: await this.save(input) });
      } catch (err) {
        if (!(err instanceof RecordValidationError)) throw err;
        outcomes.push({ url, ok: false, error: err });
      }
    }
    return outcomes;
  }

  async get(url: string): Promise<StoredAudit | null> {
    return this.storage.get(normalizeUrl(url));
  }

  async remove(url: string): Promise<boolean> {
    return this.storage.delete(normalizeUrl(url));
  }

  async list(query?: AuditQuery): Promise<StoredAudit[]> {
    return filterAudits(await this.storage.list(), query);
  }

  async stats(): Promise<AuditStats> {
    return computeStats(await this.storage.list());
  }

  /** Compare stored audits in the given order. URLs with no audit are listed in `missing`. */
  async compare(urls: readonly string[]): Promise<AuditComparison & { missing: string[] }> {
    const found: StoredAudit[] = [];
    const missing: string[] = [];

    for (const url of urls) {
      const audit = await this.get(url);
      if (audit) found.push(audit);
      else missing.push(url);
    }

    return { ...compareAudits(found), missing };
  }
}

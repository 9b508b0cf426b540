import { existsSync } from "node:fs";
import { readFile, writeFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import type { EvaluationResult, SEORecord } from "./types.js";
import { parseRecord } from "./record.js";
import { AuditStoreError } from "./errors.js";

/** A record persisted together with the evaluation computed when it was saved */
export interface StoredAudit {
  record: SEORecord;
  result: EvaluationResult;
  createdAt: Date;
  updatedAt: Date;
}

/** Persistence boundary. Audits are keyed by their normalized URL. */
export interface AuditStorage {
  get(url: string): Promise<StoredAudit | null>;
  /** Insert or replace the audit stored under `audit.record.url` */
  put(audit: StoredAudit): Promise<void>;
  /** Returns false when nothing was stored under `url` */
  delete(url: string): Promise<boolean>;
  list(): Promise<StoredAudit[]>;
}

/** Keeps audits in a Map. Used by tests and embedders with their own persistence. */
export class MemoryAuditStorage implements AuditStorage {
  private readonly audits = new Map<string, StoredAudit>();

  async get(url: string): Promise<StoredAudit | null> {
    return this.audits.get(url) ?? null;
  }

  async put(audit: StoredAudit): Promise<void> {
    this.audits.set(audit.record.url, audit);
  }

  async delete(url: string): Promise<boolean> {
    return this.audits.delete(url);
  }

  async list(): Promise<StoredAudit[]> {
    return [...this.audits.values()];
  }
}

export const STORE_FILE = "audits.json";

const groupBreakdownSchema = z.object({
  weight: z.number(),
  deduction: z.number(),
  score: z.number(),
});

const evaluationResultSchema = z.object({
  healthPercentage: z.number().int().min(0).max(100),
  grade: z.enum(["A", "B", "C", "D", "F"]),
  recommendations: z.array(z.string()),
  hasCriticalErrors: z.boolean(),
  findings: z.array(
    z.object({
      ruleId: z.string(),
      group: z.enum(["content", "meta", "technical", "media", "vitals", "eeat"]),
      severity: z.enum(["critical", "optional"]),
      deduction: z.number(),
      message: z.string(),
    }),
  ),
  breakdown: z.object({
    content: groupBreakdownSchema,
    meta: groupBreakdownSchema,
    technical: groupBreakdownSchema,
    media: groupBreakdownSchema,
    vitals: groupBreakdownSchema,
    eeat: groupBreakdownSchema,
  }),
  metrics: z.object({
    titleLength: z.number(),
    metaDescriptionLength: z.number(),
    keywordDensity: z.number(),
    recommendedKeywordCount: z.number(),
    longParagraphCount: z.number(),
    keywordParagraphCount: z.number(),
    keywordParagraphCoverage: z.number(),
  }),
});

const storeFileSchema = z.object({
  version: z.literal(1),
  audits: z.array(
    z.object({
      record: z.unknown(),
      result: evaluationResultSchema,
      createdAt: z.coerce.date(),
      updatedAt: z.coerce.date(),
    }),
  ),
});

/**
 * Keeps audits in `<dir>/audits.json`. The file is read on every call and
 * rewritten on every change; last write wins.
 */
export class FileAuditStorage implements AuditStorage {
  readonly filePath: string;

  constructor(private readonly dir: string) {
    this.filePath = join(dir, STORE_FILE);
  }

  async get(url: string): Promise<StoredAudit | null> {
    const audits = await this.readAll();
    return audits.get(url) ?? null;
  }

  async put(audit: StoredAudit): Promise<void> {
    const audits = await this.readAll();
    audits.set(audit.record.url, audit);
    await this.writeAll(audits);
  }

  async delete(url: string): Promise<boolean> {
    const audits = await this.readAll();
    if (!audits.delete(url)) return false;
    await this.writeAll(audits);
    return true;
  }

  async list(): Promise<StoredAudit[]> {
    const audits = await this.readAll();
    return [...audits.values()];
  }

  private async readAll(): Promise<Map<string, StoredAudit>> {
    const audits = new Map<string, StoredAudit>();
    if (!existsSync(this.filePath)) {
      return audits;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(this.filePath, "utf-8"));
    } catch (err) {
      throw new AuditStoreError(`Audit store is not valid JSON: ${this.filePath}`, this.filePath, { cause: err });
    }

    const parsed = storeFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
      throw new AuditStoreError(
        `Audit store has an unexpected shape${where}: ${this.filePath}`,
        this.filePath,
        { cause: parsed.error },
      );
    }

    for (const [index, entry] of parsed.data.audits.entries()) {
      let record: SEORecord;
      try {
        record = parseRecord(entry.record);
      } catch (err) {
        throw new AuditStoreError(`Audit #${index} in ${this.filePath} holds an invalid record`, this.filePath, {
          cause: err,
        });
      }
      audits.set(record.url, {
        record,
        result: entry.result,
        createdAt: entry.createdAt,
        updatedAt: entry.updatedAt,
      });
    }

    return audits;
  }

  private async writeAll(audits: Map<string, StoredAudit>): Promise<void> {
    if (!existsSync(this.dir)) {
      await mkdir(this.dir, { recursive: true });
    }

    const payload = {
      version: 1,
      audits: [...audits.values()].map(serializeAudit),
    };

    await writeFile(this.filePath, JSON.stringify(payload, null, 2), "utf-8");
  }
}

/** JSON-friendly shape of a stored audit (Set -> array, Date -> ISO string) */
function serializeAudit(audit: StoredAudit) {
  const { record } = audit;
  return {
    record: {
      ...record,
      schemaTypes: [...record.schemaTypes],
      lastUpdated: record.lastUpdated?.toISOString() ?? null,
    },
    result: audit.result,
    createdAt: audit.createdAt.toISOString(),
    updatedAt: audit.updatedAt.toISOString(),
  };
}

import { readFile } from "node:fs/promises";
import { z } from "zod";

const rawRecord = z.record(z.string(), z.unknown());

/** One record object, or an array of them */
const recordsFileSchema = z.union([rawRecord.transform((record) => [record]), z.array(rawRecord).min(1)]);

/**
 * Read raw audit records from a JSON file. Field-level validation is left to
 * the repository so each invalid record can be reported on its own.
 */
export async function readRecordsFile(path: string): Promise<Record<string, unknown>[]> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, "utf-8"));
  } catch (err) {
    throw new Error(`Cannot read records from ${path}: ${err instanceof Error ? err.message : String(err)}`, {
      cause: err,
    });
  }

  const parsed = recordsFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`${path} must hold a record object or a non-empty array of record objects`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

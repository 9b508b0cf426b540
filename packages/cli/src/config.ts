import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { z } from "zod";
import { allRules } from "pagehealth";

export const CONFIG_FILES = [".pagehealthrc.json", ".pagehealthrc", "pagehealth.config.json"];

/** Store directory used when neither the config nor the environment names one */
export const DEFAULT_STORE_DIR = ".pagehealth";

/** Environment variable that overrides `storeDir` */
export const STORE_DIR_ENV = "PAGEHEALTH_STORE_DIR";

const knownRuleIds = new Set(allRules.map((rule) => rule.id));

const configSchema = z.object({
  /** Minimum score to pass (0-100). The --min-score flag overrides it. */
  minScore: z.number().int().min(0).max(100).optional(),
  /** Rule IDs to disable (keep full credit, never reported). */
  disabledRules: z
    .array(z.string())
    .default([])
    .superRefine((ids, ctx) => {
      for (const [index, id] of ids.entries()) {
        if (!knownRuleIds.has(id)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: [index], message: `Unknown rule "${id}"` });
        }
      }
    }),
  /** Directory holding audits.json, relative to the project directory. */
  storeDir: z.string().trim().min(1).default(DEFAULT_STORE_DIR),
});

export type PageHealthConfig = z.infer<typeof configSchema>;

/** Thrown when a config file exists but cannot be used */
export class ConfigError extends Error {
  constructor(
    message: string,
    readonly filePath: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ConfigError";
  }
}

/**
 * Load pagehealth config from the project root.
 * Searches for .pagehealthrc.json, .pagehealthrc, or pagehealth.config.json;
 * the first one found wins. Without a config file every default applies.
 */
export async function loadConfig(cwd: string): Promise<PageHealthConfig> {
  for (const file of CONFIG_FILES) {
    const path = join(cwd, file);
    if (!existsSync(path)) continue;

    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(path, "utf-8"));
    } catch (err) {
      throw new ConfigError(`${file} is not valid JSON`, path, { cause: err });
    }

    const parsed = configSchema.safeParse(raw);
    if (!parsed.success) {
      const details = parsed.error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
        .join("; ");
      throw new ConfigError(`Invalid ${file}: ${details}`, path, { cause: parsed.error });
    }
    return parsed.data;
  }

  return configSchema.parse({});
}

/**
 * Absolute store directory: $PAGEHEALTH_STORE_DIR, then `storeDir` from the
 * config, both resolved against the project directory.
 */
export function resolveStoreDir(
  cwd: string,
  config: PageHealthConfig,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const fromEnv = env[STORE_DIR_ENV]?.trim();
  return resolve(cwd, fromEnv || config.storeDir);
}

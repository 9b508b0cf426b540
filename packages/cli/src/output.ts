import chalk from "chalk";
import { RecordValidationError } from "pagehealth";

export interface Output {
  /** Human-readable lines, dropped under --json */
  log(...lines: string[]): void;
  /** Machine-readable payload, printed only under --json */
  json(value: unknown): void;
}

export function createOutput(jsonOutput: boolean): Output {
  return {
    log(...lines) {
      if (jsonOutput) return;
      for (const line of lines) console.log(line);
    },
    json(value) {
      if (jsonOutput) console.log(JSON.stringify(value, null, 2));
    },
  };
}

/** Message printed for a failed command, with validation issues listed one per line */
export function formatError(err: unknown): string {
  if (err instanceof RecordValidationError) {
    return ["Invalid audit record:", ...err.issues.map((i) => `  ${i.path ? `${i.path}: ` : ""}${i.message}`)].join(
      "\n",
    );
  }
  return err instanceof Error ? err.message : String(err);
}

/** Print the error (red text, or `{ "error": ... }` under --json) and exit 1 */
export function exitWithError(err: unknown, jsonOutput: boolean): never {
  const message = formatError(err);
  if (jsonOutput) {
    console.log(JSON.stringify({ error: message }, null, 2));
  } else {
    console.error(chalk.red(`  x ${message}`));
  }
  process.exit(1);
}

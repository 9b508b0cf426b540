import { Command } from "commander";
import { auditCommand } from "./commands/audit.js";
import { showCommand } from "./commands/show.js";
import { listCommand } from "./commands/list.js";
import { statsCommand } from "./commands/stats.js";
import { compareCommand } from "./commands/compare.js";
import { removeCommand } from "./commands/remove.js";

// Injected at build time by tsup define
declare const __CLI_VERSION__: string;
const cliVersion = typeof __CLI_VERSION__ !== "undefined" ? __CLI_VERSION__ : "0.1.0";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("pagehealth")
    .description("Score pages for SEO health and track audits over time.")
    .version(cliVersion);

  program.addCommand(auditCommand);
  program.addCommand(showCommand);
  program.addCommand(listCommand);
  program.addCommand(statsCommand);
  program.addCommand(compareCommand);
  program.addCommand(removeCommand);

  return program;
}

export { auditCommand, showCommand, listCommand, statsCommand, compareCommand, removeCommand };
export { loadConfig, resolveStoreDir, ConfigError } from "./config.js";
export type { PageHealthConfig } from "./config.js";

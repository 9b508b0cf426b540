import { AuditRepository, FileAuditStorage } from "pagehealth";
import { loadConfig, resolveStoreDir, type PageHealthConfig } from "./config.js";

export interface Workspace {
  config: PageHealthConfig;
  /** Absolute path of the directory holding audits.json */
  storeDir: string;
  audits: AuditRepository;
}

/** Load the project config and open the audit store it points at */
export async function openWorkspace(cwd: string): Promise<Workspace> {
  const config = await loadConfig(cwd);
  const storeDir = resolveStoreDir(cwd, config);

  const audits = new AuditRepository(new FileAuditStorage(storeDir), {
    disabledRules: config.disabledRules,
  });

  return { config, storeDir, audits };
}

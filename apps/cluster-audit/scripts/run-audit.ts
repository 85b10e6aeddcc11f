#!/usr/bin/env tsx
/**
 * CLI runner: audits one clustering run with the settings from cluster-audit.yaml
 * (or the path given as first argument) and prints the summary notices.
 */

import { loadEnv } from "../src/main/config.js";
import { loadAuditConfig, resolveAuditConfig } from "../src/main/audit-config.js";
import { runAudit } from "../src/main/pipeline-runner.js";
import { createAuditConsole } from "./cli.js";

const auditConsole = createAuditConsole();

async function main(): Promise<void> {
  loadEnv();
  const loaded = await loadAuditConfig(process.argv[2]);
  const { config } = resolveAuditConfig(loaded.fileConfig, {
    env: process.env,
    configPath: loaded.configPath,
    loadedFromFile: loaded.loadedFromFile,
  });
  auditConsole.settings(config, loaded.configPath, loaded.loadedFromFile);

  const result = await runAudit({ config, onProgress: auditConsole.progress });
  auditConsole.finish(result);
}

try {
  await main();
} catch (error) {
  auditConsole.fail(error);
  process.exit(1);
}

/* eslint-disable no-console */
import path from "node:path";
import type { AuditProgressEvent, AuditRunResult, AuditStage } from "../src/ipc/contracts.js";
import type { AuditConfig } from "../src/main/audit-config.js";
import { formatSummaryLines } from "../src/main/pipeline-runner.js";

export type StageStatus = "ok" | "warn" | "fail";

export const STAGE_LABELS: Record<AuditStage, string> = {
  load: "Load image list and hotspots",
  select: "Resolve clusters of interest",
  "last-pages": "Infer last pages",
  gaps: "Find pages between selected pages",
  sample: "Draw audit samples",
  copy: "Copy images for review",
  validate: "Score random sample",
  export: "Export tables",
  "user-hotspot": "Resolve user hotspot",
};

export interface AuditConsoleOptions {
  write?: (line: string) => void;
  color?: boolean;
  verbose?: boolean;
  now?: () => number;
}

export interface AuditConsole {
  settings: (config: AuditConfig, configPath: string, loadedFromFile: boolean) => void;
  progress: (event: AuditProgressEvent) => void;
  finish: (result: AuditRunResult) => void;
  fail: (error: unknown) => void;
}

type OpenStage = {
  stage: AuditStage;
  startedAt: number;
  processed: number;
  total: number;
};

export const formatDuration = (ms: number): string => {
  if (ms < 1000) return `${ms}ms`;
  const seconds = ms / 1000;
  if (seconds < 60) return `${seconds.toFixed(2)}s`;
  return `${Math.floor(seconds / 60)}m ${(seconds % 60).toFixed(1)}s`;
};

/** `processed/total` for stages that count records, nothing for the 0/1 markers. */
export const formatStageCount = ({
  processed,
  total,
}: Pick<OpenStage, "processed" | "total">): string =>
  total === 1 && processed <= 1 ? "" : `${processed}/${total}`;

export const createAuditConsole = (options: AuditConsoleOptions = {}): AuditConsole => {
  const write = options.write ?? ((line: string) => console.log(line));
  const color = options.color ?? Boolean(process.stdout.isTTY);
  const verbose =
    options.verbose ??
    (process.env.CLUSTER_AUDIT_DEV_LOGS === "1" || process.env.CLUSTER_AUDIT_DEV_LOGS === "true");
  const now = options.now ?? Date.now;

  const paint = (code: string, value: string): string =>
    color ? `\u001b[${code}m${value}\u001b[0m` : value;
  const statusTag: Record<StageStatus, string> = {
    ok: paint("32", "ok"),
    warn: paint("33", "warn"),
    fail: paint("31", "fail"),
  };

  let open: OpenStage | null = null;

  const heading = (title: string): void => {
    const rule = "=".repeat(Math.max(48, title.length + 12));
    write("");
    write(rule);
    write(paint("36", title));
    write(rule);
  };

  const indent = (message: string): void => {
    message.split("\n").forEach((line) => write(`  ${line}`));
  };

  const closeStage = (status: StageStatus): void => {
    if (!open) return;
    const count = formatStageCount(open);
    const detail = count ? ` - ${count}` : "";
    const duration = paint("2", `(${formatDuration(now() - open.startedAt)})`);
    write(`[${statusTag[status]}] ${STAGE_LABELS[open.stage]}${detail} ${duration}`);
    open = null;
  };

  const startStage = (stage: AuditStage): OpenStage => {
    closeStage("ok");
    if (verbose) write(paint("2", `[start] ${STAGE_LABELS[stage]}`));
    return { stage, startedAt: now(), processed: 0, total: 0 };
  };

  return {
    settings: (config, configPath, loadedFromFile) => {
      heading(`CLUSTER AUDIT ${config.run_id}`);
      indent(`Config: ${loadedFromFile ? configPath : `${configPath} (not found, defaults)`}`);
      indent(`Clusters of interest: ${config.clusters_of_interest.join(", ")}`);
      indent(`Output root: ${config.output_root}`);
      indent(`Sample size: ${config.sampling.size} (seed ${config.sampling.seed})`);
      if (config.user_hotspot.path) {
        indent(`User hotspot: ${config.user_hotspot.path}`);
      }
      if (!config.copy_images) {
        indent(paint("2", "Image copies are disabled."));
      }
    },
    progress: (event) => {
      const current = open !== null && open.stage === event.stage ? open : startStage(event.stage);
      open = { ...current, processed: event.processed, total: event.total };
    },
    finish: (result) => {
      closeStage("ok");
      heading("AUDIT RESULTS");
      formatSummaryLines(result).forEach(indent);
      const truthStatus = result.groundTruth.status === "validated" ? "ok" : "warn";
      write(`[${statusTag[truthStatus]}] Ground truth ${result.groundTruth.status}`);
      indent(`${result.copiedCount} images copied. Outputs under ${result.outputRoot}:`);
      result.outputPaths.forEach((outputPath) =>
        indent(`- ${path.relative(result.outputRoot, outputPath)}`)
      );
    },
    fail: (error) => {
      closeStage("fail");
      const message = error instanceof Error ? error.message : String(error);
      write(`[${statusTag.fail}] Cluster audit failed: ${message}`);
    },
  };
};

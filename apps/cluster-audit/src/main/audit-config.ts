import fs from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";
import { z } from "zod";
import { ConfigError, isErrnoCode } from "./errors.js";
import { getDefaultGroundTruthPath, getOriginalsDir } from "./run-paths.js";
import { DEFAULT_SAMPLE_SIZE, DEFAULT_SEED } from "./sampler.js";

const labelList = z.array(z.string().trim().min(1));

const auditConfigSchema = z.object({
  run_id: z.string().trim().min(1, "run_id is required"),
  clusters_of_interest: labelList.min(1, "clusters_of_interest must list at least one label"),
  output_root: z.string().trim().min(1),
  source_dir: z.string().trim().min(1).nullable(),
  user_hotspot: z
    .object({
      path: z.string().trim().min(1).nullable(),
      clusters_of_interest: labelList,
    })
    .refine((hotspot) => hotspot.path === null || hotspot.clusters_of_interest.length > 0, {
      message: "clusters_of_interest must list at least one label when path is set",
      path: ["clusters_of_interest"],
    }),
  sampling: z.object({
    size: z.number().int().positive(),
    seed: z.number().int().safe(),
  }),
  ground_truth_path: z.string().trim().min(1).nullable(),
  copy_images: z.boolean(),
  logging: z.object({
    level: z.enum(["debug", "info", "warn", "error"]),
    per_document_logs: z.boolean(),
    keep_logs: z.boolean(),
  }),
});

export type AuditConfig = z.infer<typeof auditConfigSchema>;

export type AuditConfigOverrides = {
  [K in keyof AuditConfig]?: AuditConfig[K] extends Record<string, unknown>
    ? Partial<AuditConfig[K]>
    : AuditConfig[K];
};

export type AuditConfigSources = {
  configPath: string;
  loadedFromFile: boolean;
  overrides?: AuditConfigOverrides;
  envOverrides: AuditConfigOverrides;
};

export type LoadedAuditConfig = {
  fileConfig: Record<string, unknown>;
  configPath: string;
  loadedFromFile: boolean;
};

export type ResolvedAuditPaths = {
  outputRoot: string;
  sourceDir: string;
  groundTruthPath: string;
  userHotspotPath: string | null;
};

export const CONFIG_PATH_ENV = "CLUSTER_AUDIT_CONFIG_PATH";

export const defaultAuditConfig: AuditConfig = {
  run_id: "",
  clusters_of_interest: [],
  output_root: path.join("output", "data"),
  source_dir: null,
  user_hotspot: { path: null, clusters_of_interest: [] },
  sampling: { size: DEFAULT_SAMPLE_SIZE, seed: DEFAULT_SEED },
  ground_truth_path: null,
  copy_images: true,
  logging: { level: "info", per_document_logs: false, keep_logs: true },
};

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const mergeDeep = (target: object, source: object): Record<string, unknown> => {
  const output: Record<string, unknown> = { ...target };
  Object.entries(source).forEach(([key, value]: [string, unknown]) => {
    if (value === undefined) return;
    const base = output[key];
    if (isPlainObject(value) && isPlainObject(base)) {
      output[key] = mergeDeep(base, value);
      return;
    }
    output[key] = value;
  });
  return output;
};

export const resolveConfigPath = (
  configPath?: string,
  env: Record<string, string | undefined> = process.env
): string => configPath ?? env[CONFIG_PATH_ENV] ?? path.join(process.cwd(), "cluster-audit.yaml");

/** Reads the YAML config; a missing file is not an error, anything else is. */
export const loadAuditConfig = async (
  configPath?: string,
  env: Record<string, string | undefined> = process.env
): Promise<LoadedAuditConfig> => {
  const resolvedPath = resolveConfigPath(configPath, env);
  let raw: string;
  try {
    raw = await fs.readFile(resolvedPath, "utf-8");
  } catch (error) {
    if (isErrnoCode(error, "ENOENT")) {
      return { fileConfig: {}, configPath: resolvedPath, loadedFromFile: false };
    }
    throw error;
  }
  const parsed: unknown = YAML.parse(raw);
  if (parsed === null || parsed === undefined) {
    return { fileConfig: {}, configPath: resolvedPath, loadedFromFile: true };
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigError(["top level must be a mapping"], resolvedPath);
  }
  return { fileConfig: parsed, configPath: resolvedPath, loadedFromFile: true };
};

const parseInteger = (value: string | undefined): number | null => {
  if (value === undefined || value.trim() === "") return null;
  const parsed = Number(value);
  return Number.isSafeInteger(parsed) ? parsed : null;
};

export const readEnvOverrides = (env: Record<string, string | undefined>): AuditConfigOverrides => {
  const overrides: AuditConfigOverrides = {};
  const runId = env.CLUSTER_AUDIT_RUN_ID?.trim();
  const outputRoot = env.CLUSTER_AUDIT_OUTPUT_ROOT?.trim();
  const sampleSize = parseInteger(env.CLUSTER_AUDIT_SAMPLE_SIZE);
  const seed = parseInteger(env.CLUSTER_AUDIT_SEED);
  if (runId) overrides.run_id = runId;
  if (outputRoot) overrides.output_root = outputRoot;
  if (sampleSize !== null && sampleSize > 0) {
    overrides.sampling = { ...overrides.sampling, size: sampleSize };
  }
  if (seed !== null) {
    overrides.sampling = { ...overrides.sampling, seed };
  }
  return overrides;
};

export const resolveAuditConfig = (
  fileConfig: Record<string, unknown>,
  options?: {
    overrides?: AuditConfigOverrides;
    env?: Record<string, string | undefined>;
    configPath?: string;
    loadedFromFile?: boolean;
  }
): { config: AuditConfig; sources: AuditConfigSources } => {
  const envOverrides = readEnvOverrides(options?.env ?? {});
  const configPath = options?.configPath ?? resolveConfigPath(undefined, options?.env);
  const merged = mergeDeep(
    mergeDeep(mergeDeep(defaultAuditConfig, fileConfig), options?.overrides ?? {}),
    envOverrides
  );

  const result = auditConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`
    );
    throw new ConfigError(issues, configPath);
  }

  return {
    config: result.data,
    sources: {
      configPath,
      loadedFromFile: options?.loadedFromFile ?? false,
      overrides: options?.overrides,
      envOverrides,
    },
  };
};

export const resolveAuditPaths = (config: AuditConfig, cwd = process.cwd()): ResolvedAuditPaths => {
  const outputRoot = path.resolve(cwd, config.output_root);
  return {
    outputRoot,
    sourceDir: config.source_dir
      ? path.resolve(cwd, config.source_dir)
      : getOriginalsDir(outputRoot),
    groundTruthPath: config.ground_truth_path
      ? path.resolve(cwd, config.ground_truth_path)
      : getDefaultGroundTruthPath(outputRoot, config.run_id),
    userHotspotPath: config.user_hotspot.path ? path.resolve(cwd, config.user_hotspot.path) : null,
  };
};

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { beforeEach, describe, expect, it } from "vitest";
import {
  loadAuditConfig,
  readEnvOverrides,
  resolveAuditConfig,
  resolveAuditPaths,
} from "./audit-config.js";
import { ConfigError } from "./errors.js";

let root: string;

const minimal = { run_id: "run-1", clusters_of_interest: ["Cluster 8"] };

describe("audit-config", () => {
  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "cluster-config-"));
  });

  it("returns an empty file config when the file is missing", async () => {
    const configPath = path.join(root, "missing.yaml");

    const loaded = await loadAuditConfig(configPath);

    expect(loaded).toEqual({ fileConfig: {}, configPath, loadedFromFile: false });
  });

  it("falls back to the path from the environment", async () => {
    const configPath = path.join(root, "env.yaml");
    await fs.writeFile(configPath, "run_id: from-env-path\n");

    const loaded = await loadAuditConfig(undefined, { CLUSTER_AUDIT_CONFIG_PATH: configPath });

    expect(loaded.configPath).toBe(configPath);
    expect(loaded.fileConfig).toEqual({ run_id: "from-env-path" });
  });

  it("merges yaml over defaults", async () => {
    const configPath = path.join(root, "cluster-audit.yaml");
    await fs.writeFile(
      configPath,
      [
        "run_id: 26a16624",
        "clusters_of_interest:",
        "  - Cluster 8",
        "  - Cluster 9",
        "sampling:",
        "  size: 250",
        "user_hotspot:",
        "  path: hotspots/user_hotspots.json",
        "  clusters_of_interest: [Brandlagerbuecher]",
      ].join("\n")
    );

    const loaded = await loadAuditConfig(configPath);
    const { config, sources } = resolveAuditConfig(loaded.fileConfig, {
      configPath: loaded.configPath,
      loadedFromFile: loaded.loadedFromFile,
    });

    expect(config.clusters_of_interest).toEqual(["Cluster 8", "Cluster 9"]);
    expect(config.sampling).toEqual({ size: 250, seed: 1 });
    expect(config.user_hotspot.clusters_of_interest).toEqual(["Brandlagerbuecher"]);
    expect(config.logging.level).toBe("info");
    expect(config.copy_images).toBe(true);
    expect(sources.loadedFromFile).toBe(true);
  });

  it("rejects files that are not mappings", async () => {
    const configPath = path.join(root, "list.yaml");
    await fs.writeFile(configPath, "- a\n- b\n");

    await expect(loadAuditConfig(configPath)).rejects.toThrow(ConfigError);
  });

  it("applies overrides and then environment values", () => {
    const { config, sources } = resolveAuditConfig(minimal, {
      overrides: { output_root: "/override", sampling: { seed: 5 } },
      env: {
        CLUSTER_AUDIT_OUTPUT_ROOT: "/env-root",
        CLUSTER_AUDIT_SAMPLE_SIZE: "20",
        CLUSTER_AUDIT_SEED: "not-a-number",
      },
    });

    expect(config.output_root).toBe("/env-root");
    expect(config.sampling).toEqual({ size: 20, seed: 5 });
    expect(sources.envOverrides).toEqual({
      output_root: "/env-root",
      sampling: { size: 20 },
    });
  });

  it("ignores invalid numeric env values", () => {
    expect(
      readEnvOverrides({ CLUSTER_AUDIT_SAMPLE_SIZE: "0", CLUSTER_AUDIT_SEED: "1.5" })
    ).toEqual({});
    expect(readEnvOverrides({ CLUSTER_AUDIT_SEED: "-3" })).toEqual({ sampling: { seed: -3 } });
  });

  it("lists every validation issue", () => {
    const attempt = () =>
      resolveAuditConfig(
        { sampling: { size: 0 }, user_hotspot: { path: "user.json" } },
        { configPath: "/cfg.yaml" }
      );

    expect(attempt).toThrow(ConfigError);
    try {
      attempt();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect((error as ConfigError).issues).toEqual([
        "run_id: run_id is required",
        "clusters_of_interest: clusters_of_interest must list at least one label",
        "user_hotspot.clusters_of_interest: clusters_of_interest must list at least one label when path is set",
        "sampling.size: Number must be greater than 0",
      ]);
    }
  });

  it("derives default paths from the output root", () => {
    const { config } = resolveAuditConfig({ ...minimal, output_root: "data" });

    expect(resolveAuditPaths(config, "/work")).toEqual({
      outputRoot: path.resolve("/work", "data"),
      sourceDir: path.join(path.resolve("/work", "data"), "originals"),
      groundTruthPath: path.join(
        path.resolve("/work", "data"),
        "run-1_random_sample",
        "to_be_selected.txt"
      ),
      userHotspotPath: null,
    });
  });

  it("resolves explicit paths against the working directory", () => {
    const { config } = resolveAuditConfig({
      ...minimal,
      output_root: "/data",
      source_dir: "scans",
      ground_truth_path: "/truth/list.txt",
      user_hotspot: { path: "user.json", clusters_of_interest: ["A"] },
    });

    expect(resolveAuditPaths(config, "/work")).toEqual({
      outputRoot: path.resolve("/data"),
      sourceDir: path.resolve("/work", "scans"),
      groundTruthPath: path.resolve("/truth/list.txt"),
      userHotspotPath: path.resolve("/work", "user.json"),
    });
  });
});

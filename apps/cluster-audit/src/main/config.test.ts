import { describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { findRepoRoot, loadEnv, parseEnv } from "./config.js";

const makeRepo = (): string => {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "cluster-env-"));
  fs.writeFileSync(path.join(root, "package.json"), JSON.stringify({ workspaces: ["apps/*"] }));
  return root;
};

describe("config", () => {
  it("parses env syntax", () => {
    const parsed = parseEnv(
      [
        "CLUSTER_AUDIT_RUN_ID=abc",
        'export CLUSTER_AUDIT_OUTPUT_ROOT="/data/out"',
        "WITH_COMMENT=value # comment",
        "QUOTED='hello # world'",
        "MULTI=line1\\nline2",
        "EMPTY=",
        "# comment",
        "INVALIDLINE",
        "=novalue",
      ].join("\n")
    );

    expect(parsed).toEqual({
      CLUSTER_AUDIT_RUN_ID: "abc",
      CLUSTER_AUDIT_OUTPUT_ROOT: "/data/out",
      WITH_COMMENT: "value",
      QUOTED: "hello # world",
      MULTI: "line1\nline2",
      EMPTY: "",
    });
  });

  it("finds the workspace root from a nested directory", () => {
    const root = makeRepo();
    const nested = path.join(root, "apps", "cluster-audit");
    fs.mkdirSync(nested, { recursive: true });
    fs.writeFileSync(path.join(nested, "package.json"), JSON.stringify({ name: "cluster-audit" }));

    expect(findRepoRoot(nested)).toBe(root);
  });

  it("loads .env files without replacing existing values", () => {
    const root = makeRepo();
    const envPath = path.join(root, ".env");
    const localPath = path.join(root, ".env.local");
    fs.writeFileSync(envPath, "CLUSTER_AUDIT_SEED=7\nCLUSTER_AUDIT_RUN_ID=from-file");
    fs.writeFileSync(localPath, "CLUSTER_AUDIT_SEED=9\nLOCAL_ONLY=yes");

    const env: Record<string, string> = { CLUSTER_AUDIT_RUN_ID: "preset" };
    const result = loadEnv({ cwd: root, env });

    expect(result.loadedFiles).toEqual([envPath, localPath]);
    expect(env).toEqual({
      CLUSTER_AUDIT_RUN_ID: "preset",
      CLUSTER_AUDIT_SEED: "7",
      LOCAL_ONLY: "yes",
    });
  });

  it("loads nothing when no env files exist", () => {
    const root = makeRepo();
    const env: Record<string, string> = {};

    expect(loadEnv({ cwd: root, env }).loadedFiles).toEqual([]);
    expect(env).toEqual({});
  });
});

import path from "node:path";
import { describe, expect, it } from "vitest";
import {
  getCopyDir,
  getDefaultGroundTruthPath,
  getExportPath,
  getHotspotPath,
  getImageListPath,
  getOriginalsDir,
  getRunLogDir,
  getRunReportPath,
} from "./run-paths.js";

describe("run-paths", () => {
  const root = path.join("/data", "output");
  const runId = "26a16624";

  it("locates clustering inputs", () => {
    expect(getHotspotPath(root, runId)).toBe(path.join(root, "hotspots", "hotspot-26a16624.json"));
    expect(getImageListPath(root, runId)).toBe(
      path.join(root, "imagelists", "imagelist-26a16624.json")
    );
    expect(getOriginalsDir(root)).toBe(path.join(root, "originals"));
  });

  it("prefixes copy directories and exports with the run id", () => {
    expect(getCopyDir(root, runId, "between_selected")).toBe(
      path.join(root, "26a16624_between_selected")
    );
    expect(getExportPath(root, runId, "image_sample")).toBe(
      path.join(root, "26a16624_image_sample.csv")
    );
    expect(getRunReportPath(root, runId)).toBe(path.join(root, "26a16624_report.json"));
    expect(getRunLogDir(root, runId)).toBe(path.join(root, "26a16624_logs"));
  });

  it("expects ground truth inside the random sample directory", () => {
    expect(getDefaultGroundTruthPath(root, runId)).toBe(
      path.join(root, "26a16624_random_sample", "to_be_selected.txt")
    );
  });
});

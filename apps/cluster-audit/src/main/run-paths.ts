import path from "node:path";

export type CopyTarget =
  | "selected_last_page"
  | "between_selected"
  | "selected_sample"
  | "random_sample"
  | "selected_sample_user";

export type ExportTable =
  | "imagelist"
  | "image_selected"
  | "image_selected_last"
  | "image_between_selected"
  | "image_sample"
  | "image_selected_user";

export const GROUND_TRUTH_FILENAME = "to_be_selected.txt";

export const getHotspotPath = (outputRoot: string, runId: string): string =>
  path.join(outputRoot, "hotspots", `hotspot-${runId}.json`);

export const getImageListPath = (outputRoot: string, runId: string): string =>
  path.join(outputRoot, "imagelists", `imagelist-${runId}.json`);

export const getOriginalsDir = (outputRoot: string): string => path.join(outputRoot, "originals");

export const getCopyDir = (outputRoot: string, runId: string, target: CopyTarget): string =>
  path.join(outputRoot, `${runId}_${target}`);

export const getExportPath = (outputRoot: string, runId: string, table: ExportTable): string =>
  path.join(outputRoot, `${runId}_${table}.csv`);

export const getDefaultGroundTruthPath = (outputRoot: string, runId: string): string =>
  path.join(getCopyDir(outputRoot, runId, "random_sample"), GROUND_TRUTH_FILENAME);

export const getRunReportPath = (outputRoot: string, runId: string): string =>
  path.join(outputRoot, `${runId}_report.json`);

export const getRunLogDir = (outputRoot: string, runId: string): string =>
  path.join(outputRoot, `${runId}_logs`);

import fs from "node:fs/promises";
import { z, type ZodType, type ZodTypeDef } from "zod";
import type { Cluster, ClusteringResult, GroundTruthSet, ImageList } from "./contracts.js";
import {
  InputFormatError,
  MissingGroundTruthError,
  NotFoundError,
  isErrnoCode,
} from "../main/errors.js";
import { annotateImage } from "../main/filename-parser.js";

const imageIndicesSchema = z.array(z.number().int());

const clusterRecordSchema = z
  .object({
    label: z.string().min(1),
    images: imageIndicesSchema,
  })
  .passthrough();

const clusterEntrySchema = z.object({ images: imageIndicesSchema }).passthrough();

const clusteringFileSchema = z.union([
  z.array(clusterRecordSchema),
  z.record(z.string(), clusterEntrySchema),
]);

const imageListFileSchema = z
  .object({
    images: z.array(z.string()),
  })
  .passthrough();

const GROUND_TRUTH_COLUMN = "filename";

const readText = async (filePath: string): Promise<string> => {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (isErrnoCode(error, "ENOENT")) {
      throw new NotFoundError("file", filePath);
    }
    throw error;
  }
};

const parseJsonFile = async <T>(
  filePath: string,
  schema: ZodType<T, ZodTypeDef, unknown>
): Promise<T> => {
  const raw = await readText(filePath);
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new InputFormatError(filePath, `not valid JSON (${message})`);
  }
  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .slice(0, 5)
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
    throw new InputFormatError(filePath, issues.join("; "));
  }
  return result.data;
};

/** Accepts the hotspot array form and the label-keyed object form. First record wins on repeated labels. */
export const readClusteringResult = async (filePath: string): Promise<ClusteringResult> => {
  const parsed = await parseJsonFile(filePath, clusteringFileSchema);
  const clusters = new Map<string, Cluster>();
  const entries: Array<[string, number[]]> = Array.isArray(parsed)
    ? parsed.map((record): [string, number[]] => [record.label, record.images])
    : Object.entries(parsed).map(
        ([label, entry]): [string, number[]] => [label, entry.images]
      );
  for (const [label, images] of entries) {
    if (clusters.has(label)) continue;
    clusters.set(label, { label, imageIndices: images });
  }
  return clusters;
};

export const readImageList = async (filePath: string): Promise<ImageList> => {
  const parsed = await parseJsonFile(filePath, imageListFileSchema);
  return parsed.images.map(annotateImage);
};

export const parseGroundTruth = (raw: string, filePath: string): GroundTruthSet => {
  const lines = raw
    .replace(/^\uFEFF/, "")
    .split(/\r?\n/)
    .filter((line) => line.trim().length > 0);
  const header = lines[0]?.split("\t").map((cell) => cell.trim()) ?? [];
  const column = header.indexOf(GROUND_TRUTH_COLUMN);
  if (column === -1) {
    throw new MissingGroundTruthError(filePath, `no "${GROUND_TRUTH_COLUMN}" column in header`);
  }
  const filenames = new Set<string>();
  for (const line of lines.slice(1)) {
    const value = line.split("\t")[column]?.trim();
    if (value) filenames.add(value);
  }
  return filenames;
};

export const readGroundTruth = async (filePath: string): Promise<GroundTruthSet> => {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (isErrnoCode(error, "ENOENT")) {
      throw new MissingGroundTruthError(filePath);
    }
    throw new MissingGroundTruthError(
      filePath,
      error instanceof Error ? error.message : String(error)
    );
  }
  return parseGroundTruth(raw, filePath);
};

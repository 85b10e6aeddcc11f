/**
 * Data contracts for the cluster audit pipeline.
 * Shapes shared between the input readers, the pipeline modules and the exporters.
 */

export interface ImageRecord {
  filename: string;
  docTitle: string | null;
  pageNr: number | null;
}

/** Ordered as in the clustering tool's image manifest; cluster indices point into it. */
export type ImageList = readonly ImageRecord[];

export interface Cluster {
  label: string;
  imageIndices: number[];
}

export type ClusteringResult = ReadonlyMap<string, Cluster>;

/** Subsequence of an ImageList, kept in list order. */
export type SelectionSet = readonly ImageRecord[];

export type DocumentLengthTable = ReadonlyMap<string, number>;

export interface GapRecord {
  docTitle: string;
  pageNr: number;
  filename: string;
}

export type GroundTruthSet = ReadonlySet<string>;

export type ValidationOutcome =
  | "correct_selected"
  | "wrong_selected"
  | "wrong_not_selected"
  | "correct_not_selected";

export type ValidationTally = Record<ValidationOutcome, number>;

export interface SelectedImageRecord extends ImageRecord {
  nrOfPages: number | null;
}

export interface AuditedImageRecord extends ImageRecord {
  validation?: ValidationOutcome;
}

export type AuditStage =
  | "load"
  | "select"
  | "last-pages"
  | "gaps"
  | "sample"
  | "copy"
  | "validate"
  | "export"
  | "user-hotspot";

export interface AuditProgressEvent {
  stage: AuditStage;
  processed: number;
  total: number;
}

export type GroundTruthStatus =
  | { status: "validated"; path: string; tally: ValidationTally }
  | { status: "missing"; path: string; message: string };

export interface UserHotspotSummary {
  hotspotPath: string;
  selectedCount: number;
  sampleCount: number;
}

export interface AuditRunResult {
  runId: string;
  outputRoot: string;
  imageCount: number;
  selectedCount: number;
  firstPageCount: number;
  lastPageCount: number;
  gapCount: number;
  gapSampleCount: number;
  selectedSampleCount: number;
  imageSampleCount: number;
  copiedCount: number;
  groundTruth: GroundTruthStatus;
  userHotspot?: UserHotspotSummary;
  outputPaths: string[];
}

/**
 * Audit pipeline: turns a clustering run into selected, last-page, gap and sampled image sets,
 * copies the sampled images for review and scores the random sample against ground truth.
 */

import type {
  AuditedImageRecord,
  AuditProgressEvent,
  AuditRunResult,
  AuditStage,
  ClusteringResult,
  DocumentLengthTable,
  GapRecord,
  GroundTruthStatus,
  ImageList,
  ImageRecord,
  SelectedImageRecord,
  SelectionSet,
} from "../ipc/contracts.js";
import { readClusteringResult, readGroundTruth, readImageList } from "../ipc/clusterInput.js";
import { resolveAuditPaths, type AuditConfig } from "./audit-config.js";
import { resolveSelection } from "./cluster-resolver.js";
import {
  buildLengthTable,
  joinDocumentLength,
  selectFirstPages,
  selectLastPages,
} from "./document-index.js";
import { MissingGroundTruthError } from "./errors.js";
import {
  copyImages,
  createSourceIndex,
  writeCsv,
  writeJsonAtomic,
  type CsvColumn,
  type SourceIndex,
} from "./file-utils.js";
import { findGaps } from "./gap-detector.js";
import { createRunLogger, type RunLogger } from "./logger.js";
import {
  getCopyDir,
  getExportPath,
  getHotspotPath,
  getImageListPath,
  getRunLogDir,
  getRunReportPath,
  type CopyTarget,
  type ExportTable,
} from "./run-paths.js";
import { createSampler, type Sampler } from "./sampler.js";
import { accuracy, formatTally, validateSample } from "./validator.js";

export type AuditInputs = {
  imageList: ImageList;
  clusteringResult: ClusteringResult;
  userClusteringResult?: ClusteringResult;
};

export type AuditPlanOptions = {
  clustersOfInterest: readonly string[];
  userClustersOfInterest?: readonly string[];
  sampleSize: number;
};

export type UserHotspotPlan = {
  selected: SelectionSet;
  sample: SelectionSet;
};

export type AuditPlan = {
  imageList: ImageList;
  lengthTable: DocumentLengthTable;
  selected: SelectedImageRecord[];
  firstPages: SelectionSet;
  lastPages: SelectionSet;
  gaps: GapRecord[];
  gapSample: GapRecord[];
  selectedSample: SelectionSet;
  imageSample: SelectionSet;
  user?: UserHotspotPlan;
};

export type RunAuditOptions = {
  config: AuditConfig;
  cwd?: string;
  logger?: RunLogger;
  onProgress?: (event: AuditProgressEvent) => void;
};

/**
 * Derives every set of the audit from already loaded inputs.
 * Sampling order is fixed (gaps, selection, image list, user selection) so one seed replays a run.
 */
export const planAudit = (
  inputs: AuditInputs,
  options: AuditPlanOptions,
  sampler: Sampler
): AuditPlan => {
  const { imageList, clusteringResult, userClusteringResult } = inputs;
  const selection = resolveSelection(clusteringResult, imageList, options.clustersOfInterest);
  const lengthTable = buildLengthTable(imageList);
  const gaps = findGaps(selection);

  const plan: AuditPlan = {
    imageList,
    lengthTable,
    selected: joinDocumentLength(selection, lengthTable),
    firstPages: selectFirstPages(selection),
    lastPages: selectLastPages(selection, lengthTable),
    gaps,
    gapSample: sampler.sample(gaps, options.sampleSize),
    selectedSample: sampler.sample(selection, options.sampleSize),
    imageSample: sampler.sample(imageList, options.sampleSize),
  };

  if (userClusteringResult && options.userClustersOfInterest?.length) {
    const userSelection = resolveSelection(
      userClusteringResult,
      imageList,
      options.userClustersOfInterest
    );
    plan.user = {
      selected: userSelection,
      sample: sampler.sample(userSelection, options.sampleSize),
    };
  }

  return plan;
};

const imageColumns: CsvColumn<ImageRecord>[] = [
  { header: "filename", value: (row) => row.filename },
  { header: "doc_title", value: (row) => row.docTitle },
  { header: "page_nr", value: (row) => row.pageNr },
];

const selectedColumns: CsvColumn<SelectedImageRecord>[] = [
  ...imageColumns,
  { header: "nr_of_pages", value: (row) => row.nrOfPages },
];

const gapColumns: CsvColumn<GapRecord>[] = [
  { header: "doc_title", value: (row) => row.docTitle },
  { header: "page_nr", value: (row) => row.pageNr },
  { header: "filename", value: (row) => row.filename },
];

const auditedColumns = (withValidation: boolean): CsvColumn<AuditedImageRecord>[] =>
  withValidation
    ? [...imageColumns, { header: "validation", value: (row) => row.validation }]
    : imageColumns;

/** Rounds to the nearest integer, ties to the even neighbour. */
export const roundHalfEven = (value: number): number => {
  const floor = Math.floor(value);
  const fraction = value - floor;
  if (fraction > 0.5) return floor + 1;
  if (fraction < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
};

export const formatSelectionSummary = (selectedCount: number, imageCount: number): string => {
  const percent = imageCount > 0 ? roundHalfEven((selectedCount / imageCount) * 100) : 0;
  return `${selectedCount} images selected out of ${imageCount} (${percent}%).`;
};

/** Console notices for a finished run, one per line. */
export const formatSummaryLines = (result: AuditRunResult): string[] => {
  const lines = [
    formatSelectionSummary(result.selectedCount, result.imageCount),
    `${result.firstPageCount} images are selected corresponding to the first page of a document.`,
    `${result.lastPageCount} images are selected corresponding to the last page of a document.`,
    `${result.gapCount} pages lie between selected pages (${result.gapSampleCount} sampled).`,
  ];
  if (result.groundTruth.status === "validated") {
    const score = accuracy(result.groundTruth.tally);
    lines.push(`Validation result:\n${formatTally(result.groundTruth.tally)}`);
    if (score !== null) {
      lines.push(`Sample accuracy: ${(score * 100).toFixed(1)}%.`);
    }
  } else {
    lines.push(result.groundTruth.message);
  }
  if (result.userHotspot) {
    lines.push(
      `${result.userHotspot.selectedCount} images selected from the user hotspot ` +
        `(${result.userHotspot.sampleCount} sampled).`
    );
  }
  return lines;
};

export const runAudit = async (options: RunAuditOptions): Promise<AuditRunResult> => {
  const { config, onProgress } = options;
  const runId = config.run_id;
  const paths = resolveAuditPaths(config, options.cwd);
  const { outputRoot } = paths;
  const logger =
    options.logger ?? createRunLogger(getRunLogDir(outputRoot, runId), config.logging);
  const ownsLogger = options.logger === undefined;
  const outputPaths: string[] = [];

  const report = (stage: AuditStage, processed: number, total: number): void => {
    onProgress?.({ stage, processed, total });
  };

  try {
    logger.info("audit-start", { runId, outputRoot, clusters: config.clusters_of_interest });

    report("load", 0, 1);
    const imageList = await readImageList(getImageListPath(outputRoot, runId));
    const clusteringResult = await readClusteringResult(getHotspotPath(outputRoot, runId));
    const userClusteringResult = paths.userHotspotPath
      ? await readClusteringResult(paths.userHotspotPath)
      : undefined;
    report("load", 1, 1);
    logger.info("inputs-loaded", {
      images: imageList.length,
      clusters: clusteringResult.size,
      userHotspot: paths.userHotspotPath,
    });

    const sampler = createSampler(config.sampling.seed);
    const plan = planAudit(
      { imageList, clusteringResult, userClusteringResult },
      {
        clustersOfInterest: config.clusters_of_interest,
        userClustersOfInterest: config.user_hotspot.clusters_of_interest,
        sampleSize: config.sampling.size,
      },
      sampler
    );
    report("select", plan.selected.length, imageList.length);
    report("last-pages", plan.lastPages.length, plan.selected.length);
    report("gaps", plan.gaps.length, plan.gaps.length);
    report("sample", plan.imageSample.length, imageList.length);
    logger.info("selection-resolved", {
      selected: plan.selected.length,
      firstPages: plan.firstPages.length,
      lastPages: plan.lastPages.length,
      gaps: plan.gaps.length,
      documents: plan.lengthTable.size,
    });
    logGapsPerDocument(logger, plan.gaps);

    let copiedCount = 0;
    if (config.copy_images) {
      const sourceIndex = await createSourceIndex(paths.sourceDir);
      const copyJobs: Array<[CopyTarget, readonly string[]]> = [
        ["selected_last_page", plan.lastPages.map((record) => record.filename)],
        ["between_selected", plan.gapSample.map((gap) => gap.filename)],
        ["selected_sample", plan.selectedSample.map((record) => record.filename)],
        ["random_sample", plan.imageSample.map((record) => record.filename)],
      ];
      if (plan.user) {
        const userFilenames = plan.user.sample.map((record) => record.filename);
        copyJobs.push(["selected_sample_user", userFilenames]);
      }
      copiedCount = await runCopyJobs(copyJobs, sourceIndex, outputRoot, runId, report);
      logger.info("images-copied", { count: copiedCount, sourceDir: paths.sourceDir });
    } else {
      logger.info("image-copy-skipped");
    }

    report("validate", 0, 1);
    const { groundTruth, auditedSample } = await scoreImageSample(plan, paths.groundTruthPath);
    report("validate", 1, 1);
    if (groundTruth.status === "validated") {
      logger.info("sample-validated", { ...groundTruth.tally });
    } else {
      logger.warn("ground-truth-missing", { path: groundTruth.path });
    }

    const exportTable = async <T>(
      table: ExportTable,
      rows: readonly T[],
      columns: readonly CsvColumn<T>[]
    ): Promise<void> => {
      const filePath = getExportPath(outputRoot, runId, table);
      await writeCsv(filePath, rows, columns);
      outputPaths.push(filePath);
    };

    if (plan.user) {
      report("user-hotspot", plan.user.sample.length, plan.user.selected.length);
    }
    report("export", 0, 1);
    await exportTable("imagelist", plan.imageList, imageColumns);
    await exportTable("image_selected", plan.selected, selectedColumns);
    await exportTable("image_selected_last", plan.lastPages, imageColumns);
    await exportTable("image_between_selected", plan.gaps, gapColumns);
    await exportTable(
      "image_sample",
      auditedSample,
      auditedColumns(groundTruth.status === "validated")
    );
    if (plan.user) {
      await exportTable("image_selected_user", plan.user.selected, imageColumns);
    }

    const result: AuditRunResult = {
      runId,
      outputRoot,
      imageCount: imageList.length,
      selectedCount: plan.selected.length,
      firstPageCount: plan.firstPages.length,
      lastPageCount: plan.lastPages.length,
      gapCount: plan.gaps.length,
      gapSampleCount: plan.gapSample.length,
      selectedSampleCount: plan.selectedSample.length,
      imageSampleCount: plan.imageSample.length,
      copiedCount,
      groundTruth,
      ...(plan.user && paths.userHotspotPath
        ? {
            userHotspot: {
              hotspotPath: paths.userHotspotPath,
              selectedCount: plan.user.selected.length,
              sampleCount: plan.user.sample.length,
            },
          }
        : {}),
      outputPaths,
    };

    const reportPath = getRunReportPath(outputRoot, runId);
    outputPaths.push(reportPath);
    await writeJsonAtomic(reportPath, {
      generatedAt: new Date().toISOString(),
      seed: sampler.seed,
      sampleSize: config.sampling.size,
      result,
    });
    report("export", 1, 1);
    logger.info("audit-complete", { outputs: outputPaths.length });
    return result;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error("audit-failed", { message });
    throw error;
  } finally {
    if (ownsLogger) {
      await logger.finalize();
    }
  }
};

const logGapsPerDocument = (logger: RunLogger, gaps: readonly GapRecord[]): void => {
  const byDocument = new Map<string, number[]>();
  for (const gap of gaps) {
    const pages = byDocument.get(gap.docTitle) ?? [];
    pages.push(gap.pageNr);
    byDocument.set(gap.docTitle, pages);
  }
  byDocument.forEach((pages, docTitle) => {
    logger.document(docTitle, "info", "pages-between-selected", { pages });
  });
};

const runCopyJobs = async (
  jobs: ReadonlyArray<[CopyTarget, readonly string[]]>,
  sourceIndex: SourceIndex,
  outputRoot: string,
  runId: string,
  report: (stage: AuditStage, processed: number, total: number) => void
): Promise<number> => {
  const total = jobs.reduce((sum, [, filenames]) => sum + filenames.length, 0);
  let processed = 0;
  report("copy", 0, total);
  for (const [target, filenames] of jobs) {
    const destination = getCopyDir(outputRoot, runId, target);
    await copyImages(filenames, sourceIndex, destination, () => {
      processed += 1;
      report("copy", processed, total);
    });
  }
  return processed;
};

const scoreImageSample = async (
  plan: AuditPlan,
  groundTruthPath: string
): Promise<{ groundTruth: GroundTruthStatus; auditedSample: AuditedImageRecord[] }> => {
  try {
    const truth = await readGroundTruth(groundTruthPath);
    const { records, tally } = validateSample(plan.imageSample, plan.selected, truth);
    return {
      groundTruth: { status: "validated", path: groundTruthPath, tally },
      auditedSample: records,
    };
  } catch (error) {
    if (!(error instanceof MissingGroundTruthError)) throw error;
    return {
      groundTruth: {
        status: "missing",
        path: groundTruthPath,
        message:
          "Please review the images of the random sample and list the true ones in " +
          `${groundTruthPath}.`,
      },
      auditedSample: [...plan.imageSample],
    };
  }
};

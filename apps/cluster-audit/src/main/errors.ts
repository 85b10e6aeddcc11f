export type NotFoundKind = "cluster" | "file";
export type NotFoundReason = "missing" | "ambiguous";

export class NotFoundError extends Error {
  readonly kind: NotFoundKind;
  readonly reason: NotFoundReason;
  readonly target: string;

  constructor(
    kind: NotFoundKind,
    target: string,
    reason: NotFoundReason = "missing",
    detail?: string
  ) {
    const subject = kind === "cluster" ? `Cluster "${target}"` : `File "${target}"`;
    const problem = reason === "missing" ? "not found" : "is ambiguous";
    super(detail ? `${subject} ${problem}: ${detail}` : `${subject} ${problem}`);
    this.name = "NotFoundError";
    this.kind = kind;
    this.reason = reason;
    this.target = target;
  }
}

export class ClusterIndexError extends Error {
  readonly label: string;
  readonly index: number;

  constructor(label: string, index: number, imageCount: number) {
    super(
      `Cluster "${label}" references image index ${index}, but the image list has ${imageCount} entries`
    );
    this.name = "ClusterIndexError";
    this.label = label;
    this.index = index;
  }
}

export class MissingGroundTruthError extends Error {
  readonly path: string;

  constructor(path: string, detail = "file not found") {
    super(`Ground truth unavailable at ${path}: ${detail}`);
    this.name = "MissingGroundTruthError";
    this.path = path;
  }
}

export class InputFormatError extends Error {
  readonly path: string;

  constructor(path: string, detail: string) {
    super(`Invalid input file ${path}: ${detail}`);
    this.name = "InputFormatError";
    this.path = path;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[], configPath?: string) {
    const where = configPath ? ` (${configPath})` : "";
    super(`Invalid audit config${where}: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export const isErrnoCode = (error: unknown, code: string): boolean =>
  (error as NodeJS.ErrnoException | undefined)?.code === code;

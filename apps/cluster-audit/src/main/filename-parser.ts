import type { ImageRecord } from "../ipc/contracts.js";

export const IMAGE_SUFFIX = ".jpg";
export const DOC_TITLE_PREFIX = "HGB";

const PAGE_NR_PATTERN = /([0-9]{3})\.jpg/;
const DOC_TITLE_PATTERN = new RegExp(`${DOC_TITLE_PREFIX}_[0-9]_[0-9]{3}_[0-9]{3}`);

const isNonEmptyString = (value: unknown): value is string =>
  typeof value === "string" && value.length > 0;

/** Page ordinal from the three digits in front of the image suffix, e.g. `..._007.jpg` -> 7. */
export const parsePageNr = (filename: string): number | null => {
  if (!isNonEmptyString(filename)) return null;
  const match = PAGE_NR_PATTERN.exec(filename);
  if (!match?.[1]) return null;
  return Number.parseInt(match[1], 10);
};

/** Document identifier such as `HGB_1_001_002`. */
export const parseDocTitle = (filename: string): string | null => {
  if (!isNonEmptyString(filename)) return null;
  const match = DOC_TITLE_PATTERN.exec(filename);
  return match ? match[0] : null;
};

export const formatFilename = (
  docTitle: string | null | undefined,
  pageNr: number | null | undefined
): string | null => {
  if (!isNonEmptyString(docTitle)) return null;
  if (pageNr === null || pageNr === undefined) return null;
  if (!Number.isInteger(pageNr) || pageNr < 0) return null;
  return `${docTitle}_${String(pageNr).padStart(3, "0")}${IMAGE_SUFFIX}`;
};

export const annotateImage = (filename: string): ImageRecord => ({
  filename,
  docTitle: parseDocTitle(filename),
  pageNr: parsePageNr(filename),
});

import type { GapRecord, SelectionSet } from "../ipc/contracts.js";
import { formatFilename } from "./filename-parser.js";

const compareTitles = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

export const groupPagesByDocument = (selection: SelectionSet): Map<string, number[]> => {
  const groups = new Map<string, Set<number>>();
  for (const { docTitle, pageNr } of selection) {
    if (docTitle === null || pageNr === null) continue;
    const pages = groups.get(docTitle) ?? new Set<number>();
    pages.add(pageNr);
    groups.set(docTitle, pages);
  }
  const sortedTitles = [...groups.keys()].sort(compareTitles);
  return new Map(
    sortedTitles.map((title) => [title, [...(groups.get(title) ?? [])].sort((a, b) => a - b)])
  );
};

/** Unselected page numbers strictly between selected pages; input must be sorted and distinct. */
export const findPageGaps = (sortedPages: readonly number[]): number[] =>
  sortedPages.flatMap((page, i) => {
    const previous = sortedPages[i - 1];
    if (previous === undefined) return [];
    return Array.from({ length: page - previous - 1 }, (_, offset) => previous + 1 + offset);
  });

/**
 * Pages lying between two selected pages of the same document, by document title then page.
 * Pages before the first or after the last selected page of a document are never reported.
 */
export const findGaps = (selection: SelectionSet): GapRecord[] => {
  const gaps: GapRecord[] = [];
  for (const [docTitle, pages] of groupPagesByDocument(selection)) {
    for (const pageNr of findPageGaps(pages)) {
      const filename = formatFilename(docTitle, pageNr);
      if (filename === null) continue;
      gaps.push({ docTitle, pageNr, filename });
    }
  }
  return gaps;
};

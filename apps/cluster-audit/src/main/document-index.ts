import type {
  DocumentLengthTable,
  ImageList,
  ImageRecord,
  SelectedImageRecord,
  SelectionSet,
} from "../ipc/contracts.js";

/**
 * Highest page number seen per document across the whole image list.
 * Only as good as the corpus: a document whose last page was never scanned reports a shorter length.
 */
export const buildLengthTable = (imageList: ImageList): DocumentLengthTable => {
  const table = new Map<string, number>();
  for (const { docTitle, pageNr } of imageList) {
    if (docTitle === null || pageNr === null) continue;
    const current = table.get(docTitle);
    if (current === undefined || pageNr > current) {
      table.set(docTitle, pageNr);
    }
  }
  return table;
};

export const lookupLength = (
  record: ImageRecord,
  lengthTable: DocumentLengthTable
): number | null => {
  if (record.docTitle === null) return null;
  return lengthTable.get(record.docTitle) ?? null;
};

export const selectLastPages = (
  selection: SelectionSet,
  lengthTable: DocumentLengthTable
): SelectionSet =>
  selection.filter((record) => {
    const length = lookupLength(record, lengthTable);
    return length !== null && record.pageNr === length;
  });

export const selectFirstPages = (selection: SelectionSet): SelectionSet =>
  selection.filter((record) => record.pageNr === 1);

export const joinDocumentLength = (
  selection: SelectionSet,
  lengthTable: DocumentLengthTable
): SelectedImageRecord[] =>
  selection.map((record) => ({ ...record, nrOfPages: lookupLength(record, lengthTable) }));

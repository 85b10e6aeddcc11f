import type {
  AuditedImageRecord,
  GroundTruthSet,
  ImageRecord,
  SelectionSet,
  ValidationOutcome,
  ValidationTally,
} from "../ipc/contracts.js";

export const VALIDATION_OUTCOMES: readonly ValidationOutcome[] = [
  "correct_not_selected",
  "correct_selected",
  "wrong_not_selected",
  "wrong_selected",
];

export const toFilenameSet = (records: Iterable<Pick<ImageRecord, "filename">>): Set<string> => {
  const filenames = new Set<string>();
  for (const record of records) filenames.add(record.filename);
  return filenames;
};

export const validate = (
  filename: string,
  selected: ReadonlySet<string>,
  groundTruth: GroundTruthSet
): ValidationOutcome => {
  const isSelected = selected.has(filename);
  const isTrue = groundTruth.has(filename);
  if (isSelected) return isTrue ? "correct_selected" : "wrong_selected";
  return isTrue ? "wrong_not_selected" : "correct_not_selected";
};

export const emptyTally = (): ValidationTally => ({
  correct_not_selected: 0,
  correct_selected: 0,
  wrong_not_selected: 0,
  wrong_selected: 0,
});

export const validateSample = (
  sample: readonly ImageRecord[],
  selection: SelectionSet,
  groundTruth: GroundTruthSet
): { records: AuditedImageRecord[]; tally: ValidationTally } => {
  const selected = toFilenameSet(selection);
  const tally = emptyTally();
  const records = sample.map((record) => {
    const validation = validate(record.filename, selected, groundTruth);
    tally[validation] += 1;
    return { ...record, validation };
  });
  return { records, tally };
};

export const accuracy = (tally: ValidationTally): number | null => {
  const total = VALIDATION_OUTCOMES.reduce((sum, outcome) => sum + tally[outcome], 0);
  if (total === 0) return null;
  return (tally.correct_selected + tally.correct_not_selected) / total;
};

/** One-row cross table, columns padded to the wider of header and value. */
export const formatTally = (tally: ValidationTally): string => {
  const widths = VALIDATION_OUTCOMES.map((outcome) =>
    Math.max(outcome.length, String(tally[outcome]).length)
  );
  const header = VALIDATION_OUTCOMES.map((outcome, i) => outcome.padStart(widths[i])).join("  ");
  const values = VALIDATION_OUTCOMES.map((outcome, i) =>
    String(tally[outcome]).padStart(widths[i])
  ).join("  ");
  const label = "summary";
  return `${" ".repeat(label.length)}  ${header}\n${label}  ${values}`;
};

import fs from "node:fs/promises";
import path from "node:path";
import crypto from "node:crypto";
import { NotFoundError, isErrnoCode } from "./errors.js";

export type CsvValue = string | number | null | undefined;

export type CsvColumn<T> = {
  header: string;
  value: (row: T) => CsvValue;
};

export type SourceIndex = {
  root: string;
  files: ReadonlyMap<string, readonly string[]>;
};

const writeFileAtomic = async (filePath: string, data: string): Promise<void> => {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });
  const tempPath = path.join(dir, `.${path.basename(filePath)}.${crypto.randomUUID()}.tmp`);
  await fs.writeFile(tempPath, data);
  await fs.rename(tempPath, filePath);
};

export const writeJsonAtomic = async (filePath: string, payload: unknown): Promise<void> => {
  await writeFileAtomic(filePath, JSON.stringify(payload, null, 2));
};

const escapeCsvField = (value: CsvValue): string => {
  if (value === null || value === undefined) return "";
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
};

export const toCsv = <T>(rows: readonly T[], columns: readonly CsvColumn<T>[]): string => {
  const lines = [columns.map((column) => escapeCsvField(column.header)).join(",")];
  for (const row of rows) {
    lines.push(columns.map((column) => escapeCsvField(column.value(row))).join(","));
  }
  return `${lines.join("\n")}\n`;
};

export const writeCsv = async <T>(
  filePath: string,
  rows: readonly T[],
  columns: readonly CsvColumn<T>[]
): Promise<void> => {
  await writeFileAtomic(filePath, toCsv(rows, columns));
};

/** Files under `root` by basename; symlinks are not followed. */
export const createSourceIndex = async (root: string): Promise<SourceIndex> => {
  const files = new Map<string, string[]>();

  const walk = async (dir: string): Promise<void> => {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isSymbolicLink()) continue;
      if (entry.isDirectory()) {
        await walk(full);
        continue;
      }
      if (!entry.isFile()) continue;
      const matches = files.get(entry.name) ?? [];
      matches.push(full);
      files.set(entry.name, matches);
    }
  };

  try {
    await walk(root);
  } catch (error) {
    if (isErrnoCode(error, "ENOENT")) {
      throw new NotFoundError("file", root, "missing", "source directory does not exist");
    }
    throw error;
  }
  return { root, files };
};

export const resolveSourceFile = (filename: string, index: SourceIndex): string => {
  const matches = index.files.get(filename) ?? [];
  if (matches.length === 0) {
    throw new NotFoundError("file", filename, "missing", `no match under ${index.root}`);
  }
  if (matches.length > 1) {
    const detail = `${matches.length} matches under ${index.root}`;
    throw new NotFoundError("file", filename, "ambiguous", detail);
  }
  return matches[0];
};

export const copyImage = async (
  filename: string,
  index: SourceIndex,
  destinationDir: string
): Promise<string> => {
  const sourcePath = resolveSourceFile(filename, index);
  await fs.mkdir(destinationDir, { recursive: true });
  const destinationPath = path.join(destinationDir, filename);
  await fs.copyFile(sourcePath, destinationPath);
  return destinationPath;
};

export const copyImages = async (
  filenames: readonly string[],
  index: SourceIndex,
  destinationDir: string,
  onCopied?: (processed: number, total: number) => void
): Promise<string[]> => {
  await fs.mkdir(destinationDir, { recursive: true });
  const copied: string[] = [];
  for (const filename of filenames) {
    copied.push(await copyImage(filename, index, destinationDir));
    onCopied?.(copied.length, filenames.length);
  }
  return copied;
};

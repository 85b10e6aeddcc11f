import fs from "node:fs";
import path from "node:path";

type LoadEnvResult = {
  repoRoot: string;
  loadedFiles: string[];
};

const ENV_FILES = [".env", ".env.local"];
const MAX_PARENT_LEVELS = 6;

const unquote = (value: string): string => {
  const quote = value[0];
  if ((quote === '"' || quote === "'") && value.length > 1 && value.endsWith(quote)) {
    return value.slice(1, -1);
  }
  const hashIndex = value.indexOf("#");
  return hashIndex === -1 ? value : value.slice(0, hashIndex).trim();
};

const parseEnvLine = (line: string): [string, string] | null => {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith("#")) return null;
  const body = trimmed.startsWith("export ") ? trimmed.slice(7).trim() : trimmed;
  const eqIndex = body.indexOf("=");
  if (eqIndex <= 0) return null;
  const key = body.slice(0, eqIndex).trim();
  if (!key) return null;
  const value = unquote(body.slice(eqIndex + 1).trim()).replace(/\\n/g, "\n");
  return [key, value];
};

export const parseEnv = (raw: string): Record<string, string> => {
  const entries: Record<string, string> = {};
  for (const line of raw.split(/\r?\n/)) {
    const parsed = parseEnvLine(line);
    if (parsed) entries[parsed[0]] = parsed[1];
  }
  return entries;
};

const declaresWorkspaces = (dir: string): boolean => {
  const manifestPath = path.join(dir, "package.json");
  if (!fs.existsSync(manifestPath)) return false;
  try {
    const manifest: unknown = JSON.parse(fs.readFileSync(manifestPath, "utf-8"));
    return typeof manifest === "object" && manifest !== null && "workspaces" in manifest;
  } catch (error) {
    console.warn(`Ignoring unreadable ${manifestPath}`, error);
    return false;
  }
};

export const findRepoRoot = (startDir: string): string => {
  let current = startDir;
  for (let i = 0; i < MAX_PARENT_LEVELS; i += 1) {
    if (declaresWorkspaces(current)) return current;
    const parent = path.dirname(current);
    if (parent === current) break;
    current = parent;
  }
  return startDir;
};

/** Loads `.env` then `.env.local` from the repository root; variables already set win. */
export const loadEnv = (options: { cwd?: string; env?: NodeJS.ProcessEnv } = {}): LoadEnvResult => {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const repoRoot = findRepoRoot(cwd);
  const loadedFiles: string[] = [];

  for (const name of ENV_FILES) {
    const filePath = path.join(repoRoot, name);
    if (!fs.existsSync(filePath)) continue;
    const parsed = parseEnv(fs.readFileSync(filePath, "utf-8"));
    for (const [key, value] of Object.entries(parsed)) {
      if (env[key] === undefined) {
        env[key] = value;
      }
    }
    loadedFiles.push(filePath);
  }

  return { repoRoot, loadedFiles };
};

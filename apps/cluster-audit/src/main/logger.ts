import fs from "node:fs/promises";
import path from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LoggerConfig = {
  level?: string;
  per_document_logs?: boolean;
  keep_logs?: boolean;
};

export type RunLogger = {
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
  document: (
    docTitle: string,
    level: LogLevel,
    message: string,
    meta?: Record<string, unknown>
  ) => void;
  flush: () => Promise<void>;
  finalize: () => Promise<void>;
};

export const normalizeLevel = (value: string | undefined): LogLevel => {
  const normalized = String(value ?? "info").toLowerCase();
  if (normalized === "debug") return "debug";
  if (normalized === "warn" || normalized === "warning") return "warn";
  if (normalized === "error") return "error";
  return "info";
};

const safeStringify = (payload: unknown): string => {
  try {
    return JSON.stringify(payload);
  } catch {
    return JSON.stringify({ message: "Failed to serialize log payload" });
  }
};

const safeFileName = (value: string): string => value.replace(/[^A-Za-z0-9._-]+/g, "_");

/** JSON-lines logger under `logDir`; writes are queued in order and awaited by `flush`. */
export const createRunLogger = (logDir: string, config?: LoggerConfig): RunLogger => {
  const level = normalizeLevel(config?.level);
  const perDocument = config?.per_document_logs ?? false;
  const keepLogs = config?.keep_logs ?? true;
  const runLogPath = path.join(logDir, "run.log");
  const documentLogDir = path.join(logDir, "documents");
  let queue: Promise<void> = Promise.resolve();
  let writeFailed = false;

  const shouldLog = (entryLevel: LogLevel): boolean =>
    LEVEL_WEIGHT[entryLevel] >= LEVEL_WEIGHT[level];

  const enqueue = (filePath: string, payload: Record<string, unknown>): void => {
    queue = queue.then(async () => {
      try {
        await fs.mkdir(path.dirname(filePath), { recursive: true });
        await fs.appendFile(filePath, `${safeStringify(payload)}\n`);
      } catch (error) {
        if (!writeFailed) {
          console.warn(`Failed to write log entry to ${filePath}`, error);
        }
        writeFailed = true;
      }
    });
  };

  const log = (entryLevel: LogLevel, message: string, meta?: Record<string, unknown>): void => {
    if (!shouldLog(entryLevel)) return;
    enqueue(runLogPath, {
      timestamp: new Date().toISOString(),
      level: entryLevel,
      message,
      ...(meta ?? {}),
    });
  };

  const logDocument = (
    docTitle: string,
    entryLevel: LogLevel,
    message: string,
    meta?: Record<string, unknown>
  ): void => {
    if (!perDocument || !shouldLog(entryLevel)) return;
    enqueue(path.join(documentLogDir, `${safeFileName(docTitle)}.log`), {
      timestamp: new Date().toISOString(),
      level: entryLevel,
      docTitle,
      message,
      ...(meta ?? {}),
    });
  };

  const flush = async (): Promise<void> => {
    await queue;
  };

  const finalize = async (): Promise<void> => {
    await flush();
    if (keepLogs) return;
    await fs.rm(logDir, { recursive: true, force: true });
  };

  return {
    debug: (message, meta) => log("debug", message, meta),
    info: (message, meta) => log("info", message, meta),
    warn: (message, meta) => log("warn", message, meta),
    error: (message, meta) => log("error", message, meta),
    document: logDocument,
    flush,
    finalize,
  };
};

export const createNullLogger = (): RunLogger => ({
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  document: () => undefined,
  flush: async () => undefined,
  finalize: async () => undefined,
});

import pino from "pino";
import type { Backend, SyncMode } from "./types";

const DEFAULT_LEVEL = "warn";

function resolveLevel(env: NodeJS.ProcessEnv): string {
  const requested = env.SAFE_MIRROR_LOG_LEVEL?.trim().toLowerCase();
  if (requested && (requested === "silent" || requested in pino.levels.values)) {
    return requested;
  }
  return DEFAULT_LEVEL;
}

// Diagnostics go to stderr so stdout stays readable for the operator.
export const logger = pino(
  {
    level: resolveLevel(process.env),
    base: null,
    timestamp: pino.stdTimeFunctions.isoTime
  },
  pino.destination({ dest: 2, sync: true })
);

export function createComponentLogger(component: string): pino.Logger {
  return logger.child({ component });
}

export type RunStatus = "done" | "dry-run" | "aborted" | "failed" | "interrupted";

export interface RunRecord {
  tool: Backend;
  mode: SyncMode;
  source: string | null;
  destination: string | null;
  sourceFiles: number | null;
  transferFiles: number | null;
  transferBytes: number | null;
  backup: string | null;
  status: RunStatus;
  error?: string;
}

/**
 * Appends one JSON line describing a finished run to `logPath`.
 * The file is opened in append mode and closed again before returning.
 */
export function appendRunRecord(logPath: string, record: RunRecord): void {
  const destination = pino.destination({ dest: logPath, append: true, sync: true, mkdir: true });
  const runLogger = pino(
    { base: null, timestamp: pino.stdTimeFunctions.isoTime },
    destination
  );
  runLogger.info(record, "sync run");
  destination.end();
}

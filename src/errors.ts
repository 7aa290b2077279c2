export const ExitCodes = {
  Success: 0,
  Failure: 1,
  Interrupted: 130
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

export type ErrorKind =
  | "PathNotFound"
  | "SamePath"
  | "RootDestination"
  | "NestedPaths"
  | "SensitiveAreaDeclined"
  | "ElevationUnavailable"
  | "BackupFailed"
  | "BackendUnavailable"
  | "BackendExecutionFailed"
  | "InvalidConfig"
  | "Usage"
  | "Cancelled"
  | "Interrupted";

const DEFAULT_CODES: Partial<Record<ErrorKind, ExitCode>> = {
  Cancelled: ExitCodes.Success,
  Interrupted: ExitCodes.Interrupted
};

export class SafeMirrorError extends Error {
  public readonly kind: ErrorKind;
  public readonly code: ExitCode;

  constructor(message: string, kind: ErrorKind, code?: ExitCode) {
    super(message);
    this.name = "SafeMirrorError";
    this.kind = kind;
    this.code = code ?? DEFAULT_CODES[kind] ?? ExitCodes.Failure;
  }
}

export class BackendExecutionError extends SafeMirrorError {
  public readonly status: number | null;
  public readonly backupPath: string | null;

  constructor(message: string, status: number | null, backupPath: string | null) {
    super(message, "BackendExecutionFailed");
    this.status = status;
    this.backupPath = backupPath;
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === "object" && error !== null && "code" in error;
}

export function formatError(error: unknown): string {
  if (isErrnoException(error) && typeof error.code === "string") {
    const message = error instanceof Error ? error.message : String(error);
    return `${error.code}: ${message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

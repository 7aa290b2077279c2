export type Backend = "cp" | "rsync" | "rclone";

export type SyncMode = "mirror" | "copy";

export type StepName = "preview" | "backup" | "confirm" | "safety";

export const BACKENDS: readonly Backend[] = ["cp", "rsync", "rclone"];

export const SYNC_MODES: readonly SyncMode[] = ["mirror", "copy"];

export const STEP_NAMES: readonly StepName[] = ["preview", "backup", "confirm", "safety"];

export interface SyncRequest {
  sourcePath: string;
  destinationPath: string;
  mode: SyncMode;
  backend: Backend;
  options: {
    extraArgs: string[];
  };
}

export interface FileRecord {
  relativePath: string;
  sizeBytes: number;
  modTimeEpoch: number;
}

export interface DeltaSet {
  sourceFiles: FileRecord[];
  transferFiles: FileRecord[];
}

export interface PreviewSummary {
  title: string;
  sourceCount: number;
  sourceBytes: number;
  transferCount: number;
  transferBytes: number;
}

export interface BackupRecord {
  originPath: string;
  backupPath: string;
  createdAt: Date;
}

export interface EffectiveConfig {
  tool: Backend;
  /** False when `tool` is only the built-in default and the operator should pick. */
  toolConfigured: boolean;
  mode: SyncMode;
  logPath: string | null;
  skipSet: Set<StepName>;
  dryRun: boolean;
  noSudo: boolean;
  src: string | null;
  dst: string | null;
  backupRoot: string;
  extraArgs: Record<Backend, string[]>;
}

export interface ConfigOverrides {
  tool?: Backend;
  mode?: SyncMode;
  logPath?: string;
  skip?: StepName[];
  dryRun?: boolean;
  noSudo?: boolean;
  src?: string;
  dst?: string;
  backupRoot?: string;
  extraArgs?: string[];
}

export interface PrivilegeContext {
  hasRoot: boolean;
  elevationCommand: "sudo" | "doas" | null;
  elevationAvailable: boolean;
}

export function isBackend(value: string): value is Backend {
  return BACKENDS.some((backend) => backend === value);
}

export function isSyncMode(value: string): value is SyncMode {
  return SYNC_MODES.some((mode) => mode === value);
}

export function isStepName(value: string): value is StepName {
  return STEP_NAMES.some((step) => step === value);
}

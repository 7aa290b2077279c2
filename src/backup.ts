import fs from "fs/promises";
import path from "path";
import { formatError, SafeMirrorError } from "./errors";
import { copyDirectoryContents, copyTree, fileExists } from "./filesystem";
import { createComponentLogger } from "./logger";
import { isPathInside } from "./paths";
import { listFiles } from "./preview";
import type { BackupRecord } from "./types";

const log = createComponentLogger("backup");

export const NO_BACKUP = "(none)";

export interface BackupOptions {
  tempRoot: string;
  now?: Date;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/** Local time as YYYYMMDDTHHMMSSmmm. */
export function formatBackupTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `T${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}` +
    pad(date.getMilliseconds(), 3)
  );
}

export function describeBackup(record: BackupRecord | null): string {
  return record ? record.backupPath : NO_BACKUP;
}

async function verifyBackup(originPath: string, backupPath: string): Promise<void> {
  const [origin, copy] = [await listFiles(originPath), await listFiles(backupPath)];
  if (origin.length !== copy.length) {
    throw new SafeMirrorError(
      `Backup at ${backupPath} holds ${copy.length} files, expected ${origin.length}`,
      "BackupFailed"
    );
  }
  origin.forEach((record, index) => {
    const copied = copy[index];
    if (copied.relativePath !== record.relativePath || copied.sizeBytes !== record.sizeBytes) {
      throw new SafeMirrorError(
        `Backup at ${backupPath} does not match ${originPath} at ${record.relativePath}`,
        "BackupFailed"
      );
    }
  });
}

/**
 * Copies the current contents of `destination` into a fresh, uniquely named
 * directory under `tempRoot`. Resolves to null when there is nothing to back up.
 */
export async function createBackup(
  destination: string,
  options: BackupOptions
): Promise<BackupRecord | null> {
  if (!(await fileExists(destination))) {
    log.info({ destination }, "destination missing, no backup taken");
    return null;
  }

  const tempRoot = path.resolve(options.tempRoot);
  const origin = path.resolve(destination);
  if (tempRoot === origin || isPathInside(tempRoot, origin)) {
    throw new SafeMirrorError(
      `Backup of ${destination} refused: backup directory ${tempRoot} lies inside it`,
      "BackupFailed"
    );
  }

  const createdAt = options.now ?? new Date();
  const baseName = path.basename(destination) || "root";
  const prefix = path.join(tempRoot, `${baseName}.${formatBackupTimestamp(createdAt)}.`);

  let backupPath: string | null = null;
  try {
    backupPath = await fs.mkdtemp(prefix);
    const stat = await fs.lstat(destination);
    if (stat.isDirectory()) {
      await copyDirectoryContents(destination, backupPath);
      await verifyBackup(destination, backupPath);
    } else {
      await copyTree(destination, path.join(backupPath, baseName));
    }
  } catch (error) {
    if (error instanceof SafeMirrorError) {
      throw error;
    }
    const partial = backupPath ? ` (partial copy left at ${backupPath})` : "";
    throw new SafeMirrorError(
      `Backup of ${destination} failed${partial}: ${formatError(error)}`,
      "BackupFailed"
    );
  }

  log.info({ destination, backupPath }, "backup created");
  return { originPath: destination, backupPath, createdAt };
}

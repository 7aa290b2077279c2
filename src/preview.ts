import fs from "fs/promises";
import path from "path";
import { isErrnoException } from "./errors";
import { directoryExists } from "./filesystem";
import { isClearingBackend } from "./backends";
import type { DeltaSet, FileRecord, PreviewSummary, SyncRequest } from "./types";

const SIZE_UNITS = ["B", "KB", "MB", "GB", "TB", "PB", "EB", "ZB", "YB"];

function toPosix(relativePath: string): string {
  return relativePath.split(path.sep).join("/");
}

function compareRecords(left: FileRecord, right: FileRecord): number {
  if (left.relativePath < right.relativePath) {
    return -1;
  }
  return left.relativePath > right.relativePath ? 1 : 0;
}

async function walkFiles(root: string, directory: string, out: FileRecord[]): Promise<void> {
  const entries = await fs.readdir(directory, { withFileTypes: true });
  for (const entry of entries) {
    const absolute = path.join(directory, entry.name);
    if (entry.isDirectory()) {
      await walkFiles(root, absolute, out);
      continue;
    }
    if (!entry.isFile()) {
      continue;
    }
    const stat = await fs.lstat(absolute);
    out.push({
      relativePath: toPosix(path.relative(root, absolute)),
      sizeBytes: stat.size,
      modTimeEpoch: Math.floor(stat.mtimeMs / 1000)
    });
  }
}

/** Regular files below `root`, hidden ones included, ordered by relative path. */
export async function listFiles(root: string): Promise<FileRecord[]> {
  const records: FileRecord[] = [];
  await walkFiles(root, root, records);
  return records.sort(compareRecords);
}

async function readCounterpart(
  destinationRoot: string,
  record: FileRecord
): Promise<{ sizeBytes: number; modTimeEpoch: number } | null> {
  try {
    const stat = await fs.lstat(path.join(destinationRoot, ...record.relativePath.split("/")));
    if (!stat.isFile()) {
      return null;
    }
    return { sizeBytes: stat.size, modTimeEpoch: Math.floor(stat.mtimeMs / 1000) };
  } catch (error) {
    if (isErrnoException(error) && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      return null;
    }
    throw error;
  }
}

export function needsTransfer(
  record: FileRecord,
  counterpart: { sizeBytes: number; modTimeEpoch: number } | null
): boolean {
  if (!counterpart) {
    return true;
  }
  return (
    counterpart.sizeBytes !== record.sizeBytes || counterpart.modTimeEpoch !== record.modTimeEpoch
  );
}

/**
 * Predicts what the selected backend will write, using size and whole-second
 * modification time. Neither tree is modified.
 */
export async function computeDelta(request: SyncRequest): Promise<DeltaSet> {
  const sourceFiles = await listFiles(request.sourcePath);
  if (isClearingBackend(request) || !(await directoryExists(request.destinationPath))) {
    return { sourceFiles, transferFiles: [...sourceFiles] };
  }

  const transferFiles: FileRecord[] = [];
  for (const record of sourceFiles) {
    const counterpart = await readCounterpart(request.destinationPath, record);
    if (needsTransfer(record, counterpart)) {
      transferFiles.push(record);
    }
  }
  return { sourceFiles, transferFiles };
}

export function previewTitle(request: Pick<SyncRequest, "mode" | "backend">): string {
  return isClearingBackend(request) ? "full copy from source" : "delta (size+mtime)";
}

function sumBytes(records: FileRecord[]): number {
  return records.reduce((total, record) => total + record.sizeBytes, 0);
}

export function summarizeDelta(delta: DeltaSet, title: string): PreviewSummary {
  return {
    title,
    sourceCount: delta.sourceFiles.length,
    sourceBytes: sumBytes(delta.sourceFiles),
    transferCount: delta.transferFiles.length,
    transferBytes: sumBytes(delta.transferFiles)
  };
}

export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < SIZE_UNITS.length - 1) {
    value = Math.floor(value / 1024);
    unit += 1;
  }
  return `${value} ${SIZE_UNITS[unit]}`;
}

export function formatPreview(summary: PreviewSummary): string[] {
  return [
    "",
    `Preview: ${summary.title}`,
    `Source files:   ${summary.sourceCount}`,
    `Source size:    ${formatBytes(summary.sourceBytes)} (${summary.sourceBytes} bytes)`,
    `Will transfer:  ${summary.transferCount}`,
    `Transfer size:  ${formatBytes(summary.transferBytes)} (${summary.transferBytes} bytes)`
  ];
}

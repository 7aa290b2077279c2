import { constants } from "fs";
import fs from "fs/promises";
import path from "path";
import { isErrnoException } from "./errors";

export async function ensureDir(target: string): Promise<void> {
  await fs.mkdir(target, { recursive: true });
}

export async function fileExists(target: string): Promise<boolean> {
  try {
    await fs.lstat(target);
    return true;
  } catch (error) {
    if (isErrnoException(error) && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      return false;
    }
    throw error;
  }
}

export async function directoryExists(target: string): Promise<boolean> {
  try {
    const stat = await fs.stat(target);
    return stat.isDirectory();
  } catch (error) {
    if (isErrnoException(error) && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      return false;
    }
    throw error;
  }
}

export async function isWritable(target: string): Promise<boolean> {
  try {
    await fs.access(target, constants.W_OK);
    return true;
  } catch (error) {
    if (isErrnoException(error)) {
      return false;
    }
    throw error;
  }
}

/** Walks up from `target` until an entry exists; the filesystem root always does. */
export async function nearestExistingAncestor(target: string): Promise<string> {
  let current = path.resolve(target);
  while (!(await fileExists(current))) {
    const parent = path.dirname(current);
    if (parent === current) {
      return current;
    }
    current = parent;
  }
  return current;
}

export async function listEntries(target: string): Promise<string[]> {
  try {
    return await fs.readdir(target);
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return [];
    }
    throw error;
  }
}

/** Removes every entry inside `target`, hidden ones included, and keeps `target` itself. */
export async function clearDirectory(target: string): Promise<void> {
  const entries = await listEntries(target);
  for (const entry of entries) {
    await fs.rm(path.join(target, entry), { recursive: true, force: true });
  }
}

/**
 * Copies `source` to `target` keeping permission bits, timestamps and symlinks.
 * Sockets, FIFOs and device nodes are skipped.
 */
export async function copyTree(source: string, target: string): Promise<void> {
  const stat = await fs.lstat(source);
  if (stat.isSymbolicLink()) {
    await fs.symlink(await fs.readlink(source), target);
    return;
  }
  if (stat.isDirectory()) {
    await ensureDir(target);
    await copyDirectoryContents(source, target);
    await fs.chmod(target, stat.mode & 0o7777);
    await fs.utimes(target, stat.atime, stat.mtime);
    return;
  }
  if (!stat.isFile()) {
    return;
  }
  await fs.copyFile(source, target);
  await fs.chmod(target, stat.mode & 0o7777);
  await fs.utimes(target, stat.atime, stat.mtime);
}

export async function copyDirectoryContents(source: string, target: string): Promise<void> {
  const entries = await fs.readdir(source);
  for (const entry of entries) {
    await copyTree(path.join(source, entry), path.join(target, entry));
  }
}

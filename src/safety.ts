import path from "path";
import { SafeMirrorError } from "./errors";
import { isFilesystemRoot, isPathInside } from "./paths";
import type { Prompter } from "./prompt";

export const SENSITIVE_DIRECTORIES: readonly string[] = [
  "/etc",
  "/home",
  "/var",
  "/bin",
  "/usr",
  "/lib",
  "/opt",
  "/tmp",
  "/srv",
  "/dev",
  "/mnt",
  "/media",
  "/proc",
  "/run",
  "/sys"
];

const SENSITIVE_CONFIRMATIONS = ["Do you want to continue?", "Are you absolutely sure?"];

export function isSensitiveDestination(destination: string): boolean {
  const trimmed = destination.length > 1 ? destination.replace(/\/+$/, "") : destination;
  return SENSITIVE_DIRECTORIES.includes(trimmed);
}

/**
 * Applies the non-interactive rules in order and returns the first violation.
 * Both paths must already be canonical.
 */
export function findPathViolation(source: string, destination: string): SafeMirrorError | null {
  if (path.resolve(source) === path.resolve(destination)) {
    return new SafeMirrorError("Source and destination are the same. Aborting...", "SamePath");
  }
  if (isFilesystemRoot(destination)) {
    return new SafeMirrorError(
      `Destination path is '${destination}'. Aborting...`,
      "RootDestination"
    );
  }
  if (isPathInside(source, destination) || isPathInside(destination, source)) {
    return new SafeMirrorError("Source and destination are nested. Aborting.", "NestedPaths");
  }
  return null;
}

export async function validatePair(
  source: string,
  destination: string,
  prompter: Prompter,
  print: (line: string) => void
): Promise<void> {
  const violation = findPathViolation(source, destination);
  if (violation) {
    throw violation;
  }
  if (!isSensitiveDestination(destination)) {
    return;
  }

  print(`Destination is a sensitive directory: ${destination}`);
  for (const question of SENSITIVE_CONFIRMATIONS) {
    const answer = await prompter.confirm(question, "no");
    if (answer === "cancelled") {
      throw new SafeMirrorError("Exiting...", "Cancelled");
    }
    if (answer === "no") {
      throw new SafeMirrorError("Aborted...", "SensitiveAreaDeclined");
    }
  }
}

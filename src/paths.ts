import type { Stats } from "fs";
import fs from "fs/promises";
import os from "os";
import path from "path";
import { isErrnoException, SafeMirrorError } from "./errors";
import { nearestExistingAncestor } from "./filesystem";
import type { PrivilegeBroker } from "./privilege";
import type { Prompter } from "./prompt";

export function expandHome(inputPath: string): string {
  if (inputPath === "~") {
    return os.homedir();
  }
  if (inputPath.startsWith("~/")) {
    return path.join(os.homedir(), inputPath.slice(2));
  }
  return inputPath;
}

export function expandEnv(inputPath: string, env: NodeJS.ProcessEnv): string {
  const resolved = inputPath.replace(
    /\$\{([A-Z0-9_]+)(:-([^}]*))?\}/gi,
    (
      _match: string,
      varName: string,
      _fallbackGroup: string | undefined,
      fallback: string | undefined
    ): string => {
      const value = env[varName];
      if (value && value.length > 0) {
        return value;
      }
      if (fallback !== undefined) {
        return fallback;
      }
      return "";
    }
  );
  return resolved;
}

export function resolvePath(inputPath: string, env: NodeJS.ProcessEnv): string {
  const expanded = expandHome(expandEnv(inputPath, env));
  return path.resolve(expanded);
}

export function isFilesystemRoot(target: string): boolean {
  return path.parse(target).root === target;
}

/** True when `child` lies strictly below `parent`, compared segment by segment. */
export function isPathInside(child: string, parent: string): boolean {
  const relative = path.relative(parent, child);
  if (relative.length === 0 || path.isAbsolute(relative)) {
    return false;
  }
  return relative !== ".." && !relative.startsWith(`..${path.sep}`);
}

/**
 * Canonicalizes a path that may not exist yet: the deepest existing ancestor
 * goes through realpath and the missing tail is appended unchanged.
 */
export async function canonicalizeIntended(target: string): Promise<string> {
  const ancestor = await nearestExistingAncestor(target);
  const canonicalAncestor = await fs.realpath(ancestor);
  return path.join(canonicalAncestor, path.relative(ancestor, target));
}

async function statOrNull(target: string): Promise<Stats | null> {
  try {
    return await fs.stat(target);
  } catch (error) {
    if (isErrnoException(error) && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      return null;
    }
    throw error;
  }
}

export interface ResolveDirectoryOptions {
  /** Offer to create the directory when it is missing. */
  create: boolean;
  dryRun: boolean;
  prompter: Prompter;
  broker: PrivilegeBroker;
  print: (line: string) => void;
  env?: NodeJS.ProcessEnv;
  /** Checks the canonical intended path of a missing directory before it is created. */
  validateIntended?: (intended: string) => void;
}

export async function resolveDirectory(
  input: string,
  options: ResolveDirectoryOptions
): Promise<string> {
  const trimmed = input.trim();
  if (trimmed.length === 0) {
    throw new SafeMirrorError("Directory path is empty", "PathNotFound");
  }
  const absolute = resolvePath(trimmed, options.env ?? process.env);

  const stat = await statOrNull(absolute);
  if (stat) {
    if (!stat.isDirectory()) {
      throw new SafeMirrorError(`Not a directory: ${absolute}`, "PathNotFound");
    }
    return await fs.realpath(absolute);
  }

  if (!options.create) {
    throw new SafeMirrorError(
      `This directory doesn't exist: ${absolute}`,
      "PathNotFound"
    );
  }

  const intended = await canonicalizeIntended(absolute);
  options.validateIntended?.(intended);

  if (options.dryRun) {
    options.print(`DRY-RUN: directory does not exist and will not be created: ${absolute}`);
    options.print(`Using intended path for preview: ${intended}`);
    return intended;
  }

  const answer = await options.prompter.confirm(
    `This directory doesn't exist: ${absolute}. Create it?`,
    "yes"
  );
  if (answer === "cancelled") {
    throw new SafeMirrorError("Exiting...", "Cancelled");
  }
  if (answer === "no") {
    throw new SafeMirrorError(`Directory was not created: ${absolute}`, "PathNotFound");
  }

  await options.broker.perform({ kind: "create-directory", target: absolute });
  options.print("Directory created successfully.");
  return await fs.realpath(absolute);
}

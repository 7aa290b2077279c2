import { constants } from "fs";
import fs from "fs/promises";
import path from "path";
import { isErrnoException, SafeMirrorError } from "./errors";
import { createComponentLogger } from "./logger";
import type { Prompter } from "./prompt";
import { BACKENDS, type Backend } from "./types";

const log = createComponentLogger("tools");

export const BACKEND_EXECUTABLES: Record<Backend, string> = {
  cp: "cp",
  rsync: "rsync",
  rclone: "rclone"
};

export const BACKEND_LABELS: Record<Backend, string> = {
  cp: "Standard (rm+cp)",
  rsync: "rsync",
  rclone: "rclone"
};

export interface ToolLocator {
  isPresent(tool: Backend): Promise<boolean>;
  /** Resolves to true once the tool has been installed. */
  install(tool: Backend): Promise<boolean>;
}

export async function findExecutable(
  name: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<string | null> {
  const directories = (env.PATH ?? "").split(path.delimiter).filter((entry) => entry.length > 0);
  for (const directory of directories) {
    const candidate = path.join(directory, name);
    try {
      await fs.access(candidate, constants.X_OK);
      const stat = await fs.stat(candidate);
      if (stat.isFile()) {
        return candidate;
      }
    } catch (error) {
      if (isErrnoException(error)) {
        continue;
      }
      throw error;
    }
  }
  return null;
}

export class PathToolLocator implements ToolLocator {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async isPresent(tool: Backend): Promise<boolean> {
    return (await findExecutable(BACKEND_EXECUTABLES[tool], this.env)) !== null;
  }

  async install(tool: Backend): Promise<boolean> {
    log.warn({ tool }, "automatic installation is not supported");
    return false;
  }
}

export interface EnsureBackendOptions {
  locator: ToolLocator;
  prompter: Prompter;
  dryRun: boolean;
  print: (line: string) => void;
}

export async function ensureBackend(tool: Backend, options: EnsureBackendOptions): Promise<void> {
  const { locator, prompter, dryRun, print } = options;
  if (await locator.isPresent(tool)) {
    print(`Selected: ${BACKEND_LABELS[tool]}`);
    return;
  }
  if (dryRun) {
    print(`DRY-RUN: would install ${tool}.`);
    print(`Selected: ${BACKEND_LABELS[tool]}`);
    return;
  }

  const answer = await prompter.confirm(`${tool} is not installed. Install it now?`, "yes");
  if (answer === "cancelled") {
    throw new SafeMirrorError("Exiting...", "Cancelled");
  }
  if (answer === "yes" && (await locator.install(tool))) {
    print(`Selected: ${BACKEND_LABELS[tool]}`);
    return;
  }
  throw new SafeMirrorError(
    `${tool} is not available. Install it or choose another tool.`,
    "BackendUnavailable"
  );
}

export interface SelectBackendOptions extends EnsureBackendOptions {
  /** Offer the tool menu before the first availability check. */
  pick: boolean;
}

/**
 * Settles on an available backend. A tool that turns out to be unavailable is
 * dropped from the menu and the operator is asked to pick again.
 */
export async function selectBackend(
  initial: Backend,
  options: SelectBackendOptions
): Promise<Backend> {
  const remaining: Backend[] = [...BACKENDS];
  let tool = initial;
  let pick = options.pick;

  for (;;) {
    if (pick) {
      const choices = remaining.map((value) => ({ value, label: BACKEND_LABELS[value] }));
      const answer = await options.prompter.choose(
        "Choose copy tool:",
        choices,
        remaining.includes(tool) ? tool : null
      );
      if (answer === "cancelled") {
        throw new SafeMirrorError("Exiting...", "Cancelled");
      }
      if (answer === null) {
        throw new SafeMirrorError(
          `${tool} is not available. Install it or choose another tool.`,
          "BackendUnavailable"
        );
      }
      tool = answer;
    }

    try {
      await ensureBackend(tool, options);
      return tool;
    } catch (error) {
      if (!(error instanceof SafeMirrorError) || error.kind !== "BackendUnavailable") {
        throw error;
      }
      remaining.splice(remaining.indexOf(tool), 1);
      if (remaining.length === 0) {
        throw error;
      }
      options.print(error.message);
      pick = true;
    }
  }
}

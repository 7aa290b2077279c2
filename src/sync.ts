import { SafeMirrorError, formatError } from "./errors";
import { createBackup, describeBackup } from "./backup";
import type { CommandRunner } from "./command";
import { SyncExecutor, throwIfCancelled } from "./executor";
import { appendRunRecord, createComponentLogger, type RunRecord, type RunStatus } from "./logger";
import { resolveDirectory, type ResolveDirectoryOptions } from "./paths";
import { computeDelta, formatPreview, previewTitle, summarizeDelta } from "./preview";
import { PrivilegeBroker } from "./privilege";
import { DefaultsPrompter, type Prompter } from "./prompt";
import { findPathViolation, validatePair } from "./safety";
import { selectBackend, type ToolLocator } from "./tools";
import type {
  BackupRecord,
  EffectiveConfig,
  PreviewSummary,
  PrivilegeContext,
  SyncRequest
} from "./types";

const log = createComponentLogger("sync");

export interface SyncDependencies {
  prompter: Prompter;
  runner: CommandRunner;
  locator: ToolLocator;
  privilege: PrivilegeContext;
  print: (line: string) => void;
  signal?: AbortSignal;
  env?: NodeJS.ProcessEnv;
}

export interface SyncOutcome {
  status: "done" | "dry-run" | "aborted";
  request: SyncRequest;
  summary: PreviewSummary | null;
  backup: BackupRecord | null;
}

function statusForError(error: unknown): RunStatus {
  if (error instanceof SafeMirrorError) {
    if (error.kind === "Interrupted") {
      return "interrupted";
    }
    if (error.kind === "Cancelled") {
      return "aborted";
    }
  }
  return "failed";
}

/**
 * Runs one source/destination pair through resolution, safety checks, preview,
 * backup and the backend. Appends a run record when a log path is configured.
 */
export async function runSync(config: EffectiveConfig, deps: SyncDependencies): Promise<SyncOutcome> {
  const record: RunRecord = {
    tool: config.tool,
    mode: config.mode,
    source: null,
    destination: null,
    sourceFiles: null,
    transferFiles: null,
    transferBytes: null,
    backup: null,
    status: "failed"
  };

  try {
    const outcome = await performSync(config, deps, record);
    record.status = outcome.status;
    return outcome;
  } catch (error) {
    record.status = statusForError(error);
    record.error = formatError(error);
    throw error;
  } finally {
    if (config.logPath) {
      try {
        appendRunRecord(config.logPath, record);
      } catch (error) {
        log.warn({ err: error, logPath: config.logPath }, "could not append run record");
      }
    }
  }
}

async function chooseDirectory(
  label: string,
  configured: string | null,
  options: ResolveDirectoryOptions
): Promise<string> {
  if (configured) {
    return await resolveDirectory(configured, options);
  }
  for (;;) {
    const answer = await options.prompter.ask(`Enter ${label}`);
    if (answer === null) {
      throw new SafeMirrorError(`No ${label} given`, "Usage");
    }
    try {
      return await resolveDirectory(answer, options);
    } catch (error) {
      if (error instanceof SafeMirrorError && error.kind === "PathNotFound") {
        options.print(`${error.message}. Input a correct path.`);
        continue;
      }
      throw error;
    }
  }
}

async function runPreview(
  request: SyncRequest,
  config: EffectiveConfig,
  prompter: Prompter,
  print: (line: string) => void
): Promise<PreviewSummary | null> {
  if (!config.dryRun) {
    if (config.skipSet.has("preview")) {
      return null;
    }
    const answer = await prompter.confirm("Preview copy plan first?", "yes");
    if (answer === "cancelled") {
      throw new SafeMirrorError("Exiting...", "Cancelled");
    }
    if (answer === "no") {
      return null;
    }
  }

  const delta = await computeDelta(request);
  const summary = summarizeDelta(delta, previewTitle(request));
  formatPreview(summary).forEach((line) => print(line));

  if (summary.transferCount > 0) {
    const answer = await prompter.confirm("Show list of files to transfer?", "no");
    if (answer === "cancelled") {
      throw new SafeMirrorError("Exiting...", "Cancelled");
    }
    if (answer === "yes") {
      delta.transferFiles.forEach((file) => print(file.relativePath));
    }
  }
  return summary;
}

async function performSync(
  config: EffectiveConfig,
  deps: SyncDependencies,
  record: RunRecord
): Promise<SyncOutcome> {
  const { runner, locator, print, signal } = deps;
  const prompter = config.skipSet.has("confirm") ? new DefaultsPrompter() : deps.prompter;
  const broker = new PrivilegeBroker(deps.privilege, runner);

  if (config.skipSet.has("safety")) {
    print("Note: safety checks cannot be skipped; ignoring skip=safety.");
  }

  throwIfCancelled(signal);
  const baseOptions = { dryRun: config.dryRun, prompter, broker, print, env: deps.env };
  const sourcePath = await chooseDirectory("source directory", config.src, {
    ...baseOptions,
    create: false
  });
  const destinationPath = await chooseDirectory("destination directory", config.dst, {
    ...baseOptions,
    create: true,
    validateIntended: (intended) => {
      const violation = findPathViolation(sourcePath, intended);
      if (violation) {
        throw violation;
      }
    }
  });
  record.source = sourcePath;
  record.destination = destinationPath;
  print("");

  await validatePair(sourcePath, destinationPath, prompter, print);
  throwIfCancelled(signal);
  const tool = await selectBackend(config.tool, {
    locator,
    prompter,
    dryRun: config.dryRun,
    print,
    pick: !config.toolConfigured
  });
  record.tool = tool;

  const request: SyncRequest = {
    sourcePath,
    destinationPath,
    mode: config.mode,
    backend: tool,
    options: { extraArgs: config.extraArgs[tool] }
  };
  const executor = new SyncExecutor(request, { runner, broker, print });

  executor.checkpoint(signal);
  const summary = await runPreview(request, config, prompter, print);
  if (summary) {
    record.sourceFiles = summary.sourceCount;
    record.transferFiles = summary.transferCount;
    record.transferBytes = summary.transferBytes;
  }

  if (config.dryRun) {
    print("DRY-RUN: no changes made.");
    return { status: "dry-run", request, summary, backup: null };
  }

  const proceed = await prompter.confirm("Proceed with copy?", "yes");
  if (proceed !== "yes") {
    executor.abort();
    print("Aborted before copy.");
    return { status: "aborted", request, summary, backup: null };
  }
  executor.markPreviewed();

  executor.checkpoint(signal);
  let backup: BackupRecord | null = null;
  if (config.skipSet.has("backup")) {
    print("Skipping backup of the destination (skip=backup).");
  } else {
    backup = await createBackup(destinationPath, { tempRoot: config.backupRoot });
    print(
      backup
        ? `Backed up ${destinationPath} to ${backup.backupPath}`
        : "Destination does not exist; nothing to back up."
    );
  }
  record.backup = backup?.backupPath ?? null;
  executor.markBackedUp(backup);

  executor.checkpoint(signal);
  await executor.execute(signal);

  print(`The task was completed successfully. Previous data backed up to: ${describeBackup(backup)}`);
  return { status: "done", request, summary, backup };
}

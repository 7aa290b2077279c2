import { BackendExecutionError, formatError, isErrnoException, SafeMirrorError } from "./errors";
import { planBackend, type BackendPlan } from "./backends";
import { describeBackup } from "./backup";
import { formatCommand, type CommandRunner } from "./command";
import { createComponentLogger } from "./logger";
import type { PrivilegeBroker } from "./privilege";
import type { BackupRecord, SyncRequest } from "./types";

const log = createComponentLogger("executor");

export type ExecutorState =
  | "validated"
  | "previewed"
  | "backed-up"
  | "executing"
  | "done"
  | "failed"
  | "aborted";

const TRANSITIONS: Record<ExecutorState, readonly ExecutorState[]> = {
  validated: ["previewed", "aborted"],
  previewed: ["backed-up", "aborted"],
  "backed-up": ["executing", "aborted"],
  executing: ["done", "failed", "aborted"],
  done: [],
  failed: [],
  aborted: []
};

export interface ExecutorDependencies {
  runner: CommandRunner;
  broker: PrivilegeBroker;
  print?: (line: string) => void;
}

export function interruptedError(backup: BackupRecord | null): SafeMirrorError {
  const suffix = backup ? ` Previous data backed up to: ${backup.backupPath}` : "";
  return new SafeMirrorError(`Aborted by user.${suffix}`, "Interrupted");
}

export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw interruptedError(null);
  }
}

/** Carries one validated request through preview, backup and the backend run. */
export class SyncExecutor {
  private current: ExecutorState = "validated";
  private backup: BackupRecord | null = null;

  constructor(
    readonly request: SyncRequest,
    private readonly deps: ExecutorDependencies
  ) {}

  get state(): ExecutorState {
    return this.current;
  }

  get backupRecord(): BackupRecord | null {
    return this.backup;
  }

  plan(): BackendPlan {
    return planBackend(this.request);
  }

  markPreviewed(): void {
    this.transition("previewed");
  }

  markBackedUp(backup: BackupRecord | null): void {
    this.backup = backup;
    this.transition("backed-up");
  }

  abort(): void {
    if (TRANSITIONS[this.current].includes("aborted")) {
      this.transition("aborted");
    }
  }

  /** Moves to aborted and throws when cancellation was requested. */
  checkpoint(signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
      this.abort();
      throw interruptedError(this.backup);
    }
  }

  async execute(signal?: AbortSignal): Promise<void> {
    this.transition("executing");
    const plan = this.plan();

    try {
      this.checkpoint(signal);
      if (plan.clearDestination) {
        const how = await this.deps.broker.perform(
          { kind: "clear-directory", target: this.request.destinationPath },
          signal
        );
        log.debug({ destination: this.request.destinationPath, how }, "destination cleared");
      }
      this.checkpoint(signal);

      this.deps.print?.(`Running: ${formatCommand(plan.command)}`);
      const result = await this.deps.runner.run(plan.command, { signal });
      this.checkpoint(signal);
      if (result.status !== 0) {
        const status = result.status ?? result.signal ?? "unknown status";
        throw new BackendExecutionError(
          `${plan.command.command} exited with ${status}`,
          result.status,
          this.backup?.backupPath ?? null
        );
      }
    } catch (error) {
      throw this.fail(error, plan, signal);
    }

    this.transition("done");
    log.info({ backend: this.request.backend, backup: describeBackup(this.backup) }, "sync done");
  }

  private fail(error: unknown, plan: BackendPlan, signal: AbortSignal | undefined): SafeMirrorError {
    if (this.current === "aborted") {
      return error instanceof SafeMirrorError ? error : interruptedError(this.backup);
    }
    if (signal?.aborted) {
      this.transition("aborted");
      return interruptedError(this.backup);
    }

    this.transition("failed");
    if (error instanceof SafeMirrorError) {
      return error;
    }
    if (isErrnoException(error) && error.code === "ENOENT" && error.syscall?.startsWith("spawn")) {
      return new SafeMirrorError(
        `${plan.command.command} was not found on PATH`,
        "BackendUnavailable"
      );
    }
    return new BackendExecutionError(
      `${plan.command.command} failed: ${formatError(error)}`,
      null,
      this.backup?.backupPath ?? null
    );
  }

  private transition(next: ExecutorState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Invalid executor transition: ${this.current} -> ${next}`);
    }
    log.debug({ from: this.current, to: next }, "executor transition");
    this.current = next;
  }
}

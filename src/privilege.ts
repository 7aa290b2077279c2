import { SafeMirrorError } from "./errors";
import {
  clearDirectory,
  ensureDir,
  isWritable,
  nearestExistingAncestor
} from "./filesystem";
import { ArgumentListBuilder, type CommandRunner, type CommandSpec } from "./command";
import { createComponentLogger } from "./logger";
import { findExecutable } from "./tools";
import type { PrivilegeContext } from "./types";

const log = createComponentLogger("privilege");

const ELEVATION_COMMANDS = ["sudo", "doas"] as const;

export type PrivilegedAction =
  | { kind: "create-directory"; target: string }
  | { kind: "clear-directory"; target: string };

export interface DetectPrivilegeOptions {
  noSudo: boolean;
  env?: NodeJS.ProcessEnv;
  /** Effective uid; read from the process when omitted. */
  uid?: number | null;
}

export async function detectPrivilege(options: DetectPrivilegeOptions): Promise<PrivilegeContext> {
  const uid = options.uid !== undefined ? options.uid : (process.geteuid?.() ?? null);
  const hasRoot = uid === 0;

  let elevationCommand: PrivilegeContext["elevationCommand"] = null;
  if (!hasRoot) {
    for (const candidate of ELEVATION_COMMANDS) {
      if (await findExecutable(candidate, options.env)) {
        elevationCommand = candidate;
        break;
      }
    }
  }

  return {
    hasRoot,
    elevationCommand,
    elevationAvailable: hasRoot || (elevationCommand !== null && !options.noSudo)
  };
}

function describeAction(action: PrivilegedAction): string {
  return action.kind === "create-directory"
    ? `create '${action.target}'`
    : `clean '${action.target}'`;
}

export function buildElevatedCommand(
  elevationCommand: "sudo" | "doas",
  action: PrivilegedAction
): CommandSpec {
  if (action.kind === "create-directory") {
    return new ArgumentListBuilder(elevationCommand)
      .operand("mkdir")
      .operand("-p")
      .operand("--")
      .operand(action.target)
      .build();
  }
  return new ArgumentListBuilder(elevationCommand)
    .operand("find")
    .operand(action.target)
    .operand("-mindepth")
    .operand("1")
    .operand("-delete")
    .build();
}

/**
 * Performs directory creation and destination clearing, elevating only when the
 * current user cannot write the affected location.
 */
export class PrivilegeBroker {
  constructor(
    private readonly context: PrivilegeContext,
    private readonly runner: CommandRunner
  ) {}

  get privilege(): PrivilegeContext {
    return this.context;
  }

  async requiresElevation(action: PrivilegedAction): Promise<boolean> {
    if (this.context.hasRoot) {
      return false;
    }
    const anchor =
      action.kind === "create-directory"
        ? await nearestExistingAncestor(action.target)
        : action.target;
    return !(await isWritable(anchor));
  }

  async perform(
    action: PrivilegedAction,
    signal?: AbortSignal
  ): Promise<"direct" | "elevated"> {
    if (!(await this.requiresElevation(action))) {
      if (action.kind === "create-directory") {
        await ensureDir(action.target);
      } else {
        await clearDirectory(action.target);
      }
      return "direct";
    }

    const elevationCommand = this.context.elevationCommand;
    if (!this.context.elevationAvailable || elevationCommand === null) {
      throw new SafeMirrorError(
        `Cannot ${describeAction(action)} (no permission and no sudo/doas).`,
        "ElevationUnavailable"
      );
    }

    const spec = buildElevatedCommand(elevationCommand, action);
    log.debug({ command: spec.command, args: spec.args }, "running elevated action");
    const result = await this.runner.run(spec, { signal });
    if (result.status !== 0) {
      throw new SafeMirrorError(
        `Cannot ${describeAction(action)}: ${elevationCommand} exited with ${result.status ?? result.signal ?? "unknown status"}`,
        "ElevationUnavailable"
      );
    }
    return "elevated";
  }
}

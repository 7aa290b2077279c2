import { ArgumentListBuilder, type CommandSpec } from "./command";
import type { SyncRequest } from "./types";

export interface BackendPlan {
  /** Empty the destination (hidden entries included) before the command runs. */
  clearDestination: boolean;
  command: CommandSpec;
}

/** A clearing backend wipes the destination and rewrites every source file. */
export function isClearingBackend(request: Pick<SyncRequest, "mode" | "backend">): boolean {
  return request.mode === "mirror" && request.backend === "cp";
}

function withTrailingSlash(target: string): string {
  return target.endsWith("/") ? target : `${target}/`;
}

export function planBackend(request: SyncRequest): BackendPlan {
  const { sourcePath, destinationPath, mode, options } = request;

  switch (request.backend) {
    case "cp":
      return {
        clearDestination: isClearingBackend(request),
        command: new ArgumentListBuilder("cp")
          .flag("-a")
          .extraArgs(options.extraArgs)
          .operand(`${withTrailingSlash(sourcePath)}.`)
          .operand(withTrailingSlash(destinationPath))
          .build()
      };
    case "rsync": {
      const builder = new ArgumentListBuilder("rsync").flag("-aH");
      if (mode === "mirror") {
        builder.flag("--delete");
      }
      return {
        clearDestination: false,
        command: builder
          .flag("--info=progress2")
          .extraArgs(options.extraArgs)
          .operand(withTrailingSlash(sourcePath))
          .operand(withTrailingSlash(destinationPath))
          .build()
      };
    }
    case "rclone":
      return {
        clearDestination: false,
        command: new ArgumentListBuilder("rclone")
          .subcommand(mode === "mirror" ? "sync" : "copy")
          .flag("--progress")
          .flag("--copy-links")
          .flag("--local-no-check-updated")
          .extraArgs(options.extraArgs)
          .operand(sourcePath)
          .operand(destinationPath)
          .build()
      };
  }
}

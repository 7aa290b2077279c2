import os from "os";
import type { EffectiveConfig } from "./types";

export function createDefaultConfig(): EffectiveConfig {
  return {
    tool: "cp",
    toolConfigured: false,
    mode: "mirror",
    logPath: null,
    skipSet: new Set(),
    dryRun: false,
    noSudo: false,
    src: null,
    dst: null,
    backupRoot: os.tmpdir(),
    extraArgs: {
      cp: [],
      rsync: [],
      rclone: []
    }
  };
}

export function renderConfigTemplate(): string {
  const lines = [
    "# safe-mirror configuration (key=value, '#' starts a comment)",
    "# Command-line options override these values; 'skip' lists are merged.",
    "",
    "# Backend: cp | rsync | rclone",
    "#tool=cp",
    "",
    "# mirror removes files that only exist at the destination, copy keeps them",
    "#mode=mirror",
    "",
    "# Append one JSON line per run to this file",
    "#log=~/.local/state/safe-mirror/runs.log",
    "",
    "# Steps to skip: preview, backup, confirm",
    "#skip=",
    "",
    "#dry_run=false",
    "#no_sudo=false",
    "",
    "#src=",
    "#dst=",
    "",
    "# Where destination backups are written (defaults to the system temp directory)",
    "#backup_dir=",
    "",
    "# Extra arguments passed to each backend",
    "#cp_args=",
    "#rsync_args=--exclude .cache",
    "#rclone_args=",
    ""
  ];
  return lines.join("\n");
}

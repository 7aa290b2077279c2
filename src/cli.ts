#!/usr/bin/env node
import { BackendExecutionError, ExitCodes, SafeMirrorError } from "./errors";
import { SpawnRunner } from "./command";
import {
  ensureConfigFile,
  formatConfig,
  getConfigPath,
  parseSkipList,
  readConfigFile,
  resolveConfig,
  splitArgs
} from "./config";
import { initConfig } from "./init";
import { resolvePath } from "./paths";
import { detectPrivilege } from "./privilege";
import { DefaultsPrompter, TerminalPrompter } from "./prompt";
import { runSync } from "./sync";
import { createDefaultConfig } from "./templates";
import { PathToolLocator } from "./tools";
import { isBackend, type ConfigOverrides, type StepName } from "./types";

const VERSION = "0.1.0";

type Command = "sync" | "preview" | "init" | "config";

const COMMANDS: readonly Command[] = ["sync", "preview", "init", "config"];

interface ParsedArgs {
  command: Command;
  configPath?: string;
  overrides: ConfigOverrides;
  help: boolean;
  version: boolean;
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const skip: StepName[] = [];
  const result: ParsedArgs = {
    command: "sync",
    overrides: {},
    help: false,
    version: false
  };
  let commandSeen = false;

  const takeValue = (flag: string, index: number): string => {
    const value = args[index + 1];
    if (value === undefined || value.startsWith("-")) {
      throw new SafeMirrorError(`Missing value for ${flag}`, "Usage");
    }
    return value;
  };

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (!commandSeen && !arg.startsWith("-")) {
      if (!isCommand(arg)) {
        throw new SafeMirrorError(`Unknown command: ${arg}`, "Usage");
      }
      result.command = arg;
      commandSeen = true;
      continue;
    }
    switch (arg) {
      case "-s":
      case "--src":
        result.overrides.src = takeValue(arg, i);
        i += 1;
        break;
      case "-d":
      case "--dst":
        result.overrides.dst = takeValue(arg, i);
        i += 1;
        break;
      case "-t":
      case "--tool": {
        const tool = takeValue(arg, i);
        if (!isBackend(tool)) {
          throw new SafeMirrorError(`Unknown tool: ${tool} (expected cp, rsync or rclone)`, "Usage");
        }
        result.overrides.tool = tool;
        i += 1;
        break;
      }
      case "--copy":
        result.overrides.mode = "copy";
        break;
      case "--mirror":
        result.overrides.mode = "mirror";
        break;
      case "--dry-run":
        result.overrides.dryRun = true;
        break;
      case "--no-sudo":
        result.overrides.noSudo = true;
        break;
      case "--skip":
        skip.push(...parseSkipList(takeValue(arg, i), "--skip"));
        i += 1;
        break;
      case "--no-backup":
        skip.push("backup");
        break;
      case "--no-confirm":
        skip.push("confirm");
        break;
      case "--log":
        result.overrides.logPath = resolvePath(takeValue(arg, i), process.env);
        i += 1;
        break;
      case "--config":
        result.configPath = takeValue(arg, i);
        i += 1;
        break;
      case "--extra-args":
        // The value itself starts with "-"; take the next word as is.
        if (args[i + 1] === undefined) {
          throw new SafeMirrorError(`Missing value for ${arg}`, "Usage");
        }
        result.overrides.extraArgs = splitArgs(args[i + 1]);
        i += 1;
        break;
      case "--version":
        result.version = true;
        break;
      case "-h":
      case "--help":
        result.help = true;
        break;
      default:
        throw new SafeMirrorError(`Unknown option: ${arg}`, "Usage");
    }
  }

  if (skip.length > 0) {
    result.overrides.skip = skip;
  }
  if (result.command === "preview") {
    result.overrides.dryRun = true;
  }
  return result;
}

function printHelp(): void {
  const lines = [
    "safe-mirror [command] [options]",
    "",
    "Commands:",
    "  sync        Preview, back up and mirror source onto destination (default)",
    "  preview     Same as sync --dry-run",
    "  init        Write a commented config file",
    "  config      Print the effective configuration",
    "",
    "Options:",
    "  -s, --src <dir>        Source directory",
    "  -d, --dst <dir>        Destination directory (offered for creation when missing)",
    "  -t, --tool <tool>      Backend: cp | rsync | rclone",
    "  --mirror               Remove files that only exist at the destination (default)",
    "  --copy                 Keep files that only exist at the destination",
    "  --dry-run              Preview only; create, modify and delete nothing",
    "  --no-sudo              Never elevate privileges",
    "  --skip <steps>         Comma-separated steps to skip: preview,backup,confirm",
    "  --no-backup            Same as --skip backup",
    "  --no-confirm           Answer every prompt with its default",
    "  --log <file>           Append a JSON record of the run to <file>",
    "  --config <file>        Read settings from <file>",
    "  --extra-args <args>    Extra arguments for the selected backend",
    "  --version              Print version",
    "  -h, --help             Show help"
  ];
  console.log(lines.join("\n"));
}

const controller = new AbortController();

async function run(): Promise<void> {
  const args = parseArgs(process.argv);
  if (args.help) {
    printHelp();
    return;
  }
  if (args.version) {
    console.log(`safe-mirror ${VERSION}`);
    return;
  }

  const configPath = args.configPath
    ? resolvePath(args.configPath, process.env)
    : getConfigPath(process.env);

  if (args.command === "init") {
    await initConfig(configPath);
    console.log(`Created ${configPath}`);
    return;
  }

  if (!args.configPath && (await ensureConfigFile(configPath))) {
    console.log(`Created default config at ${configPath}`);
  }
  const fileValues = await readConfigFile(configPath, { required: Boolean(args.configPath) });
  const config = resolveConfig(createDefaultConfig(), fileValues, args.overrides);

  if (args.command === "config") {
    console.log(formatConfig(config).join("\n"));
    return;
  }

  const onSignal = (): void => {
    controller.abort();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  const interactive = Boolean(process.stdin.isTTY && process.stdout.isTTY);
  const prompter = interactive ? new TerminalPrompter() : new DefaultsPrompter();
  if (prompter instanceof TerminalPrompter) {
    prompter.onInterrupt(onSignal);
  }

  try {
    await runSync(config, {
      prompter,
      runner: new SpawnRunner(),
      locator: new PathToolLocator(process.env),
      privilege: await detectPrivilege({ noSudo: config.noSudo, env: process.env }),
      print: (line) => console.log(line),
      signal: controller.signal,
      env: process.env
    });
  } finally {
    if (prompter instanceof TerminalPrompter) {
      prompter.close();
    }
    process.removeListener("SIGINT", onSignal);
    process.removeListener("SIGTERM", onSignal);
  }
}

run().catch((error: unknown) => {
  if (controller.signal.aborted) {
    const interrupted = error instanceof SafeMirrorError && error.kind === "Interrupted";
    console.error(interrupted ? error.message : "Aborted by user.");
    process.exit(ExitCodes.Interrupted);
  }
  if (error instanceof SafeMirrorError) {
    if (error.kind === "Cancelled") {
      console.log(error.message);
    } else {
      console.error(error.message);
    }
    if (error instanceof BackendExecutionError && error.backupPath) {
      console.error(`Previous data backed up to: ${error.backupPath}`);
    }
    process.exit(error.code);
  }
  if (error instanceof Error) {
    console.error(error.message);
  } else {
    console.error("Unexpected error");
  }
  process.exit(ExitCodes.Failure);
});

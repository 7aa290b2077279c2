import fs from "fs/promises";
import os from "os";
import path from "path";
import { parse } from "dotenv";
import { validateExtraArgs } from "./command";
import { isErrnoException, SafeMirrorError } from "./errors";
import { resolvePath } from "./paths";
import { renderConfigTemplate } from "./templates";
import {
  BACKENDS,
  isBackend,
  isStepName,
  isSyncMode,
  type Backend,
  type ConfigOverrides,
  type EffectiveConfig,
  type StepName
} from "./types";

export const CONFIG_DIR_NAME = "safe-mirror";
export const CONFIG_FILE_NAME = "config";

const KNOWN_KEYS = new Set([
  "tool",
  "mode",
  "log",
  "skip",
  "dry_run",
  "no_sudo",
  "src",
  "dst",
  "backup_dir",
  "cp_args",
  "rsync_args",
  "rclone_args"
]);

/** Values read from the config file; absent keys stay undefined. */
export interface ConfigFileValues {
  tool?: Backend;
  mode?: EffectiveConfig["mode"];
  logPath?: string;
  skip?: StepName[];
  dryRun?: boolean;
  noSudo?: boolean;
  src?: string;
  dst?: string;
  backupRoot?: string;
  extraArgs?: Partial<Record<Backend, string[]>>;
}

export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const explicit = env.SAFE_MIRROR_CONFIG;
  if (explicit && explicit.length > 0) {
    return resolvePath(explicit, env);
  }
  const configHome =
    env.XDG_CONFIG_HOME && env.XDG_CONFIG_HOME.length > 0
      ? resolvePath(env.XDG_CONFIG_HOME, env)
      : path.join(os.homedir(), ".config");
  return path.join(configHome, CONFIG_DIR_NAME, CONFIG_FILE_NAME);
}

export function parseBoolean(value: string, key: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) {
    return true;
  }
  if (["0", "false", "no", "off"].includes(normalized)) {
    return false;
  }
  throw new SafeMirrorError(`Invalid boolean for ${key}: ${value}`, "InvalidConfig");
}

export function parseSkipList(value: string, origin: string): StepName[] {
  const steps: StepName[] = [];
  for (const raw of value.split(",")) {
    const step = raw.trim().toLowerCase();
    if (step.length === 0) {
      continue;
    }
    if (!isStepName(step)) {
      throw new SafeMirrorError(`Unknown step in ${origin}: ${step}`, "InvalidConfig");
    }
    steps.push(step);
  }
  return steps;
}

/** Splits an argument string on whitespace; single and double quotes group words. */
export function splitArgs(value: string): string[] {
  const args: string[] = [];
  let current = "";
  let quote: "'" | '"' | null = null;
  let pending = false;

  for (const char of value) {
    if (quote) {
      if (char === quote) {
        quote = null;
      } else {
        current += char;
      }
      continue;
    }
    if (char === "'" || char === '"') {
      quote = char;
      pending = true;
      continue;
    }
    if (/\s/.test(char)) {
      if (pending) {
        args.push(current);
        current = "";
        pending = false;
      }
      continue;
    }
    current += char;
    pending = true;
  }

  if (quote) {
    throw new SafeMirrorError(`Unterminated quote in: ${value}`, "InvalidConfig");
  }
  if (pending) {
    args.push(current);
  }
  return args;
}

export function parseConfigText(
  raw: string,
  configPath: string,
  env: NodeJS.ProcessEnv = process.env
): ConfigFileValues {
  const entries = parse(raw);
  const values: ConfigFileValues = {};

  for (const [key, rawValue] of Object.entries(entries)) {
    if (!KNOWN_KEYS.has(key)) {
      throw new SafeMirrorError(`Unknown key in ${configPath}: ${key}`, "InvalidConfig");
    }
    const value = rawValue.trim();
    if (value.length === 0) {
      continue;
    }

    switch (key) {
      case "tool":
        if (!isBackend(value)) {
          throw new SafeMirrorError(
            `Invalid tool in ${configPath}: ${value} (expected ${BACKENDS.join(", ")})`,
            "InvalidConfig"
          );
        }
        values.tool = value;
        break;
      case "mode":
        if (!isSyncMode(value)) {
          throw new SafeMirrorError(`Invalid mode in ${configPath}: ${value}`, "InvalidConfig");
        }
        values.mode = value;
        break;
      case "log":
        values.logPath = resolvePath(value, env);
        break;
      case "skip":
        values.skip = parseSkipList(value, configPath);
        break;
      case "dry_run":
        values.dryRun = parseBoolean(value, key);
        break;
      case "no_sudo":
        values.noSudo = parseBoolean(value, key);
        break;
      case "src":
        values.src = value;
        break;
      case "dst":
        values.dst = value;
        break;
      case "backup_dir":
        values.backupRoot = resolvePath(value, env);
        break;
      default: {
        const tool = key.slice(0, -"_args".length);
        if (!isBackend(tool)) {
          throw new SafeMirrorError(`Unknown key in ${configPath}: ${key}`, "InvalidConfig");
        }
        const args = splitArgs(value);
        validateExtraArgs(args, `${key} in ${configPath}`);
        const extraArgs = values.extraArgs ?? {};
        extraArgs[tool] = args;
        values.extraArgs = extraArgs;
      }
    }
  }

  return values;
}

export async function readConfigFile(
  configPath: string,
  options: { required?: boolean; env?: NodeJS.ProcessEnv } = {}
): Promise<ConfigFileValues> {
  let raw: string;
  try {
    raw = await fs.readFile(configPath, "utf8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      if (options.required) {
        throw new SafeMirrorError(`Missing config: ${configPath}`, "InvalidConfig");
      }
      return {};
    }
    throw error;
  }
  return parseConfigText(raw, configPath, options.env);
}

export async function writeConfigFile(configPath: string, contents: string): Promise<void> {
  await fs.mkdir(path.dirname(configPath), { recursive: true, mode: 0o700 });
  await fs.writeFile(configPath, contents, { encoding: "utf8", mode: 0o600, flag: "wx" });
}

/** Creates the commented template on first run. Resolves to true when a file was written. */
export async function ensureConfigFile(configPath: string): Promise<boolean> {
  try {
    await writeConfigFile(configPath, renderConfigTemplate());
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === "EEXIST") {
      return false;
    }
    throw error;
  }
}

/**
 * Layers invocation overrides over the config file over built-in defaults.
 * Skip lists from every layer are merged rather than replaced.
 */
export function resolveConfig(
  defaults: EffectiveConfig,
  file: ConfigFileValues,
  overrides: ConfigOverrides
): EffectiveConfig {
  const tool = overrides.tool ?? file.tool ?? defaults.tool;

  const extraArgs: Record<Backend, string[]> = { ...defaults.extraArgs };
  for (const backend of BACKENDS) {
    const fromFile = file.extraArgs?.[backend];
    if (fromFile) {
      extraArgs[backend] = fromFile;
    }
  }
  if (overrides.extraArgs) {
    validateExtraArgs(overrides.extraArgs, "--extra-args");
    extraArgs[tool] = overrides.extraArgs;
  }

  return {
    tool,
    toolConfigured:
      overrides.tool !== undefined || file.tool !== undefined || defaults.toolConfigured,
    mode: overrides.mode ?? file.mode ?? defaults.mode,
    logPath: overrides.logPath ?? file.logPath ?? defaults.logPath,
    skipSet: new Set([...defaults.skipSet, ...(file.skip ?? []), ...(overrides.skip ?? [])]),
    dryRun: overrides.dryRun ?? file.dryRun ?? defaults.dryRun,
    noSudo: overrides.noSudo ?? file.noSudo ?? defaults.noSudo,
    src: overrides.src ?? file.src ?? defaults.src,
    dst: overrides.dst ?? file.dst ?? defaults.dst,
    backupRoot: overrides.backupRoot ?? file.backupRoot ?? defaults.backupRoot,
    extraArgs
  };
}

export function formatConfig(config: EffectiveConfig): string[] {
  return [
    `tool=${config.tool}`,
    `mode=${config.mode}`,
    `log=${config.logPath ?? ""}`,
    `skip=${[...config.skipSet].sort().join(",")}`,
    `dry_run=${String(config.dryRun)}`,
    `no_sudo=${String(config.noSudo)}`,
    `src=${config.src ?? ""}`,
    `dst=${config.dst ?? ""}`,
    `backup_dir=${config.backupRoot}`,
    ...BACKENDS.map((backend) => `${backend}_args=${config.extraArgs[backend].join(" ")}`)
  ];
}

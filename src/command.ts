import { spawn } from "child_process";
import { SafeMirrorError } from "./errors";

export interface CommandSpec {
  command: string;
  args: string[];
}

export interface CommandResult {
  status: number | null;
  signal: NodeJS.Signals | null;
}

export interface CommandRunner {
  run(spec: CommandSpec, options?: { signal?: AbortSignal }): Promise<CommandResult>;
}

export type CommandOption =
  | { kind: "flag"; name: string }
  | { kind: "value"; name: string; value: string };

const OPTION_NAME = /^-{1,2}[A-Za-z0-9][A-Za-z0-9-]*(=[^\s]+)?$/;

export function validateExtraArgs(args: readonly string[], label: string): void {
  if (args.length === 0) {
    return;
  }
  if (!args[0].startsWith("-")) {
    throw new SafeMirrorError(
      `${label}: expected an option first, got "${args[0]}"`,
      "InvalidConfig"
    );
  }
  for (const arg of args) {
    if (arg === "--") {
      throw new SafeMirrorError(`${label}: "--" is not allowed`, "InvalidConfig");
    }
    if (arg.includes("\0")) {
      throw new SafeMirrorError(`${label}: arguments must not contain NUL bytes`, "InvalidConfig");
    }
  }
}

/**
 * Collects typed options and operands for one external command.
 * Operands always follow a `--` separator so they can never be read as options.
 */
export class ArgumentListBuilder {
  private subcommandName: string | null = null;
  private readonly options: CommandOption[] = [];
  private readonly extra: string[] = [];
  private readonly operands: string[] = [];

  constructor(private readonly command: string) {}

  subcommand(name: string): this {
    this.subcommandName = name;
    return this;
  }

  flag(name: string): this {
    this.options.push({ kind: "flag", name });
    return this;
  }

  option(name: string, value: string): this {
    this.options.push({ kind: "value", name, value });
    return this;
  }

  extraArgs(args: readonly string[]): this {
    this.extra.push(...args);
    return this;
  }

  operand(value: string): this {
    this.operands.push(value);
    return this;
  }

  build(): CommandSpec {
    const args: string[] = [];
    if (this.subcommandName) {
      args.push(this.subcommandName);
    }
    for (const option of this.options) {
      if (!OPTION_NAME.test(option.name)) {
        throw new SafeMirrorError(`Invalid option for ${this.command}: ${option.name}`, "Usage");
      }
      args.push(option.name);
      if (option.kind === "value") {
        args.push(option.value);
      }
    }
    validateExtraArgs(this.extra, `${this.command} extra arguments`);
    args.push(...this.extra);
    if (this.operands.length > 0) {
      for (const operand of this.operands) {
        if (operand.length === 0 || operand.includes("\0")) {
          throw new SafeMirrorError(`Invalid operand for ${this.command}`, "Usage");
        }
      }
      args.push("--", ...this.operands);
    }
    return { command: this.command, args };
  }
}

export function formatCommand(spec: CommandSpec): string {
  const quote = (value: string): string =>
    /^[\w@%+=:,./-]+$/.test(value) ? value : `'${value.replace(/'/g, "'\\''")}'`;
  return [spec.command, ...spec.args].map(quote).join(" ");
}

/** Runs commands without a shell, with the terminal attached so tool output and prompts pass through. */
export class SpawnRunner implements CommandRunner {
  async run(spec: CommandSpec, options: { signal?: AbortSignal } = {}): Promise<CommandResult> {
    return await new Promise<CommandResult>((resolve, reject) => {
      const child = spawn(spec.command, spec.args, {
        stdio: "inherit",
        signal: options.signal
      });
      child.once("error", (error) => {
        reject(error);
      });
      child.once("close", (status, signal) => {
        resolve({ status, signal });
      });
    });
  }
}

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { CommandResult, CommandRunner, CommandSpec } from "../src/command";
import { clearDirectory, copyDirectoryContents } from "../src/filesystem";
import type { Choice, Confirmation, DefaultAnswer, Prompter } from "../src/prompt";
import type { ToolLocator } from "../src/tools";
import type { Backend, PrivilegeContext } from "../src/types";

export const isRoot = process.geteuid?.() === 0;

export const UNPRIVILEGED: PrivilegeContext = {
  hasRoot: false,
  elevationCommand: null,
  elevationAvailable: false
};

export async function createTempDir(): Promise<string> {
  const temp = await fs.mkdtemp(path.join(os.tmpdir(), "safe-mirror-"));
  return await fs.realpath(temp);
}

export async function withTempDir<T>(fn: (root: string) => Promise<T>): Promise<T> {
  const root = await createTempDir();
  try {
    return await fn(root);
  } finally {
    await fs.rm(root, { recursive: true, force: true });
  }
}

export async function writeFile(
  filePath: string,
  contents: string | Buffer,
  mtime?: Date
): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, contents);
  if (mtime) {
    await fs.utimes(filePath, mtime, mtime);
  }
}

/** Replays queued answers; an empty queue answers with the question's default. */
export class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];
  private readonly answers: Array<string | null>;

  constructor(answers: readonly (string | null)[] = []) {
    this.answers = [...answers];
  }

  async confirm(message: string, defaultAnswer: DefaultAnswer): Promise<Confirmation> {
    this.questions.push(message);
    const next = this.answers.shift();
    if (next === undefined) {
      return defaultAnswer;
    }
    if (next === "yes" || next === "no" || next === "cancelled") {
      return next;
    }
    throw new Error(`Unexpected scripted answer for "${message}": ${String(next)}`);
  }

  async ask(message: string): Promise<string | null> {
    this.questions.push(message);
    const next = this.answers.shift();
    return next === undefined ? null : next;
  }

  async choose<T extends string>(
    message: string,
    choices: readonly Choice<T>[],
    defaultValue: T | null
  ): Promise<T | "cancelled" | null> {
    this.questions.push(message);
    const next = this.answers.shift();
    if (next === undefined) {
      return defaultValue;
    }
    if (next === "cancelled") {
      return next;
    }
    const picked = choices.find((choice) => choice.value === next);
    if (!picked) {
      throw new Error(`Unexpected scripted choice for "${message}": ${String(next)}`);
    }
    return picked.value;
  }
}

export class FakeRunner implements CommandRunner {
  readonly calls: CommandSpec[] = [];

  constructor(
    private readonly handler: (spec: CommandSpec) => Promise<CommandResult> | CommandResult = () => ({
      status: 0,
      signal: null
    })
  ) {}

  async run(spec: CommandSpec): Promise<CommandResult> {
    this.calls.push(spec);
    return await this.handler(spec);
  }
}

export function operandsOf(spec: CommandSpec): string[] {
  const separator = spec.args.indexOf("--");
  return separator === -1 ? [] : spec.args.slice(separator + 1);
}

/** Emulates a mirroring backend in process: the destination ends up equal to the source. */
export async function mirrorInProcess(spec: CommandSpec): Promise<CommandResult> {
  const [source, destination] = operandsOf(spec);
  const sourceRoot = source.endsWith("/.") ? source.slice(0, -2) : source;
  if (spec.command !== "cp") {
    await clearDirectory(destination);
  }
  await copyDirectoryContents(sourceRoot, destination);
  return { status: 0, signal: null };
}

export class FakeLocator implements ToolLocator {
  readonly installed: Backend[] = [];

  constructor(
    private readonly present: Set<Backend>,
    private readonly installable = false
  ) {}

  async isPresent(tool: Backend): Promise<boolean> {
    return this.present.has(tool);
  }

  async install(tool: Backend): Promise<boolean> {
    if (!this.installable) {
      return false;
    }
    this.installed.push(tool);
    this.present.add(tool);
    return true;
  }
}

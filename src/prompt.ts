import { createInterface, type Interface } from "readline/promises";

export type Confirmation = "yes" | "no" | "cancelled";

export type DefaultAnswer = "yes" | "no";

export interface Choice<T extends string> {
  value: T;
  label: string;
}

export interface Prompter {
  confirm(message: string, defaultAnswer: DefaultAnswer): Promise<Confirmation>;
  /** Resolves to null when input is exhausted or the operator quits. */
  ask(message: string): Promise<string | null>;
  /**
   * Picks one of `choices`. Resolves to "cancelled" when the operator quits and
   * to null when no answer is available and there is no default.
   */
  choose<T extends string>(
    message: string,
    choices: readonly Choice<T>[],
    defaultValue: T | null
  ): Promise<T | "cancelled" | null>;
}

export function interpretAnswer(raw: string, defaultAnswer: DefaultAnswer): Confirmation | null {
  const answer = raw.trim().toLowerCase();
  if (answer.length === 0) {
    return defaultAnswer;
  }
  if (answer === "y" || answer === "yes") {
    return "yes";
  }
  if (answer === "n" || answer === "no") {
    return "no";
  }
  if (answer === "q" || answer === "quit" || answer === "exit") {
    return "cancelled";
  }
  return null;
}

/** Accepts a 1-based number or a choice's value; null means the input matched nothing. */
export function interpretChoice<T extends string>(
  raw: string,
  choices: readonly Choice<T>[],
  defaultValue: T | null
): T | "cancelled" | null {
  const answer = raw.trim().toLowerCase();
  if (answer.length === 0) {
    return defaultValue;
  }
  if (answer === "q" || answer === "quit" || answer === "exit") {
    return "cancelled";
  }
  if (/^[0-9]+$/.test(answer)) {
    const index = Number(answer) - 1;
    return index >= 0 && index < choices.length ? choices[index].value : null;
  }
  return choices.find((choice) => choice.value.toLowerCase() === answer)?.value ?? null;
}

export function formatMenu<T extends string>(
  message: string,
  choices: readonly Choice<T>[],
  defaultValue: T | null
): string[] {
  const lines = [message, ...choices.map((choice, index) => `  ${index + 1}) ${choice.label}`)];
  const position = choices.findIndex((choice) => choice.value === defaultValue);
  const range = `[1-${choices.length}]`;
  lines.push(position === -1 ? `Select ${range}: ` : `Select ${range} (default ${position + 1}): `);
  return lines;
}

export function formatQuestion(message: string, defaultAnswer: DefaultAnswer): string {
  const hint = defaultAnswer === "yes" ? "(Y/n)" : "(y/N)";
  return `${message} ${hint}: `;
}

/** Answers every confirmation with its default; used for --no-confirm and non-TTY input. */
export class DefaultsPrompter implements Prompter {
  async confirm(_message: string, defaultAnswer: DefaultAnswer): Promise<Confirmation> {
    return defaultAnswer;
  }

  async ask(_message: string): Promise<string | null> {
    return null;
  }

  async choose<T extends string>(
    _message: string,
    _choices: readonly Choice<T>[],
    defaultValue: T | null
  ): Promise<T | "cancelled" | null> {
    return defaultValue;
  }
}

export class TerminalPrompter implements Prompter {
  private readline: Interface | null = null;
  private closed: Promise<null> | null = null;
  private ended = false;
  private interruptHandler: (() => void) | null = null;

  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {}

  async confirm(message: string, defaultAnswer: DefaultAnswer): Promise<Confirmation> {
    for (;;) {
      const raw = await this.question(formatQuestion(message, defaultAnswer));
      if (raw === null) {
        return "cancelled";
      }
      const answer = interpretAnswer(raw, defaultAnswer);
      if (answer) {
        return answer;
      }
      this.output.write("Choose Y or N\n");
    }
  }

  async ask(message: string): Promise<string | null> {
    const raw = await this.question(`${message}: `);
    if (raw === null) {
      return null;
    }
    const answer = raw.trim();
    return /^(q|quit|exit)$/i.test(answer) ? null : answer;
  }

  async choose<T extends string>(
    message: string,
    choices: readonly Choice<T>[],
    defaultValue: T | null
  ): Promise<T | "cancelled" | null> {
    const lines = formatMenu(message, choices, defaultValue);
    const prompt = lines.pop() ?? "";
    this.output.write(`${lines.join("\n")}\n`);
    for (;;) {
      const raw = await this.question(prompt);
      if (raw === null) {
        return "cancelled";
      }
      const answer = interpretChoice(raw, choices, defaultValue);
      if (answer !== null) {
        return answer;
      }
      this.output.write(`Choose a number from 1 to ${choices.length}\n`);
    }
  }

  /** Ctrl+C inside a prompt closes input and notifies `handler`. */
  onInterrupt(handler: () => void): void {
    this.interruptHandler = handler;
  }

  close(): void {
    this.readline?.close();
    this.readline = null;
    this.closed = null;
  }

  private async question(text: string): Promise<string | null> {
    if (this.ended) {
      return null;
    }
    if (!this.readline || !this.closed) {
      const readline = createInterface({ input: this.input, output: this.output });
      this.closed = new Promise<null>((resolve) => {
        readline.once("close", () => {
          this.ended = true;
          resolve(null);
        });
      });
      readline.on("SIGINT", () => {
        readline.close();
        this.interruptHandler?.();
      });
      this.readline = readline;
    }
    return await Promise.race([this.readline.question(text), this.closed]);
  }
}

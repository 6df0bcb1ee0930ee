import readline from "node:readline/promises";
import { CancelledError } from "../core/errors";
import type { ExistingFile } from "../download";
import { parseConflictChoice, parsePeriodSelection } from "../selection";
import type { ConflictChoice } from "../selection";
import type { Period } from "../types";

export type AskFn = (question: string) => Promise<string>;
export type PrintFn = (line: string) => void;

export interface Prompter {
  selectPeriods(periods: Period[]): Promise<Period[]>;
  chooseConflict(existing: ExistingFile): Promise<ConflictChoice>;
}

const RULE = "=".repeat(60);

export function formatPeriodList(periods: Period[]): string[] {
  return periods.map((period, index) => `${String(index + 1).padStart(3, " ")}. ${period.label}`);
}

function formatMegabytes(bytes: number): string {
  return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
}

/** Builds the interactive flows on top of a line-oriented question function. */
export function createPrompter(ask: AskFn, print: PrintFn): Prompter {
  return {
    async selectPeriods(periods: Period[]): Promise<Period[]> {
      print(RULE);
      print("Available periods:");
      print(RULE);
      formatPeriodList(periods).forEach((line) => print(line));
      print(RULE);

      for (;;) {
        const answer = await ask(
          [
            "Choose:",
            '  - "all" or "a" for every period',
            '  - "last N" or "l N" for the N most recent (e.g. "last 3")',
            '  - comma-separated numbers for specific periods (e.g. "1,3,5")',
            "Selection: ",
          ].join("\n"),
        );
        const result = parsePeriodSelection(answer, periods.length);
        if (result.ok) {
          return result.indices.map((index) => periods[index]);
        }
        print(`Invalid selection: ${result.reason}. Try again.`);
      }
    },

    async chooseConflict(existing: ExistingFile): Promise<ConflictChoice> {
      for (;;) {
        const answer = await ask(
          [
            `File already exists: ${existing.targetPath} (${formatMegabytes(existing.sizeBytes)})`,
            "  [s]  skip this file",
            "  [o]  overwrite this file",
            "  [sa] skip all existing files",
            "  [oa] overwrite all existing files",
            "Choice: ",
          ].join("\n"),
        );
        const choice = parseConflictChoice(answer);
        if (choice) {
          return choice;
        }
        print("Invalid option. Use s, o, sa or oa.");
      }
    },
  };
}

export interface ConsolePrompter extends Prompter {
  close(): void;
}

export interface ConsolePrompterOptions {
  /** Pending questions reject with `CancelledError` once this aborts. */
  signal?: AbortSignal;
  /** Called for Ctrl+C; in raw mode readline consumes it and no process signal arrives. */
  onInterrupt?: () => void;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  terminal?: boolean;
}

export function createConsolePrompter(options: ConsolePrompterOptions = {}): ConsolePrompter {
  const rl = readline.createInterface({
    input: options.input ?? process.stdin,
    output: options.output ?? process.stdout,
    terminal: options.terminal,
  });
  const closed = new AbortController();
  rl.once("close", () => closed.abort());
  const { onInterrupt } = options;
  if (onInterrupt) {
    rl.on("SIGINT", onInterrupt);
  }
  const questionSignal = options.signal ? AbortSignal.any([closed.signal, options.signal]) : closed.signal;

  const ask: AskFn = async (question) => {
    try {
      return await rl.question(`\n${question}`, { signal: questionSignal });
    } catch (error) {
      if (questionSignal.aborted) {
        throw new CancelledError("prompt input closed");
      }
      throw error;
    }
  };

  return {
    ...createPrompter(ask, (line) => console.log(line)),
    close: () => rl.close(),
  };
}

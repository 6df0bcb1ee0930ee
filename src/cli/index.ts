import { loadConfig, toOnExistingMode } from "../config";
import type { AppConfig, OnExistingMode } from "../config";
import { runDownload, runList, runRetry } from "../core/commands";
import type { CommandContext } from "../core/commands";
import { CancelledError } from "../core/errors";
import { createRunId, Logger, MetricsRegistry } from "../observability";
import type { RunSummary } from "../types";
import { createProgressReporter } from "./progress";
import { createConsolePrompter } from "./prompt";
import type { ConsolePrompter } from "./prompt";

export type CommandName = "list" | "download" | "retry";

export interface ParsedCliArgs {
  command: CommandName;
  configPath?: string;
  periods?: string;
  onExisting?: OnExistingMode;
  outputDir?: string;
  concurrency?: number;
  ignoreHttpsErrors: boolean;
}

const HELP_TEXT = `
Usage:
  dataset-harvester <command> [options]

Commands:
  list       Discover the catalog and print its periods, newest first
  download   Pick periods and download every resource they list
  retry      Re-attempt the transfers recorded in failed_downloads.txt

Options:
  --config <path>          Optional path to JSON config file
  --periods <selection>    Skip the prompt: "all", "last N" or "1,3,5"
  --on-existing <mode>     prompt | skip | overwrite (default prompt)
  --output-dir <dir>       Base directory for downloads and the failure manifest
  --concurrency <n>        Transfers in flight at once (default 1)
  --ignore-https-errors    Ignore TLS certificate errors (use only when required)
  -h, --help               Show this help
`;

const EXIT_INTERRUPTED = 130;

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "list" || raw === "download" || raw === "retry") {
    return raw;
  }
  return undefined;
}

function optionValue(argv: string[], flag: string): string | undefined {
  const index = argv.indexOf(flag);
  return index >= 0 ? argv[index + 1] : undefined;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  const onExistingRaw = optionValue(argv, "--on-existing");
  const concurrencyRaw = optionValue(argv, "--concurrency");
  const concurrencyParsed = concurrencyRaw ? Number.parseInt(concurrencyRaw, 10) : undefined;

  return {
    command,
    configPath: optionValue(argv, "--config"),
    periods: optionValue(argv, "--periods"),
    onExisting: onExistingRaw ? toOnExistingMode(onExistingRaw, "prompt") : undefined,
    outputDir: optionValue(argv, "--output-dir"),
    concurrency:
      concurrencyParsed !== undefined && Number.isFinite(concurrencyParsed) && concurrencyParsed > 0
        ? concurrencyParsed
        : undefined,
    ignoreHttpsErrors: argv.includes("--ignore-https-errors"),
  };
}

export function applyCliOverrides(config: AppConfig, parsed: ParsedCliArgs): AppConfig {
  return {
    ...config,
    ignoreHttpsErrors: parsed.ignoreHttpsErrors || config.ignoreHttpsErrors,
    onExisting: parsed.onExisting ?? config.onExisting,
    outputDir: parsed.outputDir ?? config.outputDir,
    transferConcurrency: parsed.concurrency ?? config.transferConcurrency,
  };
}

export function exitCodeFor(summary: RunSummary, interrupted: boolean): number {
  if (interrupted) {
    return EXIT_INTERRUPTED;
  }
  return summary.failed > 0 ? 1 : 0;
}

export async function runCli(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  const config = applyCliOverrides(loadConfig(parsed.configPath), parsed);
  const runId = createRunId();
  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId, minLevel: config.logLevel });
  const interrupt = new AbortController();
  const onSigint = (): void => {
    logger.warn("interrupt_received", { hint: "finishing the current chunk and writing the ledger" });
    interrupt.abort();
  };
  process.once("SIGINT", onSigint);

  let prompter: ConsolePrompter | undefined;
  const context: CommandContext = {
    runId,
    config,
    logger,
    metrics,
    signal: interrupt.signal,
    onProgress: createProgressReporter(logger.child("progress"), config.progressIntervalMs),
  };

  logger.info("command_start", {
    command: parsed.command,
    catalogUrl: config.catalogUrl,
    outputDir: config.outputDir,
    onExisting: config.onExisting,
    transferConcurrency: config.transferConcurrency,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
  });

  try {
    if (parsed.command === "list") {
      await runList({ ...context, logger: logger.child("list") });
      return interrupt.signal.aborted ? EXIT_INTERRUPTED : 0;
    }

    prompter = createConsolePrompter({ signal: interrupt.signal, onInterrupt: onSigint });
    const summary =
      parsed.command === "download"
        ? await runDownload({ ...context, prompter, logger: logger.child("download") }, { selection: parsed.periods })
        : await runRetry({ ...context, prompter, logger: logger.child("retry") });

    console.log(`Downloaded: ${summary.downloaded}  Skipped: ${summary.skipped}  Failed: ${summary.failed}`);
    logger.info("command_complete", { command: parsed.command, ...summary });
    return exitCodeFor(summary, interrupt.signal.aborted);
  } catch (error) {
    if (error instanceof CancelledError) {
      logger.warn("command_interrupted", { command: parsed.command, error: error.message });
      return EXIT_INTERRUPTED;
    }
    throw error;
  } finally {
    process.removeListener("SIGINT", onSigint);
    prompter?.close();
    metrics.logSummary(logger.child("metrics"));
  }
}

import { runCli } from "./cli";

async function main(): Promise<void> {
  const exitCode = await runCli(process.argv.slice(2));
  process.exitCode = exitCode;
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`dataset-harvester: fatal: ${message}`);
  process.exitCode = 1;
});

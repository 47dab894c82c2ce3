#!/usr/bin/env node
import { z } from 'zod';
import { runArgsSchema, runHarvestAction } from './actions/run.js';
import { runStatusAction, statusArgsSchema } from './actions/status.js';

type ParsedArgs = {
  command: string;
  options: Record<string, string>;
};

const cliInputSchema = z.discriminatedUnion('command', [
  z.object({
    command: z.literal('help'),
    options: z.record(z.string(), z.string()),
  }),
  z.object({
    command: z.literal('run'),
    options: z.record(z.string(), z.string()),
  }),
  z.object({
    command: z.literal('status'),
    options: z.record(z.string(), z.string()),
  }),
]);

function parseArgs(argv: string[]): ParsedArgs {
  const [rawCommand, ...rest] = argv;
  const command = normalizeCommand(rawCommand);
  const options: Record<string, string> = {};

  for (let index = 0; index < rest.length; index += 1) {
    const arg = rest[index];
    if (!arg?.startsWith('--')) {
      continue;
    }

    const [key, maybeValue] = arg.slice(2).split('=', 2);
    if (!key) {
      continue;
    }

    if (maybeValue !== undefined) {
      options[key] = maybeValue;
      continue;
    }

    const next = rest[index + 1];
    if (next && !next.startsWith('--')) {
      options[key] = next;
      index += 1;
      continue;
    }

    options[key] = 'true';
  }

  return { command, options };
}

function normalizeCommand(command?: string): string {
  if (!command || command === 'help' || command === '--help' || command === '-h') {
    return 'help';
  }

  return command;
}

function printHelp(): void {
  console.log(`url-signal-harvester CLI

Usage:
  harvest help
  harvest run --input=./data/top-sites.csv
  harvest run --input=./data/top-sites.csv --output=./output/results.csv --checkpoint=./output/checkpoint.json
  harvest run --input=./data/top-sites.csv --endpoint=http://localhost:4444 --browser=firefox
  harvest run --input=./data/top-sites.csv --limit=1000 --timeout=20
  harvest run --config=./harvest.json
  harvest run --config=./harvest.json --fresh
  harvest status
  harvest status --input=./data/top-sites.csv
  harvest status --json --pretty

Commands:
  help    Show this help message
  run     Render every input URL and append its signals to the output CSV.
          Resumes from the output file when one exists.
  status  Summarize the output file and checkpoint of a previous run

Run options:
  --input      Input CSV with a url column, or a domain column (https:// is added).
  --output     Output CSV (default: output/results.csv).
  --checkpoint Checkpoint JSON (default: output/checkpoint.json).
  --failures   Failure log, one JSON line per failed URL (default: output/failures.jsonl).
  --config     JSON file with any run setting; flags override it.
  --endpoint   WebDriver endpoint (default: http://localhost:4444).
  --browser    One of: chrome, MicrosoftEdge, firefox (default: chrome).
  --timeout    Page load timeout in seconds (default: 15).
  --checkpointInterval  Save a checkpoint every N URLs (default: 100).
  --refreshInterval     Replace the browser session every N URLs, 0 to disable (default: 500).
  --maxSessionAttempts  Session recovery attempts before stopping (default: 10).
  --limit      Only process the first N inputs.
  --noTlsProbe Skip the direct TLS certificate check.
  --fresh      Delete the output, checkpoint and failure log first.

Status options:
  --output, --checkpoint, --config  As for run.
  --input   Count the inputs to report what remains.
  --json    Print the report as JSON.
  --pretty  Pretty-print JSON output.

Exit codes:
  0  every input has a result row
  1  stopped early (resumable) or could not start
`);
}

async function main(): Promise<number> {
  const { command, options } = parseArgs(process.argv.slice(2));
  const parsedCliInput = cliInputSchema.safeParse({ command, options });

  if (!parsedCliInput.success) {
    console.error(`Unknown command: ${command}`);
    printHelp();
    return 1;
  }

  if (parsedCliInput.data.command === 'help') {
    printHelp();
    return 0;
  }

  if (parsedCliInput.data.command === 'run') {
    const parsedRunArgs = runArgsSchema.safeParse(parsedCliInput.data.options);
    if (!parsedRunArgs.success) {
      console.error(parsedRunArgs.error.issues[0]?.message ?? 'Invalid arguments');
      printHelp();
      return 1;
    }

    return runHarvestAction(parsedRunArgs.data);
  }

  if (parsedCliInput.data.command === 'status') {
    const parsedStatusArgs = statusArgsSchema.safeParse(parsedCliInput.data.options);
    if (!parsedStatusArgs.success) {
      console.error(parsedStatusArgs.error.issues[0]?.message ?? 'Invalid arguments');
      printHelp();
      return 1;
    }

    return runStatusAction(parsedStatusArgs.data);
  }

  printHelp();
  return 0;
}

const exitCode = await main();
process.exitCode = exitCode;

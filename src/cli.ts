/**
 * Command-line interface
 *
 *   legal-lineage run <company> [more...]   run the pipeline, companies in parallel
 *   legal-lineage status <company>          print the last run manifest
 *   legal-lineage --help
 *
 * Human output goes to stdout; logs go to stderr.
 *
 * @module cli
 */

import { parseArgs } from 'util';
import type { RunManifest } from './models/pipeline.js';
import { formatRunSummary, type RunOutcome } from './pipeline/controller.js';
import { errorMessage } from './pipeline/errors.js';

export const USAGE = [
  'Usage:',
  '  legal-lineage run <company> [company...]   Process data/<company>/*.pdf',
  '  legal-lineage status <company>             Show the last run manifest',
  '  legal-lineage --help                       Show this message',
].join('\n');

export type CliCommand =
  | { kind: 'run'; companies: string[] }
  | { kind: 'status'; company: string }
  | { kind: 'help' };

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

/**
 * @throws CliUsageError on an unknown command or missing company
 */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  const { values, positionals } = parseArgs({
    args: [...argv],
    options: { help: { type: 'boolean', short: 'h' } },
    allowPositionals: true,
    strict: true,
  });

  const [command, ...rest] = positionals;
  if (values.help || command === undefined || command === 'help') {
    return { kind: 'help' };
  }

  switch (command) {
    case 'run':
      if (rest.length === 0) throw new CliUsageError('run needs at least one company');
      return { kind: 'run', companies: [...new Set(rest.map((company) => company.trim()))] };
    case 'status':
      if (rest.length !== 1) throw new CliUsageError('status needs exactly one company');
      return { kind: 'status', company: rest[0].trim() };
    default:
      throw new CliUsageError(`Unknown command "${command}"`);
  }
}

/**
 * What the CLI needs from the pipeline
 */
export interface CliRunner {
  run(companyId: string): Promise<RunOutcome>;
  readRunManifest(companyId: string): RunManifest | null;
}

export interface CliOutput {
  out(line: string): void;
  err(line: string): void;
}

export const consoleOutput: CliOutput = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

/**
 * Execute a command line
 *
 * @returns process exit code: 0 when every run completed, 1 otherwise
 */
export async function runCli(
  argv: readonly string[],
  createRunner: () => CliRunner,
  output: CliOutput = consoleOutput
): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (error) {
    output.err(`Error: ${errorMessage(error)}`);
    output.err(USAGE);
    return 1;
  }

  if (command.kind === 'help') {
    output.out(USAGE);
    return 0;
  }

  const runner = createRunner();

  if (command.kind === 'status') {
    let manifest: RunManifest | null;
    try {
      manifest = runner.readRunManifest(command.company);
    } catch (error) {
      output.err(`Error: ${errorMessage(error)}`);
      return 1;
    }
    if (manifest === null) {
      output.err(`No run recorded for ${command.company}`);
      return 1;
    }
    output.out(JSON.stringify(manifest, null, 2));
    return 0;
  }

  const settled = await Promise.allSettled(command.companies.map((company) => runner.run(company)));

  let exitCode = 0;
  settled.forEach((result, i) => {
    if (result.status === 'rejected') {
      output.out(`Empresa: ${command.companies[i]}`);
      output.out(`  Error: ${errorMessage(result.reason)}`);
      exitCode = 1;
      return;
    }
    for (const line of formatRunSummary(result.value)) {
      output.out(line);
    }
    if (!result.value.ok) exitCode = 1;
  });
  return exitCode;
}

import { readFileSync } from 'node:fs';
import { Command, CommanderError } from 'commander';
import { z } from 'zod';
import { resolveConfig, type ConfigFlags, type ListerConfig } from './config/options.js';
import { getSmartsheetClient } from './services/auth.js';
import { createSmartsheetReader, type SheetReader } from './services/sheets.js';
import { listColumns, type LineWriter } from './lister/list-columns.js';
import { ConfigError, SheetFetchError } from './lister/errors.js';

const PackageJson = z.object({ version: z.string() });

// Resolves to the project root from both src/ and dist/.
export const VERSION = PackageJson.parse(
  JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'))
).version;

export const EXIT_CODES = {
  success: 0,
  transport: 1,
  config: 2,
  authorization: 3,
  not_found: 4,
} as const;

export interface CliDeps {
  stdout?: LineWriter;
  stderr?: LineWriter;
  env?: NodeJS.ProcessEnv;
  createReader?: (config: ListerConfig) => SheetReader;
}

function buildProgram(stdout: LineWriter, stderr: LineWriter): Command {
  return new Command()
    .name('sheet-columns')
    .description('List the columns of a Smartsheet sheet')
    .version(VERSION)
    .option('--token <token>', 'Smartsheet API access token (env: SMARTSHEET_ACCESS_TOKEN)')
    .option('--sheet-id <id>', 'id of the sheet to list (env: SMARTSHEET_SHEET_ID)')
    .option('--base-url <url>', 'API base URL, e.g. for the EU region (env: SMARTSHEET_BASE_URL)')
    .option('--log-level <level>', 'SDK request logging level (env: SMARTSHEET_LOG_LEVEL)')
    .exitOverride()
    .configureOutput({
      writeOut: (str) => stdout(str.replace(/\n$/, '')),
      writeErr: (str) => stderr(str.replace(/\n$/, '')),
    });
}

function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigError) {
    return EXIT_CODES.config;
  }
  if (error instanceof SheetFetchError) {
    return EXIT_CODES[error.kind];
  }
  return EXIT_CODES.transport;
}

/**
 * Run the column listing for the given arguments (without the node and
 * script paths) and resolve to the process exit code.
 */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const stdout = deps.stdout ?? ((line: string) => console.log(line));
  const stderr = deps.stderr ?? ((line: string) => console.error(line));
  const env = deps.env ?? process.env;
  const createReader =
    deps.createReader ??
    ((config: ListerConfig) => createSmartsheetReader(getSmartsheetClient(config)));

  const program = buildProgram(stdout, stderr);
  try {
    program.parse([...argv], { from: 'user' });
  } catch (error) {
    // commander has already printed help, the version or its own error message
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_CODES.success : EXIT_CODES.config;
    }
    throw error;
  }

  try {
    const config = resolveConfig(program.opts<ConfigFlags>(), env);
    await listColumns(createReader(config), config.sheetId, stdout);
    return EXIT_CODES.success;
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    stderr(`Error: ${errorMessage}`);
    return exitCodeFor(error);
  }
}

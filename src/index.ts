#!/usr/bin/env node

/**
 * xlf-translate
 *
 * Fills in missing targets of an XLIFF file through a machine translation API,
 * leaving the rest of the file exactly as it was.
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import ora, { Ora } from 'ora';
import { XlfTranslateError, errorMessage } from './core/errors';
import { loadEnvironment, resolveSettings, ENGINE_NAMES } from './config/settings';
import { createEngine, FetchLike } from './engines';
import { runTranslation, assertComplete, RunResult } from './pipeline';
import { configureLog, log } from './util/log';

const VERSION = '1.0.0';

interface CliOptions {
  language?: string;
  inline?: boolean;
  force?: boolean;
  replace?: boolean;
  output?: string;
  engine?: string;
  config?: string;
  batchSize?: number;
  verbose?: boolean;
}

/** Injected by tests */
export interface CliDependencies {
  fetch?: FetchLike;
  cwd?: string;
}

function parsePositiveInteger(value: string): number {
  const number = Number(value);
  if (!Number.isInteger(number) || number <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return number;
}

/**
 * Summary lines printed after a run
 */
export function formatSummary(result: RunResult): string[] {
  const { stats } = result;
  const lines = [
    `Translated ${stats.translated} of ${stats.pending} units to ${result.targetLanguage}`,
    `  total: ${stats.total}, already translated: ${stats.alreadyTranslated}, ` +
      `skipped: ${stats.skipped}, failed: ${stats.failed}`,
  ];

  lines.push(result.written ? `  output: ${result.outputPath}` : '  output: unchanged');
  return lines;
}

function printSummary(result: RunResult): void {
  const [headline, ...details] = formatSummary(result);
  const mark = result.stats.failed > 0 ? chalk.yellow('!') : chalk.green('✔');
  console.log(`${mark} ${headline}`);
  for (const line of details) {
    console.log(chalk.dim(line));
  }
  for (const id of result.failedIds) {
    console.log(chalk.yellow(`  untranslated: ${id}`));
  }
}

async function translateFile(inputFile: string, options: CliOptions, deps: CliDependencies): Promise<void> {
  const cwd = deps.cwd ?? process.cwd();

  configureLog({ verbose: options.verbose ?? false });
  loadEnvironment(cwd);

  const settings = resolveSettings(
    { engine: options.engine, configPath: options.config, batchSize: options.batchSize },
    process.env,
    cwd
  );
  configureLog({ file: settings.logFile });
  log(`[CLI] ${inputFile} with engine ${settings.engine} (${settings.apiUrl})`);

  const engine = createEngine(settings, deps.fetch);

  let spinner: Ora | null = null;
  if (!options.verbose) {
    spinner = ora({ text: 'Reading ' + inputFile, isEnabled: process.stderr.isTTY === true }).start();
  }

  try {
    const result = await runTranslation(
      {
        inputPath: inputFile,
        language: options.language,
        inline: options.inline,
        outputPath: options.output,
        force: options.force,
        replace: options.replace,
        sourceLanguage: settings.sourceLanguage,
        batchSize: settings.batchSize,
        batchMaxChars: settings.batchMaxChars,
      },
      {
        engine,
        onProgress: ({ batchNum, totalBatches, batchSize, status }) => {
          if (spinner && status === 'processing') {
            spinner.text = `Translating batch ${batchNum}/${totalBatches} (${batchSize} units)`;
          }
        },
      }
    );
    spinner?.stop();
    printSummary(result);
    assertComplete(result);
  } finally {
    spinner?.stop();
  }
}

/**
 * Build the command line program
 */
export function createProgram(deps: CliDependencies = {}): Command {
  const program = new Command();

  program
    .name('xlf-translate')
    .description('Translate the missing targets of an XLIFF file')
    .version(VERSION, '-v, --version')
    .argument('<input-file>', 'XLIFF file to translate')
    .option('-l, --language <code>', 'Target language (default: taken from the file name, e.g. messages.es.xlf)')
    .option('-i, --inline', 'Write translations back into the input file')
    .option('-f, --force', 'Retranslate units that already have a target')
    .option('-o, --output <path>', 'Output file (default: <name>.translated.xlf)')
    .option('-r, --replace', 'Overwrite the output file if it already exists')
    .option('-e, --engine <name>', `Translation engine (${ENGINE_NAMES.join(', ')})`)
    .option('-c, --config <path>', 'Config file path')
    .option('--batch-size <n>', 'Units per API request', parsePositiveInteger)
    .option('--verbose', 'Verbose logging')
    .action(async (inputFile: string, options: CliOptions) => {
      await translateFile(inputFile, options, deps);
    });

  return program;
}

/**
 * Run the CLI and return the process exit code
 */
export async function main(argv: string[] = process.argv, deps: CliDependencies = {}): Promise<number> {
  try {
    await createProgram(deps).parseAsync(argv);
    return 0;
  } catch (error) {
    console.error(chalk.red(`Error: ${errorMessage(error)}`));
    if (error instanceof XlfTranslateError) {
      return error.exitCode;
    }
    log(`[CLI] Unexpected error: ${error instanceof Error ? error.stack ?? error.message : String(error)}`);
    return 1;
  }
}

if (require.main === module) {
  main().then(code => {
    process.exitCode = code;
  });
}

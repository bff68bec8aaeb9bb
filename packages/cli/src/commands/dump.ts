/**
 * Dump command - render a directory as markdown that `extract` reads back
 */

import { Command } from 'commander';
import { resolve, join } from 'path';
import {
  ConfigError,
  closeLogger,
  createLogger,
  dumpDirectory,
  loadConfig,
  writeDump,
} from '@fenceline/core';
import { FILTER_MODES, type DumpResult, type FilterMode } from '@fenceline/types';
import { exitWithFencelineError } from '../utils/errorFormatter.js';
import { getLogLevel, type LogFlags } from '../utils/logOptions.js';

export interface DumpCommandOptions extends LogFlags {
  project?: string;
  output?: string;
  stdout?: boolean;
  mode?: string;
  pattern?: string[];
}

export interface DumpOutcome {
  result: DumpResult;
  /** Absent when the markdown went to stdout */
  outputPath?: string;
}

function parseMode(value: string | undefined): FilterMode | undefined {
  if (value === undefined) return undefined;
  const mode = FILTER_MODES.find((candidate) => candidate === value);
  if (!mode) {
    throw new ConfigError(
      `Invalid --mode value "${value}"`,
      'ERR_CONFIG_INVALID',
      {},
      `Use one of: ${FILTER_MODES.join(', ')}`
    );
  }
  return mode;
}

export async function runDump(dir: string | undefined, options: DumpCommandOptions = {}): Promise<DumpOutcome> {
  const projectPath = resolve(options.project ?? '.');
  const config = loadConfig(projectPath);
  const root = dir ? resolve(dir) : projectPath;

  const mode = parseMode(options.mode) ?? config.dump.mode;
  const patterns = options.pattern && options.pattern.length > 0 ? options.pattern : config.dump.patterns;
  const logger = createLogger(getLogLevel(options));

  try {
    if (options.stdout) {
      return { result: dumpDirectory(root, { mode, patterns, logger }) };
    }
    const outputPath = options.output ? resolve(options.output) : join(projectPath, config.dump.output);
    return { result: writeDump(root, outputPath, { mode, patterns, logger }), outputPath };
  } finally {
    await closeLogger(logger);
  }
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export const dumpCommand = new Command('dump')
  .description('Write a directory as ### path + fenced blocks')
  .argument('[dir]', 'Directory to dump (default: project path)')
  .option('-p, --project <path>', 'Project path', '.')
  .option('-o, --output <file>', 'Output markdown file (default: dump.output from config)')
  .option('--stdout', 'Print the markdown instead of writing a file')
  .option('-m, --mode <mode>', 'How patterns apply: include | exclude')
  .option('--pattern <glob>', 'Filename pattern (repeatable)', collect)
  .option('-q, --quiet', 'Suppress log output')
  .option('-v, --verbose', 'Show skipped files')
  .option('--log-level <level>', 'Set log level (silent, errors, warnings, info, debug)')
  .addHelpText('after', `
Examples:
  fenceline dump                               Dump the project to .fenceline/output.md
  fenceline dump src --stdout                  Print src/ as markdown
  fenceline dump -m include --pattern "*.ts"   Only TypeScript files
`)
  .action(async (dir: string | undefined, options: DumpCommandOptions) => {
    let outcome: DumpOutcome;
    try {
      outcome = await runDump(dir, options);
    } catch (err) {
      exitWithFencelineError(err);
    }

    if (!outcome.outputPath) {
      process.stdout.write(outcome.result.markdown);
      return;
    }

    console.log(`✓ Dumped ${outcome.result.files.length} files to ${outcome.outputPath}`);
    if (outcome.result.skipped.length > 0) {
      console.log(`  Skipped ${outcome.result.skipped.length} unreadable files`);
    }
  });

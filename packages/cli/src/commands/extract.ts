/**
 * Extract command - materialize the files declared in a markdown document
 */

import { Command } from 'commander';
import { resolve, join, relative } from 'path';
import {
  ConfigError,
  closeLogger,
  createLogger,
  extractDocument,
  loadConfig,
  readDocument,
} from '@fenceline/core';
import { FENCE_CLOSE_POLICIES, type ExtractionReport, type FenceClosePolicy } from '@fenceline/types';
import { exitWithFencelineError } from '../utils/errorFormatter.js';
import { getLogLevel, type LogFlags } from '../utils/logOptions.js';

export interface ExtractCommandOptions extends LogFlags {
  project?: string;
  output?: string;
  dryRun?: boolean;
  fenceClose?: string;
  stripReasoning?: boolean;
  logFile?: string;
  allowPartial?: boolean;
  json?: boolean;
}

function parseFenceClose(value: string | undefined): FenceClosePolicy | undefined {
  if (value === undefined) return undefined;
  const policy = FENCE_CLOSE_POLICIES.find((candidate) => candidate === value);
  if (!policy) {
    throw new ConfigError(
      `Invalid --fence-close value "${value}"`,
      'ERR_CONFIG_INVALID',
      {},
      `Use one of: ${FENCE_CLOSE_POLICIES.join(', ')}`
    );
  }
  return policy;
}

/**
 * Run one extraction. CLI flags override .fenceline/config.yaml.
 *
 * `file` and `--output` are relative to the working directory;
 * config paths are relative to the project.
 */
export async function runExtract(file: string | undefined, options: ExtractCommandOptions = {}): Promise<ExtractionReport> {
  const projectPath = resolve(options.project ?? '.');
  const config = loadConfig(projectPath);

  const fenceClose = parseFenceClose(options.fenceClose) ?? config.fenceClose;
  const inputPath = file ? resolve(file) : join(projectPath, config.input);
  const baseDir = options.output ? resolve(options.output) : join(projectPath, config.baseDir);
  const logFile = options.logFile ? resolve(options.logFile) : join(projectPath, config.logFile);
  const stripReasoning = options.stripReasoning === false ? false : config.stripReasoning;

  // Read the input first: a missing document must leave the project untouched
  const document = readDocument(inputPath, { stripReasoning });

  const logger = createLogger(getLogLevel(options), { logFile, append: true });
  try {
    logger.info('Input document loaded', { inputPath, lines: document.lines.length });
    return extractDocument(document, {
      baseDir,
      logger,
      fenceClose,
      dryRun: options.dryRun,
    });
  } finally {
    await closeLogger(logger);
  }
}

export function printReport(report: ExtractionReport): void {
  const verb = report.dryRun ? 'Would write' : 'Wrote';
  const noun = report.written.length === 1 ? 'file' : 'files';
  console.log(`✓ ${verb} ${report.written.length} ${noun} under ${report.baseDir}`);
  for (const file of report.written) {
    console.log(`  ${relative(report.baseDir, file.filePath)} (${file.bytes} bytes)`);
  }

  if (report.failed.length > 0) {
    console.log('');
    console.log(`✗ ${report.failed.length} failed`);
    for (const failure of report.failed) {
      console.log(`  ${failure.filePath}: ${failure.code}`);
    }
  }
}

export const extractCommand = new Command('extract')
  .description('Write the files declared in a markdown document')
  .argument('[file]', 'Markdown document (default: "input" from config)')
  .option('-p, --project <path>', 'Project path', '.')
  .option('-o, --output <dir>', 'Base directory for extracted files')
  .option('-n, --dry-run', 'Show what would be written without writing')
  .option('--fence-close <policy>', 'Filename after a closing fence: retain | clear')
  .option('--no-strip-reasoning', 'Keep text before a </think> marker')
  .option('-q, --quiet', 'Suppress log output')
  .option('-v, --verbose', 'Show every parser event on the console')
  .option('--log-level <level>', 'Set log level (silent, errors, warnings, info, debug)')
  .option('--log-file <path>', 'Append log output to this file')
  .option('--allow-partial', 'Exit 0 even if some files could not be written')
  .option('-j, --json', 'Output report as JSON')
  .addHelpText('after', `
Examples:
  fenceline extract                      Extract the configured input (response.md)
  fenceline extract answer.md -o out     Extract answer.md into ./out
  fenceline extract --dry-run            List files without writing them
  fenceline extract --fence-close clear  Require a filename for every block
`)
  .action(async (file: string | undefined, options: ExtractCommandOptions) => {
    let report: ExtractionReport;
    try {
      report = await runExtract(file, options);
    } catch (err) {
      exitWithFencelineError(err);
    }

    if (options.json) {
      console.log(JSON.stringify(report, null, 2));
    } else {
      printReport(report);
    }

    if (report.failed.length > 0 && !options.allowPartial) {
      process.exit(1);
    }
  });

#!/usr/bin/env tsx
/**
 * @fenceline/cli - markdown ⇄ filesystem
 */

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { initCommand } from './commands/init.js';
import { extractCommand } from './commands/extract.js';
import { dumpCommand } from './commands/dump.js';

// Read version from package.json
const __dirname = dirname(fileURLToPath(import.meta.url));
const pkg: unknown = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'));
const version = typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
  ? pkg.version
  : '0.0.0';

const program = new Command();

program
  .name('fenceline')
  .description('Extract files from markdown, or dump a directory as markdown')
  .version(version);

program.addCommand(initCommand);
program.addCommand(extractCommand);
program.addCommand(dumpCommand);

await program.parseAsync();

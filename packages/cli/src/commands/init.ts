/**
 * Init command - write a default .fenceline/config.yaml
 */

import { Command } from 'commander';
import { resolve, join } from 'path';
import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { stringify as stringifyYAML } from 'yaml';
import { DEFAULT_CONFIG, WORK_DIR } from '@fenceline/core';
import { exitWithError } from '../utils/errorFormatter.js';

/**
 * Generate config.yaml content from the defaults.
 */
export function generateConfigYAML(): string {
  const yaml = stringifyYAML(DEFAULT_CONFIG, {
    lineWidth: 0, // Don't wrap long lines
  });

  return `# fenceline configuration
#
# input:        markdown document read by "fenceline extract"
# baseDir:      directory extracted files are written under
# fenceClose:   retain | clear - keep the filename for the next bare fence or forget it
# dump.mode:    include | exclude - how dump.patterns (minimatch globs) are applied

${yaml}`;
}

export interface InitResult {
  configPath: string;
  created: boolean;
}

export function runInit(path: string, options: { force?: boolean } = {}): InitResult {
  const projectPath = resolve(path);
  const configPath = join(projectPath, WORK_DIR, 'config.yaml');

  if (existsSync(configPath) && !options.force) {
    return { configPath, created: false };
  }

  mkdirSync(join(projectPath, WORK_DIR), { recursive: true });
  writeFileSync(configPath, generateConfigYAML());
  return { configPath, created: true };
}

export const initCommand = new Command('init')
  .description('Create .fenceline/config.yaml in a project')
  .argument('[path]', 'Project path', '.')
  .option('-f, --force', 'Overwrite existing config')
  .addHelpText('after', `
Examples:
  fenceline init                 Initialize in current directory
  fenceline init ./my-project    Initialize in specific directory
  fenceline init --force         Overwrite existing configuration
`)
  .action((path: string, options: { force?: boolean }) => {
    const result = runInit(path, options);
    if (!result.created) {
      exitWithError('Config already exists', [
        `Edit: ${result.configPath}`,
        'Or run: fenceline init --force',
      ]);
    }
    console.log(`✓ Created ${result.configPath}`);
    console.log('');
    console.log('Next steps:');
    console.log('  1. Save a model response:  response.md');
    console.log('  2. Extract its files:      fenceline extract');
  });

import { readFileSync, existsSync } from 'fs';
import { join, isAbsolute } from 'path';
import { parse as parseYAML } from 'yaml';
import {
  FENCE_CLOSE_POLICIES,
  FILTER_MODES,
  type FenceClosePolicy,
  type FilterMode,
} from '@fenceline/types';
import { ConfigError } from '../errors/FencelineError.js';
import { FENCELINE_VERSION, getSchemaVersion } from '../version.js';

/** Work directory holding config, logs and dump output */
export const WORK_DIR = '.fenceline';

/**
 * fenceline configuration schema.
 *
 * YAML Location: .fenceline/config.yaml (preferred) or .fenceline/config.json (deprecated)
 *
 * Example config.yaml:
 *
 * ```yaml
 * input: response.md           # markdown document read by `fenceline extract`
 * baseDir: generated           # extracted files land here (relative to project)
 * fenceClose: clear            # forget the filename after every block
 * dump:
 *   mode: include
 *   patterns:
 *     - "src/**"
 *     - "*.md"
 * ```
 */
export interface FencelineConfig {
  /**
   * Config schema version (major.minor.patch, no pre-release tag).
   * If omitted, no version check is performed.
   */
  version?: string;

  /** Markdown document to extract, relative to the project directory */
  input: string;

  /** Directory all extracted files are anchored at, relative to the project directory */
  baseDir: string;

  /** Append-only extraction log, relative to the project directory */
  logFile: string;

  /** Whether a closed fence forgets the active filename */
  fenceClose: FenceClosePolicy;

  /** Drop everything up to a `</think>` marker before scanning */
  stripReasoning: boolean;

  dump: DumpConfig;
}

export interface DumpConfig {
  /** Where `fenceline dump` writes its markdown, relative to the project directory */
  output: string;
  mode: FilterMode;
  /** minimatch globs, applied according to `mode` */
  patterns: string[];
}

export const DEFAULT_CONFIG: FencelineConfig = {
  version: getSchemaVersion(FENCELINE_VERSION),
  input: 'response.md',
  baseDir: '.',
  logFile: `${WORK_DIR}/extract.log`,
  fenceClose: 'retain',
  stripReasoning: true,
  dump: {
    output: `${WORK_DIR}/output.md`,
    mode: 'exclude',
    patterns: [],
  },
};

/**
 * Raw, unvalidated shape of a parsed config file.
 */
type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load fenceline config from project directory.
 *
 * Priority:
 * 1. config.yaml (preferred)
 * 2. config.json (deprecated, fallback)
 * 3. DEFAULT_CONFIG (if neither exists)
 *
 * Parse errors are logged and fall back to defaults.
 * Structural errors throw ConfigError.
 */
export function loadConfig(
  projectPath: string,
  logger: { warn: (msg: string) => void } = console
): FencelineConfig {
  const workDir = join(projectPath, WORK_DIR);
  const yamlPath = join(workDir, 'config.yaml');
  const jsonPath = join(workDir, 'config.json');

  let parsed: unknown;

  if (existsSync(yamlPath)) {
    try {
      parsed = parseYAML(readFileSync(yamlPath, 'utf-8'));
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      logger.warn(`Failed to parse config.yaml: ${error.message}`);
      logger.warn('Using default configuration');
      return DEFAULT_CONFIG;
    }
  } else if (existsSync(jsonPath)) {
    logger.warn('⚠ config.json is deprecated. Run "fenceline init --force" to migrate to config.yaml');
    try {
      parsed = JSON.parse(readFileSync(jsonPath, 'utf-8'));
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      logger.warn(`Failed to parse config.json: ${error.message}`);
      logger.warn('Using default configuration');
      return DEFAULT_CONFIG;
    }
  } else {
    return DEFAULT_CONFIG;
  }

  // Empty file or comments only
  if (parsed === null || parsed === undefined) {
    return DEFAULT_CONFIG;
  }

  if (!isRecord(parsed)) {
    throw new ConfigError(
      `Config error: expected a mapping at the top level, got ${Array.isArray(parsed) ? 'array' : typeof parsed}`,
      'ERR_CONFIG_INVALID',
      { filePath: existsSync(yamlPath) ? yamlPath : jsonPath },
      'Run: fenceline init --force'
    );
  }

  validateVersion(parsed.version);
  return mergeConfig(DEFAULT_CONFIG, validateConfig(parsed, logger));
}

/**
 * Validate config version compatibility with the running version.
 * If the config has no version field, validation passes silently.
 */
export function validateVersion(configVersion: unknown, currentVersion?: string): void {
  if (configVersion === undefined || configVersion === null) {
    return;
  }

  if (typeof configVersion !== 'string') {
    throw new ConfigError(`Config error: version must be a string, got ${typeof configVersion}`, 'ERR_CONFIG_INVALID');
  }

  if (!configVersion.trim()) {
    throw new ConfigError('Config error: version cannot be empty', 'ERR_CONFIG_INVALID');
  }

  const current = currentVersion ?? FENCELINE_VERSION;
  const configSchema = getSchemaVersion(configVersion);
  const currentSchema = getSchemaVersion(current);

  if (configSchema !== currentSchema) {
    throw new ConfigError(
      `Config error: config version "${configVersion}" is not compatible with ` +
      `fenceline ${current}. Expected "${currentSchema}".`,
      'ERR_CONFIG_INVALID',
      {},
      'Run: fenceline init --force  (to regenerate config for current version)'
    );
  }
}

function optionalString(value: unknown, field: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new ConfigError(`Config error: ${field} must be a string, got ${typeof value}`, 'ERR_CONFIG_INVALID');
  }
  if (!value.trim()) {
    throw new ConfigError(`Config error: ${field} cannot be empty or whitespace-only`, 'ERR_CONFIG_INVALID');
  }
  return value;
}

function optionalChoice<T extends string>(value: unknown, field: string, choices: readonly T[]): T | undefined {
  const text = optionalString(value, field);
  if (text === undefined) return undefined;
  const match = choices.find((choice) => choice === text);
  if (match === undefined) {
    throw new ConfigError(
      `Config error: ${field} must be one of ${choices.join(', ')}, got "${text}"`,
      'ERR_CONFIG_INVALID'
    );
  }
  return match;
}

/**
 * Validate a relative project path.
 * Absolute paths are rejected so a shared config cannot point outside the project.
 */
function optionalRelativePath(value: unknown, field: string): string | undefined {
  const text = optionalString(value, field);
  if (text === undefined) return undefined;
  if (isAbsolute(text) || text.startsWith('~')) {
    throw new ConfigError(
      `Config error: ${field} must be relative to the project directory, got "${text}"`,
      'ERR_CONFIG_INVALID'
    );
  }
  return text;
}

/**
 * Validate dump patterns.
 * Warns (doesn't throw) for an empty include list, which would dump nothing.
 */
export function validatePatterns(
  patterns: unknown,
  mode: FilterMode | undefined,
  logger: { warn: (msg: string) => void }
): string[] | undefined {
  if (patterns === undefined || patterns === null) {
    if (mode === 'include') {
      logger.warn('Warning: dump.mode is include but no patterns are set - no files will be dumped');
    }
    return undefined;
  }
  if (!Array.isArray(patterns)) {
    throw new ConfigError(`Config error: dump.patterns must be an array, got ${typeof patterns}`, 'ERR_CONFIG_INVALID');
  }
  const result: string[] = [];
  for (let i = 0; i < patterns.length; i++) {
    const pattern: unknown = patterns[i];
    if (typeof pattern !== 'string') {
      throw new ConfigError(`Config error: dump.patterns[${i}] must be a string, got ${typeof pattern}`, 'ERR_CONFIG_INVALID');
    }
    if (!pattern.trim()) {
      throw new ConfigError(`Config error: dump.patterns[${i}] cannot be empty or whitespace-only`, 'ERR_CONFIG_INVALID');
    }
    result.push(pattern);
  }
  if (result.length === 0 && mode === 'include') {
    logger.warn('Warning: dump.mode is include but no patterns are set - no files will be dumped');
  }
  return result;
}

interface PartialConfig {
  version?: string;
  input?: string;
  baseDir?: string;
  logFile?: string;
  fenceClose?: FenceClosePolicy;
  stripReasoning?: boolean;
  dump?: Partial<DumpConfig>;
}

/**
 * Validate every known field. THROWS ConfigError on the first bad value.
 */
export function validateConfig(raw: RawConfig, logger: { warn: (msg: string) => void }): PartialConfig {
  let stripReasoning: boolean | undefined;
  if (raw.stripReasoning !== undefined && raw.stripReasoning !== null) {
    if (typeof raw.stripReasoning !== 'boolean') {
      throw new ConfigError(
        `Config error: stripReasoning must be a boolean, got ${typeof raw.stripReasoning}`,
        'ERR_CONFIG_INVALID'
      );
    }
    stripReasoning = raw.stripReasoning;
  }

  let dump: Partial<DumpConfig> | undefined;
  if (raw.dump !== undefined && raw.dump !== null) {
    if (!isRecord(raw.dump)) {
      throw new ConfigError(`Config error: dump must be a mapping, got ${typeof raw.dump}`, 'ERR_CONFIG_INVALID');
    }
    const mode = optionalChoice(raw.dump.mode, 'dump.mode', FILTER_MODES);
    dump = {
      output: optionalRelativePath(raw.dump.output, 'dump.output'),
      mode,
      patterns: validatePatterns(raw.dump.patterns, mode, logger),
    };
  }

  return {
    version: optionalString(raw.version, 'version'),
    input: optionalString(raw.input, 'input'),
    baseDir: optionalRelativePath(raw.baseDir, 'baseDir'),
    logFile: optionalRelativePath(raw.logFile, 'logFile'),
    fenceClose: optionalChoice(raw.fenceClose, 'fenceClose', FENCE_CLOSE_POLICIES),
    stripReasoning,
    dump,
  };
}

/**
 * Merge user config with defaults.
 * User config takes precedence, but missing fields use defaults.
 */
function mergeConfig(defaults: FencelineConfig, user: PartialConfig): FencelineConfig {
  return {
    version: user.version ?? defaults.version,
    input: user.input ?? defaults.input,
    baseDir: user.baseDir ?? defaults.baseDir,
    logFile: user.logFile ?? defaults.logFile,
    fenceClose: user.fenceClose ?? defaults.fenceClose,
    stripReasoning: user.stripReasoning ?? defaults.stripReasoning,
    dump: {
      output: user.dump?.output ?? defaults.dump.output,
      mode: user.dump?.mode ?? defaults.dump.mode,
      patterns: user.dump?.patterns ?? defaults.dump.patterns,
    },
  };
}

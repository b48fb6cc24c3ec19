/**
 * Make-Ready CLI Configuration Management
 *
 * Loads configuration from .make-readyrc (YAML) with environment variable
 * overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (MAKE_READY_*)
 * 3. Config file (.make-readyrc or --config path)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import {
  CONFLICT_STRATEGIES,
  POLE_FAILURE_POLICIES,
  type ConflictStrategy,
  type PoleFailurePolicy,
} from '@make-ready/types';
import { ConfigError } from '../../core/errors.js';
import type { OutputFormat } from './output.js';

// ============================================================================
// Configuration Types
// ============================================================================

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['table', 'json', 'ndjson', 'csv'];

/**
 * Report settings
 */
export interface ReportConfig {
  readonly strategy: ConflictStrategy;
  readonly heightStrategy: ConflictStrategy;
  readonly onPoleError: PoleFailurePolicy;
}

/**
 * Full CLI configuration
 */
export interface CLIConfig {
  readonly report: ReportConfig;
  /** Utility profile name or path */
  readonly profile: string;
  readonly format: OutputFormat;

  // Runtime overrides (from CLI flags)
  /** Enable verbose output */
  readonly verbose: boolean;
  /** Output logs as JSON */
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

const StrategySchema = z.enum(['PREFER_SURVEY', 'PREFER_ENGINEERING', 'HIGHLIGHT_DIFFERENCES']);
const FailurePolicySchema = z.enum(['skip', 'abort']);
const OutputFormatSchema = z.enum(['table', 'json', 'ndjson', 'csv']);

/**
 * Config file structure (YAML)
 */
const ConfigFileSchema = z
  .object({
    profile: z.string().min(1).optional(),
    report: z
      .object({
        strategy: StrategySchema.optional(),
        height_strategy: StrategySchema.optional(),
        on_pole_error: FailurePolicySchema.optional(),
      })
      .optional(),
    output: z
      .object({
        format: OutputFormatSchema.optional(),
      })
      .optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Omit<CLIConfig, 'verbose' | 'json' | 'configPath'> = {
  report: {
    strategy: 'PREFER_ENGINEERING',
    heightStrategy: 'PREFER_ENGINEERING',
    onPoleError: 'skip',
  },
  profile: 'default',
  format: 'table',
};

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Standard config file names to search for
 */
const CONFIG_FILE_NAMES = [
  '.make-readyrc',
  '.make-readyrc.yaml',
  '.make-readyrc.yml',
  '.make-readyrc.json',
];

/**
 * Find config file in current directory or parent directories
 */
function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);
  const root = resolve('/');

  while (dir !== root) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    dir = resolve(dir, '..');
  }

  return null;
}

/**
 * Parse and validate config file content
 *
 * @throws {ConfigError} If the file is not valid YAML or fails validation
 */
export function parseConfigFile(filePath: string): ConfigFile {
  let raw: unknown;
  try {
    // YAML is a superset of JSON, so .json files parse here too
    raw = parseYaml(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(
      `Cannot parse config file: ${error instanceof Error ? error.message : String(error)}`,
      filePath
    );
  }

  const result = ConfigFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issue = result.error.errors[0];
    const where = issue ? `${issue.path.join('.') || '<root>'}: ${issue.message}` : 'invalid config';
    throw new ConfigError(`Invalid config file (${where})`, filePath);
  }
  return result.data;
}

/**
 * Get environment variable with prefix
 */
function getEnvVar(name: string): string | undefined {
  const value = process.env[`MAKE_READY_${name}`];
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

/**
 * Get boolean environment variable
 */
function getEnvBool(name: string): boolean | undefined {
  const value = getEnvVar(name);
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Get an environment variable restricted to a set of choices
 *
 * @throws {ConfigError} If the variable is set to something else
 */
function getEnvChoice<T extends string>(name: string, choices: readonly T[]): T | undefined {
  const value = getEnvVar(name);
  if (value === undefined) return undefined;
  const match = choices.find((choice) => choice === value);
  if (match === undefined) {
    throw new ConfigError(
      `Invalid MAKE_READY_${name}: ${value}. Must be one of: ${choices.join(', ')}`,
      null
    );
  }
  return match;
}

/**
 * Load configuration options
 */
export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Directory to start the config file search from */
  cwd?: string;
  /** CLI flag overrides */
  overrides?: {
    verbose?: boolean;
    json?: boolean;
    strategy?: ConflictStrategy;
    heightStrategy?: ConflictStrategy;
    onPoleError?: PoleFailurePolicy;
    profile?: string;
    format?: OutputFormat;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * @throws {ConfigError} If a config file or environment variable is invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): CLIConfig {
  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  if (options.configPath) {
    configPath = resolve(options.configPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`, configPath);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    const envConfigPath = getEnvVar('CONFIG');
    configPath = envConfigPath ? resolve(envConfigPath) : findConfigFile(options.cwd ?? process.cwd());
    if (configPath && existsSync(configPath)) {
      fileConfig = parseConfigFile(configPath);
    }
  }

  const overrides = options.overrides ?? {};

  return {
    report: {
      strategy:
        overrides.strategy ??
        getEnvChoice('STRATEGY', CONFLICT_STRATEGIES) ??
        fileConfig.report?.strategy ??
        DEFAULT_CONFIG.report.strategy,
      heightStrategy:
        overrides.heightStrategy ??
        getEnvChoice('HEIGHT_STRATEGY', CONFLICT_STRATEGIES) ??
        fileConfig.report?.height_strategy ??
        DEFAULT_CONFIG.report.heightStrategy,
      onPoleError:
        overrides.onPoleError ??
        getEnvChoice('ON_POLE_ERROR', POLE_FAILURE_POLICIES) ??
        fileConfig.report?.on_pole_error ??
        DEFAULT_CONFIG.report.onPoleError,
    },
    profile: overrides.profile ?? getEnvVar('PROFILE') ?? fileConfig.profile ?? DEFAULT_CONFIG.profile,
    format:
      overrides.format ??
      getEnvChoice('FORMAT', OUTPUT_FORMATS) ??
      fileConfig.output?.format ??
      DEFAULT_CONFIG.format,

    // Runtime flags
    verbose: overrides.verbose ?? getEnvBool('VERBOSE') ?? false,
    json: overrides.json ?? getEnvBool('JSON') ?? false,
    configPath,
  };
}

#!/usr/bin/env tsx
/**
 * Make-Ready CLI Entry Point
 *
 * Reconciles pole field-survey exports with engineering-analysis exports
 * and prints make-ready reports.
 *
 * @module make-ready-cli
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  CONFLICT_STRATEGIES,
  POLE_FAILURE_POLICIES,
  type ConflictStrategy,
  type PoleFailurePolicy,
} from '@make-ready/types';

import { OUTPUT_FORMATS, loadConfig, type CLIConfig } from '../src/cli/lib/config.js';
import { createCLILogger, type CLILogger } from '../src/cli/lib/logger.js';
import { EXIT_CODES } from '../src/cli/lib/exit-codes.js';
import type { OutputFormat } from '../src/cli/lib/output.js';
import {
  BatchAbortedError,
  ConfigError,
  InputValidationError,
  ProfileError,
} from '../src/core/errors.js';
import { reportCommand } from '../src/cli/commands/report.js';
import { sequenceCommand } from '../src/cli/commands/sequence.js';

export { EXIT_CODES, type ExitCode } from '../src/cli/lib/exit-codes.js';

// ============================================================================
// Global State
// ============================================================================

export interface GlobalContext {
  config: CLIConfig;
  logger: CLILogger;
  startTime: number;
}

let globalContext: GlobalContext | null = null;

export function getGlobalContext(): GlobalContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

// ============================================================================
// Option Parsing
// ============================================================================

function parseChoice<T extends string>(value: unknown, choices: readonly T[], flag: string): T | undefined {
  if (value === undefined) return undefined;
  const match = choices.find((choice) => choice === value);
  if (match === undefined) {
    throw new ConfigError(`Invalid ${flag}: ${String(value)}. Must be one of: ${choices.join(', ')}`, null);
  }
  return match;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function optionalFlag(value: unknown): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined;
}

interface ContextOptions {
  readonly verbose?: boolean;
  readonly json?: boolean;
  readonly config?: string;
  readonly strategy?: ConflictStrategy;
  readonly heightStrategy?: ConflictStrategy;
  readonly onPoleError?: PoleFailurePolicy;
  readonly profile?: string;
  readonly format?: OutputFormat;
}

function contextOptions(options: Readonly<Record<string, unknown>>): ContextOptions {
  return {
    verbose: optionalFlag(options['verbose']),
    json: optionalFlag(options['json']),
    config: optionalString(options['config']),
    strategy: parseChoice(options['strategy'], CONFLICT_STRATEGIES, '--strategy'),
    heightStrategy: parseChoice(options['heightStrategy'], CONFLICT_STRATEGIES, '--height-strategy'),
    onPoleError: parseChoice(options['onPoleError'], POLE_FAILURE_POLICIES, '--on-pole-error'),
    profile: optionalString(options['profile']),
    format: parseChoice(options['format'], OUTPUT_FORMATS, '--format'),
  };
}

// ============================================================================
// CLI Setup
// ============================================================================

function getVersion(): string {
  const __dirname = dirname(fileURLToPath(import.meta.url));
  const packageJsonPath = join(__dirname, '..', 'package.json');
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
      return String(packageJson.version);
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

function initializeContext(options: ContextOptions): GlobalContext {
  const startTime = Date.now();

  const config = loadConfig({
    configPath: options.config,
    overrides: {
      verbose: options.verbose,
      json: options.json,
      strategy: options.strategy,
      heightStrategy: options.heightStrategy,
      onPoleError: options.onPoleError,
      profile: options.profile,
      format: options.format,
    },
  });

  // Logs go to stderr so report output on stdout stays parseable
  const logger = createCLILogger({
    level: config.verbose ? 'debug' : 'info',
    json: config.json,
    sink: (_level, line) => console.error(line),
  });

  globalContext = { config, logger, startTime };
  return globalContext;
}

/**
 * Exit code for an error that escaped a command
 */
function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigError || error instanceof ProfileError) return EXIT_CODES.CONFIG_ERROR;
  return EXIT_CODES.ERRORS;
}

function describeError(error: unknown): string {
  if (error instanceof InputValidationError) return error.getSummary();
  if (error instanceof BatchAbortedError) return `${error.message} (completed poles: ${error.completedPoles})`;
  return error instanceof Error ? error.message : String(error);
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('make-ready')
    .description('Make-ready attachment reconciliation for pole survey and engineering data')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Write logs as JSON lines')
    .option('--config <path>', 'Path to config file (default: .make-readyrc)')
    .hook('preAction', (thisCommand, actionCommand) => {
      try {
        initializeContext(contextOptions({ ...thisCommand.opts(), ...actionCommand.opts() }));
      } catch (error) {
        console.error(`Configuration error: ${describeError(error)}`);
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  program
    .command('report <survey> [engineering]')
    .description('Build the make-ready report for every pole in the survey export')
    .option('--strategy <name>', `Pole attribute conflict strategy: ${CONFLICT_STRATEGIES.join('|')}`)
    .option('--height-strategy <name>', 'Attachment height strategy (advisory)')
    .option('--target <ids...>', 'Only process these poles')
    .option('--profile <name|path>', 'Utility profile name or JSON file')
    .option('--on-pole-error <policy>', 'What to do when a pole fails: skip|abort')
    .option('--format <fmt>', 'Output format: table|json|ndjson|csv')
    .option('--rows', 'Emit spreadsheet row mappings instead of the pole summary')
    .option('-o, --output <file>', 'Write output to a file')
    .action(async (survey: string, engineering: string | undefined, options: Record<string, unknown>) => {
      const { config, logger } = getGlobalContext();
      const targets = Array.isArray(options['target'])
        ? options['target'].filter((target): target is string => typeof target === 'string')
        : undefined;
      const exitCode = await reportCommand(
        survey,
        engineering,
        { targets, rows: optionalFlag(options['rows']), output: optionalString(options['output']) },
        config,
        logger
      );
      if (exitCode !== EXIT_CODES.SUCCESS) process.exitCode = exitCode;
    });

  program
    .command('sequence <engineering>')
    .description('Print the pole visitation order of an engineering export')
    .option('--profile <name|path>', 'Utility profile name or JSON file')
    .option('--format <fmt>', 'Output format: table|json|ndjson|csv')
    .option('-o, --output <file>', 'Write output to a file')
    .action(async (engineering: string, options: Record<string, unknown>) => {
      const { config, logger } = getGlobalContext();
      const exitCode = await sequenceCommand(
        engineering,
        { output: optionalString(options['output']) },
        config,
        logger
      );
      if (exitCode !== EXIT_CODES.SUCCESS) process.exitCode = exitCode;
    });

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (globalContext) {
      globalContext.logger.error('Command failed', {
        error: describeError(error),
        duration_ms: Date.now() - globalContext.startTime,
      });
    } else {
      console.error(`Error: ${describeError(error)}`);
    }
    process.exit(exitCodeFor(error));
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});

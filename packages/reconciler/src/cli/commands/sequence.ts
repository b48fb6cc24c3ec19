/**
 * Sequence Command
 *
 * Print the pole visitation order of an engineering export with operation
 * numbers.
 *
 * Usage:
 *   make-ready sequence <engineering.json> [--format <fmt>] [-o <file>]
 *
 * @module cli/commands/sequence
 */

import { UtilityProfile } from '../../core/profile.js';
import { stringField } from '../../core/values.js';
import { parseEngineeringDataset } from '../../input/schemas.js';
import { buildEngineeringIndex } from '../../loader/indices.js';
import type { CLIConfig } from '../lib/config.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';
import { emitOutput, readDatasetFile } from '../lib/files.js';
import type { CLILogger } from '../lib/logger.js';
import { formatOutput, type TableColumn } from '../lib/output.js';

export interface SequenceCommandOptions {
  readonly output?: string;
}

export interface SequenceEntry {
  readonly operation: number;
  readonly poleId: string;
  readonly label: string;
}

const SEQUENCE_COLUMNS: readonly TableColumn[] = [
  { key: 'operation', header: '#', align: 'right' },
  { key: 'poleId', header: 'Pole ID' },
  { key: 'label', header: 'Label' },
];

/**
 * Visitation order of a parsed engineering document
 */
export function sequenceEntries(engineering: unknown, profile: UtilityProfile): SequenceEntry[] {
  const index = buildEngineeringIndex(parseEngineeringDataset(engineering), profile);
  return index.sequence.map((poleId, position) => {
    const location = index.locationsByPoleId.get(poleId);
    return {
      operation: position + 1,
      poleId,
      label: (location && stringField(location, 'label')) ?? poleId,
    };
  });
}

export async function sequenceCommand(
  engineeringPath: string,
  options: SequenceCommandOptions,
  config: CLIConfig,
  logger: CLILogger
): Promise<ExitCode> {
  logger.commandStart('sequence', { engineering: engineeringPath });

  const profile = await UtilityProfile.load(config.profile);
  const entries = sequenceEntries(await readDatasetFile(engineeringPath, 'engineering'), profile);

  await emitOutput(formatOutput(entries.map((entry) => ({ ...entry })), config.format, SEQUENCE_COLUMNS), options.output);

  logger.commandEnd(true, { poles: entries.length });
  return entries.length > 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.WARNINGS;
}

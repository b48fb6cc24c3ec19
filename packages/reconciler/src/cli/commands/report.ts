/**
 * Report Command
 *
 * Reconcile a survey export with an optional engineering export and print
 * the per-pole make-ready report.
 *
 * Usage:
 *   make-ready report <survey.json> [engineering.json] [options]
 *
 * Options:
 *   --strategy <name>         Pole attribute conflict strategy
 *   --height-strategy <name>  Attachment height strategy (advisory)
 *   --target <ids...>         Only these poles
 *   --profile <name|path>     Utility profile
 *   --on-pole-error <policy>  skip|abort
 *   --format <fmt>            table|json|ndjson|csv
 *   --rows                    Emit spreadsheet row mappings
 *   -o, --output <file>       Write to a file instead of stdout
 *
 * @module cli/commands/report
 */

import type { ReportResult } from '@make-ready/types';
import { UtilityProfile } from '../../core/profile.js';
import { generateReport } from '../../report/pipeline.js';
import { toReportRows } from '../../report/rows.js';
import type { CLIConfig } from '../lib/config.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';
import { emitOutput, readDatasetFile } from '../lib/files.js';
import type { CLILogger } from '../lib/logger.js';
import {
  POLE_SUMMARY_COLUMNS,
  formatJson,
  formatNdjson,
  formatOutput,
  poleSummaryRow,
  type TableColumn,
} from '../lib/output.js';

/**
 * Report command options (already merged with configuration)
 */
export interface ReportCommandOptions {
  readonly targets?: readonly string[];
  readonly rows?: boolean;
  readonly output?: string;
}

const ROW_COLUMNS: readonly TableColumn[] = [
  { key: 'pole', header: 'Pole' },
  { key: 'row_type', header: 'Row' },
  { key: 'description', header: 'Description' },
  { key: 'existing_height', header: 'Existing' },
  { key: 'proposed_height', header: 'Proposed' },
  { key: 'midspan_proposed', header: 'Midspan' },
  { key: 'style_hint', header: 'Style' },
];

/**
 * Render a report result in the configured format
 */
export function renderReport(result: ReportResult, config: CLIConfig, rows: boolean): string {
  if (rows) {
    const mappings = result.poles.flatMap((pole) =>
      toReportRows(pole).map((row) => ({ pole: pole.poleNumber, ...row }))
    );
    return formatOutput(mappings, config.format, ROW_COLUMNS);
  }

  switch (config.format) {
    case 'json':
      return formatJson(result);
    case 'ndjson':
      return formatNdjson(result.poles);
    default:
      return formatOutput(result.poles.map(poleSummaryRow), config.format, POLE_SUMMARY_COLUMNS);
  }
}

/**
 * Execute the report command
 *
 * @returns Exit code: success, or warnings when any pole failed or warned
 */
export async function reportCommand(
  surveyPath: string,
  engineeringPath: string | undefined,
  options: ReportCommandOptions,
  config: CLIConfig,
  logger: CLILogger
): Promise<ExitCode> {
  logger.commandStart('report', { survey: surveyPath, engineering: engineeringPath ?? null });

  const profile = await UtilityProfile.load(config.profile);
  const survey = await readDatasetFile(surveyPath, 'survey');
  const engineering = engineeringPath ? await readDatasetFile(engineeringPath, 'engineering') : undefined;

  const result = generateReport(
    { survey, engineering },
    {
      profile,
      strategy: config.report.strategy,
      heightStrategy: config.report.heightStrategy,
      targetPoles: options.targets,
      failurePolicy: config.report.onPoleError,
      logger,
      onProgress: (current, total) => logger.progress({ current, total, label: 'poles' }),
    }
  );

  await emitOutput(renderReport(result, config, options.rows ?? false), options.output);

  for (const failure of result.failures) {
    logger.warn('Pole skipped', { nodeId: failure.nodeId, pole: failure.poleNumber, error: failure.message });
  }

  const clean = result.failures.length === 0 && result.warnings.length === 0;
  logger.commandEnd(true, {
    poles: result.poles.length,
    failures: result.failures.length,
    warnings: result.warnings.length,
  });
  return clean ? EXIT_CODES.SUCCESS : EXIT_CODES.WARNINGS;
}

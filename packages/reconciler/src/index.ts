/**
 * @make-ready/reconciler
 *
 * Attachment reconciliation engine: merges a pole field-survey export with
 * an engineering-analysis export into ordered per-pole make-ready records.
 *
 * @example
 * ```typescript
 * import { UtilityProfile, generateReport, toReportRows } from '@make-ready/reconciler';
 *
 * const profile = await UtilityProfile.fromProfile('default');
 * const result = generateReport({ survey, engineering }, { profile });
 * const rows = result.poles.flatMap(toReportRows);
 * ```
 */

// Pipeline
export {
  generateReport,
  buildPoleReport,
  type ReportInput,
  type ReportOptions,
} from './report/pipeline.js';
export { toReportRows, toRowMapping } from './report/rows.js';
export { buildFinalRows, referenceHeight } from './report/final-list.js';
export {
  determinePoleAction,
  determinePoleStatus,
  countProposedEquipment,
  formatEquipmentCount,
  PASSING_CAPACITY_THRESHOLD,
} from './report/pole-classification.js';

// Profile, units and errors
export {
  UtilityProfile,
  UtilityProfileSchema,
  type UtilityProfileDefinition,
  type UtilityProfileInput,
} from './core/profile.js';
export {
  METERS_TO_INCHES,
  NOT_AVAILABLE,
  UNDERGROUND,
  toFeetInchesString,
  parseFeetInchesString,
  formatHeight,
  formatMidspan,
  extractWireHeight,
} from './core/units.js';
export {
  InputValidationError,
  PoleProcessingError,
  BatchAbortedError,
  ProfileError,
  ConfigError,
  type ValidationIssue,
} from './core/errors.js';
export { silentLogger, type EngineLogger, type LogFields } from './core/logging.js';

// Input
export {
  parseSurveyDataset,
  parseEngineeringDataset,
  type SurveyDataset,
  type EngineeringDataset,
} from './input/schemas.js';

// Components
export { TraceResolver, extractWireMetadata, type TraceMetadata } from './survey/trace-resolver.js';
export { normalizePoleId } from './survey/nodes.js';
export { resolveAttribute, resolvePoleAttributes } from './attributes/pole-attributes.js';
export { consolidateAttachments, ownersWithChanges } from './attachments/consolidator.js';
export { filterBelowNeutral, highestNeutral } from './neutral/neutral-identifier.js';
export { isReferenceConnection } from './spans/connections.js';
export { processPoleSpans, type PoleSpans, type SpanBlock } from './spans/span-processor.js';
export { calculatePoleMidspan, applyMidspanValues, type PoleMidspan } from './midspan/midspan-calculator.js';

// CLI library
export { CLILogger, createCLILogger, type LogLevel } from './cli/lib/logger.js';
export { loadConfig, type CLIConfig } from './cli/lib/config.js';

export type * from '@make-ready/types';

/**
 * Report Pipeline
 *
 * Entry point of the engine. Validates both datasets, builds the shared
 * indices once, then assembles one `PoleReport` per survey pole node:
 *
 * 1. resolve pole attributes from both sources
 * 2. extract and consolidate attachments
 * 3. walk the pole's connections (summaries, backspan, reference spans)
 * 4. identify the governing neutral and filter below it
 * 5. compute the pole-level midspan and apply per-attachment rules
 * 6. build the final row list and classify the pole
 *
 * Poles are independent once the indices exist. A failing pole is either
 * recorded and skipped or aborts the batch, per the failure policy.
 *
 * @module report/pipeline
 */

import type {
  ConflictStrategy,
  PoleFailure,
  PoleFailurePolicy,
  PoleReport,
  ReportResult,
} from '@make-ready/types';
import { BatchAbortedError, PoleProcessingError } from '../core/errors.js';
import { silentLogger, type EngineLogger } from '../core/logging.js';
import type { UtilityProfile } from '../core/profile.js';
import { asRecord, toFiniteNumber, type JsonRecord } from '../core/values.js';
import { parseEngineeringDataset, parseSurveyDataset } from '../input/schemas.js';
import {
  buildEngineeringIndex,
  buildSurveyIndex,
  operationNumberOf,
  type EngineeringIndex,
  type SurveyIndex,
} from '../loader/indices.js';
import { isPoleNode, normalizePoleId, poleNumberOf } from '../survey/nodes.js';
import { TraceResolver } from '../survey/trace-resolver.js';
import {
  extractEngineeringAttributes,
  extractSurveyAttributes,
  resolvePoleAttributes,
} from '../attributes/pole-attributes.js';
import {
  classifiedNodeWires,
  extractSurveyAttachments,
  type SurveyExtractionContext,
} from '../attachments/survey-extractor.js';
import { extractEngineeringAttachments } from '../attachments/engineering-extractor.js';
import { consolidateAttachments, ownersWithChanges } from '../attachments/consolidator.js';
import {
  filterBelowNeutral,
  highestNeutral,
  identifyEngineeringNeutrals,
  identifySurveyNeutrals,
} from '../neutral/neutral-identifier.js';
import { processPoleSpans } from '../spans/span-processor.js';
import { spanMidspanHeights } from '../spans/midspan-heights.js';
import { applyMidspanValues, calculatePoleMidspan } from '../midspan/midspan-calculator.js';
import { buildFinalRows } from './final-list.js';
import {
  countProposedEquipment,
  determinePoleAction,
  determinePoleStatus,
  formatEquipmentCount,
} from './pole-classification.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Parsed input documents; the engineering dataset is optional
 */
export interface ReportInput {
  readonly survey: unknown;
  readonly engineering?: unknown;
}

export interface ReportOptions {
  readonly profile: UtilityProfile;
  /** Pole attribute conflict strategy (default PREFER_ENGINEERING) */
  readonly strategy?: ConflictStrategy;
  /** Attachment height strategy; advisory, recorded in the log only */
  readonly heightStrategy?: ConflictStrategy;
  /** Pole labels to restrict processing to, compared by normalized id */
  readonly targetPoles?: readonly string[];
  readonly failurePolicy?: PoleFailurePolicy;
  readonly logger?: EngineLogger;
  /** Called after each pole is attempted */
  readonly onProgress?: (processed: number, total: number) => void;
}

export interface BatchContext {
  readonly survey: SurveyIndex;
  readonly engineering: EngineeringIndex;
  readonly resolver: TraceResolver;
  readonly profile: UtilityProfile;
  readonly strategy: ConflictStrategy;
}

export interface PoleCandidate {
  readonly nodeId: string;
  readonly node: JsonRecord;
  readonly poleNumber: string;
  readonly poleId: string;
}

// ============================================================================
// Per-Pole Assembly
// ============================================================================

/**
 * Build the report record of one pole
 */
export function buildPoleReport(
  candidate: PoleCandidate,
  context: BatchContext,
  logger: EngineLogger
): PoleReport {
  const { nodeId, node, poleNumber, poleId } = candidate;
  const { survey, engineering, resolver, profile } = context;
  const location = engineering.locationsByPoleId.get(poleId);
  const warnings: string[] = [];

  const attributes = resolvePoleAttributes(
    extractSurveyAttributes(node),
    location ? extractEngineeringAttributes(location, engineering.constructionGrade) : undefined,
    context.strategy
  );
  for (const conflict of attributes.conflicts) {
    logger.debug('Attribute conflict', { ...conflict });
  }

  const extraction: SurveyExtractionContext = { photos: survey.photos, resolver, profile, logger };
  const surveyRecords = extractSurveyAttachments(node, extraction);
  const engineeringRecords = location ? extractEngineeringAttachments(location, profile, logger) : [];
  const consolidated = consolidateAttachments(engineeringRecords, surveyRecords);
  const changedOwners = ownersWithChanges(consolidated);

  const spans = processPoleSpans(
    { nodeId, poleNumber, poleId },
    {
      survey,
      sequence: engineering.sequence,
      resolver,
      profile,
      logger,
      engineeringWires: engineering.wireLookup,
    }
  );

  const neutral = highestNeutral([
    ...identifySurveyNeutrals(classifiedNodeWires(node, extraction), profile),
    ...identifyEngineeringNeutrals(location, profile),
  ]);
  if (!neutral) {
    const warning = `No neutral wire found for pole ${poleNumber}; attachments are not filtered`;
    logger.warn('No neutral wire found', { nodeId });
    warnings.push(warning);
  }
  const belowNeutral = filterBelowNeutral(consolidated, neutral);

  const poleMidspan = calculatePoleMidspan(consolidated, spans.wires, changedOwners);
  const attachmentsBelowNeutral = applyMidspanValues(belowNeutral, poleMidspan);

  const rows = buildFinalRows(attachmentsBelowNeutral, spans, logger);
  const equipment = countProposedEquipment(node, location, attributes.makeReadyNotes);
  const operationNumber = operationNumberOf(engineering, poleId);
  const latitude = toFiniteNumber(node['latitude']);
  const longitude = toFiniteNumber(node['longitude']);

  return {
    nodeId,
    poleNumber,
    poleId,
    ...(operationNumber !== undefined && { operationNumber }),
    isPrimary: location !== undefined,
    owner: attributes.owner,
    structure: attributes.structure,
    constructionGrade: attributes.constructionGrade,
    plaPercentage: attributes.plaPercentage,
    makeReadyNotes: attributes.makeReadyNotes,
    ...(latitude !== undefined && { latitude }),
    ...(longitude !== undefined && { longitude }),
    status: determinePoleStatus(attributes.makeReadyNotes, attributes.passingCapacity),
    action: determinePoleAction(rows),
    proposedRiser: formatEquipmentCount(equipment.risers),
    proposedGuy: formatEquipmentCount(equipment.guys),
    fromPole: spans.fromPole,
    ...(spans.toPole !== undefined && { toPole: spans.toPole }),
    existingMidspanLowestCommunication: spans.lowestCommunication,
    existingMidspanLowestElectrical: spans.lowestElectrical,
    midspanProposed: poleMidspan.proposed,
    ...(neutral && { neutral }),
    connections: spans.summaries,
    spanMidspanHeights: spanMidspanHeights(nodeId, survey, resolver, profile),
    attachmentsBelowNeutral,
    rows,
    warnings,
  };
}

// ============================================================================
// Batch
// ============================================================================

function collectCandidates(
  survey: SurveyIndex,
  targets: ReadonlySet<string> | undefined,
  logger: EngineLogger
): PoleCandidate[] {
  const candidates: PoleCandidate[] = [];
  for (const [nodeId, raw] of Object.entries(survey.nodes)) {
    const node = asRecord(raw);
    if (!isPoleNode(node)) continue;

    const poleNumber = poleNumberOf(node);
    const poleId = normalizePoleId(poleNumber);
    if (!poleNumber || !poleId) {
      logger.debug('Skipping pole node without a pole number', { nodeId });
      continue;
    }
    if (targets && !targets.has(poleId)) continue;

    candidates.push({ nodeId, node, poleNumber, poleId });
  }
  return candidates;
}

function normalizedTargets(targetPoles: readonly string[] | undefined): Set<string> | undefined {
  if (!targetPoles || targetPoles.length === 0) return undefined;
  const ids = new Set<string>();
  for (const target of targetPoles) {
    const id = normalizePoleId(target);
    if (id) ids.add(id);
  }
  return ids;
}

/**
 * Poles in visitation order; poles outside the sequence keep survey order
 * after the sequenced ones
 */
function orderBySequence(poles: readonly PoleReport[]): PoleReport[] {
  return [...poles].sort(
    (a, b) =>
      (a.operationNumber ?? Number.POSITIVE_INFINITY) - (b.operationNumber ?? Number.POSITIVE_INFINITY)
  );
}

/**
 * Generate the make-ready report for a survey dataset and an optional
 * engineering dataset
 *
 * @throws {InputValidationError} If either dataset is not a usable document
 * @throws {BatchAbortedError} If a pole fails under the `abort` policy
 */
export function generateReport(input: ReportInput, options: ReportOptions): ReportResult {
  const logger = options.logger ?? silentLogger;
  const strategy = options.strategy ?? 'PREFER_ENGINEERING';
  const failurePolicy = options.failurePolicy ?? 'skip';

  const surveyDataset = parseSurveyDataset(input.survey);
  const engineeringDataset =
    input.engineering === undefined || input.engineering === null
      ? undefined
      : parseEngineeringDataset(input.engineering);

  const survey = buildSurveyIndex(surveyDataset);
  const engineering = buildEngineeringIndex(engineeringDataset, options.profile);
  const context: BatchContext = {
    survey,
    engineering,
    resolver: new TraceResolver(survey.traces, logger),
    profile: options.profile,
    strategy,
  };

  logger.info('Starting report', {
    profile: options.profile.name,
    strategy,
    heightStrategy: options.heightStrategy ?? 'PREFER_ENGINEERING',
    engineering: engineeringDataset !== undefined,
    sequenced: engineering.sequence.length,
  });

  const batchWarnings: string[] = [];
  if (!engineeringDataset) {
    batchWarnings.push('No engineering dataset supplied; running survey-only');
  }

  const candidates = collectCandidates(survey, normalizedTargets(options.targetPoles), logger);
  const poles: PoleReport[] = [];
  const failures: PoleFailure[] = [];

  for (const [index, candidate] of candidates.entries()) {
    const poleLogger = logger.child({ pole: candidate.poleNumber });
    try {
      poles.push(buildPoleReport(candidate, context, poleLogger));
    } catch (error) {
      const failure = new PoleProcessingError(candidate.nodeId, candidate.poleNumber, error);
      poleLogger.error('Pole processing failed', { nodeId: candidate.nodeId, error: failure.message });
      if (failurePolicy === 'abort') {
        throw new BatchAbortedError(failure, poles.length);
      }
      failures.push({ nodeId: candidate.nodeId, poleNumber: candidate.poleNumber, message: failure.message });
    }
    options.onProgress?.(index + 1, candidates.length);
  }

  logger.info('Report complete', { poles: poles.length, failures: failures.length });

  return {
    poles: orderBySequence(poles),
    failures,
    warnings: [...batchWarnings, ...poles.flatMap((pole) => pole.warnings)],
    sequence: engineering.sequence,
  };
}

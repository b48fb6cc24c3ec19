/**
 * Trace Resolver
 *
 * Locates the classification record of a survey wire. Trace collections
 * come in several shapes: a flat id-keyed map, a map nested under
 * `trace_data` or `trace_items`, or entries nested one level under an
 * arbitrary group key. Lookup never throws; a miss yields an empty record.
 *
 * @module survey/trace-resolver
 */

import type { EngineLogger } from '../core/logging.js';
import { silentLogger } from '../core/logging.js';
import type { UtilityProfile } from '../core/profile.js';
import {
  asRecord,
  isRecord,
  isTruthyFlag,
  stringField,
  toValue,
  valueText,
  type JsonRecord,
} from '../core/values.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Classification of a single wire
 */
export interface TraceMetadata {
  readonly owner: string;
  readonly cableType: string;
  readonly usageGroup?: string;
  readonly isProposed: boolean;
}

export const UNKNOWN = 'Unknown';

const ALTERNATE_COLLECTIONS = ['trace_data', 'trace_items'] as const;

// ============================================================================
// Resolver
// ============================================================================

export class TraceResolver {
  private readonly traces: JsonRecord;
  private readonly logger: EngineLogger;

  constructor(traces: JsonRecord, logger: EngineLogger = silentLogger) {
    this.traces = traces;
    this.logger = logger;
  }

  /**
   * Trace record for an id, or an empty record when it cannot be found
   */
  resolve(traceId: string | undefined): JsonRecord {
    if (!traceId) return {};

    const direct = this.traces[traceId];
    if (isRecord(direct)) return direct;

    for (const collection of ALTERNATE_COLLECTIONS) {
      const entry = asRecord(this.traces[collection])[traceId];
      if (isRecord(entry)) return entry;
    }

    for (const group of Object.values(this.traces)) {
      if (!isRecord(group)) continue;
      const entry = group[traceId];
      if (isRecord(entry)) return entry;
    }

    this.logger.debug('Trace not found', { traceId });
    return {};
  }
}

// ============================================================================
// Metadata
// ============================================================================

function firstText(record: JsonRecord, keys: readonly string[]): string | undefined {
  for (const key of keys) {
    const raw = record[key];
    if (raw === undefined || raw === null || raw === '' || raw === false) continue;
    const text = valueText(toValue(raw))?.trim();
    if (text) return text;
  }
  return undefined;
}

function firstFlag(record: JsonRecord, keys: readonly string[]): boolean {
  for (const key of keys) {
    const raw = record[key];
    if (raw === undefined || raw === null || raw === '' || raw === false || raw === 0) continue;
    return isTruthyFlag(raw);
  }
  return false;
}

/**
 * Owner, cable type, usage group and proposed flag of a wire
 *
 * The trace is read first; wire-level fields fill whatever it lacks. A
 * known communications owner with no cable type reads as `Communication`.
 */
export function extractWireMetadata(
  wire: JsonRecord,
  trace: JsonRecord,
  profile: UtilityProfile
): TraceMetadata {
  const rawOwner =
    firstText(trace, ['company', 'owner', 'client']) ??
    firstText(wire, ['_company', 'owner', 'client']);
  let cableType =
    firstText(trace, ['cable_type', 'type', 'description']) ??
    firstText(wire, ['_cable_type', 'type', 'description']) ??
    UNKNOWN;
  const isProposed =
    firstFlag(trace, ['proposed', 'is_proposed', 'status']) ||
    firstFlag(wire, ['_proposed', 'is_proposed', 'status']);

  const owner = profile.normalizeOwner(rawOwner) ?? UNKNOWN;
  if (
    cableType === UNKNOWN &&
    owner !== UNKNOWN &&
    !profile.isUtilityOwner(owner) &&
    profile.isCommunicationOwner(owner)
  ) {
    cableType = 'Communication';
  }

  const usageGroup = stringField(trace, 'usageGroup') ?? stringField(wire, 'usageGroup');
  return { owner, cableType, isProposed, ...(usageGroup && { usageGroup }) };
}

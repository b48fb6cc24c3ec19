/**
 * Survey Attachment Extractor
 *
 * Walks every photo of a pole node and emits one record per distinct
 * description. Repeated sightings of the same wire across photos keep the
 * tallest reading.
 *
 * @module attachments/survey-extractor
 */

import type { AttachmentRecord, MidspanValue } from '@make-ready/types';
import type { EngineLogger } from '../core/logging.js';
import type { UtilityProfile } from '../core/profile.js';
import { UNDERGROUND_MIDSPAN, UNSET_MIDSPAN, midspanAt, parseHeightInches } from '../core/units.js';
import { isTruthyFlag, stringField, type JsonRecord } from '../core/values.js';
import { nodeWires } from '../survey/nodes.js';
import { extractWireMetadata, type TraceMetadata, type TraceResolver } from '../survey/trace-resolver.js';
import { isUndergroundText, sortHeight } from './records.js';

export interface SurveyExtractionContext {
  readonly photos: JsonRecord;
  readonly resolver: TraceResolver;
  readonly profile: UtilityProfile;
  readonly logger: EngineLogger;
}

/**
 * A photographed wire with its trace classification and pole height
 */
export interface ClassifiedWire {
  readonly wire: JsonRecord;
  readonly trace: JsonRecord;
  readonly metadata: TraceMetadata;
  readonly heightIn: number;
}

/**
 * Wires of a node that carry a trace reference and a positive measured height
 */
export function classifiedNodeWires(
  node: JsonRecord,
  context: SurveyExtractionContext
): ClassifiedWire[] {
  const wires: ClassifiedWire[] = [];
  for (const wire of nodeWires(node, context.photos)) {
    const traceId = stringField(wire, '_trace');
    if (!traceId) {
      context.logger.debug('Wire has no trace reference', { wire: stringField(wire, 'id') });
      continue;
    }
    const heightIn = parseHeightInches(wire['_measured_height']);
    if (heightIn === undefined || heightIn <= 0) {
      context.logger.debug('Wire has no usable measured height', { traceId });
      continue;
    }
    const trace = context.resolver.resolve(traceId);
    const metadata = extractWireMetadata(wire, trace, context.profile);
    wires.push({ wire, trace, metadata, heightIn });
  }
  return wires;
}

/**
 * Whether a survey wire runs underground: by cable type, description or flag
 */
export function isUndergroundWire(wire: JsonRecord, cableType: string, description: string): boolean {
  return (
    isUndergroundText(cableType) ||
    isUndergroundText(description) ||
    isTruthyFlag(wire['_underground']) ||
    isTruthyFlag(wire['underground'])
  );
}

function surveyMidspan(wire: JsonRecord, underground: boolean): MidspanValue {
  if (underground) return UNDERGROUND_MIDSPAN;
  const midspan = parseHeightInches(wire['_midspan_height']);
  return midspan === undefined ? UNSET_MIDSPAN : midspanAt(midspan);
}

/**
 * Survey-side attachment records keyed by description, in first-seen order
 */
export function extractSurveyAttachments(
  node: JsonRecord,
  context: SurveyExtractionContext
): Map<string, AttachmentRecord> {
  const records = new Map<string, AttachmentRecord>();

  for (const { wire, metadata, heightIn } of classifiedNodeWires(node, context)) {
    const description = context.profile.formatDescription(metadata.owner, metadata.cableType);
    const current = records.get(description);
    if (current && (sortHeight(current) ?? 0) >= heightIn) continue;

    const underground = isUndergroundWire(wire, metadata.cableType, description);
    const wireId = stringField(wire, 'id');
    records.set(description, {
      description,
      owner: metadata.owner,
      ...(metadata.isProposed ? { proposedHeightIn: heightIn } : { existingHeightIn: heightIn }),
      midspanProposed: surveyMidspan(wire, underground),
      isUnderground: underground,
      isProposed: metadata.isProposed,
      isNeutral: false,
      source: 'survey',
      ...(wireId && { wireId }),
      ...(metadata.usageGroup && { usageGroup: metadata.usageGroup }),
    });
  }

  return records;
}

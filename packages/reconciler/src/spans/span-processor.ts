/**
 * Connection/Span Processor
 *
 * Walks every connection touching a pole. Each one gets a summary of its
 * lowest communications and utility-electrical heights. Connections flagged
 * as reference spans, and the one connection leading back to the previous
 * pole in the visitation order, also yield a header plus their own
 * attachment list.
 *
 * A connection is processed as a reference span or as the backspan, never
 * both; reference detection runs first.
 *
 * @module spans/span-processor
 */

import type {
  AttachmentRecord,
  MidspanValue,
  SpanHeaderRow,
  SpanKind,
  SpanSummary,
} from '@make-ready/types';
import type { EngineLogger } from '../core/logging.js';
import type { UtilityProfile } from '../core/profile.js';
import {
  UNDERGROUND_MIDSPAN,
  UNSET_MIDSPAN,
  extractWireHeight,
  midspanAt,
  parseHeightInches,
} from '../core/units.js';
import { asRecord, stringField, type JsonRecord } from '../core/values.js';
import {
  connectionEndpoints,
  wireLookupKey,
  type EngineeringSpanWire,
  type SurveyIndex,
} from '../loader/indices.js';
import { nodeLabel, normalizePoleId, poleNumberOf } from '../survey/nodes.js';
import { extractWireMetadata, type TraceMetadata, type TraceResolver } from '../survey/trace-resolver.js';
import { isUndergroundWire } from '../attachments/survey-extractor.js';
import { sortByHeightDescending } from '../attachments/records.js';
import {
  connectionWires,
  displayLabel,
  isFallbackLabel,
  isReferenceConnection,
  referenceDirection,
  referenceStyle,
} from './connections.js';

// ============================================================================
// Types
// ============================================================================

export interface SpanBlock {
  readonly header: SpanHeaderRow;
  readonly attachments: readonly AttachmentRecord[];
}

/**
 * A classified wire observed on one of the pole's connections
 */
export interface SpanWire {
  readonly connectionId: string;
  readonly owner: string;
  readonly isProposed: boolean;
  readonly heightIn: number;
}

export interface PoleSpans {
  readonly summaries: readonly SpanSummary[];
  readonly references: readonly SpanBlock[];
  readonly backspan?: SpanBlock;
  readonly wires: readonly SpanWire[];
  readonly fromPole: string;
  readonly toPole?: string;
  readonly lowestCommunication: MidspanValue;
  readonly lowestElectrical: MidspanValue;
}

export interface SpanContext {
  readonly survey: SurveyIndex;
  /** Normalized pole ids in visitation order */
  readonly sequence: readonly string[];
  readonly resolver: TraceResolver;
  readonly profile: UtilityProfile;
  readonly logger: EngineLogger;
  /** Engineering span wires; a recommended-only match marks a survey span wire proposed */
  readonly engineeringWires?: ReadonlyMap<string, EngineeringSpanWire>;
}

export interface SpanPole {
  readonly nodeId: string;
  readonly poleNumber: string;
  readonly poleId: string;
}

export interface TracedWire {
  readonly section: JsonRecord;
  readonly wire: JsonRecord;
  readonly metadata: TraceMetadata;
}

// ============================================================================
// Wire Classification
// ============================================================================

function tracedWires(connection: JsonRecord, context: SpanContext): TracedWire[] {
  const traced: TracedWire[] = [];
  for (const { section, wire } of connectionWires(connection, context.survey.photos)) {
    const traceId = stringField(wire, '_trace');
    if (!traceId) continue;
    const trace = context.resolver.resolve(traceId);
    traced.push({ section, wire, metadata: extractWireMetadata(wire, trace, context.profile) });
  }
  return traced;
}

function lowest(current: number | undefined, candidate: number): number {
  return current === undefined || candidate < current ? candidate : current;
}

// ============================================================================
// Span Attachments
// ============================================================================

function spanMidspan(section: JsonRecord, wire: JsonRecord, underground: boolean): MidspanValue {
  if (underground) return UNDERGROUND_MIDSPAN;
  const sectionMidspan = parseHeightInches(section['midspanHeight_in']);
  if (sectionMidspan !== undefined && sectionMidspan !== 0) return midspanAt(sectionMidspan);
  const wireMidspan = parseHeightInches(wire['_midspan_height']);
  if (wireMidspan !== undefined && wireMidspan !== 0) return midspanAt(wireMidspan);
  return UNSET_MIDSPAN;
}

/**
 * Every traced wire of a span as an attachment record, tallest first
 */
export function spanAttachments(
  wires: readonly TracedWire[],
  profile: UtilityProfile
): AttachmentRecord[] {
  const records: AttachmentRecord[] = [];
  for (const { section, wire, metadata } of wires) {
    const heightIn = extractWireHeight(wire);
    if (heightIn === undefined) continue;

    const description = `${metadata.owner} ${metadata.cableType}`.trim() || 'Unknown Attachment';
    const underground = isUndergroundWire(wire, metadata.cableType, description);
    const wireId = stringField(wire, 'id');
    records.push({
      description,
      owner: metadata.owner,
      ...(metadata.isProposed ? { proposedHeightIn: heightIn } : { existingHeightIn: heightIn }),
      midspanProposed: spanMidspan(section, wire, underground),
      isUnderground: underground,
      isProposed: metadata.isProposed,
      isNeutral: profile.isNeutral(metadata.cableType),
      source: 'survey',
      ...(wireId && { wireId }),
    });
  }
  return sortByHeightDescending(records);
}

// ============================================================================
// Processor
// ============================================================================

function otherEnd(endpoints: readonly [string, string], nodeId: string): string {
  return endpoints[0] === nodeId ? endpoints[1] : endpoints[0];
}

/**
 * Connection back to the previous pole of the visitation order, if any
 */
function findBackspanConnection(
  pole: SpanPole,
  context: SpanContext,
  excluded: ReadonlySet<string>
): { readonly connectionId: string; readonly previousPoleId: string } | undefined {
  const position = context.sequence.indexOf(pole.poleId);
  if (position <= 0) return undefined;

  const previousPoleId = context.sequence[position - 1];
  if (previousPoleId === undefined) return undefined;
  const previousNodeId = context.survey.nodeIdByPoleId.get(previousPoleId);
  if (!previousNodeId) return undefined;

  for (const connectionId of context.survey.connectionIdsByNodeId.get(pole.nodeId) ?? []) {
    if (excluded.has(connectionId)) continue;
    const endpoints = connectionEndpoints(asRecord(context.survey.connections[connectionId]));
    if (endpoints && otherEnd(endpoints, pole.nodeId) === previousNodeId) {
      return { connectionId, previousPoleId };
    }
  }
  return undefined;
}

function heightValue(inches: number | undefined): MidspanValue {
  return inches === undefined ? UNSET_MIDSPAN : midspanAt(inches);
}

export function processPoleSpans(pole: SpanPole, context: SpanContext): PoleSpans {
  const { survey, profile, logger } = context;
  const connectionIds = survey.connectionIdsByNodeId.get(pole.nodeId) ?? [];
  const currentNode = asRecord(survey.nodes[pole.nodeId]);

  const summaries: SpanSummary[] = [];
  const references: SpanBlock[] = [];
  const wires: SpanWire[] = [];
  const tracedByConnection = new Map<string, TracedWire[]>();
  const referenceIds = new Set<string>();

  for (const connectionId of connectionIds) {
    const connection = asRecord(survey.connections[connectionId]);
    const endpoints = connectionEndpoints(connection);
    if (!endpoints) continue;

    const traced = tracedWires(connection, context);
    tracedByConnection.set(connectionId, traced);

    if (isReferenceConnection(connection)) {
      referenceIds.add(connectionId);
      const otherNodeId = otherEnd(endpoints, pole.nodeId);
      const direction = referenceDirection(connection, currentNode, asRecord(survey.nodes[otherNodeId]));
      references.push({
        header: {
          kind: 'reference_header',
          text: `Ref (${direction}) to ${displayLabel(nodeLabel(survey.nodes, otherNodeId))}`,
          style: referenceStyle(connection, direction),
          connectionId,
        },
        attachments: spanAttachments(traced, profile),
      });
    }
  }

  const backspanMatch = findBackspanConnection(pole, context, referenceIds);
  let backspan: SpanBlock | undefined;
  if (backspanMatch) {
    backspan = {
      header: {
        kind: 'backspan_header',
        text: `Ref (Backspan) to ${backspanMatch.previousPoleId}`,
        style: 'light-blue',
        connectionId: backspanMatch.connectionId,
      },
      attachments: spanAttachments(tracedByConnection.get(backspanMatch.connectionId) ?? [], profile),
    };
  }

  for (const connectionId of connectionIds) {
    const traced = tracedByConnection.get(connectionId);
    const endpoints = connectionEndpoints(asRecord(survey.connections[connectionId]));
    if (!traced || !endpoints) continue;

    const otherNodeId = otherEnd(endpoints, pole.nodeId);
    const otherPoleId = normalizePoleId(poleNumberOf(asRecord(survey.nodes[otherNodeId])));

    let lowestCommunicationIn: number | undefined;
    let lowestElectricalIn: number | undefined;
    for (const { wire, metadata } of traced) {
      const heightIn = extractWireHeight(wire);
      if (heightIn === undefined) continue;
      const designed = otherPoleId
        ? context.engineeringWires?.get(wireLookupKey(metadata.owner, [pole.poleId, otherPoleId]))
        : undefined;
      wires.push({
        connectionId,
        owner: metadata.owner,
        isProposed: metadata.isProposed || designed?.design === 'recommended',
        heightIn,
      });
      if (profile.isCommunication(metadata.owner, metadata.cableType)) {
        lowestCommunicationIn = lowest(lowestCommunicationIn, heightIn);
      }
      if (profile.isUtilityElectrical(metadata.owner, metadata.cableType)) {
        lowestElectricalIn = lowest(lowestElectricalIn, heightIn);
      }
    }

    const kind: SpanKind = referenceIds.has(connectionId)
      ? 'reference'
      : backspanMatch?.connectionId === connectionId
        ? 'backspan'
        : 'primary';
    summaries.push({
      connectionId,
      otherNodeId,
      otherLabel: nodeLabel(survey.nodes, otherNodeId),
      kind,
      ...(lowestCommunicationIn !== undefined && { lowestCommunicationIn }),
      ...(lowestElectricalIn !== undefined && { lowestElectricalIn }),
    });
  }

  logger.debug('Processed connections', {
    connections: summaries.length,
    references: references.length,
    backspan: backspan?.header.connectionId,
  });

  const primary = summaries.find((summary) => !isFallbackLabel(summary.otherLabel)) ?? summaries[0];
  return {
    summaries,
    references,
    ...(backspan && { backspan }),
    wires,
    fromPole: pole.poleNumber,
    ...(primary && { toPole: primary.otherLabel }),
    lowestCommunication: heightValue(primary?.lowestCommunicationIn),
    lowestElectrical: heightValue(primary?.lowestElectricalIn),
  };
}

/**
 * Per-span lowest midspan heights toward neighbouring poles.
 *
 * Only true midspan readings count here; the pole attachment height is a
 * last resort when a wire carries no midspan value at all.
 *
 * @module spans/midspan-heights
 */

import type { MidspanValue, SpanMidspanHeights } from '@make-ready/types';
import type { UtilityProfile } from '../core/profile.js';
import { UNDERGROUND_MIDSPAN, UNSET_MIDSPAN, midspanAt, parseHeightInches } from '../core/units.js';
import { asRecord, stringField, type JsonRecord } from '../core/values.js';
import { connectionEndpoints, type SurveyIndex } from '../loader/indices.js';
import { poleNumberOf } from '../survey/nodes.js';
import { extractWireMetadata, type TraceResolver } from '../survey/trace-resolver.js';
import { connectionWires, isUndergroundPath } from './connections.js';

function firstHeight(...candidates: unknown[]): number | undefined {
  for (const candidate of candidates) {
    const height = parseHeightInches(candidate);
    if (height !== undefined) return height;
  }
  return undefined;
}

function heightOrUnset(inches: number | undefined): MidspanValue {
  return inches === undefined ? UNSET_MIDSPAN : midspanAt(inches);
}

function isPowerGroup(usageGroup: string | undefined): boolean {
  return usageGroup?.toLowerCase().includes('power') ?? false;
}

/**
 * Lowest communications and electrical midspan per neighbouring pole
 *
 * Neighbours without a pole number are skipped. Underground-path
 * connections report UG for both values.
 */
export function spanMidspanHeights(
  nodeId: string,
  survey: SurveyIndex,
  resolver: TraceResolver,
  profile: UtilityProfile
): SpanMidspanHeights[] {
  const heights: SpanMidspanHeights[] = [];

  for (const connectionId of survey.connectionIdsByNodeId.get(nodeId) ?? []) {
    const connection: JsonRecord = asRecord(survey.connections[connectionId]);
    const endpoints = connectionEndpoints(connection);
    if (!endpoints) continue;

    const otherNodeId = endpoints[0] === nodeId ? endpoints[1] : endpoints[0];
    const otherLabel = poleNumberOf(asRecord(survey.nodes[otherNodeId]));
    if (!otherLabel) continue;

    if (isUndergroundPath(connection)) {
      heights.push({ otherLabel, communication: UNDERGROUND_MIDSPAN, electrical: UNDERGROUND_MIDSPAN });
      continue;
    }

    let communication: number | undefined;
    let electrical: number | undefined;
    for (const { section, wire } of connectionWires(connection, survey.photos)) {
      const traceId = stringField(wire, '_trace');
      if (!traceId) continue;
      const height = firstHeight(
        wire['_midspan_height'],
        wire['midspanHeight_in'],
        section['midspanHeight_in'],
        wire['_measured_height']
      );
      if (height === undefined) continue;

      const metadata = extractWireMetadata(wire, resolver.resolve(traceId), profile);
      if (profile.isUtilityOwner(metadata.owner)) {
        if (
          profile.isUtilityElectrical(metadata.owner, metadata.cableType) ||
          isPowerGroup(metadata.usageGroup)
        ) {
          electrical = electrical === undefined ? height : Math.min(electrical, height);
        }
      } else {
        communication = communication === undefined ? height : Math.min(communication, height);
      }
    }

    heights.push({
      otherLabel,
      communication: heightOrUnset(communication),
      electrical: heightOrUnset(electrical),
    });
  }

  return heights;
}

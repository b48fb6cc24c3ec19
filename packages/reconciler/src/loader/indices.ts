/**
 * Source Indices
 *
 * Lookups built once per batch, before any pole is processed, and shared
 * read-only by every pole afterwards.
 *
 * @module loader/indices
 */

import { itemOwnerId, locationDesigns, structureItems } from '../engineering/designs.js';
import type { UtilityProfile } from '../core/profile.js';
import { asArray, asRecord, isRecord, stringField, type JsonRecord } from '../core/values.js';
import type { EngineeringDataset, SurveyDataset } from '../input/schemas.js';
import { normalizePoleId, poleNumberOf } from '../survey/nodes.js';

// ============================================================================
// Engineering Index
// ============================================================================

/**
 * Engineering wire on a span, with the design that first declares it
 */
export interface EngineeringSpanWire {
  readonly wire: JsonRecord;
  /** `recommended` when no measured design carries the wire */
  readonly design: 'measured' | 'recommended';
}

export interface EngineeringIndex {
  /** Location per normalized pole id (first occurrence wins) */
  readonly locationsByPoleId: ReadonlyMap<string, JsonRecord>;
  /** Normalized pole ids in visitation order, without repeats */
  readonly sequence: readonly string[];
  /** Span wire per `owner|endpoint,endpoint` key */
  readonly wireLookup: ReadonlyMap<string, EngineeringSpanWire>;
  /** Construction grade of the first analysis case that declares one */
  readonly constructionGrade?: string;
}

export const EMPTY_ENGINEERING_INDEX: EngineeringIndex = {
  locationsByPoleId: new Map(),
  sequence: [],
  wireLookup: new Map(),
};

/**
 * Key of the wire lookup: owner plus the sorted distinct span endpoints
 */
export function wireLookupKey(owner: string, endpoints: readonly string[]): string {
  const unique = [...new Set(endpoints.filter((endpoint) => endpoint !== ''))].sort();
  return `${owner}|${unique.join(',')}`;
}

function locationLabel(location: JsonRecord): string | undefined {
  return stringField(location, 'label');
}

function constructionGradeOf(dataset: EngineeringDataset): string | undefined {
  for (const analysisCase of asArray(asRecord(dataset.clientData)['analysisCases'])) {
    if (!isRecord(analysisCase) || !('constructionGrade' in analysisCase)) continue;
    const grade = stringField(analysisCase, 'constructionGrade');
    if (grade) return grade;
  }
  return undefined;
}

export function buildEngineeringIndex(
  dataset: EngineeringDataset | undefined,
  profile: UtilityProfile
): EngineeringIndex {
  if (!dataset) return EMPTY_ENGINEERING_INDEX;

  const locationsByPoleId = new Map<string, JsonRecord>();
  const sequence: string[] = [];
  const wireLookup = new Map<string, EngineeringSpanWire>();

  for (const lead of dataset.leads) {
    for (const location of lead.locations) {
      const poleId = normalizePoleId(locationLabel(location));
      if (!poleId) continue;

      if (!locationsByPoleId.has(poleId)) {
        locationsByPoleId.set(poleId, location);
        sequence.push(poleId);
      }

      const { measured, recommended } = locationDesigns(location);
      for (const [design, structure] of [
        ['measured', measured],
        ['recommended', recommended],
      ] as const) {
        for (const wire of structureItems(structure, 'wires')) {
          const owner = profile.normalizeOwner(itemOwnerId(wire)) ?? '';
          const endpoints = [poleId];
          for (const endpoint of asArray(wire['wireEndPoints'])) {
            if (!isRecord(endpoint)) continue;
            const other = normalizePoleId(stringField(endpoint, 'label'));
            if (other) endpoints.push(other);
          }
          const key = wireLookupKey(owner, endpoints);
          // a measured wire takes the key even when another location proposed it first
          if (design === 'measured' || !wireLookup.has(key)) {
            wireLookup.set(key, { wire, design });
          }
        }
      }
    }
  }

  const constructionGrade = constructionGradeOf(dataset);
  return {
    locationsByPoleId,
    sequence,
    wireLookup,
    ...(constructionGrade && { constructionGrade }),
  };
}

/**
 * 1-based position of a pole in the visitation order
 */
export function operationNumberOf(index: EngineeringIndex, poleId: string): number | undefined {
  const position = index.sequence.indexOf(poleId);
  return position === -1 ? undefined : position + 1;
}

// ============================================================================
// Survey Index
// ============================================================================

export interface SurveyIndex {
  readonly nodes: JsonRecord;
  readonly connections: JsonRecord;
  readonly photos: JsonRecord;
  readonly traces: JsonRecord;
  /** First node carrying each normalized pole id */
  readonly nodeIdByPoleId: ReadonlyMap<string, string>;
  /** Connection ids touching each node, in dataset order */
  readonly connectionIdsByNodeId: ReadonlyMap<string, readonly string[]>;
}

export function connectionEndpoints(connection: JsonRecord): [string, string] | undefined {
  const first = stringField(connection, 'node_id_1');
  const second = stringField(connection, 'node_id_2');
  if (!first || !second) return undefined;
  return [first, second];
}

export function buildSurveyIndex(dataset: SurveyDataset): SurveyIndex {
  const nodeIdByPoleId = new Map<string, string>();
  for (const [nodeId, node] of Object.entries(dataset.nodes)) {
    const poleId = normalizePoleId(poleNumberOf(asRecord(node)));
    if (poleId && !nodeIdByPoleId.has(poleId)) {
      nodeIdByPoleId.set(poleId, nodeId);
    }
  }

  const connectionIdsByNodeId = new Map<string, string[]>();
  for (const [connectionId, connection] of Object.entries(dataset.connections)) {
    const endpoints = connectionEndpoints(asRecord(connection));
    if (!endpoints) continue;
    for (const nodeId of new Set(endpoints)) {
      const ids = connectionIdsByNodeId.get(nodeId) ?? [];
      ids.push(connectionId);
      connectionIdsByNodeId.set(nodeId, ids);
    }
  }

  return {
    nodes: dataset.nodes,
    connections: dataset.connections,
    photos: dataset.photos,
    traces: dataset.traces,
    nodeIdByPoleId,
    connectionIdsByNodeId,
  };
}

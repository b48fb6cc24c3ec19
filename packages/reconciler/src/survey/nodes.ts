/**
 * Survey node identity: pole numbers, labels for non-pole endpoints, and
 * photo wire collections.
 *
 * @module survey/nodes
 */

import {
  asRecord,
  extractWithPriority,
  isRecord,
  recordItems,
  stringField,
  toFiniteNumber,
  toValue,
  valueText,
  type JsonRecord,
} from '../core/values.js';

/**
 * Attribute names holding a pole number, highest priority first
 */
export const POLE_NUMBER_FIELDS: readonly string[] = [
  'PoleNumber',
  'pl_number',
  'dloc_number',
  'PL_number',
  'DLOC_number',
  'pole_tag',
  'electric_pole_tag',
];

const REFERENCE_NAME_FIELDS: readonly string[] = [
  'name',
  'label',
  'scid',
  'reference_name',
  'description',
];

const DESCRIPTIVE_NODE_TYPES = new Set(['reference', 'service', 'anchor']);

const POLE_BUTTONS = new Set(['aerial', 'pole', 'aerial_path']);

/**
 * Trailing digit run of a pole label ("PL410620" -> "410620")
 */
export function normalizePoleId(label: string | undefined): string | undefined {
  if (!label) return undefined;
  const match = /(\d+)$/.exec(label.trim());
  return match ? match[1] : undefined;
}

export function nodeAttributes(node: JsonRecord): JsonRecord {
  return asRecord(node['attributes']);
}

export function poleNumberOf(node: JsonRecord): string | undefined {
  return extractWithPriority(nodeAttributes(node), POLE_NUMBER_FIELDS);
}

function nodeType(attributes: JsonRecord): string | undefined {
  return valueText(toValue(attributes['node_type']))?.trim().toLowerCase() || undefined;
}

export function isPoleNode(node: JsonRecord): boolean {
  const button = stringField(node, 'button')?.toLowerCase();
  if (button && POLE_BUTTONS.has(button)) return true;
  return nodeType(nodeAttributes(node)) === 'pole';
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

/**
 * Label for any node: its pole number, or a synthesized descriptive label
 * for reference, service and anchor nodes, or `Node-<id prefix>`
 */
export function nodeLabel(nodes: JsonRecord, nodeId: string): string {
  const node = asRecord(nodes[nodeId]);
  const poleNumber = poleNumberOf(node);
  if (poleNumber) return poleNumber;

  const attributes = nodeAttributes(node);
  const type = nodeType(attributes);
  const shortId = nodeId.slice(0, 6);
  if (type && DESCRIPTIVE_NODE_TYPES.has(type)) {
    const name = extractWithPriority(attributes, REFERENCE_NAME_FIELDS);
    return name ? `Reference-${name}` : `${capitalize(type)}-${shortId}`;
  }
  return `Node-${shortId}`;
}

/**
 * Geographic position of a node as [longitude, latitude]
 */
export function nodePosition(node: JsonRecord): [number, number] | undefined {
  const latitude = toFiniteNumber(node['latitude']);
  const longitude = toFiniteNumber(node['longitude']);
  if (latitude === undefined || longitude === undefined) return undefined;
  return [longitude, latitude];
}

/**
 * Wire entries of a photo, whether stored as a list or an id-keyed map
 *
 * Photo data embedded on the node wins; otherwise the dataset-level photo
 * collection is consulted by id.
 */
export function photoWires(
  photoId: string,
  embedded: unknown,
  datasetPhotos: JsonRecord
): JsonRecord[] {
  const local = asRecord(embedded)['photofirst_data'];
  const photofirst = isRecord(local)
    ? local
    : asRecord(asRecord(datasetPhotos[photoId])['photofirst_data']);
  return recordItems(photofirst['wire']);
}

/**
 * Every wire photographed at a pole node
 */
export function nodeWires(node: JsonRecord, datasetPhotos: JsonRecord): JsonRecord[] {
  const wires: JsonRecord[] = [];
  for (const [photoId, photo] of Object.entries(asRecord(node['photos']))) {
    wires.push(...photoWires(photoId, photo, datasetPhotos));
  }
  return wires;
}

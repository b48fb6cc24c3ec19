/**
 * Connection helpers: span classification flags, section wires, header
 * direction, color and the other-end label.
 *
 * @module spans/connections
 */

import { bearing } from '@turf/bearing';
import { point } from '@turf/helpers';
import type { HeaderStyle } from '@make-ready/types';
import { asRecord, isRecord, recordItems, stringField, toValue, valueText, type JsonRecord } from '../core/values.js';
import { normalizePoleId, nodePosition } from '../survey/nodes.js';

// ============================================================================
// Reference Detection
// ============================================================================

const SPAN_CLASSIFICATION_FIELDS = [
  'span_type',
  'spanType',
  'connection_classification',
  'span_classification',
];

function firstValueText(raw: unknown): string | undefined {
  if (typeof raw === 'string') return raw;
  if (!isRecord(raw)) return undefined;
  for (const value of Object.values(raw)) {
    return typeof value === 'string' ? value : undefined;
  }
  return undefined;
}

/**
 * Whether a connection is flagged as a reference span
 *
 * Checked in order: `connection_type.button_added`, a direct
 * `button_added`, a boolean or string `reference` attribute, and finally a
 * span-classification field that mentions "reference".
 */
export function isReferenceConnection(connection: JsonRecord): boolean {
  const attributes = asRecord(connection['attributes']);

  if (asRecord(attributes['connection_type'])['button_added'] === 'reference') return true;
  if (attributes['button_added'] === 'reference') return true;

  const reference = attributes['reference'];
  if (reference === true) return true;
  if (typeof reference === 'string' && reference.trim().toLowerCase() === 'true') return true;

  return SPAN_CLASSIFICATION_FIELDS.some((field) =>
    firstValueText(attributes[field])?.toLowerCase().includes('reference')
  );
}

export function isUndergroundPath(connection: JsonRecord): boolean {
  return stringField(connection, 'button')?.toLowerCase() === 'underground_path';
}

// ============================================================================
// Sections and Wires
// ============================================================================

export interface SectionWire {
  readonly section: JsonRecord;
  readonly wire: JsonRecord;
}

/**
 * Every photographed wire on every section of a connection
 *
 * Section photo entries are keyed by photo id; wire data is read from the
 * dataset-level photo collection.
 */
export function connectionWires(connection: JsonRecord, photos: JsonRecord): SectionWire[] {
  const wires: SectionWire[] = [];
  for (const section of recordItems(connection['sections'])) {
    for (const photoId of Object.keys(asRecord(section['photos']))) {
      const photofirst = asRecord(asRecord(photos[photoId])['photofirst_data']);
      for (const wire of recordItems(photofirst['wire'])) {
        wires.push({ section, wire });
      }
    }
  }
  return wires;
}

// ============================================================================
// Header Attributes
// ============================================================================

const TAG_PAYLOAD_KEYS = ['-Notes Added', 'button_added', 'assessment', '-Imported'];

const DIRECTION_FIELDS = ['direction_tag', 'direction', 'span_direction', 'ref_direction'];
const COLOR_FIELDS = ['color_tag', 'color', 'span_color', 'ref_color'];

/**
 * Text of a tag attribute: a string, or a wrapper whose payload is a string
 * or carries `tagtext`
 */
export function tagText(raw: unknown): string | undefined {
  if (typeof raw === 'string') return raw.trim() || undefined;
  if (!isRecord(raw)) return undefined;
  for (const key of TAG_PAYLOAD_KEYS) {
    const payload = raw[key];
    if (typeof payload === 'string') return payload.trim() || undefined;
    if (isRecord(payload)) {
      const text = valueText(toValue(payload['tagtext']));
      if (text) return text.trim() || undefined;
    }
  }
  return undefined;
}

function firstTag(attributes: JsonRecord, fields: readonly string[]): string | undefined {
  for (const field of fields) {
    const text = tagText(attributes[field]);
    if (text) return text;
  }
  return undefined;
}

const COMPASS_POINTS = [
  'North',
  'North East',
  'East',
  'South East',
  'South',
  'South West',
  'West',
  'North West',
] as const;

/**
 * Eight-point compass direction from one node to another
 */
export function compassDirection(from: JsonRecord, to: JsonRecord): string | undefined {
  const origin = nodePosition(from);
  const target = nodePosition(to);
  if (!origin || !target) return undefined;
  if (origin[0] === target[0] && origin[1] === target[1]) return undefined;

  const degrees = (bearing(point(origin), point(target)) + 360) % 360;
  return COMPASS_POINTS[Math.round(degrees / 45) % 8];
}

/**
 * Reference direction: a tagged attribute, else the bearing between the
 * endpoints, else "Reference"
 */
export function referenceDirection(
  connection: JsonRecord,
  currentNode: JsonRecord,
  otherNode: JsonRecord
): string {
  return (
    firstTag(asRecord(connection['attributes']), DIRECTION_FIELDS) ??
    compassDirection(currentNode, otherNode) ??
    'Reference'
  );
}

function isSouthEast(direction: string): boolean {
  const lower = direction.toLowerCase();
  return lower.includes('south east') || lower.includes('southeast');
}

/**
 * Header style of a reference span: purple when facing south-east, else
 * the tagged color, else orange
 */
export function referenceStyle(connection: JsonRecord, direction: string): HeaderStyle {
  if (isSouthEast(direction)) return 'purple';
  const color = firstTag(asRecord(connection['attributes']), COLOR_FIELDS)?.toLowerCase();
  if (color?.includes('purple')) return 'purple';
  return 'orange';
}

// ============================================================================
// Labels
// ============================================================================

const FALLBACK_LABEL_PREFIXES = ['Reference-', 'Service-', 'Anchor-', 'Node-', 'Unknown-'];

export function isFallbackLabel(label: string): boolean {
  return FALLBACK_LABEL_PREFIXES.some((prefix) => label.startsWith(prefix));
}

/**
 * Display form of the other end of a span: plain or `PL`-prefixed numeric
 * labels render as `PL<digits>`, everything else as-is
 */
export function displayLabel(label: string): string {
  if (isFallbackLabel(label)) return label;
  if (/^\d+$/.test(label) || /^PL\d+$/i.test(label)) {
    const digits = normalizePoleId(label);
    return digits ? `PL${digits}` : label;
  }
  return label;
}

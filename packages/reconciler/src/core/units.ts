/**
 * Height Units
 *
 * Inches are the single canonical unit inside the engine. Conversions happen
 * once, at extraction; formatting to feet-inches strings happens at output.
 *
 * @module core/units
 */

import type { MidspanValue } from '@make-ready/types';
import { isRecord, toFiniteNumber, type JsonRecord } from './values.js';

export const METERS_TO_INCHES = 39.3701;

export const NOT_AVAILABLE = 'N/A';
export const UNDERGROUND = 'UG';

export const UNSET_MIDSPAN: MidspanValue = { kind: 'unset' };
export const UNDERGROUND_MIDSPAN: MidspanValue = { kind: 'underground' };

export function midspanAt(inches: number): MidspanValue {
  return { kind: 'height', inches };
}

export function metersToInches(meters: number): number {
  return meters * METERS_TO_INCHES;
}

/**
 * Format inches as `F'-I"`, carrying a rounded 12 into the feet
 */
export function toFeetInchesString(inches: number): string {
  let feet = Math.floor(inches / 12);
  let remainder = Math.round(((inches % 12) + 12) % 12);
  if (remainder === 12) {
    feet += 1;
    remainder = 0;
  }
  return `${feet}'-${remainder}"`;
}

/**
 * Parse `F'-I"`, `F' I"`, `F'I"`, whole feet `F'` or a plain number of inches
 */
export function parseFeetInchesString(text: string): number | undefined {
  const match = /^\s*(\d+)'(?:[-\s]*(\d+)"?)?/.exec(text);
  if (match) {
    return Number(match[1]) * 12 + Number(match[2] ?? 0);
  }
  return toFiniteNumber(text);
}

/**
 * Height string, or N/A when unset
 */
export function formatHeight(inches: number | undefined): string {
  return inches === undefined ? NOT_AVAILABLE : toFeetInchesString(inches);
}

export function formatMidspan(value: MidspanValue): string {
  switch (value.kind) {
    case 'underground':
      return UNDERGROUND;
    case 'height':
      return toFeetInchesString(value.inches);
    case 'unset':
      return NOT_AVAILABLE;
  }
}

/**
 * Inches from a raw height: numeric, numeric string or feet-inches string
 */
export function parseHeightInches(raw: unknown): number | undefined {
  if (typeof raw === 'string') {
    return parseFeetInchesString(raw);
  }
  return toFiniteNumber(raw);
}

/**
 * Inches from a `{ value, unit }` measurement (meters when unit is absent)
 */
export function measurementToInches(
  measurement: unknown,
  defaultUnit: 'm' | 'in' = 'm'
): number | undefined {
  if (!isRecord(measurement)) return undefined;
  const value = toFiniteNumber(measurement['value']);
  if (value === undefined) return undefined;

  const unit = typeof measurement['unit'] === 'string' ? measurement['unit'].toLowerCase() : defaultUnit;
  switch (unit) {
    case 'm':
    case 'meter':
    case 'meters':
    case 'metre':
      return metersToInches(value);
    case 'ft':
    case 'foot':
    case 'feet':
      return value * 12;
    default:
      return value;
  }
}

/**
 * Coordinate-style keys report meters when the value is this small
 */
const COORDINATE_METERS_THRESHOLD = 15;

/**
 * Extract a wire's height in inches
 *
 * Keys in priority order: `_measured_height`, `measured_height`, `height`,
 * `attachmentHeight {value, unit}` (inches when no unit is given),
 * `position.z`, `position.z_coord`, `elevation`, `measuredHeight_in`.
 * An unparsable value falls through to the next key.
 */
export function extractWireHeight(wire: JsonRecord): number | undefined {
  for (const key of ['_measured_height', 'measured_height', 'height']) {
    const height = parseHeightInches(wire[key]);
    if (height !== undefined) return height;
  }

  const attachment = measurementToInches(wire['attachmentHeight'], 'in');
  if (attachment !== undefined) return attachment;

  const position = isRecord(wire['position']) ? wire['position'] : {};
  const coordinateCandidates = [position['z'], position['z_coord'], wire['elevation']];
  for (const raw of coordinateCandidates) {
    const height = parseHeightInches(raw);
    if (height === undefined) continue;
    return height < COORDINATE_METERS_THRESHOLD ? metersToInches(height) : height;
  }

  return parseHeightInches(wire['measuredHeight_in']);
}

/**
 * Engineering design accessors
 *
 * A location carries `designs[]`; the ones labelled "Measured Design" and
 * "Recommended Design" are the as-built baseline and the target. Each design
 * holds `structure.wires`, `structure.equipments` and `structure.guys`.
 *
 * @module engineering/designs
 */

import { asArray, asRecord, isRecord, stringField, type JsonRecord } from '../core/values.js';

export type StructureCollection = 'wires' | 'equipments' | 'guys';

export interface LocationDesigns {
  readonly measured?: JsonRecord;
  readonly recommended?: JsonRecord;
}

const MEASURED_LABEL = 'measured design';
const RECOMMENDED_LABEL = 'recommended design';

/**
 * Measured and recommended designs of a location (first of each label)
 */
export function locationDesigns(location: JsonRecord): LocationDesigns {
  let measured: JsonRecord | undefined;
  let recommended: JsonRecord | undefined;
  for (const design of asArray(location['designs'])) {
    if (!isRecord(design)) continue;
    const label = stringField(design, 'label')?.toLowerCase();
    if (label === MEASURED_LABEL && !measured) measured = design;
    else if (label === RECOMMENDED_LABEL && !recommended) recommended = design;
  }
  return { measured, recommended };
}

export function structureItems(
  design: JsonRecord | undefined,
  collection: StructureCollection
): JsonRecord[] {
  if (!design) return [];
  return asArray(asRecord(design['structure'])[collection]).filter(isRecord);
}

/**
 * `owner.id` of a structure item, falling back to a plain `owner` string
 */
export function itemOwnerId(item: JsonRecord): string {
  const owner = item['owner'];
  if (isRecord(owner)) return stringField(owner, 'id') ?? '';
  return stringField(item, 'owner') ?? '';
}

export function clientItemField(item: JsonRecord, key: 'description' | 'type' | 'size'): string {
  return stringField(asRecord(item['clientItem']), key) ?? '';
}

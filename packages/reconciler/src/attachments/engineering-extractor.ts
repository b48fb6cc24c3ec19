/**
 * Engineering Attachment Extractor
 *
 * Reads the measured (as-built) and recommended (target) designs of an
 * engineering location. Every measured wire and equipment item becomes an
 * existing attachment; recommended items are matched back to a measured
 * item to detect moves, and anything left unmatched is a new install.
 *
 * Match order for a recommended item:
 * 1. detailed key `owner||description||type||usageGroup||id`
 * 2. simple key `owner||description`
 * 3. equal item id
 * 4. relaxed provider-family match on a shared keyword
 *
 * A measured item is matched at most once.
 *
 * @module attachments/engineering-extractor
 */

import type { AttachmentRecord } from '@make-ready/types';
import type { EngineLogger } from '../core/logging.js';
import type { UtilityProfile } from '../core/profile.js';
import { UNDERGROUND_MIDSPAN, UNSET_MIDSPAN, measurementToInches } from '../core/units.js';
import { stringField, type JsonRecord } from '../core/values.js';
import {
  clientItemField,
  itemOwnerId,
  locationDesigns,
  structureItems,
} from '../engineering/designs.js';
import { UNKNOWN } from '../survey/trace-resolver.js';
import { HEIGHT_TOLERANCE_IN, isUndergroundText } from './records.js';

// ============================================================================
// Design Items
// ============================================================================

/**
 * One wire or equipment item of a design, normalized
 */
export interface DesignItem {
  readonly owner: string;
  readonly itemDescription: string;
  readonly cableType: string;
  readonly usageGroup: string;
  readonly id: string;
  readonly heightIn?: number;
  readonly underground: boolean;
  readonly description: string;
  readonly simpleKey: string;
  readonly detailedKey: string;
}

export function toDesignItem(item: JsonRecord, profile: UtilityProfile): DesignItem {
  const owner = profile.normalizeOwner(itemOwnerId(item)) ?? UNKNOWN;
  const cableType = clientItemField(item, 'type');
  const itemDescription = clientItemField(item, 'description') || cableType;
  const usageGroup = stringField(item, 'usageGroup') ?? '';
  const id = stringField(item, 'id') ?? '';
  const descriptionKey = itemDescription.toLowerCase();

  return {
    owner,
    itemDescription,
    cableType,
    usageGroup,
    id,
    heightIn: measurementToInches(item['attachmentHeight'], 'm'),
    underground: isUndergroundText(itemDescription) || isUndergroundText(cableType),
    description: profile.formatDescription(owner, itemDescription),
    simpleKey: `${owner}||${descriptionKey}`,
    detailedKey: [owner, descriptionKey, cableType.toLowerCase(), usageGroup.toLowerCase(), id].join('||'),
  };
}

/**
 * Wires then equipment of a design
 */
export function designItems(design: JsonRecord | undefined, profile: UtilityProfile): DesignItem[] {
  return [...structureItems(design, 'wires'), ...structureItems(design, 'equipments')].map((item) =>
    toDesignItem(item, profile)
  );
}

// ============================================================================
// Matching
// ============================================================================

interface MeasuredEntry {
  readonly item: DesignItem;
  record: AttachmentRecord;
  matched: boolean;
}

function findMatch(
  recommended: DesignItem,
  measured: readonly MeasuredEntry[],
  profile: UtilityProfile
): MeasuredEntry | undefined {
  const open = measured.filter((entry) => !entry.matched);
  return (
    open.find((entry) => entry.item.detailedKey === recommended.detailedKey) ??
    open.find((entry) => entry.item.simpleKey === recommended.simpleKey) ??
    (recommended.id !== '' ? open.find((entry) => entry.item.id === recommended.id) : undefined) ??
    open.find((entry) =>
      profile.sharesProviderFamily(
        { owner: entry.item.owner, text: `${entry.item.itemDescription} ${entry.item.cableType}` },
        { owner: recommended.owner, text: `${recommended.itemDescription} ${recommended.cableType}` }
      )
    )
  );
}

function baseRecord(item: DesignItem): Omit<AttachmentRecord, 'existingHeightIn' | 'proposedHeightIn'> {
  return {
    description: item.description,
    owner: item.owner,
    midspanProposed: item.underground ? UNDERGROUND_MIDSPAN : UNSET_MIDSPAN,
    isUnderground: item.underground,
    isProposed: false,
    isNeutral: false,
    source: 'engineering',
    ...(item.id && { wireId: item.id }),
    ...(item.usageGroup && { usageGroup: item.usageGroup }),
  };
}

// ============================================================================
// Extraction
// ============================================================================

/**
 * Engineering-side attachment records for one location
 *
 * Measured items come first in design order, followed by new installs.
 */
export function extractEngineeringAttachments(
  location: JsonRecord,
  profile: UtilityProfile,
  logger: EngineLogger
): AttachmentRecord[] {
  const { measured, recommended } = locationDesigns(location);

  const measuredEntries: MeasuredEntry[] = [];
  for (const item of designItems(measured, profile)) {
    if (item.heightIn === undefined) {
      logger.debug('Measured item has no attachment height', { item: item.description });
      continue;
    }
    measuredEntries.push({
      item,
      record: { ...baseRecord(item), existingHeightIn: item.heightIn },
      matched: false,
    });
  }

  const installs: AttachmentRecord[] = [];
  for (const item of designItems(recommended, profile)) {
    const match = findMatch(item, measuredEntries, profile);

    if (!match) {
      if (item.heightIn === undefined) {
        logger.debug('Recommended item has no attachment height', { item: item.description });
        continue;
      }
      installs.push({ ...baseRecord(item), proposedHeightIn: item.heightIn, isProposed: true });
      continue;
    }

    match.matched = true;
    const existing = match.record.existingHeightIn;
    const moved =
      item.heightIn !== undefined &&
      existing !== undefined &&
      Math.abs(item.heightIn - existing) >= HEIGHT_TOLERANCE_IN;
    const underground = match.record.isUnderground || item.underground;

    match.record = {
      ...match.record,
      ...(moved && { proposedHeightIn: item.heightIn }),
      isUnderground: underground,
      midspanProposed: underground ? UNDERGROUND_MIDSPAN : match.record.midspanProposed,
    };
  }

  return [...measuredEntries.map((entry) => entry.record), ...installs];
}

/**
 * Neutral Identifier
 *
 * Finds neutral conductors in both sources, selects the tallest as the
 * governing neutral, and filters an attachment list down to what hangs at
 * or below it.
 *
 * @module neutral/neutral-identifier
 */

import type { AttachmentRecord, NeutralWire } from '@make-ready/types';
import type { UtilityProfile } from '../core/profile.js';
import { UNSET_MIDSPAN } from '../core/units.js';
import { asArray, type JsonRecord } from '../core/values.js';
import { locationDesigns, structureItems } from '../engineering/designs.js';
import { toDesignItem } from '../attachments/engineering-extractor.js';
import type { ClassifiedWire } from '../attachments/survey-extractor.js';
import { sortHeight } from '../attachments/records.js';

/**
 * A neutral already in the list matches by description within this many inches
 */
export const NEUTRAL_MATCH_TOLERANCE_IN = 5;

function usageGroupsOf(raw: unknown): string[] {
  if (typeof raw === 'string') return [raw];
  return asArray(raw).filter((group): group is string => typeof group === 'string');
}

function mentionsNeutral(groups: readonly string[]): boolean {
  return groups.some((group) => group.toUpperCase().includes('NEUTRAL'));
}

// ============================================================================
// Detection
// ============================================================================

export function identifySurveyNeutrals(
  wires: readonly ClassifiedWire[],
  profile: UtilityProfile
): NeutralWire[] {
  const neutrals: NeutralWire[] = [];
  for (const { metadata, heightIn } of wires) {
    if (!profile.isNeutral(metadata.cableType) && !mentionsNeutral(usageGroupsOf(metadata.usageGroup))) continue;
    neutrals.push({
      heightIn,
      description: profile.formatDescription(metadata.owner, metadata.cableType),
      owner: metadata.owner,
      source: 'survey',
    });
  }
  return neutrals;
}

/**
 * Neutral wires of the measured design
 */
export function identifyEngineeringNeutrals(
  location: JsonRecord | undefined,
  profile: UtilityProfile
): NeutralWire[] {
  if (!location) return [];
  const neutrals: NeutralWire[] = [];
  for (const wire of structureItems(locationDesigns(location).measured, 'wires')) {
    const item = toDesignItem(wire, profile);
    const isNeutral =
      mentionsNeutral(usageGroupsOf(wire['usageGroup'])) ||
      profile.isNeutral(item.cableType);
    if (!isNeutral || item.heightIn === undefined) continue;
    neutrals.push({
      heightIn: item.heightIn,
      description: item.description,
      owner: item.owner,
      source: 'engineering',
    });
  }
  return neutrals;
}

/**
 * Tallest neutral; the first one wins a tie
 */
export function highestNeutral(neutrals: readonly NeutralWire[]): NeutralWire | undefined {
  let highest: NeutralWire | undefined;
  for (const neutral of neutrals) {
    if (!highest || neutral.heightIn > highest.heightIn) highest = neutral;
  }
  return highest;
}

// ============================================================================
// Filtering
// ============================================================================

/**
 * Attachments at or below the neutral height, with the neutral itself on top
 *
 * The boundary is inclusive. A record matching the neutral (same
 * description, existing height within tolerance) is flagged as the neutral;
 * otherwise the neutral is inserted first. Without a neutral nothing is
 * filtered.
 */
export function filterBelowNeutral(
  records: readonly AttachmentRecord[],
  neutral: NeutralWire | undefined
): AttachmentRecord[] {
  if (!neutral) return [...records];

  const below = records.filter((record) => {
    const height = sortHeight(record);
    return height !== undefined && height <= neutral.heightIn;
  });

  const matchIndex = below.findIndex(
    (record) =>
      record.description === neutral.description &&
      Math.abs((record.existingHeightIn ?? 0) - neutral.heightIn) < NEUTRAL_MATCH_TOLERANCE_IN
  );

  if (matchIndex !== -1) {
    return below.map((record, index) => (index === matchIndex ? { ...record, isNeutral: true } : record));
  }

  const neutralRecord: AttachmentRecord = {
    description: neutral.description,
    owner: neutral.owner,
    existingHeightIn: neutral.heightIn,
    midspanProposed: UNSET_MIDSPAN,
    isUnderground: false,
    isProposed: false,
    isNeutral: true,
    source: neutral.source,
  };
  return [neutralRecord, ...below];
}

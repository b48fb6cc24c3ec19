/**
 * Attachment Consolidator
 *
 * Merges the engineering-side and survey-side records of a pole into one
 * ordered list. Engineering records are authoritative whenever the pole has
 * any; survey records then only contribute midspan values to moved
 * attachments.
 *
 * @module attachments/consolidator
 */

import type { AttachmentRecord } from '@make-ready/types';
import { isMoved, sortByHeightDescending } from './records.js';

function hasBothHeights(record: AttachmentRecord): boolean {
  return record.existingHeightIn !== undefined && record.proposedHeightIn !== undefined;
}

/**
 * One record per description, in first-appearance order
 *
 * Among duplicates the first record carrying both heights wins, else the
 * first record.
 */
export function deduplicateByDescription(
  records: readonly AttachmentRecord[]
): AttachmentRecord[] {
  const groups = new Map<string, AttachmentRecord[]>();
  for (const record of records) {
    const group = groups.get(record.description);
    if (group) group.push(record);
    else groups.set(record.description, [record]);
  }

  const unique: AttachmentRecord[] = [];
  for (const group of groups.values()) {
    const best = group.find(hasBothHeights) ?? group[0];
    if (best) unique.push(best);
  }
  return unique;
}

/**
 * Consolidated attachment list, tallest first (stable on ties)
 *
 * A moved record whose midspan is unset inherits the survey record's
 * midspan for the same description when that is a height or underground.
 */
export function consolidateAttachments(
  engineering: readonly AttachmentRecord[],
  survey: ReadonlyMap<string, AttachmentRecord>
): AttachmentRecord[] {
  const primary = engineering.length > 0 ? engineering : [...survey.values()];

  const merged = deduplicateByDescription(primary).map((record) => {
    if (!isMoved(record) || record.midspanProposed.kind !== 'unset') return record;
    const surveyRecord = survey.get(record.description);
    if (!surveyRecord || surveyRecord.midspanProposed.kind === 'unset') return record;
    return { ...record, midspanProposed: surveyRecord.midspanProposed };
  });

  return sortByHeightDescending(merged);
}

/**
 * Owners with a moved attachment or a proposed one
 */
export function ownersWithChanges(records: readonly AttachmentRecord[]): Set<string> {
  const owners = new Set<string>();
  for (const record of records) {
    if (isMoved(record) || record.isProposed) owners.add(record.owner);
  }
  return owners;
}

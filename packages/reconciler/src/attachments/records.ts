/**
 * Attachment record helpers shared by the extractors, the consolidator and
 * the midspan rules.
 *
 * @module attachments/records
 */

import type { AttachmentRecord } from '@make-ready/types';

/**
 * Height differences below this many inches are not a move
 */
export const HEIGHT_TOLERANCE_IN = 0.1;

const UNDERGROUND_SUBSTRINGS = ['underground', 'riser', 'vertical'];

/**
 * Whether a description or cable type names an underground run
 */
export function isUndergroundText(text: string | undefined): boolean {
  if (!text) return false;
  const lower = text.toLowerCase();
  return UNDERGROUND_SUBSTRINGS.some((needle) => lower.includes(needle)) || /\bug\b/.test(lower);
}

export function isMoved(record: AttachmentRecord): boolean {
  return (
    record.existingHeightIn !== undefined &&
    record.proposedHeightIn !== undefined &&
    Math.abs(record.existingHeightIn - record.proposedHeightIn) >= HEIGHT_TOLERANCE_IN
  );
}

export function isNewInstall(record: AttachmentRecord): boolean {
  return record.existingHeightIn === undefined && record.proposedHeightIn !== undefined;
}

/**
 * Height used for ordering: existing, else proposed
 */
export function sortHeight(record: AttachmentRecord): number | undefined {
  return record.existingHeightIn ?? record.proposedHeightIn;
}

/**
 * Stable sort, tallest first; records without a height go last
 */
export function sortByHeightDescending(records: readonly AttachmentRecord[]): AttachmentRecord[] {
  return [...records].sort(
    (a, b) => (sortHeight(b) ?? Number.NEGATIVE_INFINITY) - (sortHeight(a) ?? Number.NEGATIVE_INFINITY)
  );
}

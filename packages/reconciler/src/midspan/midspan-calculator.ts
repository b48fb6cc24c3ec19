/**
 * Midspan Calculator
 *
 * Pole-level proposed midspan clearance, and the per-attachment midspan
 * rules applied once that value is known.
 *
 * @module midspan/midspan-calculator
 */

import type { AttachmentRecord, MidspanValue } from '@make-ready/types';
import { UNSET_MIDSPAN, midspanAt } from '../core/units.js';
import { isMoved, isNewInstall } from '../attachments/records.js';
import type { SpanWire } from '../spans/span-processor.js';

export interface PoleMidspan {
  readonly proposed: MidspanValue;
  /** Whether the value was measured on a span wire */
  readonly fromSpans: boolean;
}

const NO_MIDSPAN: PoleMidspan = { proposed: UNSET_MIDSPAN, fromSpans: false };

/**
 * Lowest span wire height relevant to the pole's changes
 *
 * A wire counts when its owner has a moved or proposed attachment, when it
 * is itself proposed, or when the pole has any new install. With no
 * qualifying span wire the lowest proposed height among changed attachments
 * is used. A pole with no changes has no proposed midspan.
 */
export function calculatePoleMidspan(
  records: readonly AttachmentRecord[],
  spanWires: readonly SpanWire[],
  ownersWithChanges: ReadonlySet<string>
): PoleMidspan {
  const hasNewInstall = records.some(isNewInstall);
  if (!hasNewInstall && ownersWithChanges.size === 0) return NO_MIDSPAN;

  let lowest: number | undefined;
  for (const wire of spanWires) {
    if (!hasNewInstall && !wire.isProposed && !ownersWithChanges.has(wire.owner)) continue;
    if (lowest === undefined || wire.heightIn < lowest) lowest = wire.heightIn;
  }
  if (lowest !== undefined) return { proposed: midspanAt(lowest), fromSpans: true };

  for (const record of records) {
    if (!isMoved(record) && !isNewInstall(record)) continue;
    const proposed = record.proposedHeightIn;
    if (proposed !== undefined && (lowest === undefined || proposed < lowest)) lowest = proposed;
  }
  return lowest === undefined ? NO_MIDSPAN : { proposed: midspanAt(lowest), fromSpans: false };
}

/**
 * Set each attachment's midspan field from its movement class
 *
 * - moved: own midspan, else the span-measured pole-level value
 * - new install: unset unless underground
 * - unmoved existing: unset
 */
export function applyMidspanValues(
  records: readonly AttachmentRecord[],
  poleMidspan: PoleMidspan
): AttachmentRecord[] {
  return records.map((record) => {
    if (isMoved(record)) {
      if (record.midspanProposed.kind !== 'unset' || !poleMidspan.fromSpans) return record;
      return { ...record, midspanProposed: poleMidspan.proposed };
    }
    if (isNewInstall(record)) {
      return record.isUnderground ? record : { ...record, midspanProposed: UNSET_MIDSPAN };
    }
    return { ...record, midspanProposed: UNSET_MIDSPAN };
  });
}

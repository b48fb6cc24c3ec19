/**
 * Final ordered row list of a pole: below-neutral attachments, then the
 * backspan block, then each reference-span block.
 *
 * @module report/final-list
 */

import type { AttachmentRecord, ReportRow } from '@make-ready/types';
import type { EngineLogger } from '../core/logging.js';
import { midspanAt } from '../core/units.js';
import { sortByHeightDescending } from '../attachments/records.js';
import type { PoleSpans, SpanBlock } from '../spans/span-processor.js';

/**
 * Height governing span filtering: the flagged neutral, else the tallest
 * existing primary attachment
 */
export function referenceHeight(primary: readonly AttachmentRecord[]): number | undefined {
  const neutral = primary.find((record) => record.isNeutral);
  if (neutral?.existingHeightIn !== undefined) return neutral.existingHeightIn;

  let highest: number | undefined;
  for (const record of primary) {
    const height = record.existingHeightIn;
    if (height !== undefined && (highest === undefined || height > highest)) highest = height;
  }
  return highest;
}

function isStrictlyBelow(record: AttachmentRecord, height: number): boolean {
  return record.existingHeightIn !== undefined && record.existingHeightIn < height;
}

function isFiber(record: AttachmentRecord): boolean {
  const description = record.description.toLowerCase();
  return description.includes('fiber') || description.includes('optic');
}

/**
 * Fiber attachments on a reference span show their height as midspan when
 * no midspan was captured
 */
function withFiberMidspan(record: AttachmentRecord): AttachmentRecord {
  if (!isFiber(record) || record.midspanProposed.kind !== 'unset' || record.existingHeightIn === undefined) {
    return record;
  }
  return { ...record, midspanProposed: midspanAt(record.existingHeightIn) };
}

function backspanAttachments(block: SpanBlock, height: number | undefined): AttachmentRecord[] {
  if (height === undefined) return [...block.attachments];
  return block.attachments.filter((record) => isStrictlyBelow(record, height) || record.isNeutral);
}

function referenceAttachments(block: SpanBlock, height: number | undefined): AttachmentRecord[] {
  const kept =
    height === undefined
      ? block.attachments
      : block.attachments.filter(
          (record) => isStrictlyBelow(record, height) || record.description.toLowerCase().includes('neutral')
        );
  return kept.map(withFiberMidspan);
}

export function buildFinalRows(
  primary: readonly AttachmentRecord[],
  spans: Pick<PoleSpans, 'backspan' | 'references'>,
  logger: EngineLogger
): ReportRow[] {
  const height = referenceHeight(primary);
  const rows: ReportRow[] = sortByHeightDescending(primary).map((attachment) => ({
    kind: 'attachment',
    block: 'primary',
    attachment,
  }));

  if (spans.backspan) {
    rows.push(spans.backspan.header);
    for (const attachment of backspanAttachments(spans.backspan, height)) {
      rows.push({ kind: 'attachment', block: 'backspan', attachment });
    }
  }

  for (const reference of spans.references) {
    rows.push(reference.header);
    for (const attachment of referenceAttachments(reference, height)) {
      rows.push({ kind: 'attachment', block: 'reference', attachment });
    }
  }

  logger.debug('Built final row list', { rows: rows.length, referenceHeight: height });
  return rows;
}

/**
 * Final Row List Tests
 */

import { describe, it, expect } from 'vitest';
import type { ReportRow, SpanHeaderRow } from '@make-ready/types';
import { silentLogger } from '../../../core/logging.js';
import { buildFinalRows, referenceHeight } from '../../../report/final-list.js';
import type { SpanBlock } from '../../../spans/span-processor.js';
import { attachment } from '../../utils/builders.js';

const neutral = attachment('UTILITY Neutral', 'UTILITY', { existingHeightIn: 336, isNeutral: true });
const fiber = attachment('PROVIDER Fiber', 'PROVIDER', { existingHeightIn: 300 });

const backspanHeader: SpanHeaderRow = {
  kind: 'backspan_header',
  text: 'Ref (Backspan) to 1000',
  style: 'light-blue',
  connectionId: 'c0',
};

const referenceHeader: SpanHeaderRow = {
  kind: 'reference_header',
  text: 'Ref (North) to PL1002',
  style: 'orange',
  connectionId: 'c1',
};

const backspan: SpanBlock = {
  header: backspanHeader,
  attachments: [
    attachment('UTILITY Primary', 'UTILITY', { existingHeightIn: 350 }),
    attachment('UTILITY Neutral', 'UTILITY', { existingHeightIn: 340, isNeutral: true }),
    attachment('PROVIDER Fiber', 'PROVIDER', { existingHeightIn: 280 }),
  ],
};

const reference: SpanBlock = {
  header: referenceHeader,
  attachments: [
    attachment('UTILITY Secondary', 'UTILITY', { existingHeightIn: 350 }),
    attachment('UTILITY Neutral', 'UTILITY', { existingHeightIn: 345 }),
    attachment('PROVIDER Optic Cable', 'PROVIDER', { existingHeightIn: 336 }),
    attachment('PROVIDER Fiber', 'PROVIDER', { existingHeightIn: 298 }),
    attachment('PROVIDER Drop', 'PROVIDER', { existingHeightIn: 290, midspanProposed: { kind: 'height', inches: 250 } }),
  ],
};

function describeRow(row: ReportRow): string {
  if (row.kind !== 'attachment') return row.text;
  const { attachment: record } = row;
  const midspan = record.midspanProposed.kind === 'height' ? record.midspanProposed.inches : record.midspanProposed.kind;
  return `${row.block}:${record.description}@${record.existingHeightIn ?? '-'}/${midspan}`;
}

describe('referenceHeight', () => {
  it('should use the flagged neutral', () => {
    expect(referenceHeight([attachment('X', 'P', { existingHeightIn: 400 }), neutral])).toBe(336);
  });

  it('should fall back to the tallest existing attachment', () => {
    expect(referenceHeight([fiber, attachment('X', 'P', { existingHeightIn: 320 })])).toBe(320);
    expect(referenceHeight([])).toBeUndefined();
  });
});

describe('buildFinalRows', () => {
  it('should append backspan and reference blocks filtered to the reference height', () => {
    const rows = buildFinalRows([fiber, neutral], { backspan, references: [reference] }, silentLogger);

    expect(rows.map(describeRow)).toEqual([
      'primary:UTILITY Neutral@336/unset',
      'primary:PROVIDER Fiber@300/unset',
      'Ref (Backspan) to 1000',
      'backspan:UTILITY Neutral@340/unset',
      'backspan:PROVIDER Fiber@280/unset',
      'Ref (North) to PL1002',
      'reference:UTILITY Neutral@345/unset',
      'reference:PROVIDER Fiber@298/298',
      'reference:PROVIDER Drop@290/250',
    ]);
  });

  it('should not filter span blocks without a reference height', () => {
    const rows = buildFinalRows([], { references: [reference] }, silentLogger);

    expect(rows.map(describeRow)).toEqual([
      'Ref (North) to PL1002',
      'reference:UTILITY Secondary@350/unset',
      'reference:UTILITY Neutral@345/unset',
      'reference:PROVIDER Optic Cable@336/336',
      'reference:PROVIDER Fiber@298/298',
      'reference:PROVIDER Drop@290/250',
    ]);
  });
});

/**
 * Attachment Consolidator Tests
 */

import { describe, it, expect } from 'vitest';
import type { AttachmentRecord } from '@make-ready/types';
import {
  consolidateAttachments,
  deduplicateByDescription,
  ownersWithChanges,
} from '../../../attachments/consolidator.js';
import { isMoved, isNewInstall, isUndergroundText, sortByHeightDescending } from '../../../attachments/records.js';
import { attachment } from '../../utils/builders.js';

describe('record helpers', () => {
  it('should classify moves with a tolerance', () => {
    expect(isMoved(attachment('A', 'P', { existingHeightIn: 300, proposedHeightIn: 290 }))).toBe(true);
    expect(isMoved(attachment('A', 'P', { existingHeightIn: 300, proposedHeightIn: 300.05 }))).toBe(false);
    expect(isNewInstall(attachment('A', 'P', { proposedHeightIn: 280 }))).toBe(true);
  });

  it('should recognize underground wording', () => {
    expect(['Underground feed', 'Riser', 'vertical run', 'UG conduit', 'Plug'].map(isUndergroundText)).toEqual([
      true,
      true,
      true,
      true,
      false,
    ]);
  });

  it('should sort tallest first and keep height-less records last', () => {
    const records = [
      attachment('low', 'P', { existingHeightIn: 100 }),
      attachment('none', 'P'),
      attachment('new', 'P', { proposedHeightIn: 200 }),
    ];
    expect(sortByHeightDescending(records).map((record) => record.description)).toEqual(['new', 'low', 'none']);
  });
});

describe('deduplicateByDescription', () => {
  it('should prefer the first record carrying both heights', () => {
    const records = [
      attachment('A', 'P', { existingHeightIn: 300 }),
      attachment('B', 'P', { existingHeightIn: 200 }),
      attachment('A', 'P', { existingHeightIn: 300, proposedHeightIn: 290 }),
    ];

    expect(deduplicateByDescription(records)).toEqual([records[2], records[1]]);
  });
});

describe('deduplication order', () => {
  const engineering = [
    attachment('UTILITY Neutral', 'UTILITY', { existingHeightIn: 336, source: 'engineering' }),
    attachment('PROVIDER Fiber', 'PROVIDER', { existingHeightIn: 300, proposedHeightIn: 290, source: 'engineering' }),
  ];
  const survey = [
    attachment('PROVIDER Fiber', 'PROVIDER', { existingHeightIn: 301 }),
    attachment('PROVIDER Drop', 'PROVIDER', { existingHeightIn: 280 }),
  ];

  function descriptions(records: readonly AttachmentRecord[]): string[] {
    return records.map((record) => record.description).sort();
  }

  it('should yield the same descriptions whichever list comes first', () => {
    const forward = deduplicateByDescription([...engineering, ...survey]);
    const reverse = deduplicateByDescription([...survey, ...engineering]);

    expect(descriptions(forward)).toEqual(['PROVIDER Drop', 'PROVIDER Fiber', 'UTILITY Neutral']);
    expect(descriptions(reverse)).toEqual(descriptions(forward));
  });

  it('should consolidate to the same descriptions whichever engineering order is given', () => {
    const surveyMap = new Map(survey.map((record) => [record.description, record]));

    expect(descriptions(consolidateAttachments([...engineering].reverse(), surveyMap))).toEqual(
      descriptions(consolidateAttachments(engineering, surveyMap))
    );
  });
});

describe('consolidateAttachments', () => {
  const surveyFiber = attachment('PROVIDER Fiber', 'PROVIDER', {
    existingHeightIn: 301,
    midspanProposed: { kind: 'height', inches: 250 },
  });

  it('should fall back to survey records without engineering data', () => {
    const survey = new Map<string, AttachmentRecord>([
      ['PROVIDER Fiber', surveyFiber],
      ['UTILITY Neutral', attachment('UTILITY Neutral', 'UTILITY', { existingHeightIn: 336 })],
    ]);

    expect(consolidateAttachments([], survey).map((record) => record.description)).toEqual([
      'UTILITY Neutral',
      'PROVIDER Fiber',
    ]);
  });

  it('should give a moved record the survey midspan', () => {
    const moved = attachment('PROVIDER Fiber', 'PROVIDER', {
      existingHeightIn: 300,
      proposedHeightIn: 290,
      source: 'engineering',
    });
    const [record] = consolidateAttachments([moved], new Map([['PROVIDER Fiber', surveyFiber]]));

    expect(record?.midspanProposed).toEqual({ kind: 'height', inches: 250 });
    expect(record?.source).toBe('engineering');
  });

  it('should leave unmoved records alone', () => {
    const unmoved = attachment('PROVIDER Fiber', 'PROVIDER', { existingHeightIn: 300, source: 'engineering' });
    const [record] = consolidateAttachments([unmoved], new Map([['PROVIDER Fiber', surveyFiber]]));

    expect(record?.midspanProposed).toEqual({ kind: 'unset' });
  });
});

describe('ownersWithChanges', () => {
  it('should collect owners of moved or proposed records', () => {
    const owners = ownersWithChanges([
      attachment('A', 'MOVER', { existingHeightIn: 300, proposedHeightIn: 280 }),
      attachment('B', 'INSTALLER', { proposedHeightIn: 250, isProposed: true }),
      attachment('C', 'STILL', { existingHeightIn: 200 }),
    ]);

    expect([...owners]).toEqual(['MOVER', 'INSTALLER']);
  });
});

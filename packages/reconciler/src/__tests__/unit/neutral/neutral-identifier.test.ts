/**
 * Neutral Identifier Tests
 */

import { describe, it, expect } from 'vitest';
import type { NeutralWire } from '@make-ready/types';
import type { ClassifiedWire } from '../../../attachments/survey-extractor.js';
import {
  filterBelowNeutral,
  highestNeutral,
  identifyEngineeringNeutrals,
  identifySurveyNeutrals,
} from '../../../neutral/neutral-identifier.js';
import type { TraceMetadata } from '../../../survey/trace-resolver.js';
import { attachment, designItem, engineeringLocation, testProfile } from '../../utils/builders.js';

const profile = testProfile();

function classified(metadata: TraceMetadata, heightIn: number): ClassifiedWire {
  return { wire: {}, trace: {}, metadata, heightIn };
}

function neutralAt(heightIn: number, description = 'UTILITY Neutral'): NeutralWire {
  return { heightIn, description, owner: 'UTILITY', source: 'survey' };
}

describe('identifySurveyNeutrals', () => {
  it('should detect neutrals by description or usage group', () => {
    const neutrals = identifySurveyNeutrals(
      [
        classified({ owner: 'UTILITY', cableType: 'Neutral', isProposed: false }, 336),
        classified({ owner: 'UTILITY', cableType: 'Wire', isProposed: false, usageGroup: 'Power Neutral' }, 330),
        classified({ owner: 'PROVIDER', cableType: 'Fiber', isProposed: false }, 300),
      ],
      profile
    );

    expect(neutrals).toEqual([
      { heightIn: 336, description: 'UTILITY Neutral', owner: 'UTILITY', source: 'survey' },
      { heightIn: 330, description: 'UTILITY Wire', owner: 'UTILITY', source: 'survey' },
    ]);
  });

  it('should not treat an owner name mentioning neutral as a neutral wire', () => {
    const neutrals = identifySurveyNeutrals(
      [classified({ owner: 'NEUTRAL HOST', cableType: 'Fiber', isProposed: false }, 320)],
      profile
    );

    expect(neutrals).toEqual([]);
  });
});

describe('identifyEngineeringNeutrals', () => {
  it('should read neutrals from the measured design only', () => {
    const location = engineeringLocation(
      'PL1001',
      {
        wires: [
          designItem({ id: 'w1', owner: 'Utility', type: 'Neutral', heightIn: 336 }),
          { ...designItem({ id: 'w2', owner: 'Utility', type: 'Wire', heightIn: 340 }), usageGroup: ['NEUTRAL'] },
          designItem({ id: 'w3', owner: 'Provider', type: 'Fiber', heightIn: 300 }),
        ],
      },
      { wires: [designItem({ id: 'w4', owner: 'Utility', type: 'Neutral', heightIn: 400 })] }
    );

    const neutrals = identifyEngineeringNeutrals(location, profile);
    expect(neutrals.map((neutral) => neutral.description)).toEqual(['UTILITY Neutral', 'UTILITY Wire']);
    expect(neutrals.map((neutral) => neutral.source)).toEqual(['engineering', 'engineering']);
  });

  it('should key detection on the cable type rather than the owner', () => {
    const location = engineeringLocation(
      'PL1001',
      { wires: [designItem({ id: 'w1', owner: 'Neutral Host', type: 'Fiber', heightIn: 320 })] },
      {}
    );

    expect(identifyEngineeringNeutrals(location, profile)).toEqual([]);
  });

  it('should return nothing without a location', () => {
    expect(identifyEngineeringNeutrals(undefined, profile)).toEqual([]);
  });
});

describe('highestNeutral', () => {
  it('should pick the tallest and keep the first on a tie', () => {
    const first = neutralAt(336, 'first');
    expect(highestNeutral([neutralAt(300), first, neutralAt(336, 'second')])).toBe(first);
    expect(highestNeutral([])).toBeUndefined();
  });
});

describe('filterBelowNeutral', () => {
  const records = [
    attachment('UTILITY Primary', 'UTILITY', { existingHeightIn: 400 }),
    attachment('UTILITY Neutral', 'UTILITY', { existingHeightIn: 334 }),
    attachment('PROVIDER Fiber', 'PROVIDER', { existingHeightIn: 336 }),
    attachment('PROVIDER Drop', 'PROVIDER', { proposedHeightIn: 280, isProposed: true }),
  ];

  it('should keep records at or below the neutral and flag the match', () => {
    const filtered = filterBelowNeutral(records, neutralAt(336));

    expect(filtered.map((record) => [record.description, record.isNeutral])).toEqual([
      ['UTILITY Neutral', true],
      ['PROVIDER Fiber', false],
      ['PROVIDER Drop', false],
    ]);
  });

  it('should insert the neutral when no record matches it', () => {
    const filtered = filterBelowNeutral(records, neutralAt(350, 'UTILITY Secondary Neutral'));

    expect(filtered[0]).toEqual({
      description: 'UTILITY Secondary Neutral',
      owner: 'UTILITY',
      existingHeightIn: 350,
      midspanProposed: { kind: 'unset' },
      isUnderground: false,
      isProposed: false,
      isNeutral: true,
      source: 'survey',
    });
    expect(filtered).toHaveLength(4);
  });

  it('should not filter without a neutral', () => {
    expect(filterBelowNeutral(records, undefined)).toEqual(records);
  });
});

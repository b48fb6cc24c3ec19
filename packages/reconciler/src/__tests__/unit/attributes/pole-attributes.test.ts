/**
 * Pole Attribute Resolver Tests
 */

import { describe, it, expect } from 'vitest';
import {
  engineeringStructure,
  extractEngineeringAttributes,
  extractSurveyAttributes,
  plaPercentage,
  resolveAttribute,
  resolvePoleAttributes,
} from '../../../attributes/pole-attributes.js';
import { design, poleNode } from '../../utils/builders.js';

describe('extractSurveyAttributes', () => {
  it('should compose the structure and read notes and capacity', () => {
    const node = poleNode({
      poleNumber: 'PL1',
      attributes: {
        pole_height: '40',
        pole_class: { '-Imported': '3' },
        pole_owner: 'Utility',
        kat_mr_notes: 'Lower fiber',
        passing_capacity: '82.5%',
      },
    });

    expect(extractSurveyAttributes(node)).toEqual({
      poleNumber: 'PL1',
      owner: 'Utility',
      structure: '40-3 Southern Pine',
      makeReadyNotes: 'Lower fiber',
      passingCapacity: 82.5,
    });
  });

  it('should fall back to a recorded structure string', () => {
    const node = poleNode({ attributes: { pole_structure: '35-5 Cedar' } });
    expect(extractSurveyAttributes(node).structure).toBe('35-5 Cedar');
  });
});

describe('engineering attributes', () => {
  it('should build the structure from pole tags', () => {
    expect(engineeringStructure({ poleTags: { height: 45, class: '2', species: 'Douglas Fir' } })).toBe(
      '45-2 Douglas Fir'
    );
  });

  it('should fall back to the first alias id', () => {
    expect(engineeringStructure({ aliases: [{ id: '40-4' }] })).toBe('40-4');
    expect(engineeringStructure({})).toBeUndefined();
  });

  it('should read the pole stress of the recommended design', () => {
    const location = {
      designs: [
        design(
          'Recommended Design',
          {},
          {
            analysis: [
              {
                results: [
                  { component: 'Crossarm', analysisType: 'STRESS', actual: 10 },
                  { component: 'Pole', analysisType: 'STRESS', actual: 45.678 },
                ],
              },
            ],
          }
        ),
      ],
    };

    expect(plaPercentage(location)).toBe('45.68%');
  });

  it('should read the owner id and carry the construction grade', () => {
    expect(extractEngineeringAttributes({ owner: { id: 'Utility' } }, 'C')).toEqual({
      owner: 'Utility',
      structure: undefined,
      constructionGrade: 'C',
      plaPercentage: undefined,
    });
  });
});

describe('resolveAttribute', () => {
  it('should use whichever source has a value', () => {
    expect(resolveAttribute(undefined, 'E', 'PREFER_SURVEY')).toBe('E');
    expect(resolveAttribute('S', undefined, 'PREFER_ENGINEERING')).toBe('S');
  });

  it('should treat case-insensitive equal values as agreeing', () => {
    expect(resolveAttribute('Utility', 'UTILITY ', 'PREFER_ENGINEERING')).toBe('Utility');
  });

  it('should apply each conflict strategy', () => {
    expect(resolveAttribute('40-3', '45-2', 'PREFER_SURVEY')).toBe('40-3');
    expect(resolveAttribute('40-3', '45-2', 'PREFER_ENGINEERING')).toBe('45-2');
    expect(resolveAttribute('40-3', '45-2', 'HIGHLIGHT_DIFFERENCES')).toBe('40-3 (ENGINEERING: 45-2)');
  });
});

describe('resolvePoleAttributes', () => {
  it('should merge both sources and record conflicts', () => {
    const resolved = resolvePoleAttributes(
      { owner: 'Utility', structure: '40-3 Southern Pine', makeReadyNotes: 'none', passingCapacity: 90 },
      { owner: 'UTILITY', structure: '45-2', constructionGrade: 'C', plaPercentage: '50.00%' },
      'PREFER_ENGINEERING'
    );

    expect(resolved).toEqual({
      owner: 'Utility',
      structure: '45-2',
      constructionGrade: 'C',
      plaPercentage: '50.00%',
      makeReadyNotes: 'none',
      passingCapacity: 90,
      conflicts: [{ attribute: 'structure', survey: '40-3 Southern Pine', engineering: '45-2', resolved: '45-2' }],
    });
  });
});

/**
 * Midspan Calculator Tests
 */

import { describe, it, expect } from 'vitest';
import { applyMidspanValues, calculatePoleMidspan } from '../../../midspan/midspan-calculator.js';
import type { SpanWire } from '../../../spans/span-processor.js';
import { attachment } from '../../utils/builders.js';

function spanWire(owner: string, heightIn: number, isProposed = false): SpanWire {
  return { connectionId: 'c1', owner, heightIn, isProposed };
}

const existing = attachment('UTILITY Neutral', 'UTILITY', { existingHeightIn: 336 });
const moved = attachment('PROVIDER Fiber', 'PROVIDER', { existingHeightIn: 300, proposedHeightIn: 290 });
const install = attachment('OTHER Drop', 'OTHER', { proposedHeightIn: 310, isProposed: true });

describe('calculatePoleMidspan', () => {
  it('should leave a pole without changes unset', () => {
    expect(calculatePoleMidspan([existing], [spanWire('PROVIDER', 280)], new Set())).toEqual({
      proposed: { kind: 'unset' },
      fromSpans: false,
    });
  });

  it('should take the lowest span wire of a changed owner', () => {
    const wires = [spanWire('PROVIDER', 300), spanWire('PROVIDER', 280), spanWire('UTILITY', 250)];

    expect(calculatePoleMidspan([existing, moved], wires, new Set(['PROVIDER']))).toEqual({
      proposed: { kind: 'height', inches: 280 },
      fromSpans: true,
    });
  });

  it('should count proposed span wires of any owner', () => {
    const wires = [spanWire('PROVIDER', 300), spanWire('UTILITY', 260, true)];

    expect(calculatePoleMidspan([existing, moved], wires, new Set(['PROVIDER'])).proposed).toEqual({
      kind: 'height',
      inches: 260,
    });
  });

  it('should count every span wire when the pole has a new install', () => {
    const wires = [spanWire('PROVIDER', 300), spanWire('UTILITY', 250)];

    expect(calculatePoleMidspan([existing, install], wires, new Set(['OTHER'])).proposed).toEqual({
      kind: 'height',
      inches: 250,
    });
  });

  it('should fall back to the lowest proposed height of changed attachments', () => {
    expect(calculatePoleMidspan([existing, moved, install], [], new Set(['PROVIDER', 'OTHER']))).toEqual({
      proposed: { kind: 'height', inches: 290 },
      fromSpans: false,
    });
  });
});

describe('applyMidspanValues', () => {
  const spanMeasured = { proposed: { kind: 'height', inches: 280 }, fromSpans: true } as const;
  const fallback = { proposed: { kind: 'height', inches: 290 }, fromSpans: false } as const;

  it('should keep a moved attachment midspan of its own', () => {
    const own = { ...moved, midspanProposed: { kind: 'height', inches: 270 } } as const;
    expect(applyMidspanValues([own], spanMeasured)[0]?.midspanProposed).toEqual({ kind: 'height', inches: 270 });
  });

  it('should give a moved attachment the span-measured pole midspan', () => {
    expect(applyMidspanValues([moved], spanMeasured)[0]?.midspanProposed).toEqual({ kind: 'height', inches: 280 });
    expect(applyMidspanValues([moved], fallback)[0]?.midspanProposed).toEqual({ kind: 'unset' });
  });

  it('should unset new installs unless underground', () => {
    const underground = { ...install, isUnderground: true, midspanProposed: { kind: 'underground' } } as const;
    const measured = { ...install, midspanProposed: { kind: 'height', inches: 200 } } as const;

    expect(applyMidspanValues([underground, measured], spanMeasured).map((record) => record.midspanProposed)).toEqual(
      [{ kind: 'underground' }, { kind: 'unset' }]
    );
  });

  it('should unset unmoved existing attachments', () => {
    const measured = { ...existing, midspanProposed: { kind: 'height', inches: 320 } } as const;
    expect(applyMidspanValues([measured], spanMeasured)[0]?.midspanProposed).toEqual({ kind: 'unset' });
  });
});

/**
 * Row Mapping Tests
 */

import { describe, it, expect } from 'vitest';
import { toRowMapping } from '../../../report/rows.js';
import { attachment } from '../../utils/builders.js';

describe('toRowMapping', () => {
  it('should map a header row to its text and style', () => {
    expect(
      toRowMapping({ kind: 'backspan_header', text: 'Ref (Backspan) to 1000', style: 'light-blue', connectionId: 'c0' })
    ).toEqual({
      row_type: 'backspan_header',
      description: 'Ref (Backspan) to 1000',
      existing_height: '',
      proposed_height: '',
      midspan_proposed: '',
      style_hint: 'light-blue',
    });
  });

  it('should format attachment heights', () => {
    const record = attachment('PROVIDER Riser', 'PROVIDER', {
      existingHeightIn: 100,
      proposedHeightIn: 122,
      isUnderground: true,
      midspanProposed: { kind: 'underground' },
    });

    expect(toRowMapping({ kind: 'attachment', block: 'primary', attachment: record })).toEqual({
      row_type: 'attachment',
      description: 'PROVIDER Riser',
      existing_height: `8'-4"`,
      proposed_height: `10'-2"`,
      midspan_proposed: 'UG',
      style_hint: '',
    });
  });
});

/**
 * Flat row mappings consumed by the spreadsheet renderer.
 *
 * @module report/rows
 */

import type { PoleReport, ReportRow, ReportRowMapping } from '@make-ready/types';
import { formatHeight, formatMidspan } from '../core/units.js';

export function toRowMapping(row: ReportRow): ReportRowMapping {
  if (row.kind !== 'attachment') {
    return {
      row_type: row.kind,
      description: row.text,
      existing_height: '',
      proposed_height: '',
      midspan_proposed: '',
      style_hint: row.style,
    };
  }

  const { attachment } = row;
  return {
    row_type: 'attachment',
    description: attachment.description,
    existing_height: formatHeight(attachment.existingHeightIn),
    proposed_height: formatHeight(attachment.proposedHeightIn),
    midspan_proposed: formatMidspan(attachment.midspanProposed),
    style_hint: '',
  };
}

export function toReportRows(pole: PoleReport): ReportRowMapping[] {
  return pole.rows.map(toRowMapping);
}

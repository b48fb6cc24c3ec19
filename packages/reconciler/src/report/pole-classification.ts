/**
 * Pole-level classification: attachment action, status, and proposed riser
 * and guy counts.
 *
 * @module report/pole-classification
 */

import type { PoleAction, PoleStatus, ReportRow } from '@make-ready/types';
import { asArray, asRecord, isRecord, isTruthyFlag, stringField, type JsonRecord } from '../core/values.js';
import { clientItemField, locationDesigns, structureItems } from '../engineering/designs.js';

// ============================================================================
// Action and Status
// ============================================================================

/**
 * Passing capacity below this percentage is an issue
 */
export const PASSING_CAPACITY_THRESHOLD = 85;

/**
 * (I) when any attachment row is a new install, else (R) when any is an
 * existing attachment with nothing proposed, else (E)
 */
export function determinePoleAction(rows: readonly ReportRow[]): PoleAction {
  let removing = false;
  for (const row of rows) {
    if (row.kind !== 'attachment') continue;
    const { existingHeightIn, proposedHeightIn, isProposed } = row.attachment;
    if (existingHeightIn === undefined && (proposedHeightIn !== undefined || isProposed)) {
      return '(I)nstalling';
    }
    if (existingHeightIn !== undefined && proposedHeightIn === undefined && !isProposed) {
      removing = true;
    }
  }
  return removing ? '(R)emoving' : '(E)xisting';
}

export function determinePoleStatus(
  makeReadyNotes: string | undefined,
  passingCapacity: number | undefined
): PoleStatus {
  if (passingCapacity !== undefined && passingCapacity < PASSING_CAPACITY_THRESHOLD) {
    return 'Issue Detected';
  }
  if (makeReadyNotes && makeReadyNotes.trim() !== '') return 'Make-Ready Required';
  return 'No Change';
}

// ============================================================================
// Riser and Guy Counts
// ============================================================================

export interface ProposedEquipment {
  readonly risers: number;
  readonly guys: number;
}

const RISER_NOTE = /\b(?:add|install|new|proposed)\s+riser/i;
const GUY_NOTE = /\b(?:add|install|new|proposed)\s+(?:(?:down|overhead)\s+)?guy/i;

function descriptionOf(entry: JsonRecord): string {
  return stringField(entry, 'desc')?.toLowerCase() ?? '';
}

function surveyEquipment(node: JsonRecord): ProposedEquipment {
  const attachments = asRecord(node['attachments']);
  let risers = 0;
  let guys = 0;

  for (const riser of asArray(attachments['riser'])) {
    if (isRecord(riser) && isTruthyFlag(riser['proposed'])) risers += 1;
  }

  for (const guy of asArray(attachments['guying'])) {
    if (!isRecord(guy)) continue;
    const attributes = asRecord(guy['attributes']);
    if (
      isTruthyFlag(guy['proposed']) ||
      descriptionOf(guy).includes('proposed') ||
      isTruthyFlag(attributes['proposed']) ||
      isTruthyFlag(attributes['is_proposed'])
    ) {
      guys += 1;
    }
  }

  for (const wire of asArray(attachments['wires'])) {
    if (!isRecord(wire)) continue;
    const description = descriptionOf(wire);
    if (description.includes('guy') && (isTruthyFlag(wire['proposed']) || description.includes('proposed'))) {
      guys += 1;
    }
  }

  return { risers, guys };
}

function engineeringEquipment(location: JsonRecord): ProposedEquipment {
  const { recommended } = locationDesigns(location);
  let risers = 0;
  let guys = 0;

  for (const equipment of structureItems(recommended, 'equipments')) {
    if (clientItemField(equipment, 'type').toUpperCase() === 'RISER') risers += 1;
  }
  for (const guy of structureItems(recommended, 'guys')) {
    const type = clientItemField(guy, 'type').toUpperCase();
    if (type.includes('GUY') || type.includes('DOWN')) guys += 1;
  }

  const notes = stringField(asRecord(location['analysis']), 'notes')?.toLowerCase() ?? '';
  if (notes.includes('add guy') || notes.includes('proposed guy')) guys += 1;

  return { risers, guys };
}

/**
 * Proposed risers and guys from the survey node, the recommended design
 * and the make-ready notes
 *
 * A note phrase only counts when no structured entry was found.
 */
export function countProposedEquipment(
  node: JsonRecord,
  location: JsonRecord | undefined,
  makeReadyNotes: string | undefined
): ProposedEquipment {
  const survey = surveyEquipment(node);
  const engineering = location ? engineeringEquipment(location) : { risers: 0, guys: 0 };
  let risers = survey.risers + engineering.risers;
  let guys = survey.guys + engineering.guys;

  if (makeReadyNotes) {
    if (risers === 0 && RISER_NOTE.test(makeReadyNotes)) risers = 1;
    if (guys === 0 && GUY_NOTE.test(makeReadyNotes)) guys = 1;
  }
  return { risers, guys };
}

export function formatEquipmentCount(count: number): string {
  return count > 0 ? `YES (${count})` : 'NO';
}

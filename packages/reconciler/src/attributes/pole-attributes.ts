/**
 * Pole Attribute Resolver
 *
 * Extracts identity and structural attributes of a pole from each source
 * independently, then merges them under the active conflict strategy.
 *
 * @module attributes/pole-attributes
 */

import type { ConflictStrategy } from '@make-ready/types';
import { locationDesigns } from '../engineering/designs.js';
import {
  asArray,
  asRecord,
  extractWithPriority,
  isRecord,
  stringField,
  toFiniteNumber,
  type JsonRecord,
} from '../core/values.js';
import { nodeAttributes, poleNumberOf } from '../survey/nodes.js';

// ============================================================================
// Types
// ============================================================================

export interface SurveyPoleAttributes {
  readonly poleNumber?: string;
  readonly owner?: string;
  readonly structure?: string;
  readonly makeReadyNotes?: string;
  readonly passingCapacity?: number;
}

export interface EngineeringPoleAttributes {
  readonly owner?: string;
  readonly structure?: string;
  readonly constructionGrade?: string;
  readonly plaPercentage?: string;
}

export type ResolvableAttribute = 'owner' | 'structure' | 'constructionGrade' | 'plaPercentage';

export interface AttributeConflict {
  readonly attribute: ResolvableAttribute;
  readonly survey: string;
  readonly engineering: string;
  readonly resolved: string;
}

export interface ResolvedPoleAttributes {
  readonly owner?: string;
  readonly structure?: string;
  readonly constructionGrade?: string;
  readonly plaPercentage?: string;
  readonly makeReadyNotes?: string;
  readonly passingCapacity?: number;
  readonly conflicts: readonly AttributeConflict[];
}

// ============================================================================
// Field Names
// ============================================================================

const OWNER_FIELDS = ['pole_owner', 'PoleOwner'];
const HEIGHT_FIELDS = ['pole_height', 'PoleHeight'];
const CLASS_FIELDS = ['pole_class', 'PoleClass'];
const SPECIES_FIELDS = ['pole_species', 'PoleSpecies'];
const NOTES_FIELDS = ['kat_mr_notes', 'kat_MR_notes', 'mr_notes', 'make_ready_notes'];

export const DEFAULT_SPECIES = 'Southern Pine';

// ============================================================================
// Survey
// ============================================================================

export function extractSurveyAttributes(node: JsonRecord): SurveyPoleAttributes {
  const attributes = nodeAttributes(node);

  const height = extractWithPriority(attributes, HEIGHT_FIELDS);
  const poleClass = extractWithPriority(attributes, CLASS_FIELDS);
  const species = extractWithPriority(attributes, SPECIES_FIELDS) ?? DEFAULT_SPECIES;
  const structure =
    height && poleClass
      ? `${height}-${poleClass} ${species}`
      : extractWithPriority(attributes, ['pole_structure']);

  const passingCapacity = toFiniteNumber(
    extractWithPriority(attributes, ['passing_capacity'])?.replace(/%$/, '')
  );

  return {
    poleNumber: poleNumberOf(node),
    owner: extractWithPriority(attributes, OWNER_FIELDS),
    structure,
    makeReadyNotes: extractWithPriority(attributes, NOTES_FIELDS),
    passingCapacity,
  };
}

// ============================================================================
// Engineering
// ============================================================================

function textOf(raw: unknown): string | undefined {
  if (typeof raw === 'string') return raw.trim() || undefined;
  if (typeof raw === 'number' && Number.isFinite(raw)) return String(raw);
  return undefined;
}

/**
 * `H-C Species` from pole tags, then direct fields, then the first alias id
 */
export function engineeringStructure(location: JsonRecord): string | undefined {
  const tags = asRecord(location['poleTags']);
  let height = textOf(tags['height']) ?? textOf(location['height']);
  let poleClass = textOf(tags['class']) ?? textOf(location['class']);
  const species = textOf(tags['species']) ?? textOf(location['species']);

  if (height === undefined || poleClass === undefined) {
    const firstAlias = asArray(location['aliases'])[0];
    const aliasId = isRecord(firstAlias) ? textOf(firstAlias['id']) : undefined;
    if (aliasId?.includes('-')) {
      const separator = aliasId.indexOf('-');
      height ??= aliasId.slice(0, separator);
      poleClass ??= aliasId.slice(separator + 1) || undefined;
    }
  }

  if (!height || !poleClass) return undefined;
  return species ? `${height}-${poleClass} ${species}` : `${height}-${poleClass}`;
}

/**
 * Pole stress from the recommended design's first analysis, as `NN.NN%`
 */
export function plaPercentage(location: JsonRecord): string | undefined {
  const { recommended } = locationDesigns(location);
  if (!recommended) return undefined;

  const analysis = asArray(recommended['analysis'])[0];
  if (!isRecord(analysis)) return undefined;

  for (const result of asArray(analysis['results'])) {
    if (!isRecord(result)) continue;
    if (result['component'] !== 'Pole' || result['analysisType'] !== 'STRESS') continue;
    const actual = result['actual'];
    const value = toFiniteNumber(actual);
    if (value !== undefined) return `${value.toFixed(2)}%`;
    if (typeof actual === 'string' && actual.trim() !== '') return actual.trim();
  }
  return undefined;
}

export function extractEngineeringAttributes(
  location: JsonRecord,
  constructionGrade: string | undefined
): EngineeringPoleAttributes {
  const owner = isRecord(location['owner'])
    ? stringField(location['owner'], 'id')
    : stringField(location, 'poleOwner');

  return {
    owner,
    structure: engineeringStructure(location),
    constructionGrade,
    plaPercentage: plaPercentage(location),
  };
}

// ============================================================================
// Conflict Resolution
// ============================================================================

function sameValue(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

/**
 * Merge one attribute from both sources
 *
 * A value present in only one source is used as-is. Two differing values
 * are resolved by the strategy; the highlight form puts the survey value
 * first.
 */
export function resolveAttribute(
  survey: string | undefined,
  engineering: string | undefined,
  strategy: ConflictStrategy
): string | undefined {
  if (survey === undefined) return engineering;
  if (engineering === undefined || sameValue(survey, engineering)) return survey;

  switch (strategy) {
    case 'PREFER_SURVEY':
      return survey;
    case 'PREFER_ENGINEERING':
      return engineering;
    case 'HIGHLIGHT_DIFFERENCES':
      return `${survey} (ENGINEERING: ${engineering})`;
  }
}

const RESOLVABLE: readonly ResolvableAttribute[] = [
  'owner',
  'structure',
  'constructionGrade',
  'plaPercentage',
];

export function resolvePoleAttributes(
  survey: SurveyPoleAttributes,
  engineering: EngineeringPoleAttributes | undefined,
  strategy: ConflictStrategy
): ResolvedPoleAttributes {
  const surveyValues: Partial<Record<ResolvableAttribute, string>> = {
    owner: survey.owner,
    structure: survey.structure,
  };
  const resolved: Partial<Record<ResolvableAttribute, string>> = {};
  const conflicts: AttributeConflict[] = [];

  for (const attribute of RESOLVABLE) {
    const fromSurvey = surveyValues[attribute];
    const fromEngineering = engineering?.[attribute];
    const value = resolveAttribute(fromSurvey, fromEngineering, strategy);
    resolved[attribute] = value;
    if (
      fromSurvey !== undefined &&
      fromEngineering !== undefined &&
      value !== undefined &&
      !sameValue(fromSurvey, fromEngineering)
    ) {
      conflicts.push({ attribute, survey: fromSurvey, engineering: fromEngineering, resolved: value });
    }
  }

  return {
    ...resolved,
    makeReadyNotes: survey.makeReadyNotes,
    passingCapacity: survey.passingCapacity,
    conflicts,
  };
}

/**
 * Make-Ready Report Contract
 *
 * Data structures exchanged between the reconciliation engine and its
 * collaborators (CLI output, spreadsheet rendering). Heights are always
 * carried in inches; string formatting happens at the edge.
 *
 * @module report
 */

// ============================================================================
// Strategies
// ============================================================================

/**
 * Attribute conflict resolution between the two sources
 *
 * - PREFER_SURVEY: survey value wins
 * - PREFER_ENGINEERING: engineering value wins
 * - HIGHLIGHT_DIFFERENCES: "A (OTHER: B)" with the survey value first
 */
export type ConflictStrategy = 'PREFER_SURVEY' | 'PREFER_ENGINEERING' | 'HIGHLIGHT_DIFFERENCES';

export const CONFLICT_STRATEGIES: readonly ConflictStrategy[] = [
  'PREFER_SURVEY',
  'PREFER_ENGINEERING',
  'HIGHLIGHT_DIFFERENCES',
];

/**
 * What to do when a single pole fails to build
 */
export type PoleFailurePolicy = 'skip' | 'abort';

export const POLE_FAILURE_POLICIES: readonly PoleFailurePolicy[] = ['skip', 'abort'];

/**
 * Which dataset an item was read from
 */
export type DataSource = 'survey' | 'engineering';

// ============================================================================
// Attachments
// ============================================================================

/**
 * Midspan clearance value
 *
 * `unset` renders as N/A, `underground` as UG.
 */
export type MidspanValue =
  | { readonly kind: 'unset' }
  | { readonly kind: 'underground' }
  | { readonly kind: 'height'; readonly inches: number };

/**
 * A wire or equipment item attached to a pole (or observed on a span)
 *
 * Invariant: `description` is non-empty and at least one of
 * `existingHeightIn` / `proposedHeightIn` is set.
 */
export interface AttachmentRecord {
  readonly description: string;
  /** Normalized owner */
  readonly owner: string;
  readonly existingHeightIn?: number;
  readonly proposedHeightIn?: number;
  readonly midspanProposed: MidspanValue;
  readonly isUnderground: boolean;
  readonly isProposed: boolean;
  readonly isNeutral: boolean;
  readonly source: DataSource;
  readonly wireId?: string;
  readonly usageGroup?: string;
}

/**
 * The wire that governs below-neutral filtering for a pole
 */
export interface NeutralWire {
  readonly heightIn: number;
  readonly description: string;
  readonly owner: string;
  readonly source: DataSource;
}

// ============================================================================
// Report Rows
// ============================================================================

export type HeaderStyle = 'orange' | 'purple' | 'light-blue';

/**
 * Header row introducing a backspan or reference-span block
 */
export interface SpanHeaderRow {
  readonly kind: 'backspan_header' | 'reference_header';
  /** e.g. "Ref (North East) to PL1234" */
  readonly text: string;
  readonly style: HeaderStyle;
  readonly connectionId: string;
}

export interface AttachmentRow {
  readonly kind: 'attachment';
  readonly block: 'primary' | 'backspan' | 'reference';
  readonly attachment: AttachmentRecord;
}

export type ReportRow = SpanHeaderRow | AttachmentRow;

/**
 * Flat row shape consumed by the spreadsheet renderer
 */
export interface ReportRowMapping {
  readonly row_type: ReportRow['kind'];
  readonly description: string;
  readonly existing_height: string;
  readonly proposed_height: string;
  readonly midspan_proposed: string;
  readonly style_hint: HeaderStyle | '';
}

// ============================================================================
// Poles
// ============================================================================

export type SpanKind = 'primary' | 'reference' | 'backspan';

export type PoleAction = '(I)nstalling' | '(R)emoving' | '(E)xisting';

export type PoleStatus = 'No Change' | 'Make-Ready Required' | 'Issue Detected';

/**
 * Lowest observed heights on one connection of the pole
 */
export interface SpanSummary {
  readonly connectionId: string;
  readonly otherNodeId: string;
  readonly otherLabel: string;
  readonly kind: SpanKind;
  readonly lowestCommunicationIn?: number;
  readonly lowestElectricalIn?: number;
}

/**
 * Lowest true-midspan heights toward one neighbouring pole
 */
export interface SpanMidspanHeights {
  readonly otherLabel: string;
  readonly communication: MidspanValue;
  readonly electrical: MidspanValue;
}

export interface PoleReport {
  readonly nodeId: string;
  /** Pole number as it appears in the survey */
  readonly poleNumber: string;
  /** Trailing-digit normalized pole id */
  readonly poleId: string;
  /** 1-based position in the engineering visitation order */
  readonly operationNumber?: number;
  /** Present in the engineering dataset */
  readonly isPrimary: boolean;
  readonly owner?: string;
  readonly structure?: string;
  readonly constructionGrade?: string;
  readonly plaPercentage?: string;
  readonly makeReadyNotes?: string;
  readonly latitude?: number;
  readonly longitude?: number;
  readonly status: PoleStatus;
  readonly action: PoleAction;
  /** "YES (n)" or "NO" */
  readonly proposedRiser: string;
  readonly proposedGuy: string;
  readonly fromPole: string;
  readonly toPole?: string;
  readonly existingMidspanLowestCommunication: MidspanValue;
  readonly existingMidspanLowestElectrical: MidspanValue;
  /** Pole-level proposed midspan clearance */
  readonly midspanProposed: MidspanValue;
  readonly neutral?: NeutralWire;
  readonly connections: readonly SpanSummary[];
  readonly spanMidspanHeights: readonly SpanMidspanHeights[];
  readonly attachmentsBelowNeutral: readonly AttachmentRecord[];
  /** Final ordered list with backspan and reference blocks interleaved */
  readonly rows: readonly ReportRow[];
  readonly warnings: readonly string[];
}

// ============================================================================
// Batch Result
// ============================================================================

export interface PoleFailure {
  readonly nodeId: string;
  readonly poleNumber?: string;
  readonly message: string;
}

export interface ReportResult {
  readonly poles: readonly PoleReport[];
  readonly failures: readonly PoleFailure[];
  readonly warnings: readonly string[];
  /** Normalized pole ids in engineering visitation order */
  readonly sequence: readonly string[];
}

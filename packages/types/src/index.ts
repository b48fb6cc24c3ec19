/**
 * @make-ready/types
 *
 * Shared report contract for the make-ready reconciler.
 */

export type {
  ConflictStrategy,
  PoleFailurePolicy,
  DataSource,
  MidspanValue,
  AttachmentRecord,
  NeutralWire,
  HeaderStyle,
  SpanHeaderRow,
  AttachmentRow,
  ReportRow,
  ReportRowMapping,
  SpanKind,
  PoleAction,
  PoleStatus,
  SpanSummary,
  SpanMidspanHeights,
  PoleReport,
  PoleFailure,
  ReportResult,
} from './report.js';

export { CONFLICT_STRATEGIES, POLE_FAILURE_POLICIES } from './report.js';

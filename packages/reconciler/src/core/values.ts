/**
 * Attribute Values
 *
 * Survey attributes arrive either as bare scalars or as wrapper maps whose
 * payload sits under one of several known keys (`-Imported`, `assessment`,
 * `button_added`, ...). This module models both as a single `Value` variant
 * and provides one priority-ordered accessor instead of per-call unwrapping.
 *
 * @module core/values
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Read-only view of a parsed JSON object
 */
export type JsonRecord = Readonly<Record<string, unknown>>;

/**
 * Attribute value: a scalar or a wrapper of further values
 */
export type Value =
  | { readonly kind: 'scalar'; readonly text: string }
  | { readonly kind: 'wrapper'; readonly entries: ReadonlyMap<string, Value> };

// ============================================================================
// Constants
// ============================================================================

/**
 * Wrapper payload keys in priority order
 */
export const WRAPPER_PAYLOAD_KEYS: readonly string[] = [
  '-Imported',
  'assessment',
  'button_added',
  'tagtext',
  'value',
  'name',
  'id',
];

/**
 * Payload keys checked inside a nested wrapper
 */
export const NESTED_PAYLOAD_KEYS: readonly string[] = ['tagtext', 'value', 'name', 'id'];

// ============================================================================
// JSON Guards
// ============================================================================

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asRecord(value: unknown): JsonRecord {
  return isRecord(value) ? value : {};
}

export function asArray(value: unknown): readonly unknown[] {
  return Array.isArray(value) ? value : [];
}

/**
 * Records held by a collection that may be either a list or an id-keyed map
 */
export function recordItems(collection: unknown): JsonRecord[] {
  const items = Array.isArray(collection)
    ? collection
    : isRecord(collection)
      ? Object.values(collection)
      : [];
  return items.filter(isRecord);
}

/**
 * Parse a finite number from a number or numeric string
 */
export function toFiniteNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

/**
 * Plain string field (trimmed), or undefined when absent or empty
 */
export function stringField(record: JsonRecord, key: string): string | undefined {
  const raw = record[key];
  if (typeof raw === 'string') {
    const trimmed = raw.trim();
    return trimmed === '' ? undefined : trimmed;
  }
  if (typeof raw === 'number' || typeof raw === 'boolean') {
    return String(raw);
  }
  return undefined;
}

/**
 * Truthiness of a flag that may be stored as boolean, number or string
 */
export function isTruthyFlag(raw: unknown): boolean {
  if (typeof raw === 'boolean') return raw;
  if (typeof raw === 'number') return raw === 1;
  if (typeof raw === 'string') {
    return ['true', 'yes', 'proposed', '1'].includes(raw.trim().toLowerCase());
  }
  return false;
}

// ============================================================================
// Value Variant
// ============================================================================

/**
 * Lift a raw JSON value into the Value variant
 *
 * Null, undefined and arrays carry no attribute payload and map to undefined.
 */
export function toValue(raw: unknown): Value | undefined {
  if (raw === null || raw === undefined || Array.isArray(raw)) {
    return undefined;
  }
  if (typeof raw === 'string' || typeof raw === 'number' || typeof raw === 'boolean') {
    return { kind: 'scalar', text: String(raw) };
  }
  if (isRecord(raw)) {
    const entries = new Map<string, Value>();
    for (const [key, child] of Object.entries(raw)) {
      const value = toValue(child);
      if (value) entries.set(key, value);
    }
    return { kind: 'wrapper', entries };
  }
  return undefined;
}

function firstEntry(entries: ReadonlyMap<string, Value>): Value | undefined {
  for (const value of entries.values()) {
    return value;
  }
  return undefined;
}

function nestedText(wrapper: ReadonlyMap<string, Value>): string | undefined {
  for (const key of NESTED_PAYLOAD_KEYS) {
    const value = wrapper.get(key);
    if (value) return valueText(value);
  }
  const first = firstEntry(wrapper);
  return first ? valueText(first) : undefined;
}

/**
 * Text payload of a value
 *
 * Scalars yield their text. Wrappers are searched by `payloadKeys` in order;
 * a nested wrapper under a matched key is read through its own payload keys.
 * Without any matching key the first entry is used.
 */
export function valueText(
  value: Value | undefined,
  payloadKeys: readonly string[] = WRAPPER_PAYLOAD_KEYS
): string | undefined {
  if (!value) return undefined;
  if (value.kind === 'scalar') return value.text;

  for (const key of payloadKeys) {
    const payload = value.entries.get(key);
    if (!payload) continue;
    if (payload.kind === 'scalar') return payload.text;
    if (payload.entries.size > 0) return nestedText(payload.entries);
  }

  const first = firstEntry(value.entries);
  if (!first) return undefined;
  return first.kind === 'scalar' ? first.text : nestedText(first.entries);
}

/**
 * Extract the first non-empty text among candidate field names
 *
 * @param record - Attribute container
 * @param fieldNames - Candidate field names, highest priority first
 * @param payloadKeys - Wrapper payload keys, highest priority first
 */
export function extractWithPriority(
  record: JsonRecord,
  fieldNames: readonly string[],
  payloadKeys: readonly string[] = WRAPPER_PAYLOAD_KEYS
): string | undefined {
  for (const field of fieldNames) {
    const text = valueText(toValue(record[field]), payloadKeys)?.trim();
    if (text) return text;
  }
  return undefined;
}

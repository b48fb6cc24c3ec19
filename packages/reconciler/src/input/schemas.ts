/**
 * Input Dataset Validation
 *
 * Validates only the top-level shape each dataset must have before a batch
 * can start. Everything below those collections varies per record and is
 * read through the guards in `core/values`.
 *
 * @module input/schemas
 */

import { z, type ZodError } from 'zod';
import { InputValidationError, type ValidationIssue } from '../core/errors.js';

// ============================================================================
// Schemas
// ============================================================================

const ObjectMapSchema = z.record(z.string(), z.unknown());

/**
 * Optional id-keyed collection; null or absent becomes an empty map
 */
const OptionalObjectMapSchema = ObjectMapSchema.nullish().transform((value) => value ?? {});

export const SurveyDatasetSchema = z
  .object({
    nodes: ObjectMapSchema,
    connections: OptionalObjectMapSchema,
    photos: OptionalObjectMapSchema,
    traces: OptionalObjectMapSchema,
  })
  .passthrough();

const EngineeringLocationSchema = z
  .object({
    label: z.union([z.string(), z.number()]).optional(),
  })
  .passthrough();

export const EngineeringDatasetSchema = z
  .object({
    leads: z.array(
      z
        .object({
          locations: z.array(EngineeringLocationSchema).nullish().transform((value) => value ?? []),
        })
        .passthrough()
    ),
    clientData: ObjectMapSchema.optional(),
  })
  .passthrough();

export type SurveyDataset = z.infer<typeof SurveyDatasetSchema>;
export type EngineeringDataset = z.infer<typeof EngineeringDatasetSchema>;
export type EngineeringLocation = z.infer<typeof EngineeringLocationSchema>;

// ============================================================================
// Parsing
// ============================================================================

function toIssues(error: ZodError): ValidationIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Validate a parsed survey document
 *
 * @throws {InputValidationError} If the document has no usable `nodes` map
 */
export function parseSurveyDataset(input: unknown): SurveyDataset {
  const result = SurveyDatasetSchema.safeParse(input);
  if (!result.success) {
    throw new InputValidationError('survey', toIssues(result.error));
  }
  return result.data;
}

/**
 * Validate a parsed engineering document
 *
 * @throws {InputValidationError} If the document has no `leads` array
 */
export function parseEngineeringDataset(input: unknown): EngineeringDataset {
  const result = EngineeringDatasetSchema.safeParse(input);
  if (!result.success) {
    throw new InputValidationError('engineering', toIssues(result.error));
  }
  return result.data;
}

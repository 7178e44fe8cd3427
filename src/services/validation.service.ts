/**
 * ValidationService - Thought input validation
 * Stateless service - failures are returned, never thrown
 */

import { z } from 'zod';
import type { ThoughtInput, ThoughtValidation, ValidationError } from '../types/thought.types.js';

const REQUIRED_FIELDS = ['thought', 'thoughtNumber', 'totalThoughts', 'nextThoughtNeeded'] as const;
type RequiredField = (typeof REQUIRED_FIELDS)[number];

const FIELD_ERRORS: Record<RequiredField, string> = {
  thought: 'Invalid thought: must be a non-empty string',
  thoughtNumber: 'Invalid thoughtNumber: must be a positive integer',
  totalThoughts: 'Invalid totalThoughts: must be a positive integer',
  nextThoughtNeeded: 'Invalid nextThoughtNeeded: must be a boolean',
};

const positiveInt = z.number().int().positive();

/** Optional fields: kept when well-typed, dropped otherwise */
const optionalThoughtFields = {
  isRevision: z.boolean().optional().catch(undefined),
  revisesThought: positiveInt.optional().catch(undefined),
  branchFromThought: positiveInt.optional().catch(undefined),
  branchId: z.string().min(1).optional().catch(undefined),
  needsMoreThoughts: z.boolean().optional().catch(undefined),
};

const thoughtSchema = z.object({
  thought: z.string().refine((s) => s.trim().length > 0),
  thoughtNumber: positiveInt,
  totalThoughts: positiveInt,
  nextThoughtNeeded: z.boolean(),
  ...optionalThoughtFields,
});

/** Loosened so that every failure, a missing field included, reaches validateThought */
const lenient = <T extends z.ZodTypeAny>(schema: T) => schema.optional().catch(undefined);

/**
 * Tool argument shape advertised to MCP clients.
 * Nothing is rejected here; all rules live in validateThought.
 */
export const thoughtToolShape = {
  thought: lenient(z.string()).describe('Your current thinking step (required)'),
  nextThoughtNeeded: lenient(z.boolean()).describe('Whether another thought step is needed (required)'),
  thoughtNumber: lenient(z.number()).describe('Current thought number, can exceed the initial total (required)'),
  totalThoughts: lenient(z.number()).describe('Estimated total thoughts needed, can be adjusted (required)'),
  isRevision: optionalThoughtFields.isRevision.describe('Whether this revises previous thinking'),
  revisesThought: optionalThoughtFields.revisesThought.describe('Which thought is being reconsidered'),
  branchFromThought: optionalThoughtFields.branchFromThought.describe('Branching point thought number'),
  branchId: optionalThoughtFields.branchId.describe('Branch identifier'),
  needsMoreThoughts: optionalThoughtFields.needsMoreThoughts.describe('If more thoughts are needed'),
};

export class ValidationService {
  /**
   * Validate one submitted thought.
   * Required fields are checked in order (thought, thoughtNumber, totalThoughts,
   * nextThoughtNeeded) and the first failure is reported.
   */
  validateThought(input: unknown): ThoughtValidation {
    const parsed = thoughtSchema.safeParse(input);
    if (parsed.success) {
      return { ok: true, input: this.compact(parsed.data) };
    }
    return { ok: false, error: this.toValidationError(parsed.error) };
  }

  private toValidationError(error: z.ZodError): ValidationError {
    const failedFields = new Set(error.issues.map((issue) => issue.path[0]));
    const field = REQUIRED_FIELDS.find((f) => failedFields.has(f));
    if (field) {
      return { kind: 'validation', field, message: FIELD_ERRORS[field] };
    }
    return { kind: 'validation', message: 'Invalid input: expected an object with thought fields' };
  }

  /** Drop absent optionals so records only carry what the caller supplied */
  private compact(data: z.infer<typeof thoughtSchema>): ThoughtInput {
    const input: ThoughtInput = {
      thought: data.thought,
      thoughtNumber: data.thoughtNumber,
      totalThoughts: data.totalThoughts,
      nextThoughtNeeded: data.nextThoughtNeeded,
    };
    if (data.isRevision !== undefined) input.isRevision = data.isRevision;
    if (data.revisesThought !== undefined) input.revisesThought = data.revisesThought;
    if (data.branchFromThought !== undefined) input.branchFromThought = data.branchFromThought;
    if (data.branchId !== undefined) input.branchId = data.branchId;
    if (data.needsMoreThoughts !== undefined) input.needsMoreThoughts = data.needsMoreThoughts;
    return input;
  }
}

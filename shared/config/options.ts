/**
 * Parse option schema
 *
 * Every parse call receives a fully resolved `ParseOptions`; callers build one
 * from partial input with `resolveParseOptions`.
 */

import { z } from 'zod';
import type { Result } from '../utils/result';
import { Ok, Err } from '../utils/result';
import type { ValidationError } from '../validators/validators';

export const CountMismatchPolicySchema = z.enum(['strict', 'lenient']);

export type CountMismatchPolicy = z.infer<typeof CountMismatchPolicySchema>;

export const ParseOptionsSchema = z.object({
  // Hard ceiling on triangles accepted into one mesh
  maxTriangles: z.number().int().positive().optional().default(10_000_000),
  // Hard ceiling on source size in bytes
  maxFileSize: z.number().int().positive().optional().default(512 * 1024 * 1024),
  // Triangles with a smaller area are flagged as degenerate
  degenerateAreaEpsilon: z.number().nonnegative().optional().default(1e-12),
  // Supplied normals shorter than this are recomputed from geometry
  normalEpsilon: z.number().nonnegative().optional().default(1e-6),
  // 'lenient' decodes the complete records of a binary file whose count disagrees with its length
  countMismatch: CountMismatchPolicySchema.optional().default('strict'),
  // Skip detection and use this registered format
  format: z.string().min(1).optional(),
});

export type ParseOptions = z.infer<typeof ParseOptionsSchema>;
export type ParseOptionsInput = z.input<typeof ParseOptionsSchema>;

export const defaultParseOptions: ParseOptions = Object.freeze(ParseOptionsSchema.parse({}));

export const resolveParseOptions = (
  input: ParseOptionsInput = {}
): Result<ParseOptions, ValidationError> => {
  const parsed = ParseOptionsSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return Err({
      message: issue ? issue.message : 'Invalid parse options',
      code: 'INVALID_OPTIONS',
      path: issue ? issue.path.join('.') : undefined,
    });
  }
  return Ok(parsed.data);
};

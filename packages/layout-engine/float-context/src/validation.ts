/**
 * Input schemas for the float context.
 *
 * Every public entry point parses its input here before touching the band
 * profile, so a rejected call leaves no partial state behind.
 */

import { z } from 'zod';
import type { FloatContextOptions, FloatRequest } from '@float-placement/contracts';
import { FloatPlacementError, type FloatPlacementErrorCode } from './errors.js';

const FLOAT_SIDES = ['left', 'right'] as const;
const CLEAR_SIDES = ['left', 'right', 'both', 'none'] as const;

const coordinate = z.number().finite().nonnegative();

export const floatRequestSchema = z.object({
  side: z.enum(FLOAT_SIDES),
  width: coordinate,
  height: coordinate,
  minTop: coordinate.default(0),
});

export const clearSideSchema = z.enum(CLEAR_SIDES);

export const floatContextOptionsSchema = z.object({
  containingWidth: z.number().finite().positive(),
  debug: z.boolean().optional(),
  checkInvariants: z.boolean().optional(),
});

export type NormalizedFloatRequest = z.infer<typeof floatRequestSchema>;

const parseWith = <T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
  code: FloatPlacementErrorCode,
  subject: string,
): z.infer<T> => {
  const result = schema.safeParse(input);
  if (result.success) return result.data;

  const issue = result.error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join('.') : subject;
  const reason = issue?.message ?? 'Invalid input';
  const message = field === subject ? `Invalid ${subject}: ${reason}.` : `Invalid ${subject}: ${field}: ${reason}.`;
  throw new FloatPlacementError(code, message, { field, reason });
};

/**
 * Validates a placement request and fills in `minTop`.
 *
 * @throws FloatPlacementError INVALID_DIMENSIONS for a missing or unknown side,
 *   or a negative or non-finite width, height or minTop
 */
export function parseFloatRequest(input: FloatRequest): NormalizedFloatRequest {
  return parseWith(floatRequestSchema, input, 'INVALID_DIMENSIONS', 'float request');
}

/**
 * @throws FloatPlacementError INVALID_OPTIONS unless containingWidth is finite and positive
 */
export function parseFloatContextOptions(input: FloatContextOptions): FloatContextOptions {
  return parseWith(floatContextOptionsSchema, input, 'INVALID_OPTIONS', 'float context options');
}

/**
 * @throws FloatPlacementError INVALID_DIMENSIONS for a negative or non-finite coordinate
 */
export function parseCoordinate(value: number, field: string): number {
  return parseWith(coordinate, value, 'INVALID_DIMENSIONS', field);
}

export function parseClearSide(value: string): z.infer<typeof clearSideSchema> {
  return parseWith(clearSideSchema, value, 'INVALID_DIMENSIONS', 'clear side');
}

/**
 * Normalize a scalar-or-sequence option into an array.
 *
 * Block options that hold one value per variable (descriptors, bounds,
 * partitions) accept a bare scalar as shorthand for a single variable.
 */

import { z } from "zod";
import { validateField } from "./validation.js";

function isSequence<T>(value: T | readonly T[]): value is readonly T[] {
  return Array.isArray(value);
}

export function toArray<T>(value: T | readonly T[]): T[] {
  if (isSequence(value)) {
    return [...value];
  }
  return [value];
}

/**
 * Validate a scalar-or-sequence option and normalize it to an array.
 * A bare item is accepted as a one-element sequence.
 */
export function validateSequence<S extends z.ZodTypeAny>(
  field: string,
  item: S,
  value: unknown,
  minLength = 0
) {
  const schema = z.preprocess(
    (input) => toArray(input),
    z.array(item).min(minLength, {
      message: `${field} must have at least ${minLength} value(s)`,
    })
  );
  return validateField(field, schema, value);
}

/**
 * Values for a keyword line, each preceded by a space.
 */
export function formatList(values: readonly (number | string)[]): string {
  return values.map((value) => ` ${value}`).join("");
}

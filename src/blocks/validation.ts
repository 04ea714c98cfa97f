/**
 * Field validation results and errors shared by every block.
 *
 * Setters never throw: they return a FieldResult and leave the field
 * untouched on failure. Block factories collect every failing option into
 * a BlockResult. Callers that prefer fail-fast behavior pass either result
 * through unwrap().
 */

import type { z, ZodIssue } from "zod";

/**
 * Kinds of validation failure.
 *
 *   type_mismatch - the value has the wrong type (a number where a string
 *                   is required, a float where an integer is required)
 *   invalid_value - the type is right but the value is outside the
 *                   allowed domain (out of range, not in a closed set)
 */
export type ValidationErrorKind = "type_mismatch" | "invalid_value";

export interface ValidationIssue {
  /** Option name, in camelCase, of the rejected field */
  field: string;
  kind: ValidationErrorKind;
  /** Human-readable error message */
  message: string;
  /** Zod error code, or "cross_field" for checks spanning several fields */
  code: string;
}

export type FieldResult<T> =
  | { success: true; value: T }
  | { success: false; error: ValidationIssue };

export type BlockResult<T> =
  | { success: true; block: T }
  | { success: false; issues: ValidationIssue[] };

export class BlockValidationError extends Error {
  public readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[]) {
    super(message);
    this.name = "BlockValidationError";
    this.issues = issues;
  }

  /** Kind of the first issue. */
  get kind(): ValidationErrorKind {
    return this.issues[0]?.kind ?? "invalid_value";
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = [this.message];
    for (const issue of this.issues) {
      lines.push(`  - ${issue.field} [${issue.kind}]: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Map a zod issue onto our two-kind taxonomy.
 * A union fails on type only when every alternative failed on type.
 */
export function classifyIssue(issue: ZodIssue): ValidationErrorKind {
  if (issue.code === "invalid_union") {
    const typeOnly = issue.unionErrors.every((error) =>
      error.issues.every((inner) => classifyIssue(inner) === "type_mismatch")
    );
    return typeOnly ? "type_mismatch" : "invalid_value";
  }
  return issue.code === "invalid_type" ? "type_mismatch" : "invalid_value";
}

export function toValidationIssue(field: string, issue: ZodIssue): ValidationIssue {
  return {
    field,
    kind: classifyIssue(issue),
    message: issue.message,
    code: issue.code,
  };
}

/**
 * Validate a single field value against its schema.
 */
export function validateField<S extends z.ZodTypeAny>(
  field: string,
  schema: S,
  value: unknown
): FieldResult<z.output<S>> {
  const result = schema.safeParse(value);
  if (result.success) {
    return { success: true, value: result.data };
  }
  // Report the first issue only; nested paths are folded into the field
  const [first] = result.error.issues;
  return { success: false, error: toValidationIssue(field, first) };
}

export function fieldFailure(
  field: string,
  kind: ValidationErrorKind,
  message: string,
  code = "cross_field"
): FieldResult<never> {
  return { success: false, error: { field, kind, message, code } };
}

/**
 * Accumulates issues while a block validates its options.
 */
export class IssueCollector {
  readonly issues: ValidationIssue[] = [];

  /**
   * Record the issue of a failed result.
   * Returns the parsed value, or undefined when validation failed.
   */
  check<T>(result: FieldResult<T>): T | undefined {
    if (result.success) {
      return result.value;
    }
    this.issues.push(result.error);
    return undefined;
  }

  get ok(): boolean {
    return this.issues.length === 0;
  }
}

/**
 * Return the value of a successful result, or throw BlockValidationError.
 */
export function unwrap<T>(result: FieldResult<T>): T;
export function unwrap<T>(result: BlockResult<T>): T;
export function unwrap<T>(result: FieldResult<T> | BlockResult<T>): T {
  if (result.success) {
    return "block" in result ? result.block : result.value;
  }
  const issues = "issues" in result ? result.issues : [result.error];
  throw new BlockValidationError(
    `Invalid block configuration: ${issues.length} validation error(s)`,
    issues
  );
}

/**
 * Base for concrete variable kinds.
 *
 * A concrete kind owns a Variables block of a fixed kind and adds keywords
 * holding one value per variable. Their lengths must match the number of
 * descriptors; that is checked on creation and on every assignment. To
 * change the number of variables, use the kind's `resize`, which replaces
 * the descriptors and every per-variable keyword together.
 */

import { fieldFailure, type FieldResult } from "../blocks/validation.js";
import { validateDescriptors, type Variables, type VariablesBlock } from "./variables.js";

/**
 * Check that a per-variable sequence has one value per descriptor.
 */
export function checkCount<T>(
  field: string,
  values: T[],
  count: number
): FieldResult<T[]> {
  if (values.length !== count) {
    return fieldFailure(
      field,
      "invalid_value",
      `${field} has ${values.length} value(s) but there are ${count} descriptor(s)`
    );
  }
  return { success: true, value: values };
}

export abstract class ComposedVariables implements VariablesBlock {
  protected constructor(private readonly base: Variables) {}

  get variables(): string {
    return this.base.variables;
  }

  get descriptors(): readonly string[] {
    return this.base.descriptors;
  }

  /**
   * Replace the descriptors. Rejected when the count no longer matches the
   * per-variable keywords already set; `resize` changes both at once.
   */
  setDescriptors(value: unknown): FieldResult<string[]> {
    const result = validateDescriptors(value);
    if (!result.success) {
      return result;
    }
    const count = result.value.length;
    for (const [field, values] of this.perVariableFields()) {
      if (values !== undefined && values.length !== count) {
        return fieldFailure(
          "descriptors",
          "invalid_value",
          `descriptors has ${count} label(s) but ${field} has ${values.length} value(s)`
        );
      }
    }
    return this.base.setDescriptors(result.value);
  }

  /**
   * Commit descriptors the caller has already validated along with its
   * per-variable keywords.
   */
  protected replaceDescriptors(descriptors: string[]): FieldResult<string[]> {
    return this.base.setDescriptors(descriptors);
  }

  render(): string {
    return this.base.render() + "\n" + this.renderFields();
  }

  /** Per-variable keywords and their current values, keyed by option name. */
  protected abstract perVariableFields(): [string, readonly number[] | undefined][];

  /** Keyword lines following the descriptors line. */
  protected abstract renderFields(): string;
}

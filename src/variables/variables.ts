/**
 * Generic Dakota variables block.
 *
 * A variables block declares a set of labeled variables of one kind. The
 * number of descriptors is the number of variables; concrete kinds add one
 * value per variable for each of their keywords.
 */

import { z } from "zod";
import { formatList, validateSequence } from "../blocks/iterable.js";
import type { BlockResult, FieldResult } from "../blocks/validation.js";

export interface VariablesBlock {
  /** Kind of variable set, e.g. "continuous_design" */
  readonly variables: string;
  /** One label per variable */
  readonly descriptors: readonly string[];
  /** Render the variables block text, without a trailing newline. */
  render(): string;
}

export interface VariablesOptions {
  variables?: string;
  /** A single label is shorthand for a one-element list */
  descriptors?: string | readonly string[];
}

export const VARIABLES_DEFAULTS = {
  variables: "continuous_design",
  descriptors: [],
} as const;

const Descriptor = z.string({
  invalid_type_error: "Descriptors must be a string or a list of strings",
});

export function validateDescriptors(value: unknown): FieldResult<string[]> {
  return validateSequence("descriptors", Descriptor, value);
}

/**
 * Quote a label as a string literal. Single quotes, unless the label holds a
 * single quote and no double quote; then double quotes.
 */
export function quoteDescriptor(label: string): string {
  const escaped = label.replace(/\\/g, "\\\\");
  if (label.includes("'") && !label.includes('"')) {
    return `"${escaped}"`;
  }
  return `'${escaped.replace(/'/g, "\\'")}'`;
}

export class Variables implements VariablesBlock {
  /** Not validated here; concrete kinds fix it. */
  variables: string;

  private descriptorValues: string[];

  private constructor(variables: string, descriptors: string[]) {
    this.variables = variables;
    this.descriptorValues = descriptors;
  }

  static create(options: VariablesOptions = {}): BlockResult<Variables> {
    const descriptors = validateDescriptors(
      options.descriptors ?? VARIABLES_DEFAULTS.descriptors
    );
    if (!descriptors.success) {
      return { success: false, issues: [descriptors.error] };
    }
    return {
      success: true,
      block: new Variables(
        options.variables ?? VARIABLES_DEFAULTS.variables,
        descriptors.value
      ),
    };
  }

  get descriptors(): readonly string[] {
    return [...this.descriptorValues];
  }

  setDescriptors(value: unknown): FieldResult<string[]> {
    const result = validateDescriptors(value);
    if (result.success) {
      this.descriptorValues = result.value;
    }
    return result;
  }

  /**
   * Render the variables block:
   *
   *   variables
   *     continuous_design = 2
   *       descriptors = 'x1' 'x2'
   */
  render(): string {
    const descriptors = this.descriptorValues;
    let s = "variables\n" + `  ${this.variables} = ${descriptors.length}\n`;
    s += "    descriptors =" + formatList(descriptors.map(quoteDescriptor));
    return s;
  }
}

/**
 * Probability and response levels for uncertainty quantification.
 *
 * Levels are either one flat list (a single response) or a list of lists
 * with one sub-list per response. The shape is resolved once, when the
 * option is validated, so rendering is a plain switch on the tag.
 */

import { z } from "zod";
import { fieldFailure, validateField, type FieldResult } from "./validation.js";

export type Levels =
  | { kind: "flat"; values: number[] }
  | { kind: "grouped"; groups: number[][] };

/**
 * Plain array shape accepted for a levels option. Mixing numbers and
 * lists type-checks but is rejected by parseLevels.
 */
export type LevelsInput = readonly (number | readonly number[])[];

const LevelSchema = z.number({
  invalid_type_error: "Levels must contain numbers or lists of numbers",
});

const LevelsInputSchema = z.array(
  z.union([LevelSchema, z.array(LevelSchema)], {
    errorMap: (issue, ctx) =>
      issue.code === "invalid_union"
        ? { message: "Levels must contain numbers or lists of numbers" }
        : { message: ctx.defaultError },
  }),
  { invalid_type_error: "Levels must be a list" }
);

/**
 * Validate a levels option and resolve its shape.
 */
export function parseLevels(field: string, value: unknown): FieldResult<Levels> {
  const parsed = validateField(field, LevelsInputSchema, value);
  if (!parsed.success) {
    return parsed;
  }

  const items = parsed.value;
  const values: number[] = [];
  const groups: number[][] = [];
  for (const item of items) {
    if (typeof item === "number") {
      values.push(item);
    } else {
      groups.push(item);
    }
  }

  if (values.length > 0 && groups.length > 0) {
    return fieldFailure(
      field,
      "invalid_value",
      "Levels must be all numbers or all lists, not a mix",
      "mixed_levels"
    );
  }

  if (groups.length > 0) {
    return { success: true, value: { kind: "grouped", groups } };
  }
  return { success: true, value: { kind: "flat", values } };
}

export function isEmptyLevels(levels: Levels): boolean {
  return levels.kind === "flat" ? levels.values.length === 0 : levels.groups.length === 0;
}

/**
 * Convert levels back to their plain array shape.
 */
export function levelsToArray(levels: Levels): number[] | number[][] {
  switch (levels.kind) {
    case "flat":
      return [...levels.values];
    case "grouped":
      return levels.groups.map((group) => [...group]);
  }
}

/**
 * Format levels for appending to a `name =` line.
 *
 * Flat levels continue the current line:
 *
 *   probability_levels = 0.1 0.5 0.9
 *
 * Grouped levels put each response on its own continuation line,
 * indented six spaces:
 *
 *   probability_levels =
 *         0.1 0.5
 *         0.2 0.8
 */
export function formatLevels(levels: Levels): string {
  let s = "";
  switch (levels.kind) {
    case "flat":
      for (const value of levels.values) {
        s += ` ${value}`;
      }
      break;
    case "grouped":
      for (const group of levels.groups) {
        s += "\n     ";
        for (const value of group) {
          s += ` ${value}`;
        }
      }
      break;
  }
  return s + "\n";
}

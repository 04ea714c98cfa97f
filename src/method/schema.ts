/**
 * Field schemas and defaults for method blocks.
 */

import { z } from "zod";
import type { LevelsInput } from "../blocks/levels.js";

export const MethodNameSchema = z.string({
  invalid_type_error: "Method must be a string",
});

export const MaxIterationsSchema = z
  .number({ invalid_type_error: "Max iterations must be an integer" })
  .int({ message: "Max iterations must be an integer" })
  .nonnegative({ message: "Max iterations must be non-negative" });

/** Defined on the open interval (0, 1). */
export const ConvergenceToleranceSchema = z
  .number({ invalid_type_error: "Convergence tolerance must be a number" })
  .gt(0, { message: "Convergence tolerance must be on (0,1)" })
  .lt(1, { message: "Convergence tolerance must be on (0,1)" });

export const BasisPolynomialFamily = z.enum(["extended", "askey", "wiener"], {
  errorMap: (issue, ctx) =>
    issue.code === "invalid_enum_value"
      ? { message: "Polynomial type must be 'extended', 'askey', or 'wiener'" }
      : { message: ctx.defaultError },
});
export type BasisPolynomialFamily = z.infer<typeof BasisPolynomialFamily>;

export const SampleType = z.enum(["random", "lhs"], {
  errorMap: (issue, ctx) =>
    issue.code === "invalid_enum_value"
      ? { message: "Sample type must be 'random' or 'lhs'" }
      : { message: ctx.defaultError },
});
export type SampleType = z.infer<typeof SampleType>;

export const SamplesSchema = z
  .number({ invalid_type_error: "Samples must be an integer" })
  .int({ message: "Samples must be an integer" })
  .nonnegative({ message: "Samples must be non-negative" });

export const SeedSchema = z
  .number({ invalid_type_error: "Seed must be an integer" })
  .int({ message: "Seed must be an integer" });

export const VarianceBasedDecompSchema = z.boolean({
  invalid_type_error: "Set variance-based decomposition with a boolean",
});

export const METHOD_DEFAULTS = {
  method: "vector_parameter_study",
} as const;

export const UNCERTAINTY_QUANTIFICATION_DEFAULTS: {
  readonly basisPolynomialFamily: BasisPolynomialFamily;
  readonly probabilityLevels: LevelsInput;
  readonly responseLevels: LevelsInput;
  readonly samples: number;
  readonly sampleType: SampleType;
  readonly varianceBasedDecomp: boolean;
} = {
  basisPolynomialFamily: "extended",
  probabilityLevels: [0.1, 0.5, 0.9],
  responseLevels: [],
  samples: 10,
  sampleType: "random",
  varianceBasedDecomp: false,
};

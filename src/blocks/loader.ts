/**
 * Block loader.
 *
 * Builds method and variables blocks from plain configuration objects,
 * typically parsed from JSON, using Dakota's snake_case keyword names:
 *
 *   {
 *     "method": { "method": "sampling", "samples": 25, "sample_type": "lhs" },
 *     "variables": { "variables": "uniform_uncertain", "descriptors": ["T_air"],
 *                    "lower_bounds": [-20.0], "upper_bounds": [-5.0] }
 *   }
 *
 * The input shape is checked here; field rules are enforced by each
 * block's create().
 */

import { z, type ZodIssue } from "zod";
import { getLogger } from "../logging/index.js";
import {
  CenteredParameterStudy,
  MultidimParameterStudy,
  UncertaintyQuantification,
  VectorParameterStudy,
  BasisPolynomialFamily,
  SampleType,
  type MethodBlock,
} from "../method/index.js";
import { ContinuousDesign, UniformUncertain, type VariablesBlock } from "../variables/index.js";
import {
  BlockValidationError,
  toValidationIssue,
  unwrap,
  type BlockResult,
} from "./validation.js";

const logger = getLogger("loader");

const NumberOrList = z.union([z.number(), z.array(z.number())]);
const LevelsList = z.array(z.union([z.number(), z.array(z.number())]));
const Labels = z.union([z.string(), z.array(z.string())]);

const methodControls = {
  max_iterations: z.number().optional(),
  convergence_tolerance: z.number().optional(),
};

export const MethodInputSchema = z.discriminatedUnion("method", [
  z
    .object({
      method: z.literal("vector_parameter_study"),
      ...methodControls,
      final_point: NumberOrList.optional(),
      num_steps: z.number().optional(),
    })
    .strict(),
  z
    .object({
      method: z.literal("centered_parameter_study"),
      ...methodControls,
      step_vector: NumberOrList.optional(),
      steps_per_variable: NumberOrList.optional(),
    })
    .strict(),
  z
    .object({
      method: z.literal("multidim_parameter_study"),
      ...methodControls,
      partitions: NumberOrList.optional(),
    })
    .strict(),
  z
    .object({
      method: z.literal("sampling"),
      ...methodControls,
      basis_polynomial_family: BasisPolynomialFamily.optional(),
      probability_levels: LevelsList.optional(),
      response_levels: LevelsList.optional(),
      samples: z.number().optional(),
      sample_type: SampleType.optional(),
      seed: z.number().optional(),
      variance_based_decomp: z.boolean().optional(),
    })
    .strict(),
]);
export type MethodInput = z.infer<typeof MethodInputSchema>;

const pointKeywords = {
  descriptors: Labels.optional(),
  initial_point: NumberOrList.optional(),
  lower_bounds: NumberOrList.optional(),
  upper_bounds: NumberOrList.optional(),
};

export const VariablesInputSchema = z.discriminatedUnion("variables", [
  z.object({ variables: z.literal("continuous_design"), ...pointKeywords }).strict(),
  z.object({ variables: z.literal("uniform_uncertain"), ...pointKeywords }).strict(),
]);
export type VariablesInput = z.infer<typeof VariablesInputSchema>;

export const BlocksInputSchema = z
  .object({
    method: z.record(z.string(), z.unknown()),
    variables: z.record(z.string(), z.unknown()),
  })
  .strict();

/**
 * Parse input against a schema or throw BlockValidationError.
 * Issue fields are the dotted path of the offending key.
 */
function parseInput<S extends z.ZodTypeAny>(
  label: string,
  schema: S,
  input: unknown
): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue: ZodIssue) =>
      toValidationIssue(issue.path.length > 0 ? issue.path.join(".") : "(root)", issue)
    );
    throw new BlockValidationError(
      `Invalid ${label} input: ${issues.length} validation error(s)`,
      issues
    );
  }
  return result.data;
}

function built<T>(label: string, result: BlockResult<T>): T {
  if (!result.success) {
    logger.warn(`Rejected ${label} block`, {
      issues: result.issues.map((issue) => `${issue.field}: ${issue.message}`),
    });
  }
  return unwrap(result);
}

/**
 * Build a method block from a plain configuration object.
 * @throws BlockValidationError if the input or any field is invalid
 */
export function loadMethodBlock(input: unknown): MethodBlock {
  const data = parseInput("method", MethodInputSchema, input);
  const controls = {
    maxIterations: data.max_iterations,
    convergenceTolerance: data.convergence_tolerance,
  };
  logger.debug("Loading method block", { method: data.method });

  switch (data.method) {
    case "vector_parameter_study":
      return built(
        data.method,
        VectorParameterStudy.create({
          ...controls,
          finalPoint: data.final_point,
          numSteps: data.num_steps,
        })
      );
    case "centered_parameter_study":
      return built(
        data.method,
        CenteredParameterStudy.create({
          ...controls,
          stepVector: data.step_vector,
          stepsPerVariable: data.steps_per_variable,
        })
      );
    case "multidim_parameter_study":
      return built(
        data.method,
        MultidimParameterStudy.create({ ...controls, partitions: data.partitions })
      );
    case "sampling":
      return built(
        data.method,
        UncertaintyQuantification.create({
          ...controls,
          basisPolynomialFamily: data.basis_polynomial_family,
          probabilityLevels: data.probability_levels,
          responseLevels: data.response_levels,
          samples: data.samples,
          sampleType: data.sample_type,
          seed: data.seed,
          varianceBasedDecomp: data.variance_based_decomp,
        })
      );
  }
}

/**
 * Build a variables block from a plain configuration object.
 * @throws BlockValidationError if the input or any field is invalid
 */
export function loadVariablesBlock(input: unknown): VariablesBlock {
  const data = parseInput("variables", VariablesInputSchema, input);
  const options = {
    descriptors: data.descriptors,
    initialPoint: data.initial_point,
    lowerBounds: data.lower_bounds,
    upperBounds: data.upper_bounds,
  };
  logger.debug("Loading variables block", { variables: data.variables });

  switch (data.variables) {
    case "continuous_design":
      return built(data.variables, ContinuousDesign.create(options));
    case "uniform_uncertain":
      return built(data.variables, UniformUncertain.create(options));
  }
}

export interface LoadedBlocks {
  method: MethodBlock;
  variables: VariablesBlock;
}

/**
 * Build both blocks from `{ method, variables }`.
 */
export function loadBlocks(input: unknown): LoadedBlocks {
  const data = parseInput("blocks", BlocksInputSchema, input);
  return {
    method: loadMethodBlock(data.method),
    variables: loadVariablesBlock(data.variables),
  };
}

/**
 * Parameter study methods.
 *
 * Parameter studies evaluate the model on a structured set of points in
 * the variable space. Each holds one value per variable, so its sequences
 * must line up with the descriptors of the variables block it runs with.
 */

import { z } from "zod";
import { formatList, validateSequence } from "../blocks/iterable.js";
import {
  fieldFailure,
  IssueCollector,
  validateField,
  type BlockResult,
  type FieldResult,
  type ValidationIssue,
} from "../blocks/validation.js";
import { ComposedMethod } from "./composed.js";
import { Method, type MethodControls } from "./method.js";

const Coordinate = z.number({ invalid_type_error: "Coordinates must be numbers" });

const StepCount = z
  .number({ invalid_type_error: "Step counts must be integers" })
  .int({ message: "Step counts must be integers" })
  .nonnegative({ message: "Step counts must be non-negative" });

const NumStepsSchema = z
  .number({ invalid_type_error: "Number of steps must be an integer" })
  .int({ message: "Number of steps must be an integer" })
  .positive({ message: "Number of steps must be positive" });

/**
 * Create the underlying Method and merge its issues with the study's own.
 */
function buildStudy<T>(
  method: string,
  controls: MethodControls,
  issues: IssueCollector,
  make: (base: Method) => T | undefined
): BlockResult<T> {
  const base = Method.create({ method, ...controlsOf(controls) });
  const block = base.success && issues.ok ? make(base.block) : undefined;
  if (block === undefined) {
    const all: ValidationIssue[] = [...(base.success ? [] : base.issues), ...issues.issues];
    return { success: false, issues: all };
  }
  return { success: true, block };
}

function controlsOf(controls: MethodControls): MethodControls {
  return {
    maxIterations: controls.maxIterations,
    convergenceTolerance: controls.convergenceTolerance,
  };
}

// ---------------------------------------------------------------------------
// Vector parameter study
// ---------------------------------------------------------------------------

export interface VectorParameterStudyOptions extends MethodControls {
  /** End point of the vector; the start is the variables' initial point */
  finalPoint?: number | readonly number[];
  /** Number of steps between the initial and final points */
  numSteps?: number;
}

export function validateFinalPoint(value: unknown): FieldResult<number[]> {
  return validateSequence("finalPoint", Coordinate, value, 1);
}

export function validateNumSteps(value: unknown): FieldResult<number> {
  return validateField("numSteps", NumStepsSchema, value);
}

export class VectorParameterStudy extends ComposedMethod {
  private constructor(
    base: Method,
    private finalPointValues: number[],
    private numStepsValue: number
  ) {
    super(base);
  }

  static create(
    options: VectorParameterStudyOptions = {}
  ): BlockResult<VectorParameterStudy> {
    const issues = new IssueCollector();
    const finalPoint = issues.check(validateFinalPoint(options.finalPoint ?? [1.1, 1.3]));
    const numSteps = issues.check(validateNumSteps(options.numSteps ?? 10));

    return buildStudy("vector_parameter_study", options, issues, (base) =>
      finalPoint !== undefined && numSteps !== undefined
        ? new VectorParameterStudy(base, finalPoint, numSteps)
        : undefined
    );
  }

  get finalPoint(): number[] {
    return [...this.finalPointValues];
  }

  get numSteps(): number {
    return this.numStepsValue;
  }

  setFinalPoint(value: unknown): FieldResult<number[]> {
    const result = validateFinalPoint(value);
    if (result.success) {
      this.finalPointValues = result.value;
    }
    return result;
  }

  setNumSteps(value: unknown): FieldResult<number> {
    const result = validateNumSteps(value);
    if (result.success) {
      this.numStepsValue = result.value;
    }
    return result;
  }

  protected renderFields(): string {
    return (
      `    final_point =${formatList(this.finalPointValues)}\n` +
      `    num_steps = ${this.numStepsValue}\n`
    );
  }
}

// ---------------------------------------------------------------------------
// Centered parameter study
// ---------------------------------------------------------------------------

export interface CenteredParameterStudyOptions extends MethodControls {
  /** Step size for each variable */
  stepVector?: number | readonly number[];
  /** Number of steps taken on each side of the center, per variable */
  stepsPerVariable?: number | readonly number[];
}

export function validateStepVector(value: unknown): FieldResult<number[]> {
  return validateSequence("stepVector", Coordinate, value, 1);
}

export function validateStepsPerVariable(value: unknown): FieldResult<number[]> {
  return validateSequence("stepsPerVariable", StepCount, value, 1);
}

function lengthMismatch(field: string, expected: number): FieldResult<never> {
  return fieldFailure(
    field,
    "invalid_value",
    `stepVector and stepsPerVariable must have the same length (expected ${expected})`
  );
}

/**
 * Validate both step sequences and check that their lengths agree.
 */
function validateSteps(
  stepVectorValue: unknown,
  stepsPerVariableValue: unknown,
  issues: IssueCollector
): { stepVector: number[]; stepsPerVariable: number[] } | undefined {
  const stepVector = issues.check(validateStepVector(stepVectorValue));
  const stepsPerVariable = issues.check(validateStepsPerVariable(stepsPerVariableValue));
  if (stepVector === undefined || stepsPerVariable === undefined) {
    return undefined;
  }
  if (stepVector.length !== stepsPerVariable.length) {
    issues.check(lengthMismatch("stepsPerVariable", stepVector.length));
    return undefined;
  }
  return { stepVector, stepsPerVariable };
}

export class CenteredParameterStudy extends ComposedMethod {
  private constructor(
    base: Method,
    private stepVectorValues: number[],
    private stepsPerVariableValues: number[]
  ) {
    super(base);
  }

  static create(
    options: CenteredParameterStudyOptions = {}
  ): BlockResult<CenteredParameterStudy> {
    const issues = new IssueCollector();
    const steps = validateSteps(
      options.stepVector ?? [0.4, 0.5],
      options.stepsPerVariable ?? [2, 3],
      issues
    );

    return buildStudy("centered_parameter_study", options, issues, (base) =>
      steps !== undefined
        ? new CenteredParameterStudy(base, steps.stepVector, steps.stepsPerVariable)
        : undefined
    );
  }

  get stepVector(): number[] {
    return [...this.stepVectorValues];
  }

  get stepsPerVariable(): number[] {
    return [...this.stepsPerVariableValues];
  }

  setStepVector(value: unknown): FieldResult<number[]> {
    const result = validateStepVector(value);
    if (!result.success) {
      return result;
    }
    if (result.value.length !== this.stepsPerVariableValues.length) {
      return lengthMismatch("stepVector", this.stepsPerVariableValues.length);
    }
    this.stepVectorValues = result.value;
    return result;
  }

  setStepsPerVariable(value: unknown): FieldResult<number[]> {
    const result = validateStepsPerVariable(value);
    if (!result.success) {
      return result;
    }
    if (result.value.length !== this.stepVectorValues.length) {
      return lengthMismatch("stepsPerVariable", this.stepVectorValues.length);
    }
    this.stepsPerVariableValues = result.value;
    return result;
  }

  /**
   * Replace both step sequences together, e.g. to change the number of
   * variables. Nothing changes unless both pass.
   */
  setSteps(stepVector: unknown, stepsPerVariable: unknown): BlockResult<CenteredParameterStudy> {
    const issues = new IssueCollector();
    const steps = validateSteps(stepVector, stepsPerVariable, issues);
    if (steps === undefined) {
      return { success: false, issues: issues.issues };
    }
    this.stepVectorValues = steps.stepVector;
    this.stepsPerVariableValues = steps.stepsPerVariable;
    return { success: true, block: this };
  }

  protected renderFields(): string {
    return (
      `    step_vector =${formatList(this.stepVectorValues)}\n` +
      `    steps_per_variable =${formatList(this.stepsPerVariableValues)}\n`
    );
  }
}

// ---------------------------------------------------------------------------
// Multidimensional parameter study
// ---------------------------------------------------------------------------

export interface MultidimParameterStudyOptions extends MethodControls {
  /** Number of evenly spaced intervals along each variable's bounds */
  partitions?: number | readonly number[];
}

export function validatePartitions(value: unknown): FieldResult<number[]> {
  return validateSequence("partitions", StepCount, value, 1);
}

export class MultidimParameterStudy extends ComposedMethod {
  private constructor(base: Method, private partitionsValues: number[]) {
    super(base);
  }

  static create(
    options: MultidimParameterStudyOptions = {}
  ): BlockResult<MultidimParameterStudy> {
    const issues = new IssueCollector();
    const partitions = issues.check(validatePartitions(options.partitions ?? [10, 8]));

    return buildStudy("multidim_parameter_study", options, issues, (base) =>
      partitions !== undefined ? new MultidimParameterStudy(base, partitions) : undefined
    );
  }

  get partitions(): number[] {
    return [...this.partitionsValues];
  }

  setPartitions(value: unknown): FieldResult<number[]> {
    const result = validatePartitions(value);
    if (result.success) {
      this.partitionsValues = result.value;
    }
    return result;
  }

  protected renderFields(): string {
    return `    partitions =${formatList(this.partitionsValues)}\n`;
  }
}

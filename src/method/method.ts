/**
 * Generic Dakota method block.
 *
 * The max_iterations and convergence_tolerance keywords belong to Dakota's
 * method independent controls, so every method carries them. Concrete
 * methods wrap a Method (see composed.ts) and append their own keywords
 * after its lines.
 */

import { getLogger } from "../logging/index.js";
import {
  IssueCollector,
  validateField,
  type BlockResult,
  type FieldResult,
} from "../blocks/validation.js";
import {
  ConvergenceToleranceSchema,
  MaxIterationsSchema,
  METHOD_DEFAULTS,
  MethodNameSchema,
} from "./schema.js";

const logger = getLogger("method");

/**
 * Capability shared by every method block.
 */
export interface MethodBlock {
  /** Name of the analysis method, e.g. "vector_parameter_study" */
  readonly method: string;
  /** Stopping criterion based on number of iterations */
  readonly maxIterations: number | undefined;
  /** Stopping criterion on convergence, on the open interval (0, 1) */
  readonly convergenceTolerance: number | undefined;
  /** Render the method block text. */
  render(): string;
}

/** Method independent controls, accepted by every method. */
export interface MethodControls {
  maxIterations?: number;
  convergenceTolerance?: number;
}

export interface MethodOptions extends MethodControls {
  method?: string;
}

interface MethodState {
  method: string;
  maxIterations: number | undefined;
  convergenceTolerance: number | undefined;
}

/**
 * Validate a method name.
 */
export function validateMethodName(value: unknown): FieldResult<string> {
  return validateField("method", MethodNameSchema, value);
}

/**
 * Validate max iterations; undefined unsets the field.
 */
export function validateMaxIterations(value: unknown): FieldResult<number | undefined> {
  return validateField("maxIterations", MaxIterationsSchema.optional(), value);
}

/**
 * Validate convergence tolerance; undefined unsets the field.
 */
export function validateConvergenceTolerance(
  value: unknown
): FieldResult<number | undefined> {
  return validateField(
    "convergenceTolerance",
    ConvergenceToleranceSchema.optional(),
    value
  );
}

export class Method implements MethodBlock {
  private constructor(private readonly state: MethodState) {}

  /**
   * Validate options and create a method block.
   * Every invalid option is reported, not just the first.
   */
  static create(options: MethodOptions = {}): BlockResult<Method> {
    const issues = new IssueCollector();
    const method = issues.check(
      validateMethodName(options.method ?? METHOD_DEFAULTS.method)
    );
    const maxIterations = issues.check(validateMaxIterations(options.maxIterations));
    const convergenceTolerance = issues.check(
      validateConvergenceTolerance(options.convergenceTolerance)
    );

    if (!issues.ok || method === undefined) {
      logger.debug("Rejected method options", { issues: issues.issues.length });
      return { success: false, issues: issues.issues };
    }

    return {
      success: true,
      block: new Method({ method, maxIterations, convergenceTolerance }),
    };
  }

  get method(): string {
    return this.state.method;
  }

  get maxIterations(): number | undefined {
    return this.state.maxIterations;
  }

  get convergenceTolerance(): number | undefined {
    return this.state.convergenceTolerance;
  }

  setMethod(value: unknown): FieldResult<string> {
    const result = validateMethodName(value);
    if (result.success) {
      this.state.method = result.value;
    }
    return result;
  }

  setMaxIterations(value: unknown): FieldResult<number | undefined> {
    const result = validateMaxIterations(value);
    if (result.success) {
      this.state.maxIterations = result.value;
    }
    return result;
  }

  setConvergenceTolerance(value: unknown): FieldResult<number | undefined> {
    const result = validateConvergenceTolerance(value);
    if (result.success) {
      this.state.convergenceTolerance = result.value;
    }
    return result;
  }

  /**
   * Render the preamble of the method block:
   *
   *   method
   *     vector_parameter_study
   *       max_iterations = 50
   *       convergence_tolerance = 0.001
   */
  render(): string {
    let s = "method\n" + `  ${this.method}\n`;
    if (this.maxIterations !== undefined) {
      s += `    max_iterations = ${this.maxIterations}\n`;
    }
    if (this.convergenceTolerance !== undefined) {
      s += `    convergence_tolerance = ${this.convergenceTolerance}\n`;
    }
    return s;
  }
}

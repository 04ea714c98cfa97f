/**
 * Concrete variable kinds.
 */

import { z } from "zod";
import { formatList, validateSequence } from "../blocks/iterable.js";
import {
  fieldFailure,
  IssueCollector,
  type BlockResult,
  type FieldResult,
  type ValidationIssue,
} from "../blocks/validation.js";
import { checkCount, ComposedVariables } from "./composed.js";
import { validateDescriptors, Variables } from "./variables.js";

type NumberSequence = number | readonly number[];

const Bound = z.number({ invalid_type_error: "Bounds and points must be numbers" });

function validatePoints(field: string, value: unknown): FieldResult<number[]> {
  return validateSequence(field, Bound, value);
}

/**
 * Validate a per-variable keyword against the descriptor count.
 */
function validateCounted(field: string, value: unknown, count: number): FieldResult<number[]> {
  const result = validatePoints(field, value);
  return result.success ? checkCount(field, result.value, count) : result;
}

function validatePerVariable(
  field: string,
  value: unknown,
  count: number
): FieldResult<number[] | undefined> {
  if (value === undefined) {
    return { success: true, value: undefined };
  }
  return validateCounted(field, value, count);
}

function keywordLine(keyword: string, values: readonly number[] | undefined): string {
  return values === undefined ? "" : `    ${keyword} =${formatList(values)}\n`;
}

/**
 * Every lower bound must be strictly below its upper bound.
 */
function checkBounds(
  lower: readonly number[] | undefined,
  upper: readonly number[] | undefined
): FieldResult<true> {
  if (lower !== undefined && upper !== undefined) {
    const index = lower.findIndex((value, i) => value >= upper[i]);
    if (index !== -1) {
      return fieldFailure(
        "lowerBounds",
        "invalid_value",
        `lowerBounds[${index}] must be less than upperBounds[${index}]`
      );
    }
  }
  return { success: true, value: true };
}

function resolveDescriptors(
  value: unknown,
  issues: IssueCollector
): string[] | undefined {
  return issues.check(validateDescriptors(value));
}

function failed<T>(base: BlockResult<Variables>, issues: IssueCollector): BlockResult<T> {
  const all: ValidationIssue[] = [...(base.success ? [] : base.issues), ...issues.issues];
  return { success: false, issues: all };
}

// ---------------------------------------------------------------------------
// Continuous design variables
// ---------------------------------------------------------------------------

export interface ContinuousDesignOptions {
  descriptors?: string | readonly string[];
  initialPoint?: NumberSequence;
  lowerBounds?: NumberSequence;
  upperBounds?: NumberSequence;
}

/** A new descriptor set with the keywords that go with it. */
export interface ContinuousDesignResize extends ContinuousDesignOptions {
  descriptors: string | readonly string[];
}

interface ContinuousDesignState {
  initialPoint: number[] | undefined;
  lowerBounds: number[] | undefined;
  upperBounds: number[] | undefined;
}

function validateDesignState(
  options: ContinuousDesignOptions,
  count: number,
  issues: IssueCollector
): ContinuousDesignState {
  const state: ContinuousDesignState = {
    initialPoint: issues.check(validatePerVariable("initialPoint", options.initialPoint, count)),
    lowerBounds: issues.check(validatePerVariable("lowerBounds", options.lowerBounds, count)),
    upperBounds: issues.check(validatePerVariable("upperBounds", options.upperBounds, count)),
  };
  if (issues.ok) {
    issues.check(checkBounds(state.lowerBounds, state.upperBounds));
  }
  return state;
}

export class ContinuousDesign extends ComposedVariables {
  private constructor(
    base: Variables,
    private readonly state: ContinuousDesignState
  ) {
    super(base);
  }

  static create(options: ContinuousDesignOptions = {}): BlockResult<ContinuousDesign> {
    const base = Variables.create({
      variables: "continuous_design",
      descriptors: options.descriptors ?? ["x1", "x2"],
    });
    if (!base.success) {
      return failed(base, new IssueCollector());
    }

    const issues = new IssueCollector();
    const state = validateDesignState(options, base.block.descriptors.length, issues);
    if (!issues.ok) {
      return failed(base, issues);
    }
    return { success: true, block: new ContinuousDesign(base.block, state) };
  }

  /**
   * Replace the descriptors and every per-variable keyword in one step.
   * Keywords left out are unset. Nothing changes unless all of them pass.
   */
  resize(options: ContinuousDesignResize): BlockResult<ContinuousDesign> {
    const issues = new IssueCollector();
    const descriptors = resolveDescriptors(options.descriptors, issues);
    if (descriptors === undefined) {
      return { success: false, issues: issues.issues };
    }
    const state = validateDesignState(options, descriptors.length, issues);
    if (!issues.ok) {
      return { success: false, issues: issues.issues };
    }
    const committed = this.replaceDescriptors(descriptors);
    if (!committed.success) {
      return { success: false, issues: [committed.error] };
    }
    this.state.initialPoint = state.initialPoint;
    this.state.lowerBounds = state.lowerBounds;
    this.state.upperBounds = state.upperBounds;
    return { success: true, block: this };
  }

  get initialPoint(): number[] | undefined {
    return this.state.initialPoint && [...this.state.initialPoint];
  }

  get lowerBounds(): number[] | undefined {
    return this.state.lowerBounds && [...this.state.lowerBounds];
  }

  get upperBounds(): number[] | undefined {
    return this.state.upperBounds && [...this.state.upperBounds];
  }

  setInitialPoint(value: unknown): FieldResult<number[] | undefined> {
    const result = validatePerVariable("initialPoint", value, this.descriptors.length);
    if (result.success) {
      this.state.initialPoint = result.value;
    }
    return result;
  }

  setLowerBounds(value: unknown): FieldResult<number[] | undefined> {
    const result = validatePerVariable("lowerBounds", value, this.descriptors.length);
    if (!result.success) {
      return result;
    }
    const bounds = checkBounds(result.value, this.state.upperBounds);
    if (!bounds.success) {
      return bounds;
    }
    this.state.lowerBounds = result.value;
    return result;
  }

  setUpperBounds(value: unknown): FieldResult<number[] | undefined> {
    const result = validatePerVariable("upperBounds", value, this.descriptors.length);
    if (!result.success) {
      return result;
    }
    const bounds = checkBounds(this.state.lowerBounds, result.value);
    if (!bounds.success) {
      return bounds;
    }
    this.state.upperBounds = result.value;
    return result;
  }

  protected perVariableFields(): [string, readonly number[] | undefined][] {
    return [
      ["initialPoint", this.state.initialPoint],
      ["lowerBounds", this.state.lowerBounds],
      ["upperBounds", this.state.upperBounds],
    ];
  }

  protected renderFields(): string {
    return (
      keywordLine("initial_point", this.state.initialPoint) +
      keywordLine("lower_bounds", this.state.lowerBounds) +
      keywordLine("upper_bounds", this.state.upperBounds)
    );
  }
}

// ---------------------------------------------------------------------------
// Uniform uncertain variables
// ---------------------------------------------------------------------------

export interface UniformUncertainOptions {
  descriptors?: string | readonly string[];
  /** Required; defaults to -2.0 for each default descriptor */
  lowerBounds?: NumberSequence;
  /** Required; defaults to 2.0 for each default descriptor */
  upperBounds?: NumberSequence;
  initialPoint?: NumberSequence;
}

/** A new descriptor set with the keywords that go with it. */
export interface UniformUncertainResize {
  descriptors: string | readonly string[];
  lowerBounds: NumberSequence;
  upperBounds: NumberSequence;
  initialPoint?: NumberSequence;
}

interface UniformUncertainState {
  lowerBounds: number[];
  upperBounds: number[];
  initialPoint: number[] | undefined;
}

function validateUniformState(
  options: Omit<UniformUncertainResize, "descriptors">,
  count: number,
  issues: IssueCollector
): UniformUncertainState | undefined {
  const lowerBounds = issues.check(validateCounted("lowerBounds", options.lowerBounds, count));
  const upperBounds = issues.check(validateCounted("upperBounds", options.upperBounds, count));
  const initialPoint = issues.check(
    validatePerVariable("initialPoint", options.initialPoint, count)
  );
  if (issues.ok) {
    issues.check(checkBounds(lowerBounds, upperBounds));
  }
  if (!issues.ok || lowerBounds === undefined || upperBounds === undefined) {
    return undefined;
  }
  return { lowerBounds, upperBounds, initialPoint };
}

export class UniformUncertain extends ComposedVariables {
  private constructor(
    base: Variables,
    private readonly state: UniformUncertainState
  ) {
    super(base);
  }

  static create(options: UniformUncertainOptions = {}): BlockResult<UniformUncertain> {
    const base = Variables.create({
      variables: "uniform_uncertain",
      descriptors: options.descriptors ?? ["x1", "x2"],
    });
    if (!base.success) {
      return failed(base, new IssueCollector());
    }

    const issues = new IssueCollector();
    const state = validateUniformState(
      {
        lowerBounds: options.lowerBounds ?? [-2.0, -2.0],
        upperBounds: options.upperBounds ?? [2.0, 2.0],
        initialPoint: options.initialPoint,
      },
      base.block.descriptors.length,
      issues
    );
    if (state === undefined) {
      return failed(base, issues);
    }
    return { success: true, block: new UniformUncertain(base.block, state) };
  }

  /**
   * Replace the descriptors and the bounds in one step; `initialPoint` is
   * unset when left out. Nothing changes unless all of them pass.
   */
  resize(options: UniformUncertainResize): BlockResult<UniformUncertain> {
    const issues = new IssueCollector();
    const descriptors = resolveDescriptors(options.descriptors, issues);
    if (descriptors === undefined) {
      return { success: false, issues: issues.issues };
    }
    const state = validateUniformState(options, descriptors.length, issues);
    if (state === undefined) {
      return { success: false, issues: issues.issues };
    }
    const committed = this.replaceDescriptors(descriptors);
    if (!committed.success) {
      return { success: false, issues: [committed.error] };
    }
    this.state.lowerBounds = state.lowerBounds;
    this.state.upperBounds = state.upperBounds;
    this.state.initialPoint = state.initialPoint;
    return { success: true, block: this };
  }

  get lowerBounds(): number[] {
    return [...this.state.lowerBounds];
  }

  get upperBounds(): number[] {
    return [...this.state.upperBounds];
  }

  get initialPoint(): number[] | undefined {
    return this.state.initialPoint && [...this.state.initialPoint];
  }

  setLowerBounds(value: unknown): FieldResult<number[]> {
    const result = validateCounted("lowerBounds", value, this.descriptors.length);
    if (!result.success) {
      return result;
    }
    const bounds = checkBounds(result.value, this.state.upperBounds);
    if (!bounds.success) {
      return bounds;
    }
    this.state.lowerBounds = result.value;
    return result;
  }

  setUpperBounds(value: unknown): FieldResult<number[]> {
    const result = validateCounted("upperBounds", value, this.descriptors.length);
    if (!result.success) {
      return result;
    }
    const bounds = checkBounds(this.state.lowerBounds, result.value);
    if (!bounds.success) {
      return bounds;
    }
    this.state.upperBounds = result.value;
    return result;
  }

  setInitialPoint(value: unknown): FieldResult<number[] | undefined> {
    const result = validatePerVariable("initialPoint", value, this.descriptors.length);
    if (result.success) {
      this.state.initialPoint = result.value;
    }
    return result;
  }

  protected perVariableFields(): [string, readonly number[] | undefined][] {
    return [
      ["lowerBounds", this.state.lowerBounds],
      ["upperBounds", this.state.upperBounds],
      ["initialPoint", this.state.initialPoint],
    ];
  }

  protected renderFields(): string {
    return (
      keywordLine("lower_bounds", this.state.lowerBounds) +
      keywordLine("upper_bounds", this.state.upperBounds) +
      keywordLine("initial_point", this.state.initialPoint)
    );
  }
}

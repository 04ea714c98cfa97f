/**
 * Uncertainty quantification methods.
 *
 * Sampling-based studies share a set of keywords for the number and type
 * of samples, the random seed, and the probability and response levels at
 * which statistics are estimated. To supply levels to multiple responses,
 * nest them: one list of levels per response.
 */

import { getLogger } from "../logging/index.js";
import {
  formatLevels,
  isEmptyLevels,
  levelsToArray,
  parseLevels,
  type Levels,
  type LevelsInput,
} from "../blocks/levels.js";
import {
  IssueCollector,
  validateField,
  type BlockResult,
  type FieldResult,
  type ValidationIssue,
} from "../blocks/validation.js";
import { ComposedMethod } from "./composed.js";
import { Method, type MethodControls } from "./method.js";
import {
  BasisPolynomialFamily,
  SampleType,
  SamplesSchema,
  SeedSchema,
  UNCERTAINTY_QUANTIFICATION_DEFAULTS as DEFAULTS,
  VarianceBasedDecompSchema,
} from "./schema.js";

const logger = getLogger("method").child("uq");

export interface UncertaintyQuantificationOptions extends MethodControls {
  /** Polynomial basis of the expansion; "extended" by default */
  basisPolynomialFamily?: BasisPolynomialFamily;
  /** Probabilities at which to estimate response values */
  probabilityLevels?: LevelsInput;
  /** Values at which to estimate statistics for each response */
  responseLevels?: LevelsInput;
  /** Number of model evaluations */
  samples?: number;
  sampleType?: SampleType;
  /**
   * Seed of the random number generator. A seeded study gives identical
   * results when repeated. Zero is treated as no seed.
   */
  seed?: number;
  /** Global sensitivity analysis by decomposition of response variance */
  varianceBasedDecomp?: boolean;
}

interface UncertaintyQuantificationState {
  basisPolynomialFamily: BasisPolynomialFamily;
  probabilityLevels: Levels;
  responseLevels: Levels;
  samples: number;
  sampleType: SampleType;
  seed: number | undefined;
  varianceBasedDecomp: boolean;
}

export function validateBasisPolynomialFamily(
  value: unknown
): FieldResult<BasisPolynomialFamily> {
  return validateField("basisPolynomialFamily", BasisPolynomialFamily, value);
}

export function validateSamples(value: unknown): FieldResult<number> {
  return validateField("samples", SamplesSchema, value);
}

export function validateSampleType(value: unknown): FieldResult<SampleType> {
  return validateField("sampleType", SampleType, value);
}

export function validateSeed(value: unknown): FieldResult<number | undefined> {
  return validateField("seed", SeedSchema.optional(), value);
}

export function validateVarianceBasedDecomp(value: unknown): FieldResult<boolean> {
  return validateField("varianceBasedDecomp", VarianceBasedDecompSchema, value);
}

export class UncertaintyQuantification extends ComposedMethod {
  private constructor(
    base: Method,
    private readonly state: UncertaintyQuantificationState
  ) {
    super(base);
  }

  /**
   * Validate options and create a sampling method block.
   * The method name is always "sampling".
   */
  static create(
    options: UncertaintyQuantificationOptions = {}
  ): BlockResult<UncertaintyQuantification> {
    const base = Method.create({
      method: "sampling",
      maxIterations: options.maxIterations,
      convergenceTolerance: options.convergenceTolerance,
    });

    const issues = new IssueCollector();
    const basisPolynomialFamily = issues.check(
      validateBasisPolynomialFamily(
        options.basisPolynomialFamily ?? DEFAULTS.basisPolynomialFamily
      )
    );
    const probabilityLevels = issues.check(
      parseLevels("probabilityLevels", options.probabilityLevels ?? DEFAULTS.probabilityLevels)
    );
    const responseLevels = issues.check(
      parseLevels("responseLevels", options.responseLevels ?? DEFAULTS.responseLevels)
    );
    const samples = issues.check(validateSamples(options.samples ?? DEFAULTS.samples));
    const sampleType = issues.check(
      validateSampleType(options.sampleType ?? DEFAULTS.sampleType)
    );
    const seed = issues.check(validateSeed(options.seed));
    const varianceBasedDecomp = issues.check(
      validateVarianceBasedDecomp(options.varianceBasedDecomp ?? DEFAULTS.varianceBasedDecomp)
    );

    if (
      !base.success ||
      basisPolynomialFamily === undefined ||
      probabilityLevels === undefined ||
      responseLevels === undefined ||
      samples === undefined ||
      sampleType === undefined ||
      varianceBasedDecomp === undefined ||
      !issues.ok
    ) {
      const all: ValidationIssue[] = [
        ...(base.success ? [] : base.issues),
        ...issues.issues,
      ];
      logger.debug("Rejected sampling options", { issues: all.length });
      return { success: false, issues: all };
    }

    return {
      success: true,
      block: new UncertaintyQuantification(base.block, {
        basisPolynomialFamily,
        probabilityLevels,
        responseLevels,
        samples,
        sampleType,
        seed,
        varianceBasedDecomp,
      }),
    };
  }

  get basisPolynomialFamily(): BasisPolynomialFamily {
    return this.state.basisPolynomialFamily;
  }

  /** Probability levels in their plain array shape. */
  get probabilityLevels(): number[] | number[][] {
    return levelsToArray(this.state.probabilityLevels);
  }

  /** Response levels in their plain array shape. */
  get responseLevels(): number[] | number[][] {
    return levelsToArray(this.state.responseLevels);
  }

  get samples(): number {
    return this.state.samples;
  }

  get sampleType(): SampleType {
    return this.state.sampleType;
  }

  get seed(): number | undefined {
    return this.state.seed;
  }

  get varianceBasedDecomp(): boolean {
    return this.state.varianceBasedDecomp;
  }

  setBasisPolynomialFamily(value: unknown): FieldResult<BasisPolynomialFamily> {
    const result = validateBasisPolynomialFamily(value);
    if (result.success) {
      this.state.basisPolynomialFamily = result.value;
    }
    return result;
  }

  setProbabilityLevels(value: unknown): FieldResult<Levels> {
    const result = parseLevels("probabilityLevels", value);
    if (result.success) {
      this.state.probabilityLevels = result.value;
    }
    return result;
  }

  setResponseLevels(value: unknown): FieldResult<Levels> {
    const result = parseLevels("responseLevels", value);
    if (result.success) {
      this.state.responseLevels = result.value;
    }
    return result;
  }

  setSamples(value: unknown): FieldResult<number> {
    const result = validateSamples(value);
    if (result.success) {
      this.state.samples = result.value;
    }
    return result;
  }

  setSampleType(value: unknown): FieldResult<SampleType> {
    const result = validateSampleType(value);
    if (result.success) {
      this.state.sampleType = result.value;
    }
    return result;
  }

  setSeed(value: unknown): FieldResult<number | undefined> {
    const result = validateSeed(value);
    if (result.success) {
      this.state.seed = result.value;
    }
    return result;
  }

  setVarianceBasedDecomp(value: unknown): FieldResult<boolean> {
    const result = validateVarianceBasedDecomp(value);
    if (result.success) {
      this.state.varianceBasedDecomp = result.value;
    }
    return result;
  }

  protected renderFields(): string {
    const { state } = this;
    let s = "";
    if (state.basisPolynomialFamily !== "extended") {
      s += `    ${state.basisPolynomialFamily}\n`;
    }
    s += `    sample_type = ${state.sampleType}\n`;
    s += `    samples = ${state.samples}\n`;
    // A zero seed is the same as no seed
    if (state.seed !== undefined && state.seed !== 0) {
      s += `    seed = ${state.seed}\n`;
    }
    if (!isEmptyLevels(state.probabilityLevels)) {
      s += "    probability_levels =" + formatLevels(state.probabilityLevels);
    }
    if (!isEmptyLevels(state.responseLevels)) {
      s += "    response_levels =" + formatLevels(state.responseLevels);
    }
    if (state.varianceBasedDecomp) {
      s += "    variance_based_decomp\n";
    }
    return s;
  }
}

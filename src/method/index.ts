/**
 * Method blocks.
 *
 * Usage:
 *   import { UncertaintyQuantification, unwrap } from "dakota-blocks";
 *
 *   const sampling = unwrap(UncertaintyQuantification.create({ samples: 25, sampleType: "lhs" }));
 *   sampling.setSeed(17);
 *   console.log(sampling.render());
 */

export {
  Method,
  validateMethodName,
  validateMaxIterations,
  validateConvergenceTolerance,
  type MethodBlock,
  type MethodControls,
  type MethodOptions,
} from "./method.js";

export { ComposedMethod } from "./composed.js";

export {
  UncertaintyQuantification,
  type UncertaintyQuantificationOptions,
} from "./uncertainty-quantification.js";

export {
  VectorParameterStudy,
  CenteredParameterStudy,
  MultidimParameterStudy,
  type VectorParameterStudyOptions,
  type CenteredParameterStudyOptions,
  type MultidimParameterStudyOptions,
} from "./parameter-studies.js";

export {
  BasisPolynomialFamily,
  SampleType,
  METHOD_DEFAULTS,
  UNCERTAINTY_QUANTIFICATION_DEFAULTS,
} from "./schema.js";

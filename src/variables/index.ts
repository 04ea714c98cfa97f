/**
 * Variables blocks.
 */

export {
  Variables,
  validateDescriptors,
  quoteDescriptor,
  VARIABLES_DEFAULTS,
  type VariablesBlock,
  type VariablesOptions,
} from "./variables.js";

export { ComposedVariables, checkCount } from "./composed.js";

export {
  ContinuousDesign,
  UniformUncertain,
  type ContinuousDesignOptions,
  type UniformUncertainOptions,
  type ContinuousDesignResize,
  type UniformUncertainResize,
} from "./kinds.js";

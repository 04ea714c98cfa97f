/**
 * Validated method and variables blocks for Dakota input files.
 */

export * from "./method/index.js";
export * from "./variables/index.js";

export {
  BlockValidationError,
  unwrap,
  type BlockResult,
  type FieldResult,
  type ValidationErrorKind,
  type ValidationIssue,
} from "./blocks/validation.js";

export { toArray } from "./blocks/iterable.js";
export { formatLevels, parseLevels, type Levels, type LevelsInput } from "./blocks/levels.js";

export {
  loadBlocks,
  loadMethodBlock,
  loadVariablesBlock,
  type LoadedBlocks,
  type MethodInput,
  type VariablesInput,
} from "./blocks/loader.js";

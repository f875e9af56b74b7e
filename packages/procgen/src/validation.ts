/**
 * Level Validation & Statistics
 *
 * Public facade for validation and statistics utilities.
 */

export {
  computeStats,
  type GenerationStats,
} from "./validation/compute-stats";
export {
  type LevelValidationOptions,
  validateLevel,
} from "./validation/validate-level";
export {
  hasErrorViolations,
  type LevelValidationResult,
  type ValidationFailure,
  type ValidationSuccess,
} from "./validation/result-types";

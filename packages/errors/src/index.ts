/**
 * @recurrent/errors
 *
 * Error taxonomy for the recurrent packages.
 *
 * Each error carries a `.code` from the catalog that discriminates the
 * specific condition, and a `_tag` naming its behavioral base type
 * (ValidationError for bad input, ConflictError for lifecycle misuse).
 */

export { type ErrorJSON, hasCode, isRecurrentError, RecurrentError } from "./base.js";

export {
  type BaseErrorType,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
} from "./catalog.js";

export { SchedulerConfigurationError, SchedulerError, SchedulerStateError } from "./scheduler.js";

export type { ValidationIssue } from "./types.js";

export { getErrorMessage } from "./utils.js";

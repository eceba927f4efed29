/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code raised by the recurrent packages, with the base type it
 * belongs to and whether it signals an expected condition (caller input) or a
 * programming mistake.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 */

/**
 * The behavioral base error types that all error codes map to.
 */
export type BaseErrorType = "ValidationError" | "ConflictError";

export const ERROR_CATALOG = {
  // ============================================================================
  // SCHEDULER ERRORS - Recurring scheduler configuration and lifecycle
  // ============================================================================
  SCHEDULER_CONFIGURATION_INVALID: {
    domain: "scheduler",
    baseType: "ValidationError",
    isExpected: true,
    title: "Scheduler configuration invalid",
    description: "An option passed to the scheduler has an invalid value",
  },
  SCHEDULER_INVALID_STATE: {
    domain: "scheduler",
    baseType: "ConflictError",
    isExpected: false,
    title: "Scheduler lifecycle misuse",
    description: "The operation is not allowed in the scheduler's current lifecycle state",
  },
} as const satisfies Record<
  string,
  {
    domain: string;
    baseType: BaseErrorType;
    isExpected: boolean;
    title: string;
    description: string;
  }
>;

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];

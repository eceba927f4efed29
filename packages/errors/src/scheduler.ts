/**
 * Scheduler errors: recurring scheduler configuration and lifecycle
 *
 * Abstract base: SchedulerError
 * Concrete:
 *   - SchedulerConfigurationError (SCHEDULER_CONFIGURATION_INVALID)
 *   - SchedulerStateError (SCHEDULER_INVALID_STATE)
 */

import { RecurrentError } from "./base.js";
import type { ErrorCode } from "./catalog.js";
import type { ValidationIssue } from "./types.js";

// ---------------------------------------------------------------------------
// Abstract Base
// ---------------------------------------------------------------------------

/**
 * Enables generic catch: `if (e instanceof SchedulerError)`
 * while specific subclasses allow precise handling.
 */
export abstract class SchedulerError<C extends ErrorCode = ErrorCode> extends RecurrentError<C> {}

// ---------------------------------------------------------------------------
// Configuration invalid
// ---------------------------------------------------------------------------

/**
 * Thrown when an option passed to the scheduler fails validation.
 */
export class SchedulerConfigurationError extends SchedulerError<"SCHEDULER_CONFIGURATION_INVALID"> {
  readonly issues: readonly ValidationIssue[];

  constructor(message: string, issues: readonly ValidationIssue[] = []) {
    super("SCHEDULER_CONFIGURATION_INVALID", `Invalid scheduler configuration: ${message}`);
    this.issues = issues;
  }
}

// ---------------------------------------------------------------------------
// Invalid state: lifecycle misuse
// ---------------------------------------------------------------------------

/**
 * Thrown when a lifecycle operation is called in a state that does not allow it,
 * e.g. starting a scheduler that is already running or has been stopped.
 */
export class SchedulerStateError extends SchedulerError<"SCHEDULER_INVALID_STATE"> {
  readonly operation: string;
  readonly state: string;

  constructor(operation: string, state: string) {
    super("SCHEDULER_INVALID_STATE", `Cannot ${operation}() a scheduler in state "${state}"`, {
      operation,
      state,
    });
    this.operation = operation;
    this.state = state;
  }
}

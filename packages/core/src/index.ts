/**
 * @recurrent/core
 *
 * Shared contracts for the recurrent packages.
 */

export const PACKAGE_NAME = "@recurrent/core" as const;

export type { Clock, TimerHandle } from "./clock-types.js";

export const PACKAGE_NAME = "@recurrent/test-utils" as const;

export { ManualClock } from "./manual-clock.js";

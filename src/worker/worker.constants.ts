/** Injection token for the StepRunner the scheduler uses. */
export const STEP_RUNNER = Symbol('STEP_RUNNER');

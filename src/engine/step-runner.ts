import { PipelineStage } from './pipeline.types';

export type StepLogLevel = 'info' | 'warn' | 'error';

export interface StepRunContext {
  pipelineId: string;
  stepId: string;
  stepName: string;
  stage: PipelineStage;
  /** Aborted when the step exceeds its timeout. */
  signal: AbortSignal;
  /** Stream one line of output while the step runs. */
  log(line: string, level?: StepLogLevel): void;
}

export interface StepRunResult {
  success: boolean;
  logText: string;
}

/**
 * Executes one step's command. The scheduler treats it as opaque: shell,
 * external CD tool or simulation. Retries, if any, belong here.
 */
export interface StepRunner {
  run(command: string, context: StepRunContext): Promise<StepRunResult>;
}

import { PipelineFailureReason, PipelineStatus, StepStatus } from './pipeline.types';
import { StepLogLevel } from './step-runner';

interface EventBase {
  pipelineId: string;
  timestamp: string;
}

interface StepEventBase extends EventBase {
  stepId: string;
  stepName: string;
}

export type PipelineEvent =
  | (EventBase & { type: 'pipeline.started' })
  | (EventBase & {
      type: 'pipeline.completed';
      status: PipelineStatus;
      failureReason: PipelineFailureReason | null;
    })
  | (StepEventBase & { type: 'step.started' })
  | (StepEventBase & { type: 'step.completed'; status: StepStatus })
  | (StepEventBase & { type: 'step.blocked'; blockedBy: string })
  | (StepEventBase & { type: 'step.log'; line: string; level: StepLogLevel });

export type PipelineEventType = PipelineEvent['type'];

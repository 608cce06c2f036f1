/**
 * Stages, statuses and step blueprints shared by templates, pipelines and the scheduler.
 */

/** Descriptive only; never affects ordering. */
export enum PipelineStage {
  SOURCE = 'source',
  BUILD = 'build',
  TEST = 'test',
  DEPLOY = 'deploy',
  VERIFY = 'verify',
}

export enum StepStatus {
  PENDING = 'pending',
  IN_PROGRESS = 'in_progress',
  SUCCEEDED = 'succeeded',
  FAILED = 'failed',
  /** Never ran because a dependency failed (or was itself blocked). */
  BLOCKED = 'blocked',
}

export enum PipelineStatus {
  PENDING = 'pending',
  IN_PROGRESS = 'in_progress',
  SUCCEEDED = 'succeeded',
  FAILED = 'failed',
  /** Cancelled by the caller before every step succeeded. */
  ABORTED = 'aborted',
}

export type PipelineFailureReason = 'step_failed' | 'deadlock_stall';

export const TERMINAL_STEP_STATUSES: ReadonlySet<StepStatus> = new Set([
  StepStatus.SUCCEEDED,
  StepStatus.FAILED,
  StepStatus.BLOCKED,
]);

/**
 * Blueprint of one step inside a template. `dependsOn` holds step *names*,
 * resolved to ids when the template is instantiated.
 */
export interface StepDefinition {
  readonly name: string;
  readonly stage: PipelineStage;
  readonly commandTemplate: string;
  readonly dependsOn: readonly string[];
}

/** `permissive` drops dangling names / leaves unbound placeholders; `strict` rejects them. */
export type ResolutionPolicy = 'permissive' | 'strict';

export interface InstantiateOptions {
  dependencyPolicy?: ResolutionPolicy;
  variablePolicy?: ResolutionPolicy;
}

export interface StepSnapshot {
  id: string;
  name: string;
  stage: PipelineStage;
  command: string;
  dependencies: string[];
  status: StepStatus;
  log: string;
  blockedBy: string | null;
  startedAt: string | null;
  completedAt: string | null;
}

export interface PipelineSnapshot {
  id: string;
  templateId: string;
  templateName: string;
  subjectId: string;
  version: string;
  status: PipelineStatus;
  failureReason: PipelineFailureReason | null;
  createdAt: string;
  startedAt: string | null;
  completedAt: string | null;
  steps: StepSnapshot[];
}

export type PipelineEngineErrorCode =
  | 'TEMPLATE_NOT_FOUND'
  | 'DUPLICATE_TEMPLATE_NAME'
  | 'PIPELINE_NOT_FOUND'
  | 'DANGLING_DEPENDENCY'
  | 'CYCLIC_DEPENDENCY'
  | 'DUPLICATE_STEP_NAME'
  | 'UNRESOLVED_VARIABLE'
  | 'PIPELINE_ALREADY_STARTED'
  | 'ILLEGAL_STEP_TRANSITION';

/**
 * Base class for every error raised by the pipeline engine.
 * `code` is stable and safe to match on; messages are for humans.
 */
export class PipelineEngineError extends Error {
  constructor(
    readonly code: PipelineEngineErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class TemplateNotFoundError extends PipelineEngineError {
  constructor(readonly templateId: string) {
    super('TEMPLATE_NOT_FOUND', `Pipeline template ${templateId} not found`);
  }
}

export class DuplicateTemplateNameError extends PipelineEngineError {
  constructor(readonly templateName: string) {
    super('DUPLICATE_TEMPLATE_NAME', `A pipeline template named "${templateName}" already exists`);
  }
}

export class PipelineNotFoundError extends PipelineEngineError {
  constructor(readonly pipelineId: string) {
    super('PIPELINE_NOT_FOUND', `Pipeline ${pipelineId} not found`);
  }
}

export class DanglingDependencyError extends PipelineEngineError {
  constructor(
    readonly stepName: string,
    readonly dependencyName: string,
  ) {
    super(
      'DANGLING_DEPENDENCY',
      `Step "${stepName}" depends on "${dependencyName}", which is not declared in the template`,
    );
  }
}

export class CyclicDependencyError extends PipelineEngineError {
  /** Step names along the cycle; the first name is repeated at the end. */
  constructor(readonly cycle: readonly string[]) {
    super('CYCLIC_DEPENDENCY', `Dependency cycle: ${cycle.join(' -> ')}`);
  }
}

export class DuplicateStepNameError extends PipelineEngineError {
  constructor(readonly stepName: string) {
    super('DUPLICATE_STEP_NAME', `Step name "${stepName}" is declared more than once`);
  }
}

export class UnresolvedVariableError extends PipelineEngineError {
  constructor(readonly variables: readonly string[]) {
    super('UNRESOLVED_VARIABLE', `Unresolved variables: ${variables.join(', ')}`);
  }
}

export class PipelineAlreadyStartedError extends PipelineEngineError {
  constructor(
    readonly pipelineId: string,
    readonly status: string,
  ) {
    super('PIPELINE_ALREADY_STARTED', `Pipeline ${pipelineId} is already ${status}`);
  }
}

/** Scheduler bug: a step was asked to make a transition its state machine forbids. */
export class IllegalStepTransitionError extends PipelineEngineError {
  constructor(stepName: string, from: string, to: string) {
    super('ILLEGAL_STEP_TRANSITION', `Step "${stepName}" cannot move from ${from} to ${to}`);
  }
}

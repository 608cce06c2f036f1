import { randomUUID } from 'node:crypto';
import { IllegalStepTransitionError } from './errors';
import { PipelineStage, StepSnapshot, StepStatus, TERMINAL_STEP_STATUSES } from './pipeline.types';

export interface PipelineStepInit {
  name: string;
  stage: PipelineStage;
  command: string;
  dependencies?: readonly string[];
}

/**
 * One instantiated step.
 * PENDING -> IN_PROGRESS -> SUCCEEDED | FAILED, or PENDING -> BLOCKED.
 * Any other transition is a scheduler bug and throws IllegalStepTransitionError.
 */
export class PipelineStep {
  readonly id = randomUUID();
  readonly name: string;
  readonly stage: PipelineStage;
  readonly command: string;

  private _dependencies: readonly string[];
  private _status = StepStatus.PENDING;
  private _log = '';
  private _blockedBy: string | null = null;
  private _startedAt: Date | null = null;
  private _completedAt: Date | null = null;

  constructor(init: PipelineStepInit) {
    this.name = init.name;
    this.stage = init.stage;
    this.command = init.command;
    this._dependencies = [...(init.dependencies ?? [])];
  }

  get dependencies(): readonly string[] {
    return this._dependencies;
  }

  get status(): StepStatus {
    return this._status;
  }

  get log(): string {
    return this._log;
  }

  /** Name of the dependency whose failure blocked this step. */
  get blockedBy(): string | null {
    return this._blockedBy;
  }

  get startedAt(): Date | null {
    return this._startedAt;
  }

  get completedAt(): Date | null {
    return this._completedAt;
  }

  get isTerminal(): boolean {
    return TERMINAL_STEP_STATUSES.has(this._status);
  }

  /** Only allowed while the step has not been picked up. */
  setDependencies(ids: readonly string[]): void {
    this.assertStatus(StepStatus.PENDING, StepStatus.PENDING);
    this._dependencies = [...ids];
  }

  start(now = new Date()): void {
    this.assertStatus(StepStatus.PENDING, StepStatus.IN_PROGRESS);
    this._status = StepStatus.IN_PROGRESS;
    this._startedAt = now;
  }

  complete(success: boolean, logText = '', now = new Date()): void {
    const next = success ? StepStatus.SUCCEEDED : StepStatus.FAILED;
    this.assertStatus(StepStatus.IN_PROGRESS, next);
    this._status = next;
    this._log += logText;
    this._completedAt = now;
  }

  block(dependencyName: string): void {
    this.assertStatus(StepStatus.PENDING, StepStatus.BLOCKED);
    this._status = StepStatus.BLOCKED;
    this._blockedBy = dependencyName;
  }

  toJSON(): StepSnapshot {
    return {
      id: this.id,
      name: this.name,
      stage: this.stage,
      command: this.command,
      dependencies: [...this._dependencies],
      status: this._status,
      log: this._log,
      blockedBy: this._blockedBy,
      startedAt: this._startedAt?.toISOString() ?? null,
      completedAt: this._completedAt?.toISOString() ?? null,
    };
  }

  private assertStatus(expected: StepStatus, next: StepStatus): void {
    if (this._status !== expected) {
      throw new IllegalStepTransitionError(this.name, this._status, next);
    }
  }
}

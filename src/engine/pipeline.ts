import { randomUUID } from 'node:crypto';
import { PipelineAlreadyStartedError } from './errors';
import { PipelineStep } from './pipeline-step';
import {
  PipelineFailureReason,
  PipelineSnapshot,
  PipelineStatus,
  StepStatus,
} from './pipeline.types';

export interface PipelineInit {
  templateId: string;
  templateName: string;
  subjectId: string;
  version: string;
}

/**
 * Instantiated execution graph. Owns its steps; the dependency relation between
 * them lives on each step as a list of step ids.
 */
export class Pipeline {
  readonly id = randomUUID();
  readonly templateId: string;
  readonly templateName: string;
  readonly subjectId: string;
  readonly version: string;
  readonly createdAt = new Date();

  private readonly _steps = new Map<string, PipelineStep>();
  private _status = PipelineStatus.PENDING;
  private _failureReason: PipelineFailureReason | null = null;
  private _startedAt: Date | null = null;
  private _completedAt: Date | null = null;

  constructor(init: PipelineInit) {
    this.templateId = init.templateId;
    this.templateName = init.templateName;
    this.subjectId = init.subjectId;
    this.version = init.version;
  }

  get status(): PipelineStatus {
    return this._status;
  }

  get failureReason(): PipelineFailureReason | null {
    return this._failureReason;
  }

  get startedAt(): Date | null {
    return this._startedAt;
  }

  get completedAt(): Date | null {
    return this._completedAt;
  }

  /** Steps in the order they were added (template declaration order). */
  get steps(): PipelineStep[] {
    return [...this._steps.values()];
  }

  addStep(step: PipelineStep): string {
    this._steps.set(step.id, step);
    return step.id;
  }

  getStep(id: string): PipelineStep | undefined {
    return this._steps.get(id);
  }

  /** PENDING steps whose every dependency has SUCCEEDED. */
  readySteps(): PipelineStep[] {
    return this.steps.filter(
      (step) =>
        step.status === StepStatus.PENDING &&
        step.dependencies.every((id) => this.getStep(id)?.status === StepStatus.SUCCEEDED),
    );
  }

  /** True once every step is SUCCEEDED, FAILED or BLOCKED. */
  isResolved(): boolean {
    return this.steps.every((step) => step.isTerminal);
  }

  countByStatus(status: StepStatus): number {
    return this.steps.filter((step) => step.status === status).length;
  }

  /**
   * Block every PENDING step that transitively depends on `failedId`.
   * Returns the newly blocked steps.
   */
  blockDependentsOf(failedId: string): PipelineStep[] {
    const blocked: PipelineStep[] = [];
    const queue = [failedId];

    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) break;
      const cause = this.getStep(current);
      if (!cause) continue;

      for (const step of this.steps) {
        if (step.status !== StepStatus.PENDING || !step.dependencies.includes(current)) continue;
        step.block(cause.name);
        blocked.push(step);
        queue.push(step.id);
      }
    }

    return blocked;
  }

  start(now = new Date()): void {
    if (this._status !== PipelineStatus.PENDING) {
      throw new PipelineAlreadyStartedError(this.id, this._status);
    }
    this._status = PipelineStatus.IN_PROGRESS;
    this._startedAt = now;
  }

  complete(
    status: PipelineStatus,
    failureReason: PipelineFailureReason | null = null,
    now = new Date(),
  ): void {
    this._status = status;
    this._failureReason = failureReason;
    this._completedAt = now;
  }

  toJSON(): PipelineSnapshot {
    return {
      id: this.id,
      templateId: this.templateId,
      templateName: this.templateName,
      subjectId: this.subjectId,
      version: this.version,
      status: this._status,
      failureReason: this._failureReason,
      createdAt: this.createdAt.toISOString(),
      startedAt: this._startedAt?.toISOString() ?? null,
      completedAt: this._completedAt?.toISOString() ?? null,
      steps: this.steps.map((step) => step.toJSON()),
    };
  }
}

import type { LoggerService } from '@nestjs/common';
import { Observable, Subject } from 'rxjs';
import { filter } from 'rxjs/operators';
import { Pipeline } from './pipeline';
import { PipelineEvent } from './pipeline-events';
import { PipelineStatus } from './pipeline.types';

export const DEFAULT_HISTORY_LIMIT = 1000;

export interface SchedulerContextOptions {
  /** Finished pipelines beyond this many registered ones are forgotten, oldest first. */
  historyLimit?: number;
}

const FINISHED: ReadonlySet<PipelineStatus> = new Set([
  PipelineStatus.SUCCEEDED,
  PipelineStatus.FAILED,
  PipelineStatus.ABORTED,
]);

/**
 * Process-scoped state shared by the scheduler and its callers: the pipeline
 * registry, cancellation handles of running pipelines, the logger and the event stream.
 * One instance per service process; nothing here is global.
 */
export class SchedulerContext {
  private readonly pipelines = new Map<string, Pipeline>();
  private readonly executions = new Map<string, AbortController>();
  private readonly events$ = new Subject<PipelineEvent>();

  private readonly historyLimit: number;

  constructor(
    readonly logger: LoggerService,
    options: SchedulerContextOptions = {},
  ) {
    this.historyLimit = Math.max(1, options.historyLimit ?? DEFAULT_HISTORY_LIMIT);
  }

  register(pipeline: Pipeline): Pipeline {
    this.pipelines.set(pipeline.id, pipeline);
    this.evictFinished();
    return pipeline;
  }

  get(pipelineId: string): Pipeline | undefined {
    return this.pipelines.get(pipelineId);
  }

  list(): Pipeline[] {
    return [...this.pipelines.values()];
  }

  /** Returns the signal that `cancel(pipelineId)` aborts. */
  beginExecution(pipelineId: string): AbortSignal {
    const controller = new AbortController();
    this.executions.set(pipelineId, controller);
    return controller.signal;
  }

  endExecution(pipelineId: string): void {
    this.executions.delete(pipelineId);
  }

  isExecuting(pipelineId: string): boolean {
    return this.executions.has(pipelineId);
  }

  /** False when the pipeline is not running. */
  cancel(pipelineId: string): boolean {
    const controller = this.executions.get(pipelineId);
    if (!controller) return false;
    controller.abort();
    return true;
  }

  emit(event: PipelineEvent): void {
    this.events$.next(event);
  }

  events(): Observable<PipelineEvent> {
    return this.events$.asObservable();
  }

  eventsFor(pipelineId: string): Observable<PipelineEvent> {
    return this.events$.pipe(filter((event) => event.pipelineId === pipelineId));
  }

  /** Pending and running pipelines are never evicted, so the registry may exceed the limit. */
  private evictFinished(): void {
    for (const [id, pipeline] of this.pipelines) {
      if (this.pipelines.size <= this.historyLimit) return;
      if (FINISHED.has(pipeline.status) && !this.isExecuting(id)) this.pipelines.delete(id);
    }
  }

  close(): void {
    for (const controller of this.executions.values()) controller.abort();
    this.executions.clear();
    this.events$.complete();
  }
}

import { Pipeline } from './pipeline';
import { PipelineStep } from './pipeline-step';
import { PipelineFailureReason, PipelineStatus, StepStatus } from './pipeline.types';
import { SchedulerContext } from './scheduler-context';
import { StepRunContext, StepRunner, StepRunResult } from './step-runner';

export const DEFAULT_MAX_CONCURRENCY = 4;

export interface SchedulerOptions {
  /** Upper bound on steps running at the same time. */
  maxConcurrency?: number;
  /** Per-step timeout; 0 disables it. */
  stepTimeoutMs?: number;
}

/**
 * Drives a pipeline to a terminal status.
 *
 * Each round starts every ready step (PENDING, all dependencies SUCCEEDED) that fits
 * under `maxConcurrency`, then waits for any running step to finish and recomputes the
 * ready set. A failed step blocks its transitive dependents but never stops unrelated
 * branches. When nothing runs and nothing is ready the loop ends: leftover PENDING
 * steps mean a stall, unless the pipeline was cancelled.
 */
export class PipelineScheduler {
  private readonly maxConcurrency: number;
  private readonly stepTimeoutMs: number;

  constructor(
    private readonly runner: StepRunner,
    private readonly context: SchedulerContext,
    options: SchedulerOptions = {},
  ) {
    this.maxConcurrency = Math.max(1, options.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY);
    this.stepTimeoutMs = Math.max(0, options.stepTimeoutMs ?? 0);
  }

  async execute(pipeline: Pipeline): Promise<PipelineStatus> {
    pipeline.start();
    this.context.register(pipeline);
    const signal = this.context.beginExecution(pipeline.id);

    this.context.logger.log(
      `Pipeline ${pipeline.id} (${pipeline.templateName}) started with ${pipeline.steps.length} steps`,
    );
    this.context.emit({ type: 'pipeline.started', pipelineId: pipeline.id, timestamp: now() });

    try {
      await this.drive(pipeline, signal);
    } finally {
      this.context.endExecution(pipeline.id);
    }

    return this.finish(pipeline, signal.aborted);
  }

  private async drive(pipeline: Pipeline, signal: AbortSignal): Promise<void> {
    const inFlight = new Map<string, Promise<void>>();

    for (;;) {
      if (!signal.aborted) {
        for (const step of pipeline.readySteps()) {
          if (inFlight.size >= this.maxConcurrency) break;
          // start() runs synchronously inside runStep, so the step leaves the ready set at once
          const run = this.runStep(pipeline, step).finally(() => inFlight.delete(step.id));
          inFlight.set(step.id, run);
        }
      }

      if (inFlight.size === 0) return;
      await Promise.race(inFlight.values());
    }
  }

  private finish(pipeline: Pipeline, cancelled: boolean): PipelineStatus {
    const pending = pipeline.countByStatus(StepStatus.PENDING);
    const failed = pipeline.countByStatus(StepStatus.FAILED);

    let status = PipelineStatus.SUCCEEDED;
    let reason: PipelineFailureReason | null = null;

    if (pending > 0 && !cancelled) {
      status = PipelineStatus.FAILED;
      reason = 'deadlock_stall';
      this.context.logger.error(
        `Pipeline ${pipeline.id} stalled: ${pending} step(s) can never become ready`,
      );
    } else if (failed > 0) {
      status = PipelineStatus.FAILED;
      reason = 'step_failed';
    } else if (pending > 0) {
      status = PipelineStatus.ABORTED;
    }

    pipeline.complete(status, reason);
    this.context.logger.log(
      `Pipeline ${pipeline.id} finished: ${status} ` +
        `(succeeded=${pipeline.countByStatus(StepStatus.SUCCEEDED)} failed=${failed} ` +
        `blocked=${pipeline.countByStatus(StepStatus.BLOCKED)} pending=${pending})`,
    );
    this.context.emit({
      type: 'pipeline.completed',
      pipelineId: pipeline.id,
      timestamp: now(),
      status,
      failureReason: reason,
    });
    return status;
  }

  private async runStep(pipeline: Pipeline, step: PipelineStep): Promise<void> {
    step.start();
    this.context.emit({ type: 'step.started', ...stepRef(pipeline, step) });
    this.context.logger.debug?.(`Step "${step.name}" started: ${step.command}`);

    const result = await this.invokeRunner(pipeline, step);

    step.complete(result.success, result.logText);
    this.context.emit({ type: 'step.completed', ...stepRef(pipeline, step), status: step.status });

    if (result.success) {
      this.context.logger.debug?.(`Step "${step.name}" succeeded`);
      return;
    }

    this.context.logger.warn(`Step "${step.name}" failed in pipeline ${pipeline.id}`);
    for (const blocked of pipeline.blockDependentsOf(step.id)) {
      this.context.emit({
        type: 'step.blocked',
        ...stepRef(pipeline, blocked),
        blockedBy: blocked.blockedBy ?? step.name,
      });
    }
  }

  /** Never rejects: runner errors and timeouts become failed results. */
  private async invokeRunner(pipeline: Pipeline, step: PipelineStep): Promise<StepRunResult> {
    const controller = new AbortController();
    const context: StepRunContext = {
      pipelineId: pipeline.id,
      stepId: step.id,
      stepName: step.name,
      stage: step.stage,
      signal: controller.signal,
      log: (line, level = 'info') =>
        this.context.emit({ type: 'step.log', ...stepRef(pipeline, step), line, level }),
    };

    let timer: ReturnType<typeof setTimeout> | undefined;
    try {
      const run = this.runner.run(step.command, context);
      if (this.stepTimeoutMs === 0) return await run;

      const timeoutMs = this.stepTimeoutMs;
      const timeout = new Promise<StepRunResult>((resolve) => {
        timer = setTimeout(() => {
          controller.abort();
          resolve({ success: false, logText: `Step timed out after ${timeoutMs}ms` });
        }, timeoutMs);
      });
      return await Promise.race([run, timeout]);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.context.logger.error(`Error executing step "${step.name}": ${message}`);
      return { success: false, logText: `Error: ${message}` };
    } finally {
      if (timer) clearTimeout(timer);
    }
  }
}

function now(): string {
  return new Date().toISOString();
}

function stepRef(pipeline: Pipeline, step: PipelineStep) {
  return { pipelineId: pipeline.id, stepId: step.id, stepName: step.name, timestamp: now() };
}

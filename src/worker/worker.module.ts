import { Global, Inject, Logger, Module, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PipelineScheduler, SchedulerContext, StepRunner } from '../engine';
import type { Env } from '../config/env.validation';
import { ShellStepRunner } from './shell-step-runner.service';
import { SimulatedStepRunner } from './simulated-step-runner.service';
import { STEP_RUNNER } from './worker.constants';

/**
 * Execution side of the service: one SchedulerContext per process, the StepRunner
 * picked by STEP_RUNNER, and the PipelineScheduler built from both.
 */
@Global()
@Module({
  providers: [
    SimulatedStepRunner,
    ShellStepRunner,
    {
      provide: SchedulerContext,
      inject: [ConfigService],
      useFactory: (config: ConfigService<Env, true>) =>
        new SchedulerContext(new Logger(PipelineScheduler.name), {
          historyLimit: config.get('PIPELINE_HISTORY_LIMIT', { infer: true }),
        }),
    },
    {
      provide: STEP_RUNNER,
      inject: [ConfigService, SimulatedStepRunner, ShellStepRunner],
      useFactory: (
        config: ConfigService<Env, true>,
        simulated: SimulatedStepRunner,
        shell: ShellStepRunner,
      ): StepRunner => (config.get('STEP_RUNNER', { infer: true }) === 'shell' ? shell : simulated),
    },
    {
      provide: PipelineScheduler,
      inject: [STEP_RUNNER, SchedulerContext, ConfigService],
      useFactory: (runner: StepRunner, context: SchedulerContext, config: ConfigService<Env, true>) =>
        new PipelineScheduler(runner, context, {
          maxConcurrency: config.get('PIPELINE_MAX_CONCURRENCY', { infer: true }),
          stepTimeoutMs: config.get('PIPELINE_STEP_TIMEOUT_MS', { infer: true }),
        }),
    },
  ],
  exports: [SchedulerContext, PipelineScheduler],
})
export class WorkerModule implements OnModuleDestroy {
  constructor(@Inject(SchedulerContext) private readonly context: SchedulerContext) {}

  onModuleDestroy(): void {
    this.context.close();
  }
}

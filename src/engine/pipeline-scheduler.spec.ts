import { createSilentLogger } from '../testing/silent-logger';
import { ScriptedOutcome, ScriptedStepRunner } from '../testing/scripted-step-runner';
import { PipelineAlreadyStartedError } from './errors';
import { Pipeline } from './pipeline';
import { PipelineEvent } from './pipeline-events';
import { PipelineScheduler } from './pipeline-scheduler';
import { PipelineStep } from './pipeline-step';
import { PipelineTemplate } from './pipeline-template';
import { PipelineStage, PipelineStatus, StepStatus } from './pipeline.types';
import { SchedulerContext } from './scheduler-context';
import { StepRunner } from './step-runner';

function diamond(): Pipeline {
  return new PipelineTemplate({ name: 'diamond' })
    .addStep('A', PipelineStage.SOURCE, 'run A')
    .addStep('B', PipelineStage.BUILD, 'run B', ['A'])
    .addStep('C', PipelineStage.TEST, 'run C', ['A'])
    .addStep('D', PipelineStage.DEPLOY, 'run D', ['B', 'C'])
    .instantiate('app-1', '1.0.0');
}

function independent(count: number, delayMs: number) {
  const template = new PipelineTemplate({ name: 'fan-out' });
  const outcomes: Record<string, ScriptedOutcome> = {};
  for (let i = 0; i < count; i++) {
    template.addStep(`step-${i}`, PipelineStage.TEST, `test ${i}`);
    outcomes[`test ${i}`] = { delayMs };
  }
  return { pipeline: template.instantiate('app-1', '1.0.0'), outcomes };
}

function stepNamed(pipeline: Pipeline, name: string): PipelineStep | undefined {
  return pipeline.steps.find((step) => step.name === name);
}

function statusByName(pipeline: Pipeline): Record<string, StepStatus> {
  return Object.fromEntries(pipeline.steps.map((step) => [step.name, step.status]));
}

function startTime(step: PipelineStep | undefined): number {
  return step?.startedAt?.getTime() ?? Number.NaN;
}

function endTime(step: PipelineStep | undefined): number {
  return step?.completedAt?.getTime() ?? Number.NaN;
}

describe('PipelineScheduler', () => {
  let context: SchedulerContext;

  beforeEach(() => {
    context = new SchedulerContext(createSilentLogger());
  });

  afterEach(() => {
    context.close();
  });

  it('runs a diamond to success in dependency order', async () => {
    const runner = new ScriptedStepRunner();
    const pipeline = diamond();

    const status = await new PipelineScheduler(runner, context).execute(pipeline);

    expect(status).toBe(PipelineStatus.SUCCEEDED);
    expect(pipeline.status).toBe(PipelineStatus.SUCCEEDED);
    expect(pipeline.failureReason).toBeNull();
    expect(statusByName(pipeline)).toEqual({
      A: StepStatus.SUCCEEDED,
      B: StepStatus.SUCCEEDED,
      C: StepStatus.SUCCEEDED,
      D: StepStatus.SUCCEEDED,
    });
    expect(runner.calls[0]).toBe('run A');
    expect(runner.calls[3]).toBe('run D');

    const [a, b, c, d] = ['A', 'B', 'C', 'D'].map((name) => stepNamed(pipeline, name));
    expect(startTime(b)).toBeGreaterThanOrEqual(endTime(a));
    expect(startTime(c)).toBeGreaterThanOrEqual(endTime(a));
    expect(startTime(d)).toBeGreaterThanOrEqual(Math.max(endTime(b), endTime(c)));
    expect(a?.log).toBe('ran run A');
    expect(pipeline.startedAt).not.toBeNull();
    expect(pipeline.completedAt).not.toBeNull();
  });

  it('isolates a failed branch and blocks its dependents', async () => {
    const runner = new ScriptedStepRunner({ 'run B': { success: false, logText: 'exit 2' } });
    const pipeline = diamond();

    const status = await new PipelineScheduler(runner, context).execute(pipeline);

    expect(status).toBe(PipelineStatus.FAILED);
    expect(pipeline.failureReason).toBe('step_failed');
    expect(statusByName(pipeline)).toEqual({
      A: StepStatus.SUCCEEDED,
      B: StepStatus.FAILED,
      C: StepStatus.SUCCEEDED,
      D: StepStatus.BLOCKED,
    });
    const d = stepNamed(pipeline, 'D');
    expect(d?.startedAt).toBeNull();
    expect(d?.blockedBy).toBe('B');
    expect(runner.calls).not.toContain('run D');
    expect(stepNamed(pipeline, 'B')?.log).toBe('exit 2');
  });

  it('keeps running independent branches after an early failure', async () => {
    const pipeline = new PipelineTemplate({ name: 'two-branches' })
      .addStep('lint', PipelineStage.TEST, 'lint')
      .addStep('package', PipelineStage.BUILD, 'package', ['lint'])
      .addStep('compile', PipelineStage.BUILD, 'compile')
      .addStep('unit', PipelineStage.TEST, 'unit', ['compile'])
      .instantiate('app-1', '1.0.0');
    const runner = new ScriptedStepRunner({ lint: { success: false } });

    await new PipelineScheduler(runner, context).execute(pipeline);

    expect(statusByName(pipeline)).toEqual({
      lint: StepStatus.FAILED,
      package: StepStatus.BLOCKED,
      compile: StepStatus.SUCCEEDED,
      unit: StepStatus.SUCCEEDED,
    });
    expect(pipeline.status).toBe(PipelineStatus.FAILED);
  });

  it('runs ready steps concurrently up to the cap', async () => {
    const { pipeline, outcomes } = independent(5, 20);
    const runner = new ScriptedStepRunner(outcomes);

    await new PipelineScheduler(runner, context, { maxConcurrency: 2 }).execute(pipeline);

    expect(runner.maxRunning).toBe(2);
    expect(runner.calls).toHaveLength(5);
    expect(pipeline.status).toBe(PipelineStatus.SUCCEEDED);
  });

  it('runs a whole ready set at once when the cap allows', async () => {
    const { pipeline, outcomes } = independent(5, 20);
    const runner = new ScriptedStepRunner(outcomes);

    await new PipelineScheduler(runner, context, { maxConcurrency: 10 }).execute(pipeline);

    expect(runner.maxRunning).toBe(5);
  });

  it('fails a step that exceeds the timeout and aborts its signal', async () => {
    const pipeline = new PipelineTemplate({ name: 'slow' })
      .addStep('slow', PipelineStage.TEST, 'sleep')
      .addStep('after', PipelineStage.DEPLOY, 'after', ['slow'])
      .instantiate('app-1', '1.0.0');
    const runner = new ScriptedStepRunner({ sleep: { delayMs: 200 } });

    const status = await new PipelineScheduler(runner, context, { stepTimeoutMs: 20 }).execute(
      pipeline,
    );

    expect(status).toBe(PipelineStatus.FAILED);
    expect(stepNamed(pipeline, 'slow')?.log).toBe('Step timed out after 20ms');
    expect(stepNamed(pipeline, 'after')?.status).toBe(StepStatus.BLOCKED);
    expect(runner.contexts[0].signal.aborted).toBe(true);
  });

  it('turns a throwing runner into a step failure', async () => {
    const runner = new ScriptedStepRunner({ 'run C': { error: new Error('boom') } });
    const pipeline = diamond();

    await new PipelineScheduler(runner, context).execute(pipeline);

    const c = stepNamed(pipeline, 'C');
    expect(c?.status).toBe(StepStatus.FAILED);
    expect(c?.log).toBe('Error: boom');
    expect(stepNamed(pipeline, 'B')?.status).toBe(StepStatus.SUCCEEDED);
  });

  it('fails a stalled pipeline and leaves unreachable steps pending', async () => {
    const pipeline = new Pipeline({
      templateId: 'manual',
      templateName: 'hand-built',
      subjectId: 'app-1',
      version: '1.0.0',
    });
    const x = new PipelineStep({ name: 'X', stage: PipelineStage.BUILD, command: 'x' });
    const y = new PipelineStep({ name: 'Y', stage: PipelineStage.BUILD, command: 'y' });
    const z = new PipelineStep({ name: 'Z', stage: PipelineStage.BUILD, command: 'z' });
    x.setDependencies([y.id]);
    y.setDependencies([x.id]);
    [x, y, z].forEach((step) => pipeline.addStep(step));
    const logger = createSilentLogger();
    context = new SchedulerContext(logger);

    const status = await new PipelineScheduler(new ScriptedStepRunner(), context).execute(pipeline);

    expect(status).toBe(PipelineStatus.FAILED);
    expect(pipeline.failureReason).toBe('deadlock_stall');
    expect(statusByName(pipeline)).toEqual({
      X: StepStatus.PENDING,
      Y: StepStatus.PENDING,
      Z: StepStatus.SUCCEEDED,
    });
    expect(logger.error).toHaveBeenCalledWith(
      `Pipeline ${pipeline.id} stalled: 2 step(s) can never become ready`,
    );
  });

  it('lets in-flight steps finish on cancel and starts nothing new', async () => {
    const pipeline = new PipelineTemplate({ name: 'cancel' })
      .addStep('first', PipelineStage.BUILD, 'first')
      .addStep('second', PipelineStage.DEPLOY, 'second', ['first'])
      .instantiate('app-1', '1.0.0');
    const runner = new ScriptedStepRunner({ first: { delayMs: 30 } });

    const execution = new PipelineScheduler(runner, context).execute(pipeline);
    expect(context.cancel(pipeline.id)).toBe(true);
    const status = await execution;

    expect(status).toBe(PipelineStatus.ABORTED);
    expect(pipeline.failureReason).toBeNull();
    expect(statusByName(pipeline)).toEqual({
      first: StepStatus.SUCCEEDED,
      second: StepStatus.PENDING,
    });
    expect(runner.calls).toEqual(['first']);
    expect(context.isExecuting(pipeline.id)).toBe(false);
    expect(context.cancel(pipeline.id)).toBe(false);
  });

  it('refuses to execute a pipeline twice', async () => {
    const pipeline = diamond();
    const scheduler = new PipelineScheduler(new ScriptedStepRunner(), context);
    await scheduler.execute(pipeline);

    await expect(scheduler.execute(pipeline)).rejects.toBeInstanceOf(PipelineAlreadyStartedError);
  });

  it('succeeds immediately for a pipeline without steps', async () => {
    const pipeline = new PipelineTemplate({ name: 'empty' }).instantiate('app-1', '1.0.0');

    const status = await new PipelineScheduler(new ScriptedStepRunner(), context).execute(pipeline);

    expect(status).toBe(PipelineStatus.SUCCEEDED);
  });

  it('registers the pipeline in the context', async () => {
    const pipeline = diamond();
    await new PipelineScheduler(new ScriptedStepRunner(), context).execute(pipeline);
    expect(context.get(pipeline.id)).toBe(pipeline);
  });

  it('emits lifecycle and log events in order', async () => {
    const pipeline = new PipelineTemplate({ name: 'single' })
      .addStep('only', PipelineStage.BUILD, 'make')
      .instantiate('app-1', '1.0.0');
    const runner: StepRunner = {
      run: async (command, ctx) => {
        ctx.log(`running ${command}`);
        ctx.log('warning: slow disk', 'warn');
        return { success: true, logText: 'done' };
      },
    };
    const events: PipelineEvent[] = [];
    const subscription = context.eventsFor(pipeline.id).subscribe((event) => events.push(event));

    await new PipelineScheduler(runner, context).execute(pipeline);
    subscription.unsubscribe();

    expect(events.map((event) => event.type)).toEqual([
      'pipeline.started',
      'step.started',
      'step.log',
      'step.log',
      'step.completed',
      'pipeline.completed',
    ]);
    expect(events[3]).toMatchObject({ line: 'warning: slow disk', level: 'warn', stepName: 'only' });
    expect(events[5]).toMatchObject({ status: 'succeeded', failureReason: null });
  });

  it('emits a blocked event for each dependent of a failure', async () => {
    const pipeline = diamond();
    const blocked: string[] = [];
    const subscription = context.events().subscribe((event) => {
      if (event.type === 'step.blocked') blocked.push(`${event.stepName}<-${event.blockedBy}`);
    });

    await new PipelineScheduler(
      new ScriptedStepRunner({ 'run A': { success: false } }),
      context,
    ).execute(pipeline);
    subscription.unsubscribe();

    expect(blocked).toEqual(['B<-A', 'C<-A', 'D<-B']);
  });

  it('never starts a step before its dependencies succeed', async () => {
    const pipeline = new PipelineTemplate({ name: 'layered' })
      .addStep('checkout', PipelineStage.SOURCE, 'checkout')
      .addStep('deps', PipelineStage.BUILD, 'deps', ['checkout'])
      .addStep('lint', PipelineStage.TEST, 'lint', ['deps'])
      .addStep('unit', PipelineStage.TEST, 'unit', ['deps'])
      .addStep('e2e', PipelineStage.TEST, 'e2e', ['deps'])
      .addStep('image', PipelineStage.BUILD, 'image', ['lint', 'unit'])
      .addStep('deploy', PipelineStage.DEPLOY, 'deploy', ['image', 'e2e'])
      .addStep('verify', PipelineStage.VERIFY, 'verify', ['deploy'])
      .instantiate('app-1', '1.0.0');
    const runner = new ScriptedStepRunner({
      lint: { delayMs: 15 },
      unit: { delayMs: 5 },
      e2e: { delayMs: 25 },
    });

    await new PipelineScheduler(runner, context, { maxConcurrency: 3 }).execute(pipeline);

    expect(pipeline.status).toBe(PipelineStatus.SUCCEEDED);
    for (const step of pipeline.steps) {
      for (const depId of step.dependencies) {
        expect(startTime(step)).toBeGreaterThanOrEqual(endTime(pipeline.getStep(depId)));
      }
    }
    expect(runner.calls.indexOf('image')).toBeGreaterThan(runner.calls.indexOf('unit'));
    expect(runner.calls.indexOf('deploy')).toBeGreaterThan(runner.calls.indexOf('e2e'));
  });
});

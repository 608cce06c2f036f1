import type { StepRunContext, StepRunner, StepRunResult } from '../engine';

export interface ScriptedOutcome {
  success?: boolean;
  logText?: string;
  delayMs?: number;
  /** Throw instead of returning a result. */
  error?: Error;
}

/**
 * Step runner for tests: outcome per command, records call order and the
 * highest number of steps that were running at the same time.
 */
export class ScriptedStepRunner implements StepRunner {
  readonly calls: string[] = [];
  readonly contexts: StepRunContext[] = [];
  maxRunning = 0;

  private running = 0;

  constructor(private readonly outcomes: Record<string, ScriptedOutcome> = {}) {}

  async run(command: string, context: StepRunContext): Promise<StepRunResult> {
    this.calls.push(command);
    this.contexts.push(context);
    this.running += 1;
    this.maxRunning = Math.max(this.maxRunning, this.running);

    const outcome = this.outcomes[command] ?? {};
    try {
      await new Promise((resolve) => setTimeout(resolve, outcome.delayMs ?? 1));
      if (outcome.error) throw outcome.error;
      return {
        success: outcome.success ?? true,
        logText: outcome.logText ?? `ran ${command}`,
      };
    } finally {
      this.running -= 1;
    }
  }
}

import { Injectable } from '@nestjs/common';
import { StepRunContext, StepRunner, StepRunResult } from '../engine';

/** Default runner: every command succeeds without touching the host. */
@Injectable()
export class SimulatedStepRunner implements StepRunner {
  async run(command: string, context: StepRunContext): Promise<StepRunResult> {
    context.log(`[simulated] ${command}`);
    return { success: true, logText: 'Step executed successfully' };
  }
}

import { Injectable, Logger } from '@nestjs/common';
import { spawn } from 'node:child_process';
import { PipelineStage, StepRunContext, StepRunner, StepRunResult } from '../engine';
import { DeploymentLockService } from '../locks/deployment-lock.service';
import { createLineBuffer } from './line-buffer';

const DEPLOY_ENVIRONMENTS = ['production', 'staging', 'dev', 'test'];

/** `./deploy.sh staging` deploys to staging; anything unrecognised counts as production. */
export function guessDeployEnvironment(command: string): string {
  const cmd = command.trim();
  const last = cmd.split(/\s+/).filter(Boolean).at(-1);
  if (last && DEPLOY_ENVIRONMENTS.includes(last)) return last;

  if (cmd.includes('production')) return 'production';
  if (cmd.includes('staging')) return 'staging';
  return 'production';
}

/**
 * Runs each step as a shell command, streaming stdout and stderr line by line.
 * Deploy steps hold the environment's deployment lock while they run.
 */
@Injectable()
export class ShellStepRunner implements StepRunner {
  private readonly logger = new Logger(ShellStepRunner.name);

  constructor(private readonly locks: DeploymentLockService) {}

  async run(command: string, context: StepRunContext): Promise<StepRunResult> {
    let releaseLock: (() => Promise<void>) | null = null;

    try {
      if (context.stage === PipelineStage.DEPLOY) {
        const env = guessDeployEnvironment(command);
        const lock = await this.locks.acquire(env, `${context.pipelineId}/${context.stepName}`, {
          signal: context.signal,
        });
        if (!lock.acquired) {
          return { success: false, logText: `Gave up waiting for deploy lock on ${env}` };
        }
        releaseLock = lock.release;
        context.log(`Acquired deploy lock for ${env}`);
      }

      const output: string[] = [];
      const exitCode = await this.spawnCommand(command, context, output);
      output.push(`exit code ${exitCode}`);
      return { success: exitCode === 0, logText: output.join('\n') };
    } finally {
      if (releaseLock) await releaseLock();
    }
  }

  private spawnCommand(command: string, context: StepRunContext, output: string[]): Promise<number> {
    return new Promise<number>((resolve) => {
      const child = spawn(command, { shell: true, env: process.env });

      const stdout = createLineBuffer((line) => {
        output.push(line);
        context.log(line, 'info');
      });
      const stderr = createLineBuffer((line) => {
        output.push(line);
        context.log(line, 'error');
      });

      const onAbort = () => {
        this.logger.warn(`Killing "${context.stepName}" in pipeline ${context.pipelineId}`);
        child.kill('SIGTERM');
      };
      context.signal.addEventListener('abort', onAbort, { once: true });

      child.stdout?.on('data', (buf: Buffer) => stdout.write(buf.toString('utf8')));
      child.stderr?.on('data', (buf: Buffer) => stderr.write(buf.toString('utf8')));

      child.on('close', (code) => {
        context.signal.removeEventListener('abort', onAbort);
        stdout.flush();
        stderr.flush();
        resolve(code ?? 1);
      });
      child.on('error', (err) => {
        context.signal.removeEventListener('abort', onAbort);
        stdout.flush();
        stderr.flush();
        output.push(`Execution error: ${err.message}`);
        context.log(`Execution error: ${err.message}`, 'error');
        resolve(1);
      });
    });
  }
}

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  Pipeline,
  PipelineAlreadyStartedError,
  PipelineNotFoundError,
  PipelineScheduler,
  PipelineSnapshot,
  PipelineStatus,
  SchedulerContext,
} from '../../engine';
import type { Env } from '../../config/env.validation';
import { TemplatesService } from '../templates/templates.service';

/**
 * Instantiates stored templates into live pipelines and hands them to the scheduler.
 * Pipelines live in the process's SchedulerContext, not in the database.
 */
@Injectable()
export class PipelinesService {
  private readonly logger = new Logger(PipelinesService.name);

  constructor(
    private readonly templates: TemplatesService,
    private readonly scheduler: PipelineScheduler,
    private readonly context: SchedulerContext,
    private readonly config: ConfigService<Env, true>,
  ) {}

  async instantiate(
    templateId: string,
    subjectId: string,
    version: string,
    variables: Record<string, string> = {},
  ): Promise<PipelineSnapshot> {
    const template = await this.templates.load(templateId);
    const pipeline = template.instantiate(subjectId, version, variables, {
      dependencyPolicy: this.config.get('PIPELINE_DEPENDENCY_POLICY', { infer: true }),
      variablePolicy: this.config.get('PIPELINE_VARIABLE_POLICY', { infer: true }),
    });
    this.context.register(pipeline);
    this.logger.log(
      `Pipeline ${pipeline.id} created from "${template.name}" for ${subjectId}@${version}`,
    );
    return pipeline.toJSON();
  }

  /** Runs the pipeline and resolves with its terminal status. */
  async execute(pipelineId: string): Promise<PipelineStatus> {
    return this.scheduler.execute(this.require(pipelineId));
  }

  /** Kicks off execution without waiting; the returned snapshot is already IN_PROGRESS. */
  start(pipelineId: string): PipelineSnapshot {
    const pipeline = this.require(pipelineId);
    if (pipeline.status !== PipelineStatus.PENDING) {
      throw new PipelineAlreadyStartedError(pipelineId, pipeline.status);
    }
    this.scheduler.execute(pipeline).catch((err: unknown) => {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error(`Pipeline ${pipelineId} execution failed: ${message}`);
    });
    return pipeline.toJSON();
  }

  /** False when the pipeline exists but is not running. */
  cancel(pipelineId: string): boolean {
    this.require(pipelineId);
    const cancelled = this.context.cancel(pipelineId);
    if (cancelled) this.logger.log(`Pipeline ${pipelineId} cancellation requested`);
    return cancelled;
  }

  findOne(pipelineId: string): PipelineSnapshot | null {
    return this.context.get(pipelineId)?.toJSON() ?? null;
  }

  /** Newest first. */
  findAll(subjectId?: string): PipelineSnapshot[] {
    return this.context
      .list()
      .filter((pipeline) => subjectId === undefined || pipeline.subjectId === subjectId)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .map((pipeline) => pipeline.toJSON());
  }

  private require(pipelineId: string): Pipeline {
    const pipeline = this.context.get(pipelineId);
    if (!pipeline) throw new PipelineNotFoundError(pipelineId);
    return pipeline;
  }
}

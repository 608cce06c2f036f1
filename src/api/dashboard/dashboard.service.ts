import { Injectable } from '@nestjs/common';
import { Pipeline, PipelineStatus, SchedulerContext } from '../../engine';
import { DeploymentLockService, HeldLock } from '../../locks/deployment-lock.service';

export interface PipelineStatsRow {
  templateId: string;
  templateName: string;
  totalRuns: number;
  succeeded: number;
  failed: number;
  aborted: number;
  inProgress: number;
  avgDurationSeconds: number | null;
  lastRunAt: string | null;
}

/** Aggregates over the pipelines this process knows about. */
@Injectable()
export class DashboardService {
  constructor(
    private readonly context: SchedulerContext,
    private readonly locks: DeploymentLockService,
  ) {}

  /** One row per template that has run at least once, most recently run first. */
  listPipelineStats(): PipelineStatsRow[] {
    const byTemplate = new Map<string, Pipeline[]>();
    for (const pipeline of this.context.list()) {
      if (pipeline.startedAt === null) continue;
      const group = byTemplate.get(pipeline.templateId) ?? [];
      group.push(pipeline);
      byTemplate.set(pipeline.templateId, group);
    }

    return [...byTemplate.values()]
      .map(toStatsRow)
      .sort(
        (a, b) =>
          (b.lastRunAt ?? '').localeCompare(a.lastRunAt ?? '') ||
          a.templateName.localeCompare(b.templateName),
      );
  }

  listDeploymentLocks(): HeldLock[] {
    return this.locks.listHeld().sort((a, b) => a.environment.localeCompare(b.environment));
  }
}

function toStatsRow(pipelines: Pipeline[]): PipelineStatsRow {
  const count = (status: PipelineStatus) => pipelines.filter((p) => p.status === status).length;

  const durations = pipelines.flatMap((p) =>
    p.startedAt && p.completedAt ? [(p.completedAt.getTime() - p.startedAt.getTime()) / 1000] : [],
  );
  const started = pipelines.flatMap((p) => (p.startedAt ? [p.startedAt.getTime()] : []));

  return {
    templateId: pipelines[0].templateId,
    templateName: pipelines[0].templateName,
    totalRuns: pipelines.length,
    succeeded: count(PipelineStatus.SUCCEEDED),
    failed: count(PipelineStatus.FAILED),
    aborted: count(PipelineStatus.ABORTED),
    inProgress: count(PipelineStatus.IN_PROGRESS),
    avgDurationSeconds:
      durations.length > 0 ? durations.reduce((sum, d) => sum + d, 0) / durations.length : null,
    lastRunAt: started.length > 0 ? new Date(Math.max(...started)).toISOString() : null,
  };
}

/**
 * Pipeline engine: templates, instantiated pipelines and the dependency-graph scheduler.
 * Framework-free; the Nest modules wire it to configuration, storage and HTTP.
 */
export * from './pipeline.types';
export * from './errors';
export * from './variable-binder';
export { DependencyGraph, DependencyNode } from './dependency-graph';
export { PipelineStep, PipelineStepInit } from './pipeline-step';
export { Pipeline, PipelineInit } from './pipeline';
export { PipelineTemplate, PipelineTemplateInit } from './pipeline-template';
export { StepLogLevel, StepRunContext, StepRunResult, StepRunner } from './step-runner';
export { PipelineEvent, PipelineEventType } from './pipeline-events';
export { DEFAULT_HISTORY_LIMIT, SchedulerContext, SchedulerContextOptions } from './scheduler-context';
export { DEFAULT_MAX_CONCURRENCY, PipelineScheduler, SchedulerOptions } from './pipeline-scheduler';

/**
 * Database entities: pipeline_templates, deployment_options.
 */
export { PipelineTemplateEntity, StepDefinitionRecord } from './pipeline-template.entity';
export { DeploymentOption } from './deployment-option.entity';

import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { z } from 'zod';
import { PipelineStage } from '../engine';

export const stepDefinitionSchema = z.object({
  name: z.string().trim().min(1).max(255),
  stage: z.nativeEnum(PipelineStage),
  commandTemplate: z.string().min(1),
  dependsOn: z.array(z.string().trim().min(1)).default([]),
});

export const createTemplateSchema = z.object({
  name: z.string().trim().min(1).max(255),
  description: z.string().default(''),
  steps: z.array(stepDefinitionSchema).default([]),
});

export type CreateTemplateInput = z.infer<typeof createTemplateSchema>;

export class StepDefinitionDto {
  @ApiProperty({ example: 'Run Tests', description: 'Unique within the template' })
  name!: string;

  @ApiProperty({ enum: PipelineStage, example: PipelineStage.TEST })
  stage!: PipelineStage;

  @ApiProperty({ example: 'docker run --rm ${APP_ID}:${VERSION} pytest -v' })
  commandTemplate!: string;

  @ApiPropertyOptional({
    type: [String],
    example: ['Build Docker Image'],
    description: 'Names of steps in the same template',
  })
  dependsOn?: string[];
}

export class CreateTemplateDto {
  @ApiProperty({ example: 'Microservice CI/CD Pipeline' })
  name!: string;

  @ApiPropertyOptional({ example: 'Pipeline for building and deploying microservice-based apps' })
  description?: string;

  @ApiProperty({ type: [StepDefinitionDto] })
  steps!: StepDefinitionDto[];
}

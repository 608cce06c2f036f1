import { ApiPropertyOptional } from '@nestjs/swagger';
import { z } from 'zod';
import { StepDefinitionDto, stepDefinitionSchema } from './create-template.dto';

export const updateTemplateSchema = z.object({
  name: z.string().trim().min(1).max(255).optional(),
  description: z.string().optional(),
  steps: z.array(stepDefinitionSchema).optional(),
});

export type UpdateTemplateInput = z.infer<typeof updateTemplateSchema>;

export class UpdateTemplateDto {
  @ApiPropertyOptional({ example: 'Standard CI/CD Pipeline' })
  name?: string;

  @ApiPropertyOptional()
  description?: string;

  @ApiPropertyOptional({ type: [StepDefinitionDto], description: 'Replaces all steps' })
  steps?: StepDefinitionDto[];
}

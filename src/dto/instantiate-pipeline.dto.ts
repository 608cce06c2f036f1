import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { z } from 'zod';

export const instantiatePipelineSchema = z.object({
  templateId: z.string().uuid(),
  subjectId: z.string().trim().min(1),
  version: z.string().trim().min(1),
  variables: z.record(z.string()).default({}),
});

export type InstantiatePipelineInput = z.infer<typeof instantiatePipelineSchema>;

export class InstantiatePipelineDto {
  @ApiProperty({ description: 'Template to instantiate' })
  templateId!: string;

  @ApiProperty({ example: 'app-123', description: 'Bound as ${APP_ID}' })
  subjectId!: string;

  @ApiProperty({ example: '1.0.0', description: 'Bound as ${VERSION}' })
  version!: string;

  @ApiPropertyOptional({
    description: 'Extra ${NAME} bindings; APP_ID and VERSION always come from the fields above',
    example: { BRANCH: 'main', ENV: 'staging' },
  })
  variables?: Record<string, string>;
}

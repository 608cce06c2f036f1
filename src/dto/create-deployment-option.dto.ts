import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { z } from 'zod';

export const createDeploymentOptionSchema = z.object({
  name: z.string().trim().min(1).max(255),
  optionType: z.string().trim().min(1).max(100),
  description: z.string().default(''),
  configuration: z.record(z.unknown()).default({}),
});

export type CreateDeploymentOptionInput = z.infer<typeof createDeploymentOptionSchema>;

export class CreateDeploymentOptionDto {
  @ApiProperty({ example: 'Kubernetes' })
  name!: string;

  @ApiProperty({ example: 'kubernetes' })
  optionType!: string;

  @ApiPropertyOptional({ example: 'Containerized deployment using Kubernetes' })
  description?: string;

  @ApiPropertyOptional({ example: { replicas: 2, cpu_limit: '500m' } })
  configuration?: Record<string, unknown>;
}

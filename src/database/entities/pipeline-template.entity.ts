import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';
import type { PipelineStage } from '../../engine';

/** Step blueprint as stored in pipeline_templates.steps (jsonb). */
export interface StepDefinitionRecord {
  name: string;
  stage: PipelineStage;
  commandTemplate: string;
  dependsOn: string[];
}

/**
 * Template catalog row: name, description and the ordered step blueprints.
 * Instantiated pipelines are not stored; they live in the scheduler context.
 */
@Entity('pipeline_templates')
@Index(['name'], { unique: true })
export class PipelineTemplateEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ length: 255 })
  name!: string;

  @Column('text', { default: '' })
  description!: string;

  @Column('jsonb')
  steps!: StepDefinitionRecord[];

  @CreateDateColumn({ type: 'timestamptz' })
  created_at!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updated_at!: Date;
}

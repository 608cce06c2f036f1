import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, Index } from 'typeorm';

/**
 * Where an app can be deployed (e.g. aws_lambda, kubernetes, standalone) and the
 * default configuration handed to that target.
 */
@Entity('deployment_options')
@Index(['option_type'])
export class DeploymentOption {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ length: 255 })
  name!: string;

  @Column({ length: 100 })
  option_type!: string;

  @Column('text', { default: '' })
  description!: string;

  @Column('jsonb', { default: {} })
  configuration!: Record<string, unknown>;

  @CreateDateColumn({ type: 'timestamptz' })
  created_at!: Date;
}

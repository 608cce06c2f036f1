import { Injectable } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { DeploymentOption } from '../../database/entities/deployment-option.entity';
import type { CreateDeploymentOptionInput } from '../../dto/create-deployment-option.dto';

@Injectable()
export class DeploymentOptionsService {
  constructor(private readonly dataSource: DataSource) {}

  private get repo() {
    return this.dataSource.getRepository(DeploymentOption);
  }

  /** All options, optionally only those of one type (e.g. 'kubernetes'). */
  async findAll(optionType?: string): Promise<DeploymentOption[]> {
    return this.repo.find({
      where: optionType ? { option_type: optionType } : undefined,
      order: { created_at: 'ASC' },
    });
  }

  async findOne(id: string): Promise<DeploymentOption | null> {
    return this.repo.findOne({ where: { id } });
  }

  async create(input: CreateDeploymentOptionInput): Promise<DeploymentOption> {
    const row = this.repo.create({
      name: input.name,
      option_type: input.optionType,
      description: input.description,
      configuration: input.configuration,
    });
    return this.repo.save(row);
  }
}

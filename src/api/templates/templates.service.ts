import { Injectable } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { PipelineTemplateEntity } from '../../database/entities/pipeline-template.entity';
import { DuplicateTemplateNameError, PipelineTemplate, TemplateNotFoundError } from '../../engine';
import type { CreateTemplateInput } from '../../dto/create-template.dto';
import type { UpdateTemplateInput } from '../../dto/update-template.dto';

/**
 * Template catalog. Rows are checked by building the engine's PipelineTemplate
 * before they are saved, so a stored template never has duplicate names or cycles.
 */
@Injectable()
export class TemplatesService {
  constructor(private readonly dataSource: DataSource) {}

  private get repo() {
    return this.dataSource.getRepository(PipelineTemplateEntity);
  }

  async findAll(): Promise<PipelineTemplateEntity[]> {
    return this.repo.find({ order: { name: 'ASC' } });
  }

  async findOne(id: string): Promise<PipelineTemplateEntity | null> {
    return this.repo.findOne({ where: { id } });
  }

  async findByName(name: string): Promise<PipelineTemplateEntity | null> {
    return this.repo.findOne({ where: { name } });
  }

  async create(input: CreateTemplateInput): Promise<PipelineTemplateEntity> {
    toEngineTemplate(input).validate();
    await this.assertNameAvailable(input.name);
    const row = this.repo.create(input);
    return this.repo.save(row);
  }

  async update(id: string, input: UpdateTemplateInput): Promise<PipelineTemplateEntity> {
    const row = await this.findOne(id);
    if (!row) throw new TemplateNotFoundError(id);

    const next = {
      name: input.name ?? row.name,
      description: input.description ?? row.description,
      steps: input.steps ?? row.steps,
    };
    toEngineTemplate(next).validate();
    if (next.name !== row.name) await this.assertNameAvailable(next.name, row.id);
    Object.assign(row, next);
    return this.repo.save(row);
  }

  async remove(id: string): Promise<void> {
    const result = await this.repo.delete(id);
    if (result.affected === 0) throw new TemplateNotFoundError(id);
  }

  /** pipeline_templates.name is unique; `exceptId` is the row being renamed. */
  private async assertNameAvailable(name: string, exceptId?: string): Promise<void> {
    const owner = await this.findByName(name);
    if (owner && owner.id !== exceptId) throw new DuplicateTemplateNameError(name);
  }

  /** Engine view of a stored template; throws TemplateNotFoundError. */
  async load(id: string): Promise<PipelineTemplate> {
    const row = await this.findOne(id);
    if (!row) throw new TemplateNotFoundError(id);
    return toEngineTemplate(row);
  }
}

export function toEngineTemplate(
  row: Pick<PipelineTemplateEntity, 'name' | 'description' | 'steps'> & { id?: string },
): PipelineTemplate {
  return new PipelineTemplate({
    id: row.id,
    name: row.name,
    description: row.description,
    steps: row.steps,
  });
}

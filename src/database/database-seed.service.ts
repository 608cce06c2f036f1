import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { PipelineTemplateEntity } from './entities/pipeline-template.entity';
import { DeploymentOption } from './entities/deployment-option.entity';
import { TEMPLATE_SEED } from './seed/template.seed';
import { DEPLOYMENT_OPTION_SEED } from './seed/deployment-option.seed';

/**
 * Runs seed data on app startup. Inserts the default templates and deployment
 * options only when their tables are empty.
 */
@Injectable()
export class DatabaseSeedService implements OnModuleInit {
  private readonly logger = new Logger(DatabaseSeedService.name);

  constructor(private readonly dataSource: DataSource) {}

  async onModuleInit(): Promise<void> {
    await this.seedTemplatesIfEmpty();
    await this.seedDeploymentOptionsIfEmpty();
  }

  async seedTemplatesIfEmpty(): Promise<number> {
    const repo = this.dataSource.getRepository(PipelineTemplateEntity);
    if ((await repo.count()) > 0) return 0;

    for (const row of TEMPLATE_SEED) {
      await repo.save(repo.create(row));
    }
    this.logger.log(`Seeded ${TEMPLATE_SEED.length} pipeline templates`);
    return TEMPLATE_SEED.length;
  }

  async seedDeploymentOptionsIfEmpty(): Promise<number> {
    const repo = this.dataSource.getRepository(DeploymentOption);
    if ((await repo.count()) > 0) return 0;

    for (const row of DEPLOYMENT_OPTION_SEED) {
      await repo.save(repo.create(row));
    }
    this.logger.log(`Seeded ${DEPLOYMENT_OPTION_SEED.length} deployment options`);
    return DEPLOYMENT_OPTION_SEED.length;
  }
}

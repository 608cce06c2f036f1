import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validateEnv } from './config/env.validation';
import { DatabaseModule } from './database/database.module';
import { LocksModule } from './locks/locks.module';
import { WorkerModule } from './worker/worker.module';
import { TemplatesModule } from './api/templates/templates.module';
import { PipelinesModule } from './api/pipelines/pipelines.module';
import { DeploymentOptionsModule } from './api/deployment-options/deployment-options.module';
import { DashboardModule } from './api/dashboard/dashboard.module';
import { StreamingModule } from './streaming/streaming.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate: validateEnv }),
    DatabaseModule,
    LocksModule,
    WorkerModule,
    TemplatesModule,
    PipelinesModule,
    DeploymentOptionsModule,
    DashboardModule,
    StreamingModule,
  ],
})
export class AppModule {}

import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { PipelineTemplateEntity, DeploymentOption } from './entities';
import { DatabaseSeedService } from './database-seed.service';
import type { Env } from '../config/env.validation';

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (config: ConfigService<Env, true>) => ({
        type: 'postgres',
        url: config.get('DATABASE_URL', { infer: true }),
        entities: [PipelineTemplateEntity, DeploymentOption],
        // Only one process should synchronize the database
        synchronize: config.get('SYNC_DATABASE', { infer: true }) === 'true',
      }),
      inject: [ConfigService],
    }),
  ],
  providers: [DatabaseSeedService],
})
export class DatabaseModule {}

import { Module } from '@nestjs/common';
import { DeploymentOptionsController } from './deployment-options.controller';
import { DeploymentOptionsService } from './deployment-options.service';

@Module({
  controllers: [DeploymentOptionsController],
  providers: [DeploymentOptionsService],
})
export class DeploymentOptionsModule {}

import { Global, Module } from '@nestjs/common';
import { DeploymentLockService } from './deployment-lock.service';

@Global()
@Module({
  providers: [DeploymentLockService],
  exports: [DeploymentLockService],
})
export class LocksModule {}

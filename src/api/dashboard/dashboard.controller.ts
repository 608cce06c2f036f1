import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { DashboardService } from './dashboard.service';

@ApiTags('dashboard')
@Controller('dashboard')
export class DashboardController {
  constructor(private readonly dashboardService: DashboardService) {}

  @Get('pipeline-stats')
  @ApiOperation({ summary: 'Run counts and durations per template' })
  pipelineStats() {
    return this.dashboardService.listPipelineStats();
  }

  @Get('deployment-locks')
  @ApiOperation({ summary: 'Deploy locks held by this process' })
  deploymentLocks() {
    return this.dashboardService.listDeploymentLocks();
  }
}

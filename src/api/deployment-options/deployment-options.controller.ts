import { Controller, Get, Post, Body, Param, Query, NotFoundException, ParseUUIDPipe } from '@nestjs/common';
import { ApiBody, ApiOperation, ApiQuery, ApiTags } from '@nestjs/swagger';
import { DeploymentOptionsService } from './deployment-options.service';
import { ZodValidationPipe } from '../../common/zod-validation.pipe';
import {
  CreateDeploymentOptionDto,
  CreateDeploymentOptionInput,
  createDeploymentOptionSchema,
} from '../../dto/create-deployment-option.dto';

@ApiTags('deployment-options')
@Controller('deployment-options')
export class DeploymentOptionsController {
  constructor(private readonly deploymentOptions: DeploymentOptionsService) {}

  @Get()
  @ApiOperation({ summary: 'List deployment options (optionally filtered by type)' })
  @ApiQuery({ name: 'type', required: false, example: 'kubernetes' })
  async findAll(@Query('type') type?: string) {
    return this.deploymentOptions.findAll(type);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get one deployment option' })
  async findOne(@Param('id', ParseUUIDPipe) id: string) {
    const option = await this.deploymentOptions.findOne(id);
    if (!option) throw new NotFoundException('Deployment option not found');
    return option;
  }

  @Post()
  @ApiOperation({ summary: 'Create a deployment option' })
  @ApiBody({ type: CreateDeploymentOptionDto })
  async create(
    @Body(new ZodValidationPipe(createDeploymentOptionSchema)) body: CreateDeploymentOptionInput,
  ) {
    return this.deploymentOptions.create(body);
  }
}

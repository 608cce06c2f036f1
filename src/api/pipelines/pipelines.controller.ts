import {
  Controller,
  Get,
  Post,
  Body,
  Param,
  Query,
  HttpCode,
  HttpStatus,
  NotFoundException,
  ParseUUIDPipe,
} from '@nestjs/common';
import { ApiBody, ApiOperation, ApiQuery, ApiTags } from '@nestjs/swagger';
import { PipelinesService } from './pipelines.service';
import { ZodValidationPipe } from '../../common/zod-validation.pipe';
import {
  InstantiatePipelineDto,
  InstantiatePipelineInput,
  instantiatePipelineSchema,
} from '../../dto/instantiate-pipeline.dto';

@ApiTags('pipelines')
@Controller('pipelines')
export class PipelinesController {
  constructor(private readonly pipelinesService: PipelinesService) {}

  @Get()
  @ApiOperation({ summary: 'List pipelines, newest first' })
  @ApiQuery({ name: 'subjectId', required: false })
  findAll(@Query('subjectId') subjectId?: string) {
    return this.pipelinesService.findAll(subjectId);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get one pipeline with its steps' })
  findOne(@Param('id', ParseUUIDPipe) id: string) {
    const pipeline = this.pipelinesService.findOne(id);
    if (!pipeline) throw new NotFoundException('Pipeline not found');
    return pipeline;
  }

  @Post()
  @ApiOperation({ summary: 'Instantiate a pipeline from a template' })
  @ApiBody({ type: InstantiatePipelineDto })
  async instantiate(
    @Body(new ZodValidationPipe(instantiatePipelineSchema)) body: InstantiatePipelineInput,
  ) {
    return this.pipelinesService.instantiate(
      body.templateId,
      body.subjectId,
      body.version,
      body.variables,
    );
  }

  @Post(':id/execute')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Run a pipeline and wait for its terminal status' })
  async execute(@Param('id', ParseUUIDPipe) id: string) {
    await this.pipelinesService.execute(id);
    return this.pipelinesService.findOne(id);
  }

  @Post(':id/start')
  @HttpCode(HttpStatus.ACCEPTED)
  @ApiOperation({ summary: 'Start a pipeline in the background' })
  start(@Param('id', ParseUUIDPipe) id: string) {
    return this.pipelinesService.start(id);
  }

  @Post(':id/cancel')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Stop starting new steps; running steps finish' })
  cancel(@Param('id', ParseUUIDPipe) id: string) {
    return { cancelled: this.pipelinesService.cancel(id) };
  }
}

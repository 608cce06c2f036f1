import {
  Controller,
  Get,
  Post,
  Patch,
  Delete,
  Body,
  Param,
  HttpCode,
  HttpStatus,
  NotFoundException,
  ParseUUIDPipe,
} from '@nestjs/common';
import { ApiBody, ApiOperation, ApiTags } from '@nestjs/swagger';
import { TemplatesService } from './templates.service';
import { ZodValidationPipe } from '../../common/zod-validation.pipe';
import {
  CreateTemplateDto,
  CreateTemplateInput,
  createTemplateSchema,
} from '../../dto/create-template.dto';
import {
  UpdateTemplateDto,
  UpdateTemplateInput,
  updateTemplateSchema,
} from '../../dto/update-template.dto';

@ApiTags('templates')
@Controller('templates')
export class TemplatesController {
  constructor(private readonly templatesService: TemplatesService) {}

  @Get()
  @ApiOperation({ summary: 'List pipeline templates' })
  async findAll() {
    return this.templatesService.findAll();
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get one pipeline template' })
  async findOne(@Param('id', ParseUUIDPipe) id: string) {
    const template = await this.templatesService.findOne(id);
    if (!template) throw new NotFoundException('Pipeline template not found');
    return template;
  }

  @Post()
  @ApiOperation({ summary: 'Create a pipeline template' })
  @ApiBody({ type: CreateTemplateDto })
  async create(@Body(new ZodValidationPipe(createTemplateSchema)) body: CreateTemplateInput) {
    return this.templatesService.create(body);
  }

  @Patch(':id')
  @ApiOperation({ summary: 'Update a pipeline template' })
  @ApiBody({ type: UpdateTemplateDto })
  async update(
    @Param('id', ParseUUIDPipe) id: string,
    @Body(new ZodValidationPipe(updateTemplateSchema)) body: UpdateTemplateInput,
  ) {
    return this.templatesService.update(id, body);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a pipeline template' })
  async remove(@Param('id', ParseUUIDPipe) id: string) {
    await this.templatesService.remove(id);
  }
}

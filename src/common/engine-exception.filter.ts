import {
  ArgumentsHost,
  Catch,
  ConflictException,
  HttpException,
  InternalServerErrorException,
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common';
import { BaseExceptionFilter } from '@nestjs/core';
import { PipelineEngineError } from '../engine';

/** HTTP status for each engine error code. */
export function toHttpException(err: PipelineEngineError): HttpException {
  switch (err.code) {
    case 'TEMPLATE_NOT_FOUND':
    case 'PIPELINE_NOT_FOUND':
      return new NotFoundException(err.message);
    case 'PIPELINE_ALREADY_STARTED':
      return new ConflictException(err.message);
    case 'DUPLICATE_TEMPLATE_NAME':
      return new ConflictException({ message: err.message, code: err.code });
    case 'ILLEGAL_STEP_TRANSITION':
      return new InternalServerErrorException(err.message);
    case 'DANGLING_DEPENDENCY':
    case 'CYCLIC_DEPENDENCY':
    case 'DUPLICATE_STEP_NAME':
    case 'UNRESOLVED_VARIABLE':
      return new UnprocessableEntityException({ message: err.message, code: err.code });
  }
}

/**
 * Global filter: engine errors thrown from services become HTTP errors.
 * Registered in main.ts with the http adapter.
 */
@Catch(PipelineEngineError)
export class EngineExceptionFilter extends BaseExceptionFilter {
  catch(err: PipelineEngineError, host: ArgumentsHost): void {
    super.catch(toHttpException(err), host);
  }
}

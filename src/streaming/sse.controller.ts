import { Controller, MessageEvent, Param, ParseUUIDPipe, Sse } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { Observable } from 'rxjs';
import { PipelineStreamService } from './pipeline-stream.service';

@Controller('stream')
@ApiTags('stream')
export class SSEController {
  constructor(private readonly stream: PipelineStreamService) {}

  /** GET /stream/pipelines/:pipelineId - step transitions and log lines of one pipeline. */
  @Sse('pipelines/:pipelineId')
  @ApiOperation({ summary: 'SSE: real-time events for one pipeline' })
  streamPipeline(@Param('pipelineId', ParseUUIDPipe) pipelineId: string): Observable<MessageEvent> {
    return this.stream.getStreamForPipeline(pipelineId);
  }

  @Sse('pipelines')
  @ApiOperation({ summary: 'SSE: real-time events for all pipelines' })
  streamAll(): Observable<MessageEvent> {
    return this.stream.getStream();
  }
}

import { Module } from '@nestjs/common';
import { PipelineStreamService } from './pipeline-stream.service';
import { SSEController } from './sse.controller';

@Module({
  controllers: [SSEController],
  providers: [PipelineStreamService],
})
export class StreamingModule {}

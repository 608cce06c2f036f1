import { Injectable, MessageEvent } from '@nestjs/common';
import { Observable } from 'rxjs';
import { map } from 'rxjs/operators';
import { PipelineEvent, SchedulerContext } from '../engine';

/**
 * SSE view of the scheduler's event stream. Each message carries the event
 * type as its SSE `type`, so browsers can addEventListener('step.log', ...).
 */
@Injectable()
export class PipelineStreamService {
  constructor(private readonly context: SchedulerContext) {}

  getStream(): Observable<MessageEvent> {
    return this.context.events().pipe(map(toMessage));
  }

  getStreamForPipeline(pipelineId: string): Observable<MessageEvent> {
    return this.context.eventsFor(pipelineId).pipe(map(toMessage));
  }
}

function toMessage(event: PipelineEvent): MessageEvent {
  return { type: event.type, data: event };
}

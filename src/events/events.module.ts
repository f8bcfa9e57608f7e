import { Module } from '@nestjs/common';
import { AssistantEventsListener } from './assistant.events.listener';

@Module({
  providers: [AssistantEventsListener],
})
export class EventsModule {}

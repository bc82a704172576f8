import { Module } from '@nestjs/common';
import { ChatEventsListener } from './chat.events.listener';

@Module({
  providers: [ChatEventsListener],
})
export class EventsModule {}

import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { HealthController } from './health/health.controller';
import { EventsModule } from './events/events.module';
import { MemoryModule } from './memory/memory.module';
import { ChatModule } from './chat/chat.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    EventEmitterModule.forRoot({ wildcard: true }),
    EventsModule,
    MemoryModule,
    ChatModule,
  ],
  controllers: [HealthController],
})
export class AppModule {}

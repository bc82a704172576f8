import { Module } from '@nestjs/common';
import { CoordinatorModule } from '../coordinator/coordinator.module';
import { ChatController } from './chat.controller';
import { ChatService } from './chat.service';
import { SessionStore } from './session/session.store';

@Module({
  imports: [CoordinatorModule],
  controllers: [ChatController],
  providers: [ChatService, SessionStore],
})
export class ChatModule {}

import { Module } from '@nestjs/common';
import { AgentsModule } from '../agents/agents.module';
import { CoordinatorService } from './coordinator.service';

@Module({
  imports: [AgentsModule],
  providers: [CoordinatorService],
  exports: [CoordinatorService],
})
export class CoordinatorModule {}

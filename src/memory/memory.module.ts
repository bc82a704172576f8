import { Module } from '@nestjs/common';
import { OllamaModule } from '../ollama/ollama.module';
import { VectorstoreModule } from '../vectorstore/vectorstore.module';
import { TemporalModule } from '../temporal/temporal.module';
import { MemoryService } from './memory.service';
import { MemoryController } from './memory.controller';
import { MEMORY_STORE } from './memory.types';

@Module({
  imports: [OllamaModule, VectorstoreModule, TemporalModule],
  providers: [
    MemoryService,
    { provide: MEMORY_STORE, useExisting: MemoryService },
  ],
  controllers: [MemoryController],
  exports: [MemoryService, MEMORY_STORE],
})
export class MemoryModule {}

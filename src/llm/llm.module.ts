import { Module } from '@nestjs/common';
import { OllamaModule } from '../ollama/ollama.module';
import { OllamaService } from '../ollama/ollama.service';
import { LLM_PROVIDER } from './llm.types';

@Module({
  imports: [OllamaModule],
  providers: [{ provide: LLM_PROVIDER, useExisting: OllamaService }],
  exports: [LLM_PROVIDER],
})
export class LlmModule {}

import { Module } from '@nestjs/common';
import { LlmModule } from '../llm/llm.module';
import { MemoryModule } from '../memory/memory.module';
import { PrivacyGuardianAgent } from './privacy/privacy-guardian.agent';
import { MemoryRetrievalAgent } from './retrieval/memory-retrieval.agent';
import { ConversationGeneratorAgent } from './generator/conversation-generator.agent';
import { MemoryManagerAgent } from './memory-manager/memory-manager.agent';
import { ConversationAnalystAgent } from './analyst/conversation-analyst.agent';

const AGENTS = [
  PrivacyGuardianAgent,
  MemoryRetrievalAgent,
  ConversationGeneratorAgent,
  MemoryManagerAgent,
  ConversationAnalystAgent,
];

@Module({
  imports: [LlmModule, MemoryModule],
  providers: AGENTS,
  exports: AGENTS,
})
export class AgentsModule {}

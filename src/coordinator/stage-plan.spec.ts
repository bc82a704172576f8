import { PrivacyMode, StageName, TaskType } from '../agents/agent.types';
import { SKIPPABLE, planStages } from './stage-plan';

describe('planStages', () => {
  it('runs the full memory pipeline in normal mode', () => {
    expect(planStages(PrivacyMode.NORMAL, TaskType.REPLY)).toEqual([
      StageName.PRIVACY_GUARDIAN,
      StageName.MEMORY_RETRIEVAL,
      StageName.CONVERSATION_GENERATOR,
      StageName.MEMORY_MANAGER,
    ]);
  });

  it('reads but never writes when memories are paused', () => {
    expect(planStages(PrivacyMode.PAUSE_MEMORIES, TaskType.REPLY_WITH_ANALYSIS)).toEqual([
      StageName.PRIVACY_GUARDIAN,
      StageName.MEMORY_RETRIEVAL,
      StageName.CONVERSATION_GENERATOR,
      StageName.CONVERSATION_ANALYST,
    ]);
  });

  it('keeps incognito turns to the guardian and generator, even with analysis', () => {
    expect(planStages(PrivacyMode.INCOGNITO, TaskType.REPLY_WITH_ANALYSIS)).toEqual([
      StageName.PRIVACY_GUARDIAN,
      StageName.CONVERSATION_GENERATOR,
    ]);
  });

  it('never lets the budget skip the guardian or the generator', () => {
    expect(SKIPPABLE.has(StageName.PRIVACY_GUARDIAN)).toBe(false);
    expect(SKIPPABLE.has(StageName.CONVERSATION_GENERATOR)).toBe(false);
  });
});

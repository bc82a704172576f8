import { PrivacyMode, StageName, TaskType } from '../agents/agent.types';

/** Stages run for a plain reply, per effective privacy mode, in execution order. */
export const STAGE_PLAN: Readonly<Record<PrivacyMode, readonly StageName[]>> = {
  [PrivacyMode.NORMAL]: [
    StageName.PRIVACY_GUARDIAN,
    StageName.MEMORY_RETRIEVAL,
    StageName.CONVERSATION_GENERATOR,
    StageName.MEMORY_MANAGER,
  ],
  [PrivacyMode.INCOGNITO]: [
    StageName.PRIVACY_GUARDIAN,
    StageName.CONVERSATION_GENERATOR,
  ],
  [PrivacyMode.PAUSE_MEMORIES]: [
    StageName.PRIVACY_GUARDIAN,
    StageName.MEMORY_RETRIEVAL,
    StageName.CONVERSATION_GENERATOR,
  ],
};

/** Stages the budget may drop. Guardian and generator always run. */
export const SKIPPABLE: ReadonlySet<StageName> = new Set([
  StageName.MEMORY_RETRIEVAL,
  StageName.MEMORY_MANAGER,
  StageName.CONVERSATION_ANALYST,
]);

export function planStages(mode: PrivacyMode, taskType: TaskType): StageName[] {
  const stages = [...STAGE_PLAN[mode]];
  if (
    taskType === TaskType.REPLY_WITH_ANALYSIS &&
    mode !== PrivacyMode.INCOGNITO
  ) {
    stages.push(StageName.CONVERSATION_ANALYST);
  }
  return stages;
}

import type { ConversationAnalysis } from '../agents/analyst/conversation-analyst.agent';
import type {
  AgentInput,
  PrivacyMode,
  StageContext,
  StageName,
} from '../agents/agent.types';
import { planStages } from './stage-plan';
import { TokenBudget } from './token-budget';
import type { OrchestrationResult, TurnError } from './coordinator.types';

/** Everything one turn accumulates while its stages run. */
export class TurnState {
  readonly budget: TokenBudget;
  readonly executed: StageName[] = [];
  readonly cancelled: StageName[] = [];
  readonly warnings: string[] = [];
  plan: StageName[];
  mode: PrivacyMode;
  memoryAllowed = true;
  memoriesUsed = 0;
  memoriesExtracted = 0;
  reply: string | null = null;
  analysis?: ConversationAnalysis;
  private context: StageContext;

  constructor(
    private readonly request: AgentInput,
    totalBudget: number,
  ) {
    this.budget = new TokenBudget(totalBudget);
    this.mode = request.privacyMode;
    this.plan = planStages(request.privacyMode, request.taskType);
    this.context = request.context;
  }

  get sessionId(): string {
    return this.request.sessionId;
  }

  get signal(): AbortSignal | undefined {
    return this.request.signal;
  }

  /** Each stage gets a fresh input; earlier inputs are never mutated. */
  input(): AgentInput {
    return { ...this.request, privacyMode: this.mode, context: this.context };
  }

  extend(fields: Partial<StageContext>): void {
    this.context = { ...this.context, ...fields };
  }

  replan(): void {
    this.plan = planStages(this.mode, this.request.taskType);
  }

  result(error?: TurnError): OrchestrationResult {
    const failed = error !== undefined;
    return {
      reply: failed ? null : this.reply,
      memoriesUsed: failed ? 0 : this.memoriesUsed,
      memoriesExtracted: failed ? 0 : this.memoriesExtracted,
      agentsExecuted: [...this.executed],
      tokensByAgent: this.budget.consumedByAgent(),
      totalTokens: this.budget.totalUsed(),
      warnings: [...this.warnings, ...this.budget.budgetWarnings()],
      success: !failed,
      privacyMode: this.mode,
      ...(error ? { error } : {}),
      ...(!failed && this.analysis ? { analysis: this.analysis } : {}),
    };
  }
}

import { StageName } from '../agents/agent.types';

export const DEFAULT_STAGE_BUDGETS: Readonly<Record<StageName, number>> = {
  [StageName.CONVERSATION_GENERATOR]: 2000,
  [StageName.MEMORY_MANAGER]: 1000,
  [StageName.MEMORY_RETRIEVAL]: 800,
  [StageName.PRIVACY_GUARDIAN]: 500,
  [StageName.CONVERSATION_ANALYST]: 600,
};

export const DEFAULT_TOTAL_BUDGET = 5000;
export const BUDGET_WARNING_RATIO = 0.8;

/**
 * Per-turn token accounting. Consumption only grows; overruns are reported
 * as warnings and never clipped.
 */
export class TokenBudget {
  private readonly consumed: Partial<Record<StageName, number>> = {};
  private readonly warnings: string[] = [];
  private thresholdWarned = false;

  constructor(
    readonly totalBudget: number = DEFAULT_TOTAL_BUDGET,
    readonly perAgentBudget: Readonly<Record<StageName, number>> = DEFAULT_STAGE_BUDGETS,
  ) {}

  record(stage: StageName, tokens: number): void {
    const used = Math.max(0, tokens);
    const stageTotal = (this.consumed[stage] ?? 0) + used;
    this.consumed[stage] = stageTotal;

    const limit = this.perAgentBudget[stage];
    if (stageTotal > limit) {
      this.warnings.push(
        `${stage} used ${stageTotal} tokens, over its budget of ${limit}.`,
      );
    }

    const total = this.totalUsed();
    if (
      !this.thresholdWarned &&
      total >= this.totalBudget * BUDGET_WARNING_RATIO
    ) {
      this.thresholdWarned = true;
      this.warnings.push(
        `Token usage at ${Math.round((total / this.totalBudget) * 100)}% of the turn budget (${total}/${this.totalBudget}).`,
      );
    }
  }

  totalUsed(): number {
    return Object.values(this.consumed).reduce((sum: number, n) => sum + (n ?? 0), 0);
  }

  isExhausted(): boolean {
    return this.totalUsed() > this.totalBudget;
  }

  consumedByAgent(): Partial<Record<StageName, number>> {
    return { ...this.consumed };
  }

  budgetWarnings(): string[] {
    return [...this.warnings];
  }
}

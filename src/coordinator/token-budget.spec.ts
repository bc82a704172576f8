import { StageName } from '../agents/agent.types';
import { TokenBudget } from './token-budget';

describe('TokenBudget', () => {
  it('sums consumption per stage and in total', () => {
    const budget = new TokenBudget(1000);
    budget.record(StageName.MEMORY_RETRIEVAL, 30);
    budget.record(StageName.CONVERSATION_GENERATOR, 200);
    budget.record(StageName.CONVERSATION_GENERATOR, 100);

    expect(budget.consumedByAgent()).toEqual({
      [StageName.MEMORY_RETRIEVAL]: 30,
      [StageName.CONVERSATION_GENERATOR]: 300,
    });
    expect(budget.totalUsed()).toBe(330);
    expect(budget.isExhausted()).toBe(false);
    expect(budget.budgetWarnings()).toEqual([]);
  });

  it('ignores negative counts', () => {
    const budget = new TokenBudget(1000);
    budget.record(StageName.PRIVACY_GUARDIAN, -5);

    expect(budget.totalUsed()).toBe(0);
  });

  it('warns once at the threshold and when a stage overruns', () => {
    const budget = new TokenBudget(1000);
    budget.record(StageName.PRIVACY_GUARDIAN, 600);
    budget.record(StageName.MEMORY_RETRIEVAL, 250);
    budget.record(StageName.MEMORY_MANAGER, 300);

    expect(budget.budgetWarnings()).toEqual([
      'PrivacyGuardian used 600 tokens, over its budget of 500.',
      'Token usage at 85% of the turn budget (850/1000).',
    ]);
    expect(budget.totalUsed()).toBe(1150);
    expect(budget.isExhausted()).toBe(true);
  });

  it('is not exhausted at exactly the budget', () => {
    const budget = new TokenBudget(100);
    budget.record(StageName.CONVERSATION_GENERATOR, 100);

    expect(budget.isExhausted()).toBe(false);
  });
});

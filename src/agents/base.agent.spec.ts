import { BaseAgent, StreamingAgent } from './base.agent';
import { type AgentInput, type AgentOutput, StageName } from './agent.types';
import { StoreError } from '../common/errors';
import { agentInput } from '../testing/fakes';

class ScriptedAgent extends BaseAgent<string> {
  readonly stage = StageName.MEMORY_RETRIEVAL;

  constructor(private readonly behaviour: (input: AgentInput) => Promise<AgentOutput<string>>) {
    super();
  }

  protected execute(input: AgentInput): Promise<AgentOutput<string>> {
    return this.behaviour(input);
  }

  succeed(data: string, tokens: number): AgentOutput<string> {
    return this.ok(data, tokens, ['careful']);
  }
}

class StutteringAgent extends StreamingAgent<string> {
  readonly stage = StageName.CONVERSATION_GENERATOR;

  protected async execute(): Promise<AgentOutput<string>> {
    return this.ok('unused');
  }

  protected async *executeStream(): AsyncGenerator<string, AgentOutput<string>, undefined> {
    yield 'partial';
    throw new Error('socket hang up');
  }
}

describe('BaseAgent', () => {
  it('returns the stage output with its timing', async () => {
    const agent: ScriptedAgent = new ScriptedAgent(async () => agent.succeed('done', 7));

    const output = await agent.run(agentInput());

    expect(output).toMatchObject({
      success: true,
      data: 'done',
      tokensUsed: 7,
      warnings: ['careful'],
    });
    expect(output.executionTimeMs).toBeGreaterThanOrEqual(0);
  });

  it('turns an unexpected error into an unhandled failure', async () => {
    const agent = new ScriptedAgent(async () => {
      throw new Error('boom');
    });

    const output = await agent.run(agentInput());

    expect(output.success).toBe(false);
    expect(output.error).toEqual({ message: 'boom', kind: 'UnhandledError' });
    expect(output.data).toBeUndefined();
    expect(output.tokensUsed).toBe(0);
  });

  it('keeps the kind of a classified error', async () => {
    const agent = new ScriptedAgent(async () => {
      throw new StoreError('store offline');
    });

    const output = await agent.run(agentInput());

    expect(output.error).toEqual({ message: 'store offline', kind: 'StoreError' });
  });
});

describe('StreamingAgent', () => {
  it('returns a failure after the fragments it managed to emit', async () => {
    const stream = new StutteringAgent().runStream(agentInput());

    const first = await stream.next();
    const last = await stream.next();

    expect(first).toEqual({ done: false, value: 'partial' });
    expect(last.done).toBe(true);
    expect(last.value).toMatchObject({
      success: false,
      error: { message: 'socket hang up', kind: 'UnhandledError' },
    });
  });
});

import { ConfigService } from '@nestjs/config';
import { ConversationGeneratorAgent, MAX_HISTORY_TURNS } from './conversation-generator.agent';
import { CONVERSATION_SYSTEM_PROMPT } from '../prompts';
import type { ConversationTurn } from '../agent.types';
import { ProviderFatalError, ProviderTransientError } from '../../common/errors';
import { FakeLlmProvider, agentInput } from '../../testing/fakes';

describe('ConversationGeneratorAgent', () => {
  let llm: FakeLlmProvider;
  let agent: ConversationGeneratorAgent;

  beforeEach(() => {
    llm = new FakeLlmProvider();
    agent = new ConversationGeneratorAgent(
      llm,
      new ConfigService({ LLM_RETRY_BASE_DELAY_MS: 0, LLM_MAX_TOKENS: 200 }),
    );
  });

  describe('buildMessages', () => {
    it('uses the bare system prompt without memory context', () => {
      const messages = agent.buildMessages(agentInput());

      expect(messages).toEqual([
        { role: 'system', content: CONVERSATION_SYSTEM_PROMPT },
        { role: 'user', content: 'What should I cook tonight?' },
      ]);
    });

    it('appends memory context and prefers the sanitized message', () => {
      const messages = agent.buildMessages(
        agentInput({
          message: 'Mail jane@example.com',
          context: {
            history: [{ role: 'user', content: 'Hi' }],
            memoryContext: '1. User is vegetarian',
            sanitizedMessage: 'Mail [EMAIL REDACTED]',
          },
        }),
      );

      expect(messages[0].content).toBe(
        `${CONVERSATION_SYSTEM_PROMPT}\n\nUser's memory context:\n1. User is vegetarian`,
      );
      expect(messages.slice(1)).toEqual([
        { role: 'user', content: 'Hi' },
        { role: 'user', content: 'Mail [EMAIL REDACTED]' },
      ]);
    });

    it('keeps only the most recent history', () => {
      const history: ConversationTurn[] = Array.from({ length: 25 }, (_, i) => ({
        role: i % 2 === 0 ? 'user' : 'assistant',
        content: `turn ${i}`,
      }));

      const messages = agent.buildMessages(agentInput({ context: { history } }));

      expect(messages).toHaveLength(MAX_HISTORY_TURNS + 2);
      expect(messages[1].content).toBe('turn 5');
    });
  });

  it('returns the completion with its token count', async () => {
    const output = await agent.run(agentInput());

    expect(output.success).toBe(true);
    expect(output.data).toEqual({ reply: 'Hello there!', finishReason: 'stop', attempts: 1 });
    expect(output.tokensUsed).toBe(120);
    expect(llm.calls[0].options).toMatchObject({ temperature: 0.7, maxTokens: 200 });
  });

  it('warns when the reply hit the token limit', async () => {
    llm.replies.push({ text: 'A long answer', tokensUsed: 200, finishReason: 'length' });

    const output = await agent.run(agentInput());

    expect(output.warnings).toEqual(['Reply was cut off at the maximum token length.']);
  });

  it('retries transient failures', async () => {
    llm.replies.push(
      new ProviderTransientError('rate limited', 429),
      new ProviderTransientError('rate limited', 429),
    );

    const output = await agent.run(agentInput());

    expect(output.success).toBe(true);
    expect(output.data?.attempts).toBe(3);
    expect(llm.calls).toHaveLength(3);
  });

  it('treats an empty completion as transient', async () => {
    llm.replies.push({ text: '  ', tokensUsed: 5, finishReason: 'stop' });

    const output = await agent.run(agentInput());

    expect(output.data?.attempts).toBe(2);
  });

  it('gives up after the configured attempts', async () => {
    llm.replies.push(
      new ProviderTransientError('down', 503),
      new ProviderTransientError('down', 503),
      new ProviderTransientError('down', 503),
    );

    const output = await agent.run(agentInput());

    expect(output.success).toBe(false);
    expect(output.error).toEqual({ message: 'down', kind: 'ProviderTransientError' });
    expect(llm.calls).toHaveLength(3);
  });

  it('does not retry fatal failures', async () => {
    llm.replies.push(new ProviderFatalError('bad request', 400));

    const output = await agent.run(agentInput());

    expect(output.error?.kind).toBe('ProviderFatalError');
    expect(llm.calls).toHaveLength(1);
  });

  it('stops before calling the model once cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    const output = await agent.run(agentInput({ signal: controller.signal }));

    expect(output.error?.kind).toBe('Cancelled');
    expect(llm.calls).toHaveLength(0);
  });

  describe('runStream', () => {
    async function drain(agentInputValue = agentInput()) {
      const stream = agent.runStream(agentInputValue);
      const fragments: string[] = [];
      let step = await stream.next();
      while (!step.done) {
        fragments.push(step.value);
        step = await stream.next();
      }
      return { fragments, output: step.value };
    }

    it('yields fragments and returns the aggregated reply', async () => {
      const { fragments, output } = await drain();

      expect(fragments).toEqual(['Hello', ' there!']);
      expect(output.data?.reply).toBe('Hello there!');
      expect(output.tokensUsed).toBe(120);
    });

    it('retries a stream that failed before its first fragment', async () => {
      llm.brokenStream = { fragments: [], error: new ProviderTransientError('reset') };

      const { fragments, output } = await drain();

      expect(fragments).toEqual(['Hello', ' there!']);
      expect(output.data?.attempts).toBe(2);
    });

    it('fails a stream that broke after emitting text', async () => {
      llm.brokenStream = { fragments: ['Hel'], error: new ProviderTransientError('reset') };

      const { fragments, output } = await drain();

      expect(fragments).toEqual(['Hel']);
      expect(output.success).toBe(false);
      expect(output.error?.kind).toBe('ProviderTransientError');
      expect(llm.calls).toHaveLength(1);
    });
  });
});

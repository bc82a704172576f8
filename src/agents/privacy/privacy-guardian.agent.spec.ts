import { PrivacyGuardianAgent } from './privacy-guardian.agent';
import { PrivacyMode } from '../agent.types';
import { agentInput } from '../../testing/fakes';

describe('PrivacyGuardianAgent', () => {
  const agent = new PrivacyGuardianAgent();

  it('passes clean messages through in normal mode', async () => {
    const output = await agent.run(agentInput());

    expect(output.success).toBe(true);
    expect(output.tokensUsed).toBe(0);
    expect(output.data).toEqual({
      allowed: true,
      warnings: [],
      sanitizedMode: PrivacyMode.NORMAL,
      sanitizedMessage: 'What should I cook tonight?',
      violations: [],
    });
  });

  it('warns about high-severity data in normal mode without changing it', async () => {
    const output = await agent.run(
      agentInput({ message: 'My card is 4111 1111 1111 1111' }),
    );

    expect(output.data?.sanitizedMessage).toBe('My card is 4111 1111 1111 1111');
    expect(output.warnings).toEqual([
      'Detected 1 high-severity sensitive item(s) (e.g. credit_card). This will be stored in your memory profile.',
    ]);
  });

  it('reports medium-severity findings in normal mode', async () => {
    const output = await agent.run(
      agentInput({ message: 'I was born on 03/14/1990' }),
    );

    expect(output.warnings).toEqual([
      'Detected 1 medium-severity sensitive item(s). This will be stored in your memory profile.',
    ]);
  });

  it('redacts findings in incognito mode', async () => {
    const output = await agent.run(
      agentInput({
        message: 'Reach me at jane@example.com or 555-123-4567',
        privacyMode: PrivacyMode.INCOGNITO,
      }),
    );

    expect(output.data?.sanitizedMessage).toBe(
      'Reach me at [EMAIL REDACTED] or [PHONE REDACTED]',
    );
    expect(output.data?.allowed).toBe(true);
    expect(output.warnings).toEqual([
      'Detected 2 sensitive item(s). Sensitive data has been redacted and will not be stored.',
    ]);
  });

  it('flags but does not block high-severity data in incognito mode', async () => {
    const output = await agent.run(
      agentInput({
        message: 'My SSN is 123-45-6789',
        privacyMode: PrivacyMode.INCOGNITO,
      }),
    );

    expect(output.success).toBe(true);
    expect(output.data?.sanitizedMessage).toBe(
      'My [FINANCIAL INFO REDACTED] is [SSN REDACTED]',
    );
    expect(output.warnings).toEqual([
      'Detected 2 sensitive item(s). Sensitive data has been redacted and will not be stored.',
      'High-severity data flagged: financial_info, ssn.',
    ]);
  });

  it('reminds the user that memories are paused', async () => {
    const output = await agent.run(
      agentInput({ privacyMode: PrivacyMode.PAUSE_MEMORIES }),
    );

    expect(output.data?.sanitizedMode).toBe(PrivacyMode.PAUSE_MEMORIES);
    expect(output.warnings).toEqual([
      'Memory paused: new information from this turn will not be saved.',
    ]);
  });

  it('downgrades to incognito when the profile differs from the session binding', async () => {
    const output = await agent.run(
      agentInput({
        profileId: 'personal',
        context: { history: [], sessionProfileId: 'work' },
      }),
    );

    expect(output.data?.allowed).toBe(false);
    expect(output.data?.sanitizedMode).toBe(PrivacyMode.INCOGNITO);
    expect(output.warnings).toEqual([
      'This session is bound to profile "work"; memory access for profile "personal" was denied and the turn runs in incognito mode.',
    ]);
  });

  it('accepts the profile the session is bound to', async () => {
    const output = await agent.run(
      agentInput({
        profileId: 'work',
        context: { history: [], sessionProfileId: 'work' },
      }),
    );

    expect(output.data?.allowed).toBe(true);
    expect(output.data?.sanitizedMode).toBe(PrivacyMode.NORMAL);
  });
});

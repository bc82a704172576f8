import { Logger } from '@nestjs/common';
import {
  type ErrorKind,
  errorKindOf,
  errorMessageOf,
} from '../common/errors';
import type {
  AgentFailure,
  AgentInput,
  AgentOutput,
  AgentSuccess,
  StageName,
} from './agent.types';

/**
 * Shared contract of every pipeline stage. Subclasses implement `execute`;
 * callers go through `run`, which times the stage and turns any thrown error
 * into a failed `AgentOutput`.
 */
export abstract class BaseAgent<T> {
  abstract readonly stage: StageName;
  protected readonly logger = new Logger(this.constructor.name);

  protected abstract execute(input: AgentInput): Promise<AgentOutput<T>>;

  async run(input: AgentInput): Promise<AgentOutput<T>> {
    const started = Date.now();
    try {
      const output = await this.execute(input);
      return { ...output, executionTimeMs: Date.now() - started };
    } catch (error) {
      return this.failure(error, input, Date.now() - started);
    }
  }

  protected ok(data: T, tokensUsed = 0, warnings: string[] = []): AgentSuccess<T> {
    return {
      success: true,
      data,
      tokensUsed,
      executionTimeMs: 0,
      ...(warnings.length > 0 ? { warnings } : {}),
    };
  }

  protected fail(message: string, kind: ErrorKind, tokensUsed = 0): AgentFailure {
    return {
      success: false,
      error: { message, kind },
      tokensUsed,
      executionTimeMs: 0,
    };
  }

  protected failure(
    error: unknown,
    input: AgentInput,
    executionTimeMs: number,
  ): AgentFailure {
    const kind = errorKindOf(error);
    const message = errorMessageOf(error);
    this.logger.error(
      `[${input.sessionId}] ${this.stage} failed (${kind}): ${message}`,
      error instanceof Error ? error.stack : undefined,
    );
    return { ...this.fail(message, kind), executionTimeMs };
  }
}

/** A stage that can also emit its result incrementally. */
export abstract class StreamingAgent<T> extends BaseAgent<T> {
  protected abstract executeStream(
    input: AgentInput,
  ): AsyncGenerator<string, AgentOutput<T>, undefined>;

  /** Yields text fragments; the generator's return value is the stage output. */
  async *runStream(
    input: AgentInput,
  ): AsyncGenerator<string, AgentOutput<T>, undefined> {
    const started = Date.now();
    try {
      const output = yield* this.executeStream(input);
      return { ...output, executionTimeMs: Date.now() - started };
    } catch (error) {
      return this.failure(error, input, Date.now() - started);
    }
  }
}

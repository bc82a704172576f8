import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import {
  type AgentInput,
  type AgentOutput,
  PrivacyMode,
  StageName,
  TaskType,
} from '../agents/agent.types';
import type { BaseAgent } from '../agents/base.agent';
import { PrivacyGuardianAgent } from '../agents/privacy/privacy-guardian.agent';
import { MemoryRetrievalAgent } from '../agents/retrieval/memory-retrieval.agent';
import { ConversationGeneratorAgent } from '../agents/generator/conversation-generator.agent';
import { MemoryManagerAgent } from '../agents/memory-manager/memory-manager.agent';
import { ConversationAnalystAgent } from '../agents/analyst/conversation-analyst.agent';
import { preview } from '../common/text.util';
import {
  CHAT_EVENTS,
  type PrivacyFlaggedEvent,
  type StageCompletedEvent,
  type StageSkippedEvent,
  type TurnCompletedEvent,
} from '../events/chat.events';
import { SKIPPABLE } from './stage-plan';
import { DEFAULT_TOTAL_BUDGET } from './token-budget';
import { TurnState } from './turn-state';
import type {
  OrchestrationResult,
  TurnChunk,
  TurnError,
} from './coordinator.types';

const CANCELLED: TurnError = {
  message: 'Turn cancelled before a reply was generated',
  kind: 'Cancelled',
};

/**
 * Runs one conversation turn through the stage pipeline:
 * privacy check, retrieval, generation, extraction and analysis.
 * Holds no per-turn state; concurrent turns share nothing but the agents.
 */
@Injectable()
export class CoordinatorService {
  private readonly logger = new Logger(CoordinatorService.name);
  private readonly totalBudget: number;

  constructor(
    private readonly guardian: PrivacyGuardianAgent,
    private readonly retrieval: MemoryRetrievalAgent,
    private readonly generator: ConversationGeneratorAgent,
    private readonly manager: MemoryManagerAgent,
    private readonly analyst: ConversationAnalystAgent,
    private readonly eventEmitter: EventEmitter2,
    config: ConfigService,
  ) {
    this.totalBudget = Number(
      config.get('TOKEN_BUDGET_TOTAL') ?? DEFAULT_TOTAL_BUDGET,
    );
  }

  async run(input: AgentInput): Promise<OrchestrationResult> {
    const invalid = this.validate(input);
    if (invalid) return this.rejected(input, invalid);

    const turn = new TurnState(input, this.totalBudget);
    this.logger.log(
      `[${input.sessionId}] "${preview(input.message)}" → ${input.privacyMode}/${input.taskType}`,
    );

    await this.beforeGeneration(turn);

    if (!this.mayStart(turn, StageName.CONVERSATION_GENERATOR)) {
      return this.finish(turn, CANCELLED);
    }
    const generated = await this.generator.run(turn.input());
    this.record(turn, StageName.CONVERSATION_GENERATOR, generated);
    if (!generated.success) {
      return this.finish(turn, generated.error);
    }
    turn.reply = generated.data.reply;
    turn.extend({ reply: generated.data.reply });

    await this.afterGeneration(turn);
    return this.finish(turn);
  }

  /**
   * Streaming variant: metadata once the context is ready, reply fragments
   * as they arrive, then the aggregated result after the remaining stages.
   */
  async *stream(input: AgentInput): AsyncGenerator<TurnChunk, void, undefined> {
    const invalid = this.validate(input);
    if (invalid) {
      const result = this.rejected(input, invalid);
      yield { type: 'error', error: invalid, result };
      return;
    }

    const turn = new TurnState(input, this.totalBudget);
    this.logger.log(
      `[${input.sessionId}] "${preview(input.message)}" → ${input.privacyMode}/${input.taskType} (stream)`,
    );

    await this.beforeGeneration(turn);
    yield {
      type: 'metadata',
      sessionId: input.sessionId,
      privacyMode: turn.mode,
      memoriesUsed: turn.memoriesUsed,
      warnings: [...turn.warnings],
    };

    if (!this.mayStart(turn, StageName.CONVERSATION_GENERATOR)) {
      yield { type: 'error', error: CANCELLED, result: this.finish(turn, CANCELLED) };
      return;
    }

    const fragments = this.generator.runStream(turn.input());
    let step = await fragments.next();
    while (!step.done) {
      yield { type: 'content', delta: step.value };
      step = await fragments.next();
    }

    const generated = step.value;
    this.record(turn, StageName.CONVERSATION_GENERATOR, generated);
    if (!generated.success) {
      yield {
        type: 'error',
        error: generated.error,
        result: this.finish(turn, generated.error),
      };
      return;
    }
    turn.reply = generated.data.reply;
    turn.extend({ reply: generated.data.reply });

    await this.afterGeneration(turn);
    yield { type: 'complete', result: this.finish(turn) };
  }

  validate(input: AgentInput): TurnError | null {
    const problems: string[] = [];
    if (!input.sessionId?.trim()) problems.push('sessionId is required');
    if (!input.userId?.trim()) problems.push('userId is required');
    if (!input.message?.trim()) problems.push('message must not be empty');
    if (!Object.values(PrivacyMode).includes(input.privacyMode)) {
      problems.push(`unknown privacy mode "${String(input.privacyMode)}"`);
    }
    if (!Object.values(TaskType).includes(input.taskType)) {
      problems.push(`unknown task type "${String(input.taskType)}"`);
    }
    return problems.length > 0
      ? { message: problems.join('; '), kind: 'ValidationError' }
      : null;
  }

  private async beforeGeneration(turn: TurnState): Promise<void> {
    const privacy = await this.runStage(turn, this.guardian);
    if (privacy?.success) {
      const check = privacy.data;
      turn.mode = check.sanitizedMode;
      turn.memoryAllowed = check.allowed;
      turn.extend({ sanitizedMessage: check.sanitizedMessage });
      if (check.violations.length > 0) {
        this.eventEmitter.emit(CHAT_EVENTS.PRIVACY_FLAGGED, {
          sessionId: turn.sessionId,
          violations: check.violations.map((v) => v.type),
          mode: check.sanitizedMode,
        } satisfies PrivacyFlaggedEvent);
      }
    } else if (privacy) {
      turn.mode = PrivacyMode.INCOGNITO;
      turn.memoryAllowed = false;
      turn.warnings.push(
        'Privacy check failed; this turn is handled as incognito.',
      );
    }
    turn.replan();

    const retrieved = await this.runStage(turn, this.retrieval);
    if (retrieved?.success) {
      turn.memoriesUsed = retrieved.data.memories.length;
      turn.extend({
        memories: retrieved.data.memories,
        ...(retrieved.data.context
          ? { memoryContext: retrieved.data.context }
          : {}),
      });
    }
  }

  private async afterGeneration(turn: TurnState): Promise<void> {
    if (turn.memoryAllowed) {
      const stored = await this.runStage(turn, this.manager);
      if (stored?.success) {
        turn.memoriesExtracted = stored.data.count;
      }
    }

    const analysed = await this.runStage(turn, this.analyst);
    if (analysed?.success) {
      turn.analysis = analysed.data;
    }

    if (turn.cancelled.length > 0) {
      turn.warnings.push(
        `Turn cancelled after the reply; skipped ${turn.cancelled.join(', ')}.`,
      );
    }
  }

  /** Runs a planned stage; null when it is not planned or may not start. */
  private async runStage<T>(
    turn: TurnState,
    agent: BaseAgent<T>,
  ): Promise<AgentOutput<T> | null> {
    if (!this.mayStart(turn, agent.stage)) return null;
    const output = await agent.run(turn.input());
    this.record(turn, agent.stage, output);
    return output;
  }

  private mayStart(turn: TurnState, stage: StageName): boolean {
    if (!turn.plan.includes(stage)) return false;

    if (turn.signal?.aborted) {
      turn.cancelled.push(stage);
      this.emitSkipped(turn, stage, 'cancelled');
      return false;
    }

    if (SKIPPABLE.has(stage) && turn.budget.isExhausted()) {
      turn.warnings.push(
        `Skipped ${stage}: token budget exhausted (${turn.budget.totalUsed()}/${turn.budget.totalBudget}).`,
      );
      this.emitSkipped(turn, stage, 'budget');
      return false;
    }
    return true;
  }

  private record<T>(
    turn: TurnState,
    stage: StageName,
    output: AgentOutput<T>,
  ): void {
    turn.executed.push(stage);
    turn.budget.record(stage, output.tokensUsed);
    turn.warnings.push(...(output.warnings ?? []));
    if (!output.success && stage !== StageName.CONVERSATION_GENERATOR) {
      turn.warnings.push(`${stage} failed: ${output.error.message}`);
    }

    this.eventEmitter.emit(CHAT_EVENTS.STAGE_COMPLETED, {
      sessionId: turn.sessionId,
      stage,
      success: output.success,
      tokensUsed: output.tokensUsed,
      executionTimeMs: output.executionTimeMs,
      ...(output.success ? {} : { errorKind: output.error.kind }),
    } satisfies StageCompletedEvent);
  }

  private emitSkipped(
    turn: TurnState,
    stage: StageName,
    reason: StageSkippedEvent['reason'],
  ): void {
    this.eventEmitter.emit(CHAT_EVENTS.STAGE_SKIPPED, {
      sessionId: turn.sessionId,
      stage,
      reason,
    } satisfies StageSkippedEvent);
  }

  private finish(turn: TurnState, error?: TurnError): OrchestrationResult {
    const result = turn.result(error);
    if (error) {
      this.logger.warn(
        `[${turn.sessionId}] Turn failed (${error.kind}): ${error.message}`,
      );
    }
    this.eventEmitter.emit(CHAT_EVENTS.TURN_COMPLETED, {
      sessionId: turn.sessionId,
      success: result.success,
      privacyMode: result.privacyMode,
      agentsExecuted: result.agentsExecuted,
      totalTokens: result.totalTokens,
      warningCount: result.warnings.length,
    } satisfies TurnCompletedEvent);
    return result;
  }

  private rejected(input: AgentInput, error: TurnError): OrchestrationResult {
    this.logger.warn(`[${input.sessionId}] Rejected turn: ${error.message}`);
    return {
      reply: null,
      memoriesUsed: 0,
      memoriesExtracted: 0,
      agentsExecuted: [],
      tokensByAgent: {},
      totalTokens: 0,
      warnings: [],
      success: false,
      privacyMode: input.privacyMode,
      error,
    };
  }
}

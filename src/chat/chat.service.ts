import {
  BadGatewayException,
  BadRequestException,
  type HttpException,
  Injectable,
  Logger,
  ServiceUnavailableException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import { CoordinatorService } from '../coordinator/coordinator.service';
import type {
  OrchestrationResult,
  TurnChunk,
  TurnError,
} from '../coordinator/coordinator.types';
import {
  type AgentInput,
  PrivacyMode,
  TaskType,
} from '../agents/agent.types';
import { SessionStore, type ChatSession } from './session/session.store';
import type { ChatTurnDto } from './chat.dto';
import type { ChatTurnResponse } from './chat.types';

@Injectable()
export class ChatService {
  private readonly logger = new Logger(ChatService.name);
  private readonly analysisInterval: number;

  constructor(
    private readonly coordinator: CoordinatorService,
    private readonly sessions: SessionStore,
    config: ConfigService,
  ) {
    this.analysisInterval = Number(config.get('ANALYSIS_INTERVAL') ?? 5);
  }

  async turn(dto: ChatTurnDto, signal?: AbortSignal): Promise<ChatTurnResponse> {
    const { session, input } = this.prepare(dto, signal);
    const result = await this.coordinator.run(input);
    if (!result.success) {
      throw this.toHttpError(result.error);
    }
    this.remember(session, dto.message, result);
    return { sessionId: session.sessionId, ...result };
  }

  async *stream(
    dto: ChatTurnDto,
    signal?: AbortSignal,
  ): AsyncGenerator<TurnChunk, void, undefined> {
    const { session, input } = this.prepare(dto, signal);
    for await (const chunk of this.coordinator.stream(input)) {
      if (chunk.type === 'complete') {
        this.remember(session, dto.message, chunk.result);
      }
      yield chunk;
    }
  }

  private prepare(
    dto: ChatTurnDto,
    signal?: AbortSignal,
  ): { session: ChatSession; input: AgentInput } {
    const sessionId = dto.sessionId ?? uuidv4();
    const profileId = dto.profileId ?? null;
    const session = this.sessions.getOrCreate(sessionId, dto.userId, profileId);
    if (session.userId !== dto.userId) {
      throw new BadRequestException(
        `Session ${sessionId} belongs to another user`,
      );
    }

    const analyze =
      dto.analyze === true ||
      (this.analysisInterval > 0 &&
        (session.userTurns + 1) % this.analysisInterval === 0);

    return {
      session,
      input: {
        sessionId,
        userId: dto.userId,
        message: dto.message,
        privacyMode: dto.privacyMode ?? PrivacyMode.NORMAL,
        profileId,
        taskType: analyze ? TaskType.REPLY_WITH_ANALYSIS : TaskType.REPLY,
        context: {
          history: session.history.map(({ role, content }) => ({ role, content })),
          sessionProfileId: session.profileId,
        },
        signal,
      },
    };
  }

  /** Incognito turns are answered but leave no trace in the session. */
  private remember(
    session: ChatSession,
    message: string,
    result: OrchestrationResult,
  ): void {
    if (result.reply === null || result.privacyMode === PrivacyMode.INCOGNITO) {
      return;
    }
    this.sessions.recordTurn(session.sessionId, message, result.reply);
  }

  private toHttpError(error?: TurnError): HttpException {
    const message = error?.message ?? 'Turn failed';
    this.logger.warn(`Turn failed (${error?.kind ?? 'UnhandledError'}): ${message}`);
    switch (error?.kind) {
      case 'ValidationError':
        return new BadRequestException(message);
      case 'Cancelled':
        return new ServiceUnavailableException(message);
      default:
        return new BadGatewayException(message);
    }
  }
}

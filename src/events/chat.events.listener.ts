import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { preview } from '../common/text.util';
import {
  CHAT_EVENTS,
  type MemoryAddedEvent,
  type MemorySearchedEvent,
  type PrivacyFlaggedEvent,
  type StageCompletedEvent,
  type StageSkippedEvent,
  type TurnCompletedEvent,
} from './chat.events';

@Injectable()
export class ChatEventsListener {
  private readonly logger = new Logger('ChatEvents');

  @OnEvent(CHAT_EVENTS.STAGE_COMPLETED)
  onStageCompleted(event: StageCompletedEvent) {
    const line = `[stage.completed] [${event.sessionId}] ${event.stage} success=${event.success} tokens=${event.tokensUsed} ${event.executionTimeMs}ms`;
    if (event.success) {
      this.logger.debug(line);
    } else {
      this.logger.warn(`${line} error=${event.errorKind ?? 'unknown'}`);
    }
  }

  @OnEvent(CHAT_EVENTS.STAGE_SKIPPED)
  onStageSkipped(event: StageSkippedEvent) {
    this.logger.warn(
      `[stage.skipped] [${event.sessionId}] ${event.stage} reason=${event.reason}`,
    );
  }

  @OnEvent(CHAT_EVENTS.TURN_COMPLETED)
  onTurnCompleted(event: TurnCompletedEvent) {
    this.logger.log(
      `[turn.completed] [${event.sessionId}] mode=${event.privacyMode} success=${event.success} stages=${event.agentsExecuted.join('>')} tokens=${event.totalTokens} warnings=${event.warningCount}`,
    );
  }

  @OnEvent(CHAT_EVENTS.PRIVACY_FLAGGED)
  onPrivacyFlagged(event: PrivacyFlaggedEvent) {
    this.logger.warn(
      `[privacy.flagged] [${event.sessionId}] mode=${event.mode} violations=[${event.violations.join(', ')}]`,
    );
  }

  @OnEvent(CHAT_EVENTS.MEMORY_ADDED)
  onMemoryAdded(event: MemoryAddedEvent) {
    this.logger.log(
      `[memory.added] id=${event.memoryId} ns=${event.namespace} source="${event.source}"${event.eventDate ? ` eventDate=${event.eventDate}` : ''} text="${preview(event.text)}"`,
    );
  }

  @OnEvent(CHAT_EVENTS.MEMORY_SEARCHED)
  onMemorySearched(event: MemorySearchedEvent) {
    this.logger.log(
      `[memory.searched] ns=${event.namespace} query="${event.query}" results=${event.resultCount}/${event.topK}`,
    );
  }
}

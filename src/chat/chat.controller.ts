import { Body, Controller, Post, Res } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import * as express from 'express';
import { ChatService } from './chat.service';
import { ChatTurnDto } from './chat.dto';
import type { ChatTurnResponse } from './chat.types';
import { errorKindOf, errorMessageOf } from '../common/errors';

/** Aborts when the client goes away before the response is finished. */
function disconnectSignal(res: express.Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) controller.abort();
  });
  return controller.signal;
}

@ApiTags('chat')
@Controller('chat')
export class ChatController {
  constructor(private readonly chat: ChatService) {}

  @Post('turn')
  async turn(
    @Body() dto: ChatTurnDto,
    @Res({ passthrough: true }) res: express.Response,
  ): Promise<ChatTurnResponse> {
    return this.chat.turn(dto, disconnectSignal(res));
  }

  @Post('turn/stream')
  async turnStream(
    @Body() dto: ChatTurnDto,
    @Res() res: express.Response,
  ): Promise<void> {
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no');
    res.flushHeaders();

    try {
      for await (const chunk of this.chat.stream(dto, disconnectSignal(res))) {
        res.write(`event: ${chunk.type}\ndata: ${JSON.stringify(chunk)}\n\n`);
      }
    } catch (error) {
      res.write(
        `event: error\ndata: ${JSON.stringify({
          type: 'error',
          error: { message: errorMessageOf(error), kind: errorKindOf(error) },
        })}\n\n`,
      );
    } finally {
      res.end();
    }
  }
}

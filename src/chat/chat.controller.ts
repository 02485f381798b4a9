/**
 * Chat HTTP Controller
 * POST /chat        - full answer as JSON
 * POST /chat/stream - answer tokens as server-sent events, then an `end` event
 */

import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
  Res,
  ValidationPipe,
} from '@nestjs/common';
import type { Response } from 'express';
import { ChatRequestDto } from './dto/chat-request.dto';
import type { ChatResponseDto } from './dto/chat-response.dto';
import { ChatService } from './chat.service';

@Controller('chat')
export class ChatController {
  private readonly logger = new Logger(ChatController.name);

  constructor(private readonly chatService: ChatService) {}

  /**
   * POST /chat
   *
   * Request:
   * {
   *   "query": "What does the onboarding guide say about VPN access?",
   *   "namespace": "dev",      // optional
   *   "topK": 5,               // optional
   *   "useWebFallback": true   // optional
   * }
   */
  @Post()
  @HttpCode(HttpStatus.OK)
  async chat(
    @Body(ValidationPipe) body: ChatRequestDto,
  ): Promise<ChatResponseDto> {
    this.logger.log(`Chat request: "${body.query}"`);
    return this.chatService.runChat(body);
  }

  /**
   * POST /chat/stream
   * Runs the full pipeline first, then emits `data: <token>` per answer
   * token and a final `event: end` carrying the JSON result.
   */
  @Post('stream')
  async stream(
    @Body(ValidationPipe) body: ChatRequestDto,
    @Res() res: Response,
  ): Promise<void> {
    this.logger.log(`Chat stream request: "${body.query}"`);

    const result = await this.chatService.runChat(body);

    res.status(HttpStatus.OK);
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');

    for (const token of this.chatService.tokenize(result.answer)) {
      res.write(`data: ${token}\n\n`);
    }
    res.write(`event: end\ndata: ${JSON.stringify(result)}\n\n`);
    res.end();
  }
}

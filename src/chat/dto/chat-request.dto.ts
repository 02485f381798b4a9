/**
 * Chat Request DTO
 * Input for POST /chat and POST /chat/stream
 */

import { Type } from 'class-transformer';
import {
  IsArray,
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';
import type { ChatMessage, ChatRequest, ChatRole } from '../types';

export class ChatMessageDto implements ChatMessage {
  @IsIn(['user', 'assistant'])
  role!: ChatRole;

  @IsString()
  content!: string;
}

export class ChatRequestDto implements ChatRequest {
  @IsString()
  @IsNotEmpty()
  query!: string;

  @IsOptional()
  @IsString()
  namespace?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(100)
  topK?: number;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  minScore?: number;

  @IsOptional()
  @IsBoolean()
  useWebFallback?: boolean; // default: true

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(20)
  maxWebResults?: number;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => ChatMessageDto)
  chatHistory?: ChatMessageDto[];
}

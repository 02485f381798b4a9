/**
 * Chat Response DTO
 * Output of POST /chat and the `end` event of POST /chat/stream
 */

import type { SourceSnippet, StageTimings, TraceMetadata } from '../types';

export interface ChatResponseDto {
  answer: string;
  sources: SourceSnippet[];
  timings: StageTimings;
  webFallbackUsed: boolean;
  topScore: number;
  cached: boolean;
  trace: TraceMetadata;
}

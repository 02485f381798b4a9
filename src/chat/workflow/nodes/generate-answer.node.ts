/**
 * Generate Answer Node
 * Builds the grounded prompt from history and every snippet (retrieved first,
 * then web) and asks the chat model for an answer.
 */

import { Logger } from '@nestjs/common';
import type { ResilienceService } from '../../../common/resilience/resilience.service';
import { buildRagMessages } from '../../prompts/rag-prompt';
import { CAPABILITY, type AnswerGenerationCapability } from '../../types';
import type { ChatStateType } from '../state/chat-state';

const logger = new Logger('GenerateAnswerNode');

export function createGenerateAnswerNode(
  answerGenerator: AnswerGenerationCapability,
  resilience: ResilienceService,
) {
  return async (state: ChatStateType): Promise<Partial<ChatStateType>> => {
    const sources = [...state.retrieved, ...state.webResults];
    const messages = buildRagMessages(state.chatHistory, state.query, sources);

    const startTime = Date.now();

    const answer = await resilience.call(CAPABILITY.ANSWER_GENERATION, () =>
      answerGenerator.generate(messages),
    );

    const generateMs = Date.now() - startTime;

    logger.log(
      `[GenerateAnswer] stage=5_generate status=done sources=${sources.length} answer_chars=${answer.length} duration=${generateMs}ms`,
    );

    return {
      answer,
      timings: { ...state.timings, generateMs },
      currentStage: 'generateAnswer',
    };
  };
}

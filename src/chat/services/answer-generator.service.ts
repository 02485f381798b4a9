/**
 * Answer Generator Service
 * Answer generation capability backed by the configured LangChain chat model.
 */

import { Injectable, Logger } from '@nestjs/common';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import type { BaseMessage, MessageContent } from '@langchain/core/messages';
import { LLMProviderFactory } from '../providers/llm-provider.factory';
import type { AnswerGenerationCapability } from '../types';

/**
 * Flatten model output to plain text; non-text content parts are dropped
 */
export function messageContentToText(content: MessageContent): string {
  if (typeof content === 'string') {
    return content;
  }
  return content
    .map((part) => (part.type === 'text' && 'text' in part ? String(part.text) : ''))
    .join('');
}

@Injectable()
export class AnswerGeneratorService implements AnswerGenerationCapability {
  private readonly logger = new Logger(AnswerGeneratorService.name);
  private model: BaseChatModel | null = null;

  constructor(private readonly llmFactory: LLMProviderFactory) {}

  async generate(messages: BaseMessage[]): Promise<string> {
    const response = await this.getModel().invoke(messages);
    const answer = messageContentToText(response.content).trim();

    this.logger.debug(
      `[AnswerGenerator] messages=${messages.length} answer_chars=${answer.length}`,
    );

    return answer;
  }

  private getModel(): BaseChatModel {
    if (!this.model) {
      this.model = this.llmFactory.createChatModel();
    }
    return this.model;
  }
}

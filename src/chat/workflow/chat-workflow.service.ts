/**
 * Chat Workflow Service
 * Builds the LangGraph.js StateGraph for the chat pipeline:
 * normalizeInput → retrieveContext → decideNext → [webSearch] → generateAnswer → formatResponse
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { END, START, StateGraph } from '@langchain/langgraph';
import { ResilienceService } from '../../common/resilience/resilience.service';
import {
  readPipelineSettings,
  type PipelineSettings,
} from '../../config/pipeline.settings';
import {
  ANSWER_GENERATOR,
  VECTOR_SEARCH,
  WEB_SEARCH,
  type AnswerGenerationCapability,
  type ChatRequest,
  type VectorSearchCapability,
  type WebSearchCapability,
} from '../types';
import {
  ChatState,
  createInitialState,
  type ChatStateType,
} from './state/chat-state';
import { createNormalizeInputNode } from './nodes/normalize-input.node';
import { createRetrieveContextNode } from './nodes/retrieve-context.node';
import {
  createDecideNextNode,
  routeAfterDecideNext,
} from './nodes/decide-next.node';
import { createWebSearchNode } from './nodes/web-search.node';
import { createGenerateAnswerNode } from './nodes/generate-answer.node';
import { createFormatResponseNode } from './nodes/format-response.node';

export interface ChatGraphDependencies {
  settings: PipelineSettings;
  resilience: ResilienceService;
  vectorSearch: VectorSearchCapability;
  webSearch: WebSearchCapability;
  answerGenerator: AnswerGenerationCapability;
}

export function buildChatGraph(deps: ChatGraphDependencies) {
  const graph = new StateGraph(ChatState)
    .addNode(
      'normalizeInput',
      createNormalizeInputNode(deps.settings, deps.webSearch),
    )
    .addNode(
      'retrieveContext',
      createRetrieveContextNode(
        deps.vectorSearch,
        deps.resilience,
        deps.settings.textField,
      ),
    )
    .addNode('decideNext', createDecideNextNode())
    .addNode('webSearch', createWebSearchNode(deps.webSearch, deps.resilience))
    .addNode(
      'generateAnswer',
      createGenerateAnswerNode(deps.answerGenerator, deps.resilience),
    )
    .addNode('formatResponse', createFormatResponseNode())
    .addEdge(START, 'normalizeInput')
    .addEdge('normalizeInput', 'retrieveContext')
    .addEdge('retrieveContext', 'decideNext')
    .addConditionalEdges('decideNext', routeAfterDecideNext, {
      web_search: 'webSearch',
      generate: 'generateAnswer',
    })
    .addEdge('webSearch', 'generateAnswer')
    .addEdge('generateAnswer', 'formatResponse')
    .addEdge('formatResponse', END);

  return graph.compile();
}

/**
 * Type guard to validate workflow result matches expected state type
 */
function isChatStateType(value: unknown): value is ChatStateType {
  if (!value || typeof value !== 'object') {
    return false;
  }

  return (
    'answer' in value &&
    typeof value.answer === 'string' &&
    'namespace' in value &&
    typeof value.namespace === 'string' &&
    'topScore' in value &&
    typeof value.topScore === 'number' &&
    'webFallbackUsed' in value &&
    typeof value.webFallbackUsed === 'boolean' &&
    'retrieved' in value &&
    Array.isArray(value.retrieved) &&
    'webResults' in value &&
    Array.isArray(value.webResults) &&
    'timings' in value &&
    typeof value.timings === 'object' &&
    value.timings !== null
  );
}

@Injectable()
export class ChatWorkflowService {
  private readonly logger = new Logger(ChatWorkflowService.name);
  private readonly workflow: ReturnType<typeof buildChatGraph>;

  constructor(
    configService: ConfigService,
    resilience: ResilienceService,
    @Inject(VECTOR_SEARCH) vectorSearch: VectorSearchCapability,
    @Inject(WEB_SEARCH) webSearch: WebSearchCapability,
    @Inject(ANSWER_GENERATOR) answerGenerator: AnswerGenerationCapability,
  ) {
    this.logger.log('Initializing LangGraph chat workflow...');

    this.workflow = buildChatGraph({
      settings: readPipelineSettings(configService),
      resilience,
      vectorSearch,
      webSearch,
      answerGenerator,
    });

    this.logger.log('✓ LangGraph chat workflow initialized successfully');
    this.logger.log(
      `✓ Web search tool: ${webSearch.isAvailable() ? 'available' : 'not configured'}`,
    );
  }

  /**
   * Run the graph once for a raw request.
   * Errors raised by any stage propagate unchanged.
   */
  async execute(request: ChatRequest): Promise<ChatStateType> {
    const startTime = Date.now();

    const result: unknown = await this.workflow.invoke(
      createInitialState(request),
    );

    if (!isChatStateType(result)) {
      throw new Error('Invalid workflow result - type guard failed');
    }

    this.logger.log(
      `Chat workflow completed: stage=${result.currentStage} sources=${result.retrieved.length + result.webResults.length} web_fallback=${result.webFallbackUsed} duration=${Date.now() - startTime}ms`,
    );

    return result;
  }
}

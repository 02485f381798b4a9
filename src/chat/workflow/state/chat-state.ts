/**
 * Chat Workflow State Definition
 * Working record threaded through the chat graph. One instance per request.
 */

import { Annotation } from '@langchain/langgraph';
import type {
  ChatMessage,
  ChatRequest,
  SourceSnippet,
  StageTimings,
} from '../../types';

/**
 * Bumped whenever a field is added, removed or changes meaning
 */
export const CHAT_STATE_VERSION = 1;

/**
 * Chat State Graph Definition
 * Following LangGraph.js Annotation.Root pattern
 */
export const ChatState = Annotation.Root({
  version: Annotation<number>,

  // Raw request as received
  request: Annotation<ChatRequest>,

  // ============================================
  // Normalized input (written by normalizeInput)
  // ============================================
  query: Annotation<string>,
  namespace: Annotation<string>,
  topK: Annotation<number>,
  minScore: Annotation<number>,
  useWebFallback: Annotation<boolean>,
  maxWebResults: Annotation<number>,
  chatHistory: Annotation<ChatMessage[]>,

  // ============================================
  // Retrieval
  // ============================================
  retrieved: Annotation<SourceSnippet[]>,
  topScore: Annotation<number>,

  // ============================================
  // Web fallback
  // ============================================
  webToolAvailable: Annotation<boolean>,
  webFallbackUsed: Annotation<boolean>,
  webResults: Annotation<SourceSnippet[]>,

  // ============================================
  // Output
  // ============================================
  answer: Annotation<string>,
  timings: Annotation<StageTimings>,

  // ============================================
  // Workflow metadata
  // ============================================
  currentStage: Annotation<string>,
});

export type ChatStateType = typeof ChatState.State;

/**
 * Initial state factory
 * Normalized fields hold placeholders until normalizeInput runs.
 */
export function createInitialState(request: ChatRequest): ChatStateType {
  return {
    version: CHAT_STATE_VERSION,
    request,

    query: request.query,
    namespace: '',
    topK: 0,
    minScore: 0,
    useWebFallback: false,
    maxWebResults: 0,
    chatHistory: [],

    retrieved: [],
    topScore: 0,

    webToolAvailable: false,
    webFallbackUsed: false,
    webResults: [],

    answer: '',
    timings: { retrieveMs: 0, webMs: 0, generateMs: 0, totalMs: 0 },

    currentStage: 'init',
  };
}

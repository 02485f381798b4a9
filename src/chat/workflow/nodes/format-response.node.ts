/**
 * Format Response Node
 * Terminal stage. Post-processing such as re-ranking would go here; today
 * the state passes through unchanged.
 */

import type { ChatStateType } from '../state/chat-state';

export function createFormatResponseNode() {
  return (_state: ChatStateType): Partial<ChatStateType> => ({
    currentStage: 'formatResponse',
  });
}

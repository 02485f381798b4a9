/**
 * RAG Prompt
 * Builds the message list for grounded answer generation: system
 * instructions, prior conversation turns, and one user prompt embedding the
 * numbered source snippets.
 */

import {
  AIMessage,
  HumanMessage,
  SystemMessage,
  type BaseMessage,
} from '@langchain/core/messages';
import type { ChatMessage, SourceSnippet } from '../types';

export const SYSTEM_PROMPT = `You are a focused research assistant for a retrieval-augmented generation (RAG) system.

You MUST:
- Answer the user's question using ONLY the provided context snippets.
- Treat each context snippet as a citation, referenced inline as [1], [2], etc.
- Prefer concise, clear explanations over long essays.
- Never fabricate facts that are not supported by the context.

If the context is insufficient to answer the question:
- Say that you do not know based on the current context.
- Suggest that the caller enable web search fallback for a more complete answer.`;

export function buildUserPrompt(question: string, context: string): string {
  return `You are given context snippets retrieved from a vector store and optionally from web search.

Each snippet is numbered like [1], [2], etc. Use these numbers to cite sources inline in your answer.

Context:
${context}

User question:
${question}

Instructions:
- Use the context to answer the question.
- Use inline citations like [1], [2] whenever you rely on a snippet.
- If you cannot answer from the context, say so explicitly and recommend using web search fallback.`;
}

/**
 * Numbered context block: header `[i] (source) title`, then url and text
 * when present, entries separated by a blank line.
 */
export function buildContextString(sources: readonly SourceSnippet[]): string {
  const lines: string[] = [];

  sources.forEach((snippet, index) => {
    const header = [`[${index + 1}] (${snippet.source || 'unknown'})`];
    if (snippet.title) {
      header.push(snippet.title);
    }
    lines.push(header.join(' '));

    if (snippet.url) {
      lines.push(snippet.url);
    }
    if (snippet.chunkText) {
      lines.push(snippet.chunkText);
    }
  });

  return lines.join('\n\n');
}

export function buildRagMessages(
  chatHistory: readonly ChatMessage[],
  question: string,
  sources: readonly SourceSnippet[],
): BaseMessage[] {
  const messages: BaseMessage[] = [new SystemMessage(SYSTEM_PROMPT)];

  for (const turn of chatHistory) {
    if (!turn.content) {
      continue;
    }
    messages.push(
      turn.role === 'assistant'
        ? new AIMessage(turn.content)
        : new HumanMessage(turn.content),
    );
  }

  messages.push(
    new HumanMessage(buildUserPrompt(question, buildContextString(sources))),
  );

  return messages;
}

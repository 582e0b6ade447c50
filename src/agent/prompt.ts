/**
 * Answer prompts
 *
 * Context chunks are numbered in rank order so the model (and a reader of
 * the prompt) can refer back to them.
 */

import type { RetrievedChunk } from '../search/index.js';

export const NO_CONTEXT_MARKER = 'No relevant information was found in the project documents.';

export const ANSWER_SYSTEM_PROMPT = [
  'You analyze grant applications and the documents that support them.',
  'Answer using only the numbered context passages from the project documents.',
  'When the passages do not contain the answer, say so plainly instead of guessing.',
  'Quote figures, dates and names exactly as they appear.',
].join(' ');

export function formatContext(chunks: RetrievedChunk[]): string {
  if (chunks.length === 0) {
    return NO_CONTEXT_MARKER;
  }
  return chunks.map((chunk, i) => `[${i + 1}] ${chunk.text}`).join('\n\n');
}

export function buildAnswerPrompt(question: string, chunks: RetrievedChunk[]): string {
  return `Context from project documents:\n${formatContext(chunks)}\n\nQuestion: ${question}`;
}

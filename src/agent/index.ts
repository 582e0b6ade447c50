/**
 * Agent Module
 *
 * Answers questions from a project's documents.
 *
 * @example
 * ```typescript
 * const ask = new AskService(retriever, generator, cache, { defaultTopK: 5, temperature: 0.3 });
 * const { answer, sources } = await ask.ask('alpha', 'What is the budget?');
 * ```
 */

export { AskService, distinctSources, type Answer, type AskOptions, type AskServiceOptions } from './ask.js';
export { ANSWER_SYSTEM_PROMPT, NO_CONTEXT_MARKER, buildAnswerPrompt, formatContext } from './prompt.js';

/**
 * LLM Module - Barrel Export
 *
 * The Anthropic SDK wrapper, the collaborator built on it, and the prompt
 * builders behind each collaborator task.
 *
 * @example
 * ```typescript
 * import { AnthropicClient, AnthropicCollaborator } from './llm';
 *
 * const collaborator = new AnthropicCollaborator(new AnthropicClient());
 * const facts = await collaborator.extractFacts({
 *   learnerText: 'What does a p-value measure?',
 *   tutorText: 'It is the probability of data at least this extreme if H0 holds...',
 * });
 * ```
 */

export { AnthropicClient } from './client';
export { AnthropicCollaborator, type CompletionClient } from './collaborator';

export type {
  LLMMessage,
  LLMConfig,
  LLMResponse,
  LLMErrorType,
  RequestOptions,
  CollaboratorTask,
  CandidateFact,
  Exchange,
  GradeResult,
  CollaboratorCallOptions,
  TutorCollaborator,
} from './types';
export { LLMError } from './types';

export * from './prompts';

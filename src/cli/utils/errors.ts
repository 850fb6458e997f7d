import { CollaboratorError } from '../../core/errors';
import { LLMError } from '../../llm/types';

/**
 * Errors that will fail every following turn too, so the command stops
 * instead of prompting again. Currently a rejected API key.
 */
export function isUnrecoverable(error: Error): boolean {
  return (
    error instanceof CollaboratorError &&
    error.cause instanceof LLMError &&
    error.cause.type === 'authentication'
  );
}

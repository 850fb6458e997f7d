/**
 * LLM Types and Interfaces
 *
 * Types for the Anthropic client wrapper and the collaborator contract the
 * tutor relies on. The rest of the application only sees
 * `TutorCollaborator`, so tests can swap the LLM for an in-process fake.
 */

import type { Fact, Interaction } from '../core/models';

/**
 * Represents a single message in a conversation.
 * Messages alternate between 'user' and 'assistant' roles.
 */
export interface LLMMessage {
  /** The role of who sent this message */
  role: 'user' | 'assistant';
  /** The text content of the message */
  content: string;
}

/**
 * Configuration options for LLM API calls.
 * All fields are optional and have sensible defaults.
 */
export interface LLMConfig {
  /**
   * The model to use for completions.
   * Defaults to ANTHROPIC_MODEL, or Claude Sonnet 4.5.
   */
  model?: string;

  /**
   * Maximum number of tokens to generate in the response.
   * Defaults to ANTHROPIC_MAX_TOKENS, or 1024.
   */
  maxTokens?: number;

  /**
   * Controls randomness in the response (0.0 to 1.0).
   * Defaults to 0.7; the classification prompts use 0.
   */
  temperature?: number;

  /**
   * Milliseconds before the request is abandoned.
   * Defaults to COLLABORATOR_TIMEOUT_MS, or 30 000.
   */
  timeoutMs?: number;
}

/**
 * Per-request options that are not part of the model configuration.
 */
export interface RequestOptions {
  /** Aborts the request when signalled */
  signal?: AbortSignal;
  /** System prompt for this request only */
  system?: string;
}

/**
 * Result of a complete (non-streaming) API call.
 * Contains the response text and usage information.
 */
export interface LLMResponse {
  /** The generated response text */
  text: string;

  /**
   * Token usage information for billing/tracking.
   * Null if usage data is not available.
   */
  usage: {
    /** Number of tokens in the input (prompt) */
    inputTokens: number;
    /** Number of tokens in the output (response) */
    outputTokens: number;
  } | null;

  /** The reason the model stopped generating */
  stopReason: string | null;
}

/**
 * Error types that can occur when calling the LLM API.
 * These help distinguish between different failure modes.
 */
export type LLMErrorType =
  | 'authentication'   // Invalid or missing API key
  | 'rate_limit'       // Too many requests
  | 'invalid_request'  // Bad request parameters
  | 'server_error'     // Anthropic server error
  | 'network'          // Network/connection error
  | 'timeout'          // Request took too long
  | 'aborted'          // Cancelled through an AbortSignal
  | 'unknown';         // Unexpected error

/**
 * Custom error class for LLM-related errors.
 * Includes the error type for easier handling.
 */
export class LLMError extends Error {
  /** The type of error that occurred */
  readonly type: LLMErrorType;

  constructor(message: string, type: LLMErrorType, cause?: Error) {
    super(message, cause ? { cause } : undefined);
    this.name = 'LLMError';
    this.type = type;
  }
}

// =============================================================================
// Collaborator Contract
// =============================================================================

/**
 * The tasks the tutor delegates to the language model.
 * Carried by `CollaboratorError` so callers can tell which step degraded.
 */
export type CollaboratorTask =
  | 'respond'
  | 'extract'
  | 'similarity'
  | 'contradiction'
  | 'generate_question'
  | 'grade';

/**
 * A statement worth remembering, pulled from a tutoring exchange.
 */
export interface CandidateFact {
  /** Normalized concept label, e.g. 'standard_deviation' */
  conceptKey: string;
  content: string;
}

/**
 * One learner message and the tutor's reply to it.
 */
export interface Exchange {
  learnerText: string;
  tutorText: string;
}

export interface GradeResult {
  correct: boolean;
  /** Short explanation shown to the learner */
  feedback: string;
}

export interface CollaboratorCallOptions {
  signal?: AbortSignal;
}

/**
 * What the tutor needs from a language model. Every method rejects with
 * `CollaboratorError` when the model is unreachable, times out, is aborted
 * or answers with something unusable.
 */
export interface TutorCollaborator {
  /** The tutor's reply to `learnerText`, given the recent conversation */
  respond(
    history: readonly Interaction[],
    learnerText: string,
    options?: CollaboratorCallOptions
  ): Promise<string>;

  extractFacts(exchange: Exchange, options?: CollaboratorCallOptions): Promise<CandidateFact[]>;

  /** Semantic similarity of two statements in [0, 1] */
  scoreSimilarity(existing: string, candidate: string, options?: CollaboratorCallOptions): Promise<number>;

  /** Whether the candidate contradicts the existing statement */
  detectContradiction(
    existing: string,
    candidate: string,
    options?: CollaboratorCallOptions
  ): Promise<boolean>;

  generateQuestion(fact: Fact, options?: CollaboratorCallOptions): Promise<string>;

  gradeAnswer(
    fact: Fact,
    question: string,
    answer: string,
    options?: CollaboratorCallOptions
  ): Promise<GradeResult>;
}

/**
 * Anthropic Collaborator
 *
 * Implements `TutorCollaborator` on top of a completion client. Each task
 * builds its prompt, makes one request and parses the reply. Transport
 * failures (including timeouts and aborts) and replies that do not parse
 * are both raised as `CollaboratorError`, tagged with the task, so callers
 * can degrade a single step without inspecting SDK errors.
 */

import type { Fact, Interaction } from '../core/models';
import { CollaboratorError } from '../core/errors';
import {
  LLMError,
  type CandidateFact,
  type CollaboratorCallOptions,
  type CollaboratorTask,
  type Exchange,
  type GradeResult,
  type LLMConfig,
  type LLMMessage,
  type LLMResponse,
  type RequestOptions,
  type TutorCollaborator,
} from './types';
import {
  buildContradictionPrompt,
  buildFactExtractorPrompt,
  buildGradingPrompt,
  buildQuestionPrompt,
  buildSimilarityPrompt,
  buildTutorMessages,
  buildTutorSystemPrompt,
  parseContradictionResponse,
  parseFactExtractionResponse,
  parseGradingResponse,
  parseQuestionResponse,
  parseSimilarityResponse,
} from './prompts';

/**
 * The part of `AnthropicClient` the collaborator uses.
 */
export interface CompletionClient {
  complete(messages: string | LLMMessage[], config?: LLMConfig, options?: RequestOptions): Promise<LLMResponse>;
}

// Judgement tasks should be repeatable
const DETERMINISTIC: LLMConfig = { temperature: 0 };

/**
 * @example
 * ```typescript
 * const collaborator = new AnthropicCollaborator(new AnthropicClient());
 * const reply = await collaborator.respond([], 'Why divide by n - 1?');
 * ```
 */
export class AnthropicCollaborator implements TutorCollaborator {
  constructor(private readonly client: CompletionClient) {}

  async respond(
    history: readonly Interaction[],
    learnerText: string,
    options: CollaboratorCallOptions = {}
  ): Promise<string> {
    const text = await this.request(
      'respond',
      buildTutorMessages(history, learnerText),
      {},
      { system: buildTutorSystemPrompt(), signal: options.signal }
    );
    const reply = text.trim();
    if (!reply) {
      throw new CollaboratorError('respond', 'empty reply');
    }
    return reply;
  }

  async extractFacts(exchange: Exchange, options: CollaboratorCallOptions = {}): Promise<CandidateFact[]> {
    const text = await this.request('extract', buildFactExtractorPrompt(exchange), DETERMINISTIC, options);
    return this.parsed('extract', text, parseFactExtractionResponse(text));
  }

  async scoreSimilarity(
    existing: string,
    candidate: string,
    options: CollaboratorCallOptions = {}
  ): Promise<number> {
    const text = await this.request('similarity', buildSimilarityPrompt(existing, candidate), DETERMINISTIC, options);
    return this.parsed('similarity', text, parseSimilarityResponse(text));
  }

  async detectContradiction(
    existing: string,
    candidate: string,
    options: CollaboratorCallOptions = {}
  ): Promise<boolean> {
    const text = await this.request(
      'contradiction',
      buildContradictionPrompt(existing, candidate),
      DETERMINISTIC,
      options
    );
    return this.parsed('contradiction', text, parseContradictionResponse(text));
  }

  async generateQuestion(fact: Fact, options: CollaboratorCallOptions = {}): Promise<string> {
    const text = await this.request('generate_question', buildQuestionPrompt(fact), {}, options);
    return this.parsed('generate_question', text, parseQuestionResponse(text));
  }

  async gradeAnswer(
    fact: Fact,
    question: string,
    answer: string,
    options: CollaboratorCallOptions = {}
  ): Promise<GradeResult> {
    const text = await this.request('grade', buildGradingPrompt(fact, question, answer), DETERMINISTIC, options);
    return this.parsed('grade', text, parseGradingResponse(text));
  }

  /**
   * Sends one request, converting transport errors to CollaboratorError.
   */
  private async request(
    task: CollaboratorTask,
    messages: string | LLMMessage[],
    config: LLMConfig,
    options: RequestOptions
  ): Promise<string> {
    try {
      const response = await this.client.complete(messages, config, options);
      return response.text;
    } catch (error) {
      if (error instanceof LLMError) {
        throw new CollaboratorError(task, `${error.type}: ${error.message}`, { cause: error });
      }
      throw error;
    }
  }

  private parsed<T>(task: CollaboratorTask, text: string, value: T | null): T {
    if (value === null) {
      throw new CollaboratorError(task, `malformed response: ${text.substring(0, 100)}`);
    }
    return value;
  }
}
